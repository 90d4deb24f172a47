import { describe, it, expect } from 'vitest';
import { DiceRoller } from '../../../src/engine/core/DiceRoller';
import {
  type EnemyBattleView,
  ENEMY_ARCHETYPES,
  getArchetype,
  isEnemyArchetypeId,
} from '../../../src/engine/data/EnemyArchetypes';
import { ScriptedRoller } from '../../helpers/ScriptedRoller';

const wounded: EnemyBattleView = {
  currentHealth: 900,
  maxHealth: 2000,
  numHealingPotions: 1,
  healingPotionHealth: 400,
  baseAttackDamage: 100,
  numPoisonTurns: 2,
  playerPoisoned: false,
};

const healthy: EnemyBattleView = { ...wounded, currentHealth: 2000 };

describe('EnemyArchetypes', () => {
  describe('randomEncounter', () => {
    const archetype = getArchetype('randomEncounter');

    it('keeps max health a positive multiple of 2000 within the experience bound', () => {
      const roller = new DiceRoller(2024);
      for (const exp of [0, 1, 24, 25, 49, 50, 99, 150, 333, 1000]) {
        for (let i = 0; i < 25; i++) {
          const { maxHealth } = archetype.initializeAttributes(exp, roller);
          expect(maxHealth).toBeGreaterThan(0);
          expect(maxHealth % 2000).toBe(0);
          expect(maxHealth).toBeLessThanOrEqual((exp / 25 + 2) * 2000);
        }
      }
    });

    it('rolls a fresh player an easy opponent', () => {
      const roller = new ScriptedRoller().pushInt(0, 1).pushInt(1, 2).pushInt(0, 1);
      expect(archetype.initializeAttributes(0, roller)).toEqual({
        maxHealth: 2000,
        numHealingPotions: 1,
        healingPotionHealth: 400,
        baseAttackDamage: 100,
        numPoisonTurns: 2,
        criticalChance: 0,
        dodgeChance: 0,
      });
    });

    it('scales with experience', () => {
      const roller = new ScriptedRoller().pushInt(3, 5).pushInt(1, 2).pushInt(2, 3);
      const attrs = archetype.initializeAttributes(100, roller);

      expect(attrs.maxHealth).toBe(8000);
      expect(attrs.numHealingPotions).toBe(3);
      expect(attrs.healingPotionHealth).toBe(1600);
      expect(attrs.baseAttackDamage).toBe(500);
      expect(attrs.numPoisonTurns).toBe(2);
      expect(attrs.criticalChance).toBeCloseTo(1);
      expect(attrs.dodgeChance).toBeCloseTo(0.5);
    });

    it('poisons for three turns from 150 experience', () => {
      const roller = new DiceRoller(1);
      expect(archetype.initializeAttributes(149, roller).numPoisonTurns).toBe(2);
      expect(archetype.initializeAttributes(150, roller).numPoisonTurns).toBe(3);
    });

    it('is worth five experience per whole thousand health', () => {
      expect(archetype.getExperienceGainOnDeath(2000)).toBe(10);
      expect(archetype.getExperienceGainOnDeath(2999)).toBe(10);
      expect(archetype.getExperienceGainOnDeath(8000)).toBe(40);
    });

    describe('generateBattleAction', () => {
      it('drinks a potion on a heal roll of 25 or less', () => {
        const roller = new ScriptedRoller().pushD100(25);
        const decision = archetype.generateBattleAction(wounded, roller);

        expect(decision.usedPotion).toBe(true);
        expect(decision.action).toEqual({ name: 'Healing Potion', type: 'HEALING', magnitude: 400, duration: 0 });
      });

      it('falls back to the base hit when the heal roll fails and the move roll is 50 or less', () => {
        const roller = new ScriptedRoller().pushD100(26, 50);
        const decision = archetype.generateBattleAction(wounded, roller);

        expect(decision.usedPotion).toBe(false);
        expect(decision.action).toEqual({ name: 'Magic Bolt', type: 'HIT', magnitude: 100, duration: 0 });
      });

      it('never heals without potions', () => {
        const roller = new ScriptedRoller().pushD100(96);
        const decision = archetype.generateBattleAction({ ...wounded, numHealingPotions: 0 }, roller);

        expect(decision.action).toEqual({ name: 'Poisoned Dagger', type: 'POISON', magnitude: 50, duration: 2 });
        expect(roller.drawCount()).toBe(1);
      });

      it('does not roll to heal at exactly half health', () => {
        const roller = new ScriptedRoller().pushD100(1);
        const decision = archetype.generateBattleAction({ ...wounded, currentHealth: 1000 }, roller);

        expect(decision.action.name).toBe('Magic Bolt');
        expect(roller.drawCount()).toBe(1);
      });

      it('walks the move thresholds', () => {
        const pick = (roll: number) =>
          archetype.generateBattleAction(healthy, new ScriptedRoller().pushD100(roll)).action;

        expect(pick(100)).toEqual({ name: 'Poisoned Dagger', type: 'POISON', magnitude: 50, duration: 2 });
        expect(pick(96).type).toBe('POISON');
        expect(pick(95)).toEqual({ name: 'Ice Shard', type: 'HIT', magnitude: 150, duration: 0 });
        expect(pick(86).name).toBe('Ice Shard');
        expect(pick(85)).toEqual({ name: 'Boulder Bash', type: 'HIT', magnitude: 125, duration: 0 });
        expect(pick(51).name).toBe('Boulder Bash');
        expect(pick(50).name).toBe('Magic Bolt');
        expect(pick(1).name).toBe('Magic Bolt');
      });

      it('does not poison an already poisoned player', () => {
        const roller = new ScriptedRoller().pushD100(99);
        const decision = archetype.generateBattleAction({ ...healthy, playerPoisoned: true }, roller);
        expect(decision.action).toEqual({ name: 'Ice Shard', type: 'HIT', magnitude: 150, duration: 0 });
      });
    });
  });

  describe('mainEnemy', () => {
    const archetype = getArchetype('mainEnemy');

    it('rolls its stats in a fixed draw order', () => {
      const roller = new ScriptedRoller()
        .pushInt(250, 500)
        .pushInt(0, 900)
        .pushInt(2, 3)
        .pushInt(0, 1)
        .pushInt(150, 200);
      const attrs = archetype.initializeAttributes(0, roller);

      expect(attrs.maxHealth).toBe(1215);
      expect(attrs.numHealingPotions).toBe(2);
      expect(attrs.healingPotionHealth).toBe(364);
      expect(attrs.baseAttackDamage).toBe(250);
      expect(attrs.numPoisonTurns).toBe(2);
      expect(attrs.criticalChance).toBeCloseTo(0.1);
      expect(attrs.dodgeChance).toBeCloseTo(0.1);
      expect(roller.remaining()).toBe(0);
    });

    it('is worth seventy experience per thousand health', () => {
      expect(archetype.getExperienceGainOnDeath(1215)).toBe(85);
      expect(archetype.getExperienceGainOnDeath(2000)).toBe(140);
    });

    it('heals on a roll of 30 or less', () => {
      const roller = new ScriptedRoller().pushD100(30);
      expect(archetype.generateBattleAction(wounded, roller).usedPotion).toBe(true);
    });

    it('uses its own move names', () => {
      const pick = (roll: number) =>
        archetype.generateBattleAction(healthy, new ScriptedRoller().pushD100(roll)).action;
      expect(pick(90)).toEqual({ name: 'Black Magic', type: 'HIT', magnitude: 175, duration: 0 });
      expect(pick(60)).toEqual({ name: 'Magic Blast', type: 'HIT', magnitude: 135, duration: 0 });
      expect(pick(97).name).toBe('Poisonous Magic');
    });
  });

  describe('boss', () => {
    const archetype = getArchetype('boss');

    it('starts with one strong potion', () => {
      const roller = new ScriptedRoller().pushInt(0, 1).pushInt(0, 1);
      expect(archetype.initializeAttributes(0, roller)).toEqual({
        maxHealth: 2000,
        numHealingPotions: 1,
        healingPotionHealth: 800,
        baseAttackDamage: 100,
        numPoisonTurns: 2,
        criticalChance: 0,
        dodgeChance: 0,
      });
    });

    it('heals on a roll of 40 or less', () => {
      const roller = new ScriptedRoller().pushD100(40);
      expect(archetype.generateBattleAction(wounded, roller).action.name).toBe('Powerful Healing Potion');
    });

    it('is worth five experience per whole thousand health', () => {
      expect(archetype.getExperienceGainOnDeath(6000)).toBe(30);
    });
  });

  describe('finalBoss', () => {
    const archetype = getArchetype('finalBoss');

    it('has twice the base health of a boss and a half-health potion', () => {
      const roller = new ScriptedRoller().pushInt(0, 1).pushInt(0, 1);
      const attrs = archetype.initializeAttributes(0, roller);
      expect(attrs.maxHealth).toBe(4000);
      expect(attrs.healingPotionHealth).toBe(2000);
      expect(attrs.baseAttackDamage).toBe(100);
    });

    it('poisons for three turns from 300 experience', () => {
      const roller = new DiceRoller(8);
      expect(archetype.initializeAttributes(299, roller).numPoisonTurns).toBe(2);
      expect(archetype.initializeAttributes(300, roller).numPoisonTurns).toBe(3);
    });

    it('gives no experience', () => {
      expect(archetype.getExperienceGainOnDeath(40000)).toBe(0);
    });

    it('heals on a roll of 50 or less', () => {
      const roller = new ScriptedRoller().pushD100(50);
      expect(archetype.generateBattleAction(wounded, roller).action.name).toBe('Heavenly Healing');
    });
  });

  describe('lookup', () => {
    it('recognizes archetype ids', () => {
      expect(Object.keys(ENEMY_ARCHETYPES)).toEqual(['randomEncounter', 'mainEnemy', 'boss', 'finalBoss']);
      expect(isEnemyArchetypeId('boss')).toBe(true);
      expect(isEnemyArchetypeId('dragon')).toBe(false);
      expect(isEnemyArchetypeId('toString')).toBe(false);
      expect(isEnemyArchetypeId(3)).toBe(false);
    });
  });
});
