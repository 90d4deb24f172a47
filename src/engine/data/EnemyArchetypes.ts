import { type BattleAction, createAction } from '../actions/Action';
import type { DiceRoller } from '../core/DiceRoller';
import type { EnemyArchetypeId } from '../components';
import { POISON_DAMAGE_MULTIPLIER } from '../../config';

export interface EnemyAttributes {
  maxHealth: number;
  numHealingPotions: number;
  healingPotionHealth: number;
  baseAttackDamage: number;
  numPoisonTurns: number;
  criticalChance: number;
  dodgeChance: number;
}

// What an enemy may look at when picking its move
export interface EnemyBattleView {
  currentHealth: number;
  maxHealth: number;
  numHealingPotions: number;
  healingPotionHealth: number;
  baseAttackDamage: number;
  numPoisonTurns: number;
  playerPoisoned: boolean;
}

export interface EnemyDecision {
  action: BattleAction;
  /** The action drinks one of the enemy's potions */
  usedPotion: boolean;
}

export interface EnemyArchetype {
  readonly id: EnemyArchetypeId;
  readonly displayName: string;
  initializeAttributes(playerExp: number, roller: DiceRoller): EnemyAttributes;
  generateBattleAction(view: EnemyBattleView, roller: DiceRoller): EnemyDecision;
  getExperienceGainOnDeath(maxHealth: number): number;
}

interface HitMove {
  name: string;
  bonus: number;
}

// Move set shared by every archetype; only names and numbers differ
export interface MoveTable {
  healChance: number;
  healName: string;
  poisonName: string;
  strongHit: HitMove;
  mediumHit: HitMove;
  baseHitName: string;
}

const POISON_THRESHOLD = 95;
const STRONG_HIT_THRESHOLD = 85;
const MEDIUM_HIT_THRESHOLD = 50;

/**
 * Picks a move from `table`.
 *
 * Below half health with a potion left, a D100 at or under `healChance`
 * drinks it. Otherwise a fresh D100 walks the thresholds from the top:
 * over 95 poisons (skipped while the player is already poisoned), over 85
 * is the strong hit, over 50 the medium hit, anything else the base hit.
 */
export function chooseMove(
  table: MoveTable,
  view: EnemyBattleView,
  roller: DiceRoller
): EnemyDecision {
  if (view.currentHealth < Math.floor(view.maxHealth / 2) && view.numHealingPotions > 0) {
    if (roller.rollD100() <= table.healChance) {
      return {
        action: createAction(table.healName, 'HEALING', view.healingPotionHealth, 0),
        usedPotion: true,
      };
    }
  }

  const choice = roller.rollD100();
  const base = view.baseAttackDamage;

  if (choice > POISON_THRESHOLD && !view.playerPoisoned) {
    return {
      action: createAction(
        table.poisonName,
        'POISON',
        Math.floor(base * POISON_DAMAGE_MULTIPLIER),
        view.numPoisonTurns
      ),
      usedPotion: false,
    };
  }
  if (choice > STRONG_HIT_THRESHOLD) {
    return {
      action: createAction(table.strongHit.name, 'HIT', base + table.strongHit.bonus),
      usedPotion: false,
    };
  }
  if (choice > MEDIUM_HIT_THRESHOLD) {
    return {
      action: createAction(table.mediumHit.name, 'HIT', base + table.mediumHit.bonus),
      usedPotion: false,
    };
  }
  return { action: createAction(table.baseHitName, 'HIT', base), usedPotion: false };
}

// rand(0..k), inclusive
function upTo(roller: DiceRoller, k: number): number {
  return roller.nextInt(Math.max(0, Math.floor(k)) + 1);
}

const randomEncounter: EnemyArchetype = {
  id: 'randomEncounter',
  displayName: 'Wandering Spirit',
  initializeAttributes(playerExp, roller) {
    const maxHealth = (upTo(roller, Math.floor(playerExp / 25)) + 1) * 2000;
    const numHealingPotions = Math.floor(playerExp / 50) + upTo(roller, 1);
    const baseAttackDamage =
      upTo(roller, Math.floor(playerExp / 50)) * 100 + playerExp * 2 + 100;
    return {
      maxHealth,
      numHealingPotions,
      healingPotionHealth: Math.floor(0.2 * maxHealth),
      baseAttackDamage,
      numPoisonTurns: playerExp >= 150 ? 3 : 2,
      criticalChance: 0.01 * playerExp,
      dodgeChance: 0.005 * playerExp,
    };
  },
  generateBattleAction(view, roller) {
    return chooseMove(
      {
        healChance: 25,
        healName: 'Healing Potion',
        poisonName: 'Poisoned Dagger',
        strongHit: { name: 'Ice Shard', bonus: 50 },
        mediumHit: { name: 'Boulder Bash', bonus: 25 },
        baseHitName: 'Magic Bolt',
      },
      view,
      roller
    );
  },
  getExperienceGainOnDeath(maxHealth) {
    // floor before multiplying: 2999 health is worth the same as 2000
    return Math.floor(maxHealth / 1000) * 5;
  },
};

const mainEnemy: EnemyArchetype = {
  id: 'mainEnemy',
  displayName: "Marduk's Follower",
  initializeAttributes(playerExp, roller) {
    const rough =
      Math.floor((playerExp / 1100 + 0.9) * 2000) + upTo(roller, 499) - 250;
    const spread = Math.max(1, Math.floor(rough / 2));
    const maxHealth = roller.nextInt(spread) + Math.floor((rough * 2.7) / 4);
    const numHealingPotions = Math.floor(playerExp / 600) + upTo(roller, 2);
    const baseAttackDamage =
      15 * upTo(roller, Math.floor(Math.sqrt(playerExp))) + 200 + upTo(roller, 199) - 100;
    return {
      maxHealth,
      numHealingPotions,
      healingPotionHealth: Math.floor(0.3 * maxHealth),
      baseAttackDamage,
      numPoisonTurns: playerExp >= 1000 ? 3 : 2,
      criticalChance: 0.00008 * playerExp + 0.1,
      dodgeChance: 0.00003 * playerExp + 0.1,
    };
  },
  generateBattleAction(view, roller) {
    return chooseMove(
      {
        healChance: 30,
        healName: 'Healing Potion',
        poisonName: 'Poisonous Magic',
        strongHit: { name: 'Black Magic', bonus: 75 },
        mediumHit: { name: 'Magic Blast', bonus: 35 },
        baseHitName: 'Magic Bolt',
      },
      view,
      roller
    );
  },
  getExperienceGainOnDeath(maxHealth) {
    return Math.floor((maxHealth / 1000) * 70);
  },
};

const boss: EnemyArchetype = {
  id: 'boss',
  displayName: "Marduk's Lieutenant",
  initializeAttributes(playerExp, roller) {
    const maxHealth = (upTo(roller, Math.floor(playerExp / 25)) + 1) * 2000;
    const baseAttackDamage =
      upTo(roller, Math.floor(playerExp / 10)) * 200 + playerExp * 2 + 100;
    return {
      maxHealth,
      numHealingPotions: 1,
      healingPotionHealth: Math.floor(0.4 * maxHealth),
      baseAttackDamage,
      numPoisonTurns: playerExp >= 150 ? 3 : 2,
      criticalChance: 0.02 * playerExp,
      dodgeChance: 0.01 * playerExp,
    };
  },
  generateBattleAction(view, roller) {
    return chooseMove(
      {
        healChance: 40,
        healName: 'Powerful Healing Potion',
        poisonName: 'Deadly Poisonous Dagger',
        strongHit: { name: 'Inferno Lash', bonus: 100 },
        mediumHit: { name: 'Crystal Spike', bonus: 50 },
        baseHitName: 'Shadow Strike',
      },
      view,
      roller
    );
  },
  getExperienceGainOnDeath(maxHealth) {
    return Math.floor(maxHealth / 1000) * 5;
  },
};

const finalBoss: EnemyArchetype = {
  id: 'finalBoss',
  displayName: 'Marduk',
  initializeAttributes(playerExp, roller) {
    const maxHealth = (upTo(roller, Math.floor(playerExp / 25)) + 1) * 4000;
    const baseAttackDamage =
      upTo(roller, Math.floor(playerExp / 50)) * 300 + playerExp * 2 + 100;
    return {
      maxHealth,
      numHealingPotions: 1,
      healingPotionHealth: Math.floor(0.5 * maxHealth),
      baseAttackDamage,
      numPoisonTurns: playerExp >= 300 ? 3 : 2,
      criticalChance: 0.025 * playerExp,
      dodgeChance: 0.01 * playerExp,
    };
  },
  generateBattleAction(view, roller) {
    return chooseMove(
      {
        healChance: 50,
        healName: 'Heavenly Healing',
        poisonName: 'Interstellar Poison',
        strongHit: { name: 'Supernova Destruction', bonus: 100 },
        mediumHit: { name: 'Galactic Hit', bonus: 50 },
        baseHitName: 'Star Punch',
      },
      view,
      roller
    );
  },
  // Beating Marduk ends the game
  getExperienceGainOnDeath() {
    return 0;
  },
};

export const ENEMY_ARCHETYPES: Record<EnemyArchetypeId, EnemyArchetype> = {
  randomEncounter,
  mainEnemy,
  boss,
  finalBoss,
};

export function getArchetype(id: EnemyArchetypeId): EnemyArchetype {
  return ENEMY_ARCHETYPES[id];
}

export function isEnemyArchetypeId(value: unknown): value is EnemyArchetypeId {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(ENEMY_ARCHETYPES, value);
}
