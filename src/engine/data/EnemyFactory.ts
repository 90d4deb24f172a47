import type { WorldImpl } from '../ecs/World';
import type { EntityId } from '../types';
import type { DiceRoller } from '../core/DiceRoller';
import {
  type CombatStatsComponent,
  type EnemyArchetypeId,
  type EnemyComponent,
  type HealthComponent,
  type IdentityComponent,
  type PotionsComponent,
  createStatusEffects,
} from '../components';
import { getArchetype } from './EnemyArchetypes';

// Negative or fractional experience is clamped rather than rejected
export function clampExperience(playerExp: number): number {
  if (!Number.isFinite(playerExp)) return 0;
  return Math.max(0, Math.floor(playerExp));
}

export class EnemyFactory {
  static createEnemy(
    world: WorldImpl,
    archetypeId: EnemyArchetypeId,
    playerExp: number,
    roller: DiceRoller
  ): EntityId {
    const archetype = getArchetype(archetypeId);
    const experience = clampExperience(playerExp);
    const attrs = archetype.initializeAttributes(experience, roller);

    const entity = world.createEntity();

    world.addComponent<IdentityComponent>(entity, {
      type: 'identity',
      name: archetype.displayName,
      kind: 'enemy',
    });

    world.addComponent<EnemyComponent>(entity, {
      type: 'enemy',
      archetype: archetypeId,
      playerExperience: experience,
    });

    world.addComponent<HealthComponent>(entity, {
      type: 'health',
      current: attrs.maxHealth,
      max: attrs.maxHealth,
    });

    world.addComponent<CombatStatsComponent>(entity, {
      type: 'combatStats',
      baseAttackDamage: Math.max(0, attrs.baseAttackDamage),
      numPoisonTurns: attrs.numPoisonTurns,
      criticalChance: attrs.criticalChance,
      dodgeChance: attrs.dodgeChance,
    });

    world.addComponent<PotionsComponent>(entity, {
      type: 'potions',
      numHealingPotions: attrs.numHealingPotions,
      originalNumHealingPotions: attrs.numHealingPotions,
      healingPotionHealth: attrs.healingPotionHealth,
    });

    world.addComponent(entity, createStatusEffects());

    return entity;
  }

  // Full health, full potions, no status effects: the state a retry starts from
  static resetEnemy(world: WorldImpl, enemyId: EntityId): void {
    const health = world.requireComponent<HealthComponent>(enemyId, 'health');
    const potions = world.requireComponent<PotionsComponent>(enemyId, 'potions');

    world.addComponent<HealthComponent>(enemyId, { ...health, current: health.max });
    world.addComponent<PotionsComponent>(enemyId, {
      ...potions,
      numHealingPotions: potions.originalNumHealingPotions,
    });
    world.addComponent(enemyId, createStatusEffects());
  }
}
