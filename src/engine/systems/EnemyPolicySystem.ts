import type { WorldImpl } from '../ecs/World';
import type { EventBusImpl } from '../core/EventBus';
import type { DiceRoller } from '../core/DiceRoller';
import type { EntityId } from '../types';
import type { BattleAction } from '../actions/Action';
import {
  type CombatStatsComponent,
  type EnemyComponent,
  type HealthComponent,
  type PotionsComponent,
  type StatusEffectsComponent,
  hasPoisonEffect,
} from '../components';
import { type EnemyBattleView, getArchetype } from '../data/EnemyArchetypes';

export class EnemyPolicySystem {
  /**
   * Read-only snapshot of what the enemy knows when it picks a move.
   */
  static buildView(world: WorldImpl, enemyId: EntityId, playerId: EntityId): EnemyBattleView {
    const health = world.requireComponent<HealthComponent>(enemyId, 'health');
    const stats = world.requireComponent<CombatStatsComponent>(enemyId, 'combatStats');
    const potions = world.requireComponent<PotionsComponent>(enemyId, 'potions');
    const playerEffects = world.getComponent<StatusEffectsComponent>(playerId, 'statusEffects');

    return {
      currentHealth: health.current,
      maxHealth: health.max,
      numHealingPotions: potions.numHealingPotions,
      healingPotionHealth: potions.healingPotionHealth,
      baseAttackDamage: stats.baseAttackDamage,
      numPoisonTurns: stats.numPoisonTurns,
      playerPoisoned: hasPoisonEffect(playerEffects),
    };
  }

  /**
   * Asks the enemy's archetype for its move and commits any potion it drinks.
   */
  static decideAction(
    world: WorldImpl,
    eventBus: EventBusImpl,
    roller: DiceRoller,
    enemyId: EntityId,
    playerId: EntityId,
    turn: number
  ): BattleAction {
    const enemy = world.requireComponent<EnemyComponent>(enemyId, 'enemy');
    const view = this.buildView(world, enemyId, playerId);
    const decision = getArchetype(enemy.archetype).generateBattleAction(view, roller);

    if (decision.usedPotion) {
      const potions = world.requireComponent<PotionsComponent>(enemyId, 'potions');
      const remaining = Math.max(0, potions.numHealingPotions - 1);
      world.addComponent<PotionsComponent>(enemyId, { ...potions, numHealingPotions: remaining });
      eventBus.emit({
        type: 'PotionUsed',
        turn,
        timestamp: Date.now(),
        entityId: enemyId,
        data: { potionsRemaining: remaining },
      });
    }

    eventBus.emit({
      type: 'EnemyActionChosen',
      turn,
      timestamp: Date.now(),
      entityId: enemyId,
      targetId: playerId,
      data: {
        name: decision.action.name,
        actionType: decision.action.type,
        magnitude: decision.action.magnitude,
        duration: decision.action.duration,
      },
    });

    return decision.action;
  }

  static getExperienceGainOnDeath(world: WorldImpl, enemyId: EntityId): number {
    const enemy = world.requireComponent<EnemyComponent>(enemyId, 'enemy');
    const health = world.requireComponent<HealthComponent>(enemyId, 'health');
    return getArchetype(enemy.archetype).getExperienceGainOnDeath(health.max);
  }
}
