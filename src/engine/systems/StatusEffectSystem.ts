import type { WorldImpl } from '../ecs/World';
import type { EventBusImpl } from '../core/EventBus';
import type { EntityId, GameEventType } from '../types';
import { type StatusEffectsComponent, createStatusEffects } from '../components';
import { DamageSystem } from './DamageSystem';

export type EffectKind = 'poison' | 'protection' | 'healing';

export interface EffectTickResult {
  poisonDamage: number;
  healed: number;
  expired: EffectKind[];
}

const EXPIRY_EVENTS = {
  poison: 'PoisonExpired',
  protection: 'ProtectionExpired',
  healing: 'SustainedHealingExpired',
} as const satisfies Record<EffectKind, GameEventType>;

function getEffects(world: WorldImpl, entityId: EntityId): StatusEffectsComponent {
  return world.getComponent<StatusEffectsComponent>(entityId, 'statusEffects') ?? createStatusEffects();
}

export class StatusEffectSystem {
  // Sets or refreshes poison; the previous poison, if any, is replaced
  static inflictPoison(
    world: WorldImpl,
    eventBus: EventBusImpl,
    targetId: EntityId,
    damagePerTurn: number,
    turns: number,
    turn: number,
    sourceId?: EntityId
  ): void {
    const effects = getEffects(world, targetId);
    world.addComponent<StatusEffectsComponent>(targetId, {
      ...effects,
      poison: { damagePerTurn, turnsRemaining: turns },
    });

    eventBus.emit({
      type: 'PoisonInflicted',
      turn,
      timestamp: Date.now(),
      entityId: sourceId ?? targetId,
      targetId,
      data: { damagePerTurn, turns },
    });
  }

  static applyProtection(
    world: WorldImpl,
    eventBus: EventBusImpl,
    entityId: EntityId,
    damagePercent: number,
    turns: number,
    turn: number
  ): void {
    const effects = getEffects(world, entityId);
    world.addComponent<StatusEffectsComponent>(entityId, {
      ...effects,
      protection: { damagePercent, turnsRemaining: turns },
    });

    eventBus.emit({
      type: 'ProtectionApplied',
      turn,
      timestamp: Date.now(),
      entityId,
      data: { damagePercent, turns },
    });
  }

  static applySustainedHealing(
    world: WorldImpl,
    eventBus: EventBusImpl,
    entityId: EntityId,
    healthPerTurn: number,
    turns: number,
    turn: number
  ): void {
    const effects = getEffects(world, entityId);
    world.addComponent<StatusEffectsComponent>(entityId, {
      ...effects,
      healing: { healthPerTurn, turnsRemaining: turns },
    });

    eventBus.emit({
      type: 'SustainedHealingApplied',
      turn,
      timestamp: Date.now(),
      entityId,
      data: { healthPerTurn, turns },
    });
  }

  // Percentage of hit damage the entity still takes
  static getProtectionPercent(world: WorldImpl, entityId: EntityId): number {
    const effects = getEffects(world, entityId);
    return effects.protection.turnsRemaining > 0 ? effects.protection.damagePercent : 100;
  }

  static clearEffects(world: WorldImpl, entityId: EntityId): void {
    world.addComponent(entityId, createStatusEffects());
  }

  /**
   * End-of-turn processing for one entity: poison damage, then sustained
   * healing, then the protection countdown. Each active effect loses one turn.
   */
  static tickEndOfTurn(
    world: WorldImpl,
    eventBus: EventBusImpl,
    entityId: EntityId,
    turn: number
  ): EffectTickResult {
    const effects = getEffects(world, entityId);
    const result: EffectTickResult = { poisonDamage: 0, healed: 0, expired: [] };
    let { poison, healing, protection } = effects;

    if (poison.turnsRemaining > 0) {
      result.poisonDamage = DamageSystem.applyDamage(
        world,
        eventBus,
        entityId,
        poison.damagePerTurn,
        turn,
        'poison'
      );
      poison = { ...poison, turnsRemaining: poison.turnsRemaining - 1 };
      if (poison.turnsRemaining === 0) result.expired.push('poison');
    }

    if (healing.turnsRemaining > 0) {
      result.healed = DamageSystem.applyHealing(
        world,
        eventBus,
        entityId,
        healing.healthPerTurn,
        turn,
        'sustainedHealing'
      );
      healing = { ...healing, turnsRemaining: healing.turnsRemaining - 1 };
      if (healing.turnsRemaining === 0) result.expired.push('healing');
    }

    if (protection.turnsRemaining > 0) {
      protection = { ...protection, turnsRemaining: protection.turnsRemaining - 1 };
      if (protection.turnsRemaining === 0) result.expired.push('protection');
    }

    world.addComponent<StatusEffectsComponent>(entityId, { ...effects, poison, healing, protection });

    for (const effect of result.expired) {
      eventBus.emit({
        type: EXPIRY_EVENTS[effect],
        turn,
        timestamp: Date.now(),
        entityId,
        data: {},
      });
    }

    return result;
  }
}
