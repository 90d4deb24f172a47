import type { WorldImpl } from '../ecs/World';
import type { EventBusImpl } from '../core/EventBus';
import type { EntityId } from '../types';
import type { HealthComponent } from '../components';

export type DamageSource = 'hit' | 'poison';

export class DamageSystem {
  /** Returns the damage actually taken (health never goes below 0). */
  static applyDamage(
    world: WorldImpl,
    eventBus: EventBusImpl,
    targetId: EntityId,
    damage: number,
    turn: number,
    source: DamageSource,
    attackerId?: EntityId
  ): number {
    const health = world.getComponent<HealthComponent>(targetId, 'health');
    if (!health) return 0;

    const newCurrent = Math.max(0, health.current - Math.max(0, damage));
    world.addComponent<HealthComponent>(targetId, { ...health, current: newCurrent });

    // entityId = attacker, targetId = victim for the battle log
    eventBus.emit({
      type: source === 'poison' ? 'PoisonDamage' : 'DamageDealt',
      turn,
      timestamp: Date.now(),
      entityId: attackerId ?? targetId,
      targetId,
      data: {
        damage,
        newHealth: newCurrent,
        previousHealth: health.current,
      },
    });

    if (newCurrent <= 0 && health.current > 0) {
      eventBus.emit({
        type: 'UnitDefeated',
        turn,
        timestamp: Date.now(),
        entityId: targetId,
        data: { source },
      });
    }

    return health.current - newCurrent;
  }

  /** Returns the health actually restored (capped at max). */
  static applyHealing(
    world: WorldImpl,
    eventBus: EventBusImpl,
    targetId: EntityId,
    amount: number,
    turn: number,
    source: string
  ): number {
    const health = world.getComponent<HealthComponent>(targetId, 'health');
    if (!health) return 0;

    const newCurrent = Math.min(health.max, health.current + Math.max(0, amount));
    world.addComponent<HealthComponent>(targetId, { ...health, current: newCurrent });

    eventBus.emit({
      type: 'HealthRestored',
      turn,
      timestamp: Date.now(),
      entityId: targetId,
      data: {
        amount,
        restored: newCurrent - health.current,
        newHealth: newCurrent,
        source,
      },
    });

    return newCurrent - health.current;
  }

  static isDefeated(world: WorldImpl, entityId: EntityId): boolean {
    const health = world.getComponent<HealthComponent>(entityId, 'health');
    return health !== undefined && health.current <= 0;
  }
}
