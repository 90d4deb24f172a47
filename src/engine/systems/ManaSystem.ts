import type { WorldImpl } from '../ecs/World';
import type { EventBusImpl } from '../core/EventBus';
import type { EntityId } from '../types';
import type { ManaComponent } from '../components';
import { INITIAL_MANA } from '../../config';

export class ManaSystem {
  static canAfford(world: WorldImpl, entityId: EntityId, amount: number): boolean {
    if (amount <= 0) return true;
    const mana = world.getComponent<ManaComponent>(entityId, 'mana');
    return mana !== undefined && mana.current >= amount;
  }

  static spendMana(
    world: WorldImpl,
    eventBus: EventBusImpl,
    entityId: EntityId,
    amount: number,
    turn: number
  ): boolean {
    if (amount <= 0) return true;
    const mana = world.getComponent<ManaComponent>(entityId, 'mana');
    if (!mana || mana.current < amount) return false;

    const newCurrent = mana.current - amount;
    world.addComponent<ManaComponent>(entityId, { ...mana, current: newCurrent });

    eventBus.emit({
      type: 'ManaSpent',
      turn,
      timestamp: Date.now(),
      entityId,
      data: { amount, newMana: newCurrent },
    });
    return true;
  }

  // Per-turn regeneration, capped at max
  static regenerate(world: WorldImpl, eventBus: EventBusImpl, entityId: EntityId, turn: number): number {
    const mana = world.getComponent<ManaComponent>(entityId, 'mana');
    if (!mana) return 0;

    const newCurrent = Math.min(mana.max, mana.current + mana.regenPerTurn);
    const gained = newCurrent - mana.current;
    world.addComponent<ManaComponent>(entityId, { ...mana, current: newCurrent });

    if (gained > 0) {
      eventBus.emit({
        type: 'ManaRegenerated',
        turn,
        timestamp: Date.now(),
        entityId,
        data: { amount: gained, newMana: newCurrent },
      });
    }
    return gained;
  }

  static resetForBattle(world: WorldImpl, entityId: EntityId): void {
    const mana = world.getComponent<ManaComponent>(entityId, 'mana');
    if (!mana) return;
    world.addComponent<ManaComponent>(entityId, { ...mana, current: Math.min(INITIAL_MANA, mana.max) });
  }
}
