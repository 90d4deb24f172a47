import type { WorldImpl } from '../ecs/World';
import type { EventBusImpl } from '../core/EventBus';
import type { EntityId } from '../types';
import { type ProgressComponent, type ZoneStateComponent, tileKey } from '../components';
import type { ZoneDefinition } from '../data/ZoneLoader';

export class ZoneProgressSystem {
  static getZoneStateId(world: WorldImpl, zoneId: string): EntityId {
    const entity = world
      .query('zoneState')
      .find((id) => world.getComponent<ZoneStateComponent>(id, 'zoneState')?.zoneId === zoneId);
    if (entity === undefined) {
      throw new Error(`No state for zone ${zoneId}`);
    }
    return entity;
  }

  static getZoneState(world: WorldImpl, zoneId: string): ZoneStateComponent {
    return world.requireComponent<ZoneStateComponent>(this.getZoneStateId(world, zoneId), 'zoneState');
  }

  static isTileCleared(world: WorldImpl, zoneId: string, x: number, y: number): boolean {
    return this.getZoneState(world, zoneId).clearedTiles.includes(tileKey(x, y));
  }

  // Idempotent; an already cleared tile emits nothing
  static clearTile(world: WorldImpl, eventBus: EventBusImpl, zoneId: string, x: number, y: number, turn: number): void {
    const stateId = this.getZoneStateId(world, zoneId);
    const state = world.requireComponent<ZoneStateComponent>(stateId, 'zoneState');
    const key = tileKey(x, y);
    if (state.clearedTiles.includes(key)) return;

    world.addComponent<ZoneStateComponent>(stateId, {
      ...state,
      clearedTiles: [...state.clearedTiles, key],
    });
    eventBus.emit({
      type: 'TileCleared',
      turn,
      timestamp: Date.now(),
      data: { zoneId, x, y },
    });
  }

  /**
   * Counts down the zone's followers. The last one breaks the barrier and
   * unlocks the boss tile. Returns true when that happened on this call.
   */
  static recordMainEnemyDefeat(
    world: WorldImpl,
    eventBus: EventBusImpl,
    zone: ZoneDefinition,
    turn: number
  ): boolean {
    const stateId = this.getZoneStateId(world, zone.id);
    const state = world.requireComponent<ZoneStateComponent>(stateId, 'zoneState');
    const enemiesRemaining = Math.max(0, state.enemiesRemaining - 1);
    const unlocking = enemiesRemaining === 0 && !state.bossUnlocked;

    world.addComponent<ZoneStateComponent>(stateId, {
      ...state,
      enemiesRemaining,
      bossUnlocked: state.bossUnlocked || unlocking,
    });

    if (unlocking) {
      for (const tile of zone.tiles.values()) {
        if (tile.kind === 'barrier') {
          this.clearTile(world, eventBus, zone.id, tile.x, tile.y, turn);
        }
      }
      eventBus.emit({
        type: 'BossUnlocked',
        turn,
        timestamp: Date.now(),
        data: { zoneId: zone.id },
      });
    }
    return unlocking;
  }

  static collectKey(
    world: WorldImpl,
    eventBus: EventBusImpl,
    playerId: EntityId,
    zoneId: string,
    x: number,
    y: number,
    turn: number
  ): number {
    const progress = world.requireComponent<ProgressComponent>(playerId, 'progress');
    const keysCollected = progress.keysCollected + 1;
    world.addComponent<ProgressComponent>(playerId, { ...progress, keysCollected });
    this.clearTile(world, eventBus, zoneId, x, y, turn);

    eventBus.emit({
      type: 'KeyCollected',
      turn,
      timestamp: Date.now(),
      entityId: playerId,
      data: { zoneId, keysCollected },
    });
    return keysCollected;
  }
}
