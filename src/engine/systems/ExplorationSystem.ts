import type { WorldImpl } from '../ecs/World';
import type { EventBusImpl } from '../core/EventBus';
import type { DiceRoller } from '../core/DiceRoller';
import type { EntityId } from '../types';
import { type EncounterComponent, type PositionComponent, tileKey } from '../components';
import type { BattleTileArchetype, TileDefinition, ZoneDefinition, ZoneMap } from '../data/ZoneLoader';
import { ZoneProgressSystem } from './ZoneProgressSystem';
import { GRID_SIZE, RANDOM_ENCOUNTER_MIN_STEPS, RANDOM_ENCOUNTER_THRESHOLD } from '../../config';

export type Direction = 'up' | 'down' | 'left' | 'right';

export const DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];

const DELTAS: Record<Direction, { dx: number; dy: number }> = {
  up: { dx: 0, dy: -1 },
  down: { dx: 0, dy: 1 },
  left: { dx: -1, dy: 0 },
  right: { dx: 1, dy: 0 },
};

export type BlockReason = 'edge' | 'wall' | 'barrier' | 'lockedBoss';

/** The tile a battle was started from, cleared when the enemy falls */
export interface TileRef {
  zoneId: string;
  x: number;
  y: number;
}

export type MoveOutcome =
  | { kind: 'blocked'; reason: BlockReason }
  | { kind: 'moved'; x: number; y: number }
  | { kind: 'zoneChanged'; from: string; to: string; x: number; y: number }
  | { kind: 'battle'; archetype: BattleTileArchetype; source: TileRef }
  | { kind: 'randomEncounter' }
  | { kind: 'keyCollected'; keysCollected: number };

export function isDirection(value: unknown): value is Direction {
  return typeof value === 'string' && DIRECTIONS.some((d) => d === value);
}

export class ExplorationSystem {
  static getZone(zones: ZoneMap, zoneId: string): ZoneDefinition {
    const zone = zones.get(zoneId);
    if (!zone) {
      throw new Error(`Unknown zone ${zoneId}`);
    }
    return zone;
  }

  // The tile still in play at (x, y); cleared tiles read as empty ground
  static getActiveTile(world: WorldImpl, zone: ZoneDefinition, x: number, y: number): TileDefinition | undefined {
    const tile = zone.tiles.get(tileKey(x, y));
    if (!tile || ZoneProgressSystem.isTileCleared(world, zone.id, x, y)) return undefined;
    return tile;
  }

  static getBlockReason(world: WorldImpl, zone: ZoneDefinition, x: number, y: number): BlockReason | null {
    if (x < 0 || y < 0 || x >= GRID_SIZE || y >= GRID_SIZE) return 'edge';
    if (zone.walls.has(tileKey(x, y))) return 'wall';

    const tile = this.getActiveTile(world, zone, x, y);
    if (tile?.kind === 'barrier') return 'barrier';

    const sealed = zone.boss !== null && zone.boss.x === x && zone.boss.y === y;
    if (sealed && !ZoneProgressSystem.getZoneState(world, zone.id).bossUnlocked) return 'lockedBoss';
    return null;
  }

  /**
   * Moves the player one tile and reports what the step led to.
   *
   * Blocked steps leave everything untouched. On empty ground, once enough
   * steps have been walked, each step rolls a D100 for a random encounter;
   * a miss leaves the counter where it is. Every other step counts towards
   * the next encounter and triggers whatever the tile holds.
   */
  static movePlayer(
    world: WorldImpl,
    eventBus: EventBusImpl,
    roller: DiceRoller,
    zones: ZoneMap,
    playerId: EntityId,
    direction: Direction,
    turn: number
  ): MoveOutcome {
    const position = world.requireComponent<PositionComponent>(playerId, 'position');
    const zone = this.getZone(zones, position.zoneId);
    const { dx, dy } = DELTAS[direction];
    const x = position.x + dx;
    const y = position.y + dy;

    const reason = this.getBlockReason(world, zone, x, y);
    if (reason !== null) {
      eventBus.emit({
        type: 'MovementBlocked',
        turn,
        timestamp: Date.now(),
        entityId: playerId,
        data: { zoneId: zone.id, x, y, reason },
      });
      return { kind: 'blocked', reason };
    }

    const facing = direction === 'left' || direction === 'right' ? direction : position.facing;
    world.addComponent<PositionComponent>(playerId, { ...position, x, y, facing });
    eventBus.emit({
      type: 'PlayerMoved',
      turn,
      timestamp: Date.now(),
      entityId: playerId,
      data: { zoneId: zone.id, fromX: position.x, fromY: position.y, x, y },
    });

    const encounter = world.requireComponent<EncounterComponent>(playerId, 'encounter');
    const tile = this.getActiveTile(world, zone, x, y);

    if (!tile && encounter.stepsSinceEncounter >= RANDOM_ENCOUNTER_MIN_STEPS) {
      const roll = roller.rollD100();
      if (roll > RANDOM_ENCOUNTER_THRESHOLD) {
        return { kind: 'moved', x, y };
      }
      world.addComponent<EncounterComponent>(playerId, { ...encounter, stepsSinceEncounter: 0 });
      eventBus.emit({
        type: 'RandomEncounter',
        turn,
        timestamp: Date.now(),
        entityId: playerId,
        data: { zoneId: zone.id, x, y, roll },
      });
      return { kind: 'randomEncounter' };
    }

    world.addComponent<EncounterComponent>(playerId, {
      ...encounter,
      stepsSinceEncounter: encounter.stepsSinceEncounter + 1,
    });

    switch (tile?.kind) {
      case 'loadingZone':
        return this.changeZone(world, eventBus, zones, playerId, zone.id, tile.to, tile.toX, tile.toY, turn);
      case 'battle':
        return { kind: 'battle', archetype: tile.archetype, source: { zoneId: zone.id, x, y } };
      case 'key':
        return {
          kind: 'keyCollected',
          keysCollected: ZoneProgressSystem.collectKey(world, eventBus, playerId, zone.id, x, y, turn),
        };
      default:
        return { kind: 'moved', x, y };
    }
  }

  static changeZone(
    world: WorldImpl,
    eventBus: EventBusImpl,
    zones: ZoneMap,
    playerId: EntityId,
    from: string,
    to: string,
    x: number,
    y: number,
    turn: number
  ): MoveOutcome {
    this.getZone(zones, to);
    const position = world.requireComponent<PositionComponent>(playerId, 'position');
    world.addComponent<PositionComponent>(playerId, { ...position, zoneId: to, x, y });

    eventBus.emit({
      type: 'ZoneChanged',
      turn,
      timestamp: Date.now(),
      entityId: playerId,
      data: { from, to, x, y },
    });
    return { kind: 'zoneChanged', from, to, x, y };
  }
}
