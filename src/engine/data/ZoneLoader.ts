import type { WorldImpl } from '../ecs/World';
import type { EntityId } from '../types';
import { type ZoneStateComponent, tileKey } from '../components';
import { GRID_SIZE } from '../../config';
import zonesData from './zones.json';

export type BattleTileArchetype = 'mainEnemy' | 'boss';

export type TileDefinition =
  | { kind: 'loadingZone'; x: number; y: number; to: string; toX: number; toY: number }
  | { kind: 'battle'; x: number; y: number; archetype: BattleTileArchetype }
  | { kind: 'barrier'; x: number; y: number }
  | { kind: 'key'; x: number; y: number };

export interface ZoneDefinition {
  id: string;
  name: string;
  walls: ReadonlySet<string>;
  tiles: ReadonlyMap<string, TileDefinition>;
  /** Position of the zone boss, sealed until the barrier opens */
  boss: { x: number; y: number } | null;
  mainEnemyCount: number;
}

export type ZoneMap = ReadonlyMap<string, ZoneDefinition>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(obj: Record<string, unknown>, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value === '') {
    throw new Error(`${path}.${key} must be a non-empty string`);
  }
  return value;
}

function readCoord(value: unknown, path: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value >= GRID_SIZE) {
    throw new Error(`${path} must be an integer in [0, ${GRID_SIZE - 1}]`);
  }
  return value;
}

function parseTile(raw: unknown, path: string): TileDefinition {
  if (!isRecord(raw)) throw new Error(`${path} must be an object`);
  const x = readCoord(raw.x, `${path}.x`);
  const y = readCoord(raw.y, `${path}.y`);
  const kind = raw.kind;

  switch (kind) {
    case 'loadingZone':
      return {
        kind,
        x,
        y,
        to: readString(raw, 'to', path),
        toX: readCoord(raw.toX, `${path}.toX`),
        toY: readCoord(raw.toY, `${path}.toY`),
      };
    case 'battle': {
      const archetype = raw.archetype;
      if (archetype !== 'mainEnemy' && archetype !== 'boss') {
        throw new Error(`${path}.archetype must be "mainEnemy" or "boss"`);
      }
      return { kind, x, y, archetype };
    }
    case 'barrier':
    case 'key':
      return { kind, x, y };
    default:
      throw new Error(`${path}.kind "${String(kind)}" is not a tile kind`);
  }
}

function parseZone(raw: unknown, path: string): ZoneDefinition {
  if (!isRecord(raw)) throw new Error(`${path} must be an object`);
  const id = readString(raw, 'id', path);
  const name = readString(raw, 'name', path);

  const walls = new Set<string>();
  const rawWalls = raw.walls ?? [];
  if (!Array.isArray(rawWalls)) throw new Error(`${path}.walls must be an array`);
  rawWalls.forEach((wall: unknown, i) => {
    if (!Array.isArray(wall) || wall.length !== 2) {
      throw new Error(`${path}.walls[${i}] must be an [x, y] pair`);
    }
    walls.add(tileKey(readCoord(wall[0], `${path}.walls[${i}][0]`), readCoord(wall[1], `${path}.walls[${i}][1]`)));
  });

  const tiles = new Map<string, TileDefinition>();
  const rawTiles = raw.tiles;
  if (!Array.isArray(rawTiles)) throw new Error(`${path}.tiles must be an array`);
  rawTiles.forEach((rawTile: unknown, i) => {
    const tilePath = `${path}.tiles[${i}]`;
    const tile = parseTile(rawTile, tilePath);
    const key = tileKey(tile.x, tile.y);
    if (tiles.has(key)) throw new Error(`${tilePath} overlaps another tile at ${key}`);
    if (walls.has(key)) throw new Error(`${tilePath} is placed on a wall at ${key}`);
    tiles.set(key, tile);
  });

  const bosses = [...tiles.values()].filter((t) => t.kind === 'battle' && t.archetype === 'boss');
  const barriers = [...tiles.values()].filter((t) => t.kind === 'barrier');
  if (bosses.length > 1) throw new Error(`${path} has more than one boss`);
  if (barriers.length > 0 && bosses.length === 0) {
    throw new Error(`${path} has a barrier but no boss`);
  }
  const mainEnemyCount = [...tiles.values()].filter(
    (t) => t.kind === 'battle' && t.archetype === 'mainEnemy'
  ).length;

  return {
    id,
    name,
    walls,
    tiles,
    boss: bosses.length === 1 ? { x: bosses[0].x, y: bosses[0].y } : null,
    mainEnemyCount,
  };
}

/**
 * Validates raw zone data. Throws with the path of the first bad field.
 */
export function parseZones(raw: unknown): ZoneMap {
  if (!isRecord(raw) || !Array.isArray(raw.zones)) {
    throw new Error('zone data must be an object with a "zones" array');
  }
  const zones = new Map<string, ZoneDefinition>();
  raw.zones.forEach((rawZone: unknown, i) => {
    const zone = parseZone(rawZone, `zones[${i}]`);
    if (zones.has(zone.id)) throw new Error(`zones[${i}].id "${zone.id}" is duplicated`);
    zones.set(zone.id, zone);
  });

  for (const zone of zones.values()) {
    for (const tile of zone.tiles.values()) {
      if (tile.kind === 'loadingZone' && !zones.has(tile.to)) {
        throw new Error(`zone ${zone.id} links to unknown zone "${tile.to}"`);
      }
    }
  }
  return zones;
}

export function loadDefaultZones(): ZoneMap {
  return parseZones(zonesData);
}

// One zoneState entity per zone, holding what changes as the player plays
export function createZoneStates(world: WorldImpl, zones: ZoneMap): Map<string, EntityId> {
  const ids = new Map<string, EntityId>();
  for (const zone of zones.values()) {
    const entity = world.createEntity();
    world.addComponent<ZoneStateComponent>(entity, {
      type: 'zoneState',
      zoneId: zone.id,
      enemiesRemaining: zone.mainEnemyCount,
      bossUnlocked: zone.boss === null,
      clearedTiles: [],
    });
    ids.set(zone.id, entity);
  }
  return ids;
}
