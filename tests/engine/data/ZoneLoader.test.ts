import { describe, it, expect } from 'vitest';
import { WorldImpl } from '../../../src/engine/ecs/World';
import { createZoneStates, loadDefaultZones, parseZones } from '../../../src/engine/data/ZoneLoader';
import type { ZoneStateComponent } from '../../../src/engine/components';

function zoneWith(tiles: unknown[], walls: unknown[] = []) {
  return { zones: [{ id: 'A', name: 'Zone A', walls, tiles }] };
}

describe('ZoneLoader', () => {
  describe('loadDefaultZones', () => {
    const zones = loadDefaultZones();

    it('loads the hub and the four elemental zones', () => {
      expect([...zones.keys()]).toEqual(['GREEN_HUB', 'FIRE', 'GEM', 'ICE', 'ROCK']);
    });

    it('gives every elemental zone three followers and one sealed boss', () => {
      for (const id of ['FIRE', 'GEM', 'ICE', 'ROCK']) {
        const zone = zones.get(id)!;
        expect(zone.mainEnemyCount).toBe(3);
        expect(zone.boss).not.toBeNull();
        expect([...zone.tiles.values()].filter((t) => t.kind === 'barrier')).toHaveLength(1);
        expect([...zone.tiles.values()].filter((t) => t.kind === 'key')).toHaveLength(1);
      }
      expect(zones.get('FIRE')!.boss).toEqual({ x: 4, y: 1 });
    });

    it('links the hub exits both ways', () => {
      expect(zones.get('GREEN_HUB')!.tiles.get('4,0')).toEqual({
        kind: 'loadingZone',
        x: 4,
        y: 0,
        to: 'FIRE',
        toX: 4,
        toY: 8,
      });
      expect(zones.get('FIRE')!.tiles.get('4,8')).toMatchObject({ to: 'GREEN_HUB', toX: 4, toY: 0 });
    });
  });

  describe('createZoneStates', () => {
    it('creates one state per zone with bosses sealed', () => {
      const world = new WorldImpl();
      const ids = createZoneStates(world, loadDefaultZones());

      expect(ids.size).toBe(5);
      const hub = world.getComponent<ZoneStateComponent>(ids.get('GREEN_HUB')!, 'zoneState')!;
      const fire = world.getComponent<ZoneStateComponent>(ids.get('FIRE')!, 'zoneState')!;
      expect(hub).toEqual({
        type: 'zoneState',
        zoneId: 'GREEN_HUB',
        enemiesRemaining: 0,
        bossUnlocked: true,
        clearedTiles: [],
      });
      expect(fire.enemiesRemaining).toBe(3);
      expect(fire.bossUnlocked).toBe(false);
    });
  });

  describe('parseZones', () => {
    it('accepts a minimal zone', () => {
      const zones = parseZones(zoneWith([{ kind: 'key', x: 0, y: 0 }], [[1, 1]]));
      const zone = zones.get('A')!;
      expect(zone.name).toBe('Zone A');
      expect(zone.walls.has('1,1')).toBe(true);
      expect(zone.boss).toBeNull();
      expect(zone.mainEnemyCount).toBe(0);
    });

    it('rejects data without a zones array', () => {
      expect(() => parseZones({})).toThrow('zone data must be an object with a "zones" array');
      expect(() => parseZones(null)).toThrow('zone data must be an object with a "zones" array');
    });

    it('reports the path of a coordinate off the grid', () => {
      expect(() => parseZones(zoneWith([{ kind: 'key', x: 9, y: 0 }]))).toThrow(
        'zones[0].tiles[0].x must be an integer in [0, 8]'
      );
    });

    it('rejects unknown tile kinds and archetypes', () => {
      expect(() => parseZones(zoneWith([{ kind: 'chest', x: 0, y: 0 }]))).toThrow(
        'zones[0].tiles[0].kind "chest" is not a tile kind'
      );
      expect(() =>
        parseZones(zoneWith([{ kind: 'battle', x: 0, y: 0, archetype: 'finalBoss' }]))
      ).toThrow('zones[0].tiles[0].archetype must be "mainEnemy" or "boss"');
    });

    it('rejects tiles on walls and overlapping tiles', () => {
      expect(() => parseZones(zoneWith([{ kind: 'key', x: 1, y: 1 }], [[1, 1]]))).toThrow(
        'zones[0].tiles[0] is placed on a wall at 1,1'
      );
      expect(() =>
        parseZones(
          zoneWith([
            { kind: 'key', x: 2, y: 2 },
            { kind: 'barrier', x: 2, y: 2 },
          ])
        )
      ).toThrow('zones[0].tiles[1] overlaps another tile at 2,2');
    });

    it('requires a boss behind every barrier', () => {
      expect(() => parseZones(zoneWith([{ kind: 'barrier', x: 0, y: 0 }]))).toThrow(
        'zones[0] has a barrier but no boss'
      );
    });

    it('rejects duplicate ids and dangling links', () => {
      expect(() =>
        parseZones({
          zones: [
            { id: 'A', name: 'One', tiles: [] },
            { id: 'A', name: 'Two', tiles: [] },
          ],
        })
      ).toThrow('zones[1].id "A" is duplicated');
      expect(() =>
        parseZones(zoneWith([{ kind: 'loadingZone', x: 0, y: 0, to: 'B', toX: 0, toY: 0 }]))
      ).toThrow('zone A links to unknown zone "B"');
    });
  });
});
