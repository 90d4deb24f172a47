import { describe, it, expect, beforeEach } from 'vitest';
import { WorldImpl } from '../../../src/engine/ecs/World';
import { EventBusImpl } from '../../../src/engine/core/EventBus';
import { type ZoneMap, createZoneStates } from '../../../src/engine/data/ZoneLoader';
import { PlayerFactory } from '../../../src/engine/data/PlayerFactory';
import { ZoneProgressSystem } from '../../../src/engine/systems/ZoneProgressSystem';
import type { ProgressComponent } from '../../../src/engine/components';
import { createTestZones } from '../../helpers/testZones';

describe('ZoneProgressSystem', () => {
  let world: WorldImpl;
  let eventBus: EventBusImpl;
  let zones: ZoneMap;

  beforeEach(() => {
    world = new WorldImpl();
    eventBus = new EventBusImpl();
    zones = createTestZones();
    createZoneStates(world, zones);
  });

  it('throws for a zone without state', () => {
    expect(() => ZoneProgressSystem.getZoneStateId(world, 'NOPE')).toThrow('No state for zone NOPE');
  });

  describe('clearTile', () => {
    it('records a tile once', () => {
      ZoneProgressSystem.clearTile(world, eventBus, 'ARENA', 1, 0, 4);
      ZoneProgressSystem.clearTile(world, eventBus, 'ARENA', 1, 0, 5);

      expect(ZoneProgressSystem.getZoneState(world, 'ARENA').clearedTiles).toEqual(['1,0']);
      expect(ZoneProgressSystem.isTileCleared(world, 'ARENA', 1, 0)).toBe(true);
      expect(ZoneProgressSystem.isTileCleared(world, 'GREEN_HUB', 1, 0)).toBe(false);
      expect(eventBus.getHistory()).toHaveLength(1);
      expect(eventBus.getHistory()[0]).toMatchObject({
        type: 'TileCleared',
        turn: 4,
        data: { zoneId: 'ARENA', x: 1, y: 0 },
      });
    });
  });

  describe('recordMainEnemyDefeat', () => {
    it('unlocks the boss when the last follower falls', () => {
      const arena = zones.get('ARENA')!;

      expect(ZoneProgressSystem.recordMainEnemyDefeat(world, eventBus, arena, 1)).toBe(false);
      expect(ZoneProgressSystem.getZoneState(world, 'ARENA')).toMatchObject({
        enemiesRemaining: 1,
        bossUnlocked: false,
        clearedTiles: [],
      });

      expect(ZoneProgressSystem.recordMainEnemyDefeat(world, eventBus, arena, 2)).toBe(true);
      expect(ZoneProgressSystem.getZoneState(world, 'ARENA')).toMatchObject({
        enemiesRemaining: 0,
        bossUnlocked: true,
        clearedTiles: ['4,2'],
      });
      expect(eventBus.getHistory().map((e) => e.type)).toEqual(['TileCleared', 'BossUnlocked']);
    });

    it('unlocks only once', () => {
      const arena = zones.get('ARENA')!;
      ZoneProgressSystem.recordMainEnemyDefeat(world, eventBus, arena, 1);
      ZoneProgressSystem.recordMainEnemyDefeat(world, eventBus, arena, 2);
      eventBus.clearHistory();

      expect(ZoneProgressSystem.recordMainEnemyDefeat(world, eventBus, arena, 3)).toBe(false);
      expect(ZoneProgressSystem.getZoneState(world, 'ARENA').enemiesRemaining).toBe(0);
      expect(eventBus.getHistory()).toEqual([]);
    });
  });

  describe('collectKey', () => {
    it('counts keys and clears the key tile', () => {
      const player = PlayerFactory.createPlayer(world, { name: 'Ada', zoneId: 'ARENA', x: 8, y: 7 });

      expect(ZoneProgressSystem.collectKey(world, eventBus, player, 'ARENA', 8, 8, 1)).toBe(1);
      expect(world.getComponent<ProgressComponent>(player, 'progress')!.keysCollected).toBe(1);
      expect(ZoneProgressSystem.isTileCleared(world, 'ARENA', 8, 8)).toBe(true);

      const keyEvent = eventBus.getHistory().find((e) => e.type === 'KeyCollected');
      expect(keyEvent?.data).toEqual({ zoneId: 'ARENA', keysCollected: 1 });
    });
  });
});
