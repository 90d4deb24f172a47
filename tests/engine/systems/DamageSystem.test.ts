import { describe, it, expect, beforeEach } from 'vitest';
import { WorldImpl } from '../../../src/engine/ecs/World';
import { EventBusImpl } from '../../../src/engine/core/EventBus';
import { DamageSystem } from '../../../src/engine/systems/DamageSystem';
import type { HealthComponent } from '../../../src/engine/components';

describe('DamageSystem', () => {
  let world: WorldImpl;
  let eventBus: EventBusImpl;
  let entity: string;

  beforeEach(() => {
    world = new WorldImpl();
    eventBus = new EventBusImpl();
    entity = world.createEntity();
    world.addComponent<HealthComponent>(entity, { type: 'health', current: 2000, max: 2000 });
  });

  describe('applyDamage', () => {
    it('reduces health by damage amount', () => {
      const taken = DamageSystem.applyDamage(world, eventBus, entity, 150, 1, 'hit');

      expect(taken).toBe(150);
      expect(world.getComponent<HealthComponent>(entity, 'health')!.current).toBe(1850);
    });

    it('emits DamageDealt with attacker and victim', () => {
      DamageSystem.applyDamage(world, eventBus, entity, 150, 3, 'hit', 'entity_attacker');

      const event = eventBus.getHistory()[0];
      expect(event.type).toBe('DamageDealt');
      expect(event.entityId).toBe('entity_attacker');
      expect(event.targetId).toBe(entity);
      expect(event.data).toEqual({ damage: 150, newHealth: 1850, previousHealth: 2000 });
    });

    it('emits PoisonDamage for poison', () => {
      DamageSystem.applyDamage(world, eventBus, entity, 50, 1, 'poison');
      expect(eventBus.getHistory()[0].type).toBe('PoisonDamage');
    });

    it('never goes below 0 and reports the unit defeated once', () => {
      const taken = DamageSystem.applyDamage(world, eventBus, entity, 5000, 1, 'hit');
      DamageSystem.applyDamage(world, eventBus, entity, 10, 2, 'hit');

      expect(taken).toBe(2000);
      expect(world.getComponent<HealthComponent>(entity, 'health')!.current).toBe(0);
      expect(eventBus.getHistory().filter((e) => e.type === 'UnitDefeated')).toHaveLength(1);
      expect(DamageSystem.isDefeated(world, entity)).toBe(true);
    });

    it('treats negative damage as none', () => {
      DamageSystem.applyDamage(world, eventBus, entity, -40, 1, 'hit');
      expect(world.getComponent<HealthComponent>(entity, 'health')!.current).toBe(2000);
    });
  });

  describe('applyHealing', () => {
    it('never raises health above max', () => {
      world.addComponent<HealthComponent>(entity, { type: 'health', current: 1900, max: 2000 });

      const restored = DamageSystem.applyHealing(world, eventBus, entity, 300, 1, 'Weak Healing');

      expect(restored).toBe(100);
      expect(world.getComponent<HealthComponent>(entity, 'health')!.current).toBe(2000);
      expect(eventBus.getHistory()[0].data).toEqual({
        amount: 300,
        restored: 100,
        newHealth: 2000,
        source: 'Weak Healing',
      });
    });

    it('heals the full amount when there is room', () => {
      world.addComponent<HealthComponent>(entity, { type: 'health', current: 1000, max: 2000 });
      expect(DamageSystem.applyHealing(world, eventBus, entity, 300, 1, 'potion')).toBe(300);
    });
  });

  describe('isDefeated', () => {
    it('is false while health remains and for entities without health', () => {
      expect(DamageSystem.isDefeated(world, entity)).toBe(false);
      expect(DamageSystem.isDefeated(world, world.createEntity())).toBe(false);
    });
  });
});
