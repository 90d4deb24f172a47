import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventBusImpl } from '../../../src/engine/core/EventBus';
import type { GameEvent } from '../../../src/engine/types';

describe('EventBus', () => {
  let eventBus: EventBusImpl;

  beforeEach(() => {
    eventBus = new EventBusImpl();
  });

  describe('subscribe / emit', () => {
    it('calls subscriber when event is emitted', () => {
      const callback = vi.fn();
      eventBus.subscribe('DamageDealt', callback);

      const event: GameEvent = {
        type: 'DamageDealt',
        turn: 1,
        timestamp: Date.now(),
        data: { damage: 150 },
      };
      eventBus.emit(event);

      expect(callback).toHaveBeenCalledWith(event);
    });

    it('does not call subscriber for different event type', () => {
      const callback = vi.fn();
      eventBus.subscribe('DamageDealt', callback);

      eventBus.emit({ type: 'HealthRestored', turn: 1, timestamp: Date.now(), data: {} });

      expect(callback).not.toHaveBeenCalled();
    });

    it('supports multiple subscribers for same event', () => {
      const callback1 = vi.fn();
      const callback2 = vi.fn();
      eventBus.subscribe('CriticalHit', callback1);
      eventBus.subscribe('CriticalHit', callback2);

      eventBus.emit({ type: 'CriticalHit', turn: 1, timestamp: Date.now(), data: {} });

      expect(callback1).toHaveBeenCalled();
      expect(callback2).toHaveBeenCalled();
    });
  });

  describe('unsubscribe', () => {
    it('returns unsubscribe function that works', () => {
      const callback = vi.fn();
      const unsubscribe = eventBus.subscribe('CriticalHit', callback);

      unsubscribe();
      eventBus.emit({ type: 'CriticalHit', turn: 1, timestamp: Date.now(), data: {} });

      expect(callback).not.toHaveBeenCalled();
    });

    it('unsubscribes a catch-all listener', () => {
      const callback = vi.fn();
      const unsubscribe = eventBus.subscribeAll(callback);

      unsubscribe();
      eventBus.emit({ type: 'TurnEnded', turn: 1, timestamp: 1, data: {} });

      expect(callback).not.toHaveBeenCalled();
    });
  });

  describe('history', () => {
    it('records all emitted events', () => {
      const event1: GameEvent = { type: 'EnemyActionChosen', turn: 1, timestamp: 1000, data: { name: 'Magic Bolt' } };
      const event2: GameEvent = { type: 'DamageDealt', turn: 1, timestamp: 1001, data: { damage: 5 } };

      eventBus.emit(event1);
      eventBus.emit(event2);

      const history = eventBus.getHistory();
      expect(history).toHaveLength(2);
      expect(history[0]).toEqual(event1);
      expect(history[1]).toEqual(event2);
    });

    it('filters history by turn', () => {
      eventBus.emit({ type: 'TurnStarted', turn: 1, timestamp: 1, data: {} });
      eventBus.emit({ type: 'TurnStarted', turn: 2, timestamp: 2, data: {} });
      eventBus.emit({ type: 'TurnEnded', turn: 2, timestamp: 3, data: {} });

      expect(eventBus.getHistoryForTurn(2).map((e) => e.type)).toEqual(['TurnStarted', 'TurnEnded']);
      expect(eventBus.getHistoryForTurn(5)).toEqual([]);
    });

    it('keeps only the latest events when capped', () => {
      const capped = new EventBusImpl(2);
      for (let turn = 1; turn <= 3; turn++) {
        capped.emit({ type: 'TurnStarted', turn, timestamp: turn, data: {} });
      }

      expect(capped.getHistory().map((e) => e.turn)).toEqual([2, 3]);
    });

    it('clearHistory removes all events', () => {
      eventBus.emit({ type: 'TurnStarted', turn: 1, timestamp: Date.now(), data: {} });

      eventBus.clearHistory();

      expect(eventBus.getHistory()).toHaveLength(0);
    });
  });

  describe('subscribeAll', () => {
    it('receives all events regardless of type', () => {
      const callback = vi.fn();
      eventBus.subscribeAll(callback);

      eventBus.emit({ type: 'DamageDealt', turn: 1, timestamp: 1, data: {} });
      eventBus.emit({ type: 'HealthRestored', turn: 1, timestamp: 2, data: {} });

      expect(callback).toHaveBeenCalledTimes(2);
    });
  });
});
