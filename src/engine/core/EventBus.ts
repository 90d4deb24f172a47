import type { GameEvent, GameEventType } from '../types';

export type GameEventListener = (event: GameEvent) => void;

export interface EventBus {
  subscribe(type: GameEventType, callback: GameEventListener): () => void;
  subscribeAll(callback: GameEventListener): () => void;
  emit(event: GameEvent): void;
  getHistory(): GameEvent[];
  getHistoryForTurn(turn: number): GameEvent[];
  clearHistory(): void;
}

export class EventBusImpl implements EventBus {
  private listeners: Map<GameEventType, Set<GameEventListener>> = new Map();
  private allListeners: Set<GameEventListener> = new Set();
  private history: GameEvent[] = [];

  // Oldest events are dropped once the history holds maxHistory of them
  constructor(private readonly maxHistory: number = Infinity) {}

  subscribe(type: GameEventType, callback: GameEventListener): () => void {
    let typeListeners = this.listeners.get(type);
    if (!typeListeners) {
      typeListeners = new Set();
      this.listeners.set(type, typeListeners);
    }
    typeListeners.add(callback);

    return () => {
      this.listeners.get(type)?.delete(callback);
    };
  }

  subscribeAll(callback: GameEventListener): () => void {
    this.allListeners.add(callback);
    return () => {
      this.allListeners.delete(callback);
    };
  }

  emit(event: GameEvent): void {
    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history.splice(0, this.history.length - this.maxHistory);
    }

    const typeListeners = this.listeners.get(event.type);
    if (typeListeners) {
      for (const callback of typeListeners) {
        callback(event);
      }
    }

    for (const callback of this.allListeners) {
      callback(event);
    }
  }

  getHistory(): GameEvent[] {
    return [...this.history];
  }

  // Battle log for one turn, in emission order
  getHistoryForTurn(turn: number): GameEvent[] {
    return this.history.filter((e) => e.turn === turn);
  }

  clearHistory(): void {
    this.history = [];
  }
}
