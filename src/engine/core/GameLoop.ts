import { EventEmitter } from 'node:events';
import type { GameEngine } from './GameEngine';
import { StateLock } from './StateLock';
import { createContextLogger } from '../../utils/logger';

const logger = createContextLogger('GameLoop');

export interface GameLoopConfig {
  tickInterval: number; // ms between world updates
  refreshInterval: number; // ms between presentation refreshes
}

export type RefreshCallback = (engine: GameEngine) => void | Promise<void>;

/**
 * Drives the engine on two timers: a world update that may summon Marduk,
 * and a refresh for whatever is presenting the game. Both share a StateLock
 * with input handlers so only one of them touches the engine at a time.
 *
 * Emits 'tick' (tick count), 'finalBossSummoned' and 'error'.
 */
export class GameLoop extends EventEmitter {
  private readonly lock: StateLock;
  private updateTimer: NodeJS.Timeout | null = null;
  private refreshTimer: NodeJS.Timeout | null = null;
  private running = false;
  private tickCount = 0;

  constructor(
    private readonly engine: GameEngine,
    private readonly config: GameLoopConfig,
    private readonly onRefresh: RefreshCallback | null = null,
    lock?: StateLock
  ) {
    super();
    this.lock = lock ?? new StateLock();
  }

  getLock(): StateLock {
    return this.lock;
  }

  getTickCount(): number {
    return this.tickCount;
  }

  start(): void {
    if (this.running) return;

    this.running = true;
    this.updateTimer = setInterval(() => {
      void this.tick();
    }, this.config.tickInterval);
    this.refreshTimer = setInterval(() => {
      void this.refresh();
    }, this.config.refreshInterval);
    logger.info(
      `Game loop started: update every ${this.config.tickInterval}ms, refresh every ${this.config.refreshInterval}ms`
    );
  }

  stop(): void {
    if (!this.running) return;

    if (this.updateTimer) clearInterval(this.updateTimer);
    if (this.refreshTimer) clearInterval(this.refreshTimer);
    this.updateTimer = null;
    this.refreshTimer = null;
    this.running = false;
    logger.info('Game loop stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  // Runs one world update now, through the lock
  forceTick(): Promise<void> {
    return this.tick();
  }

  /**
   * Runs `task` under the loop's lock. Failures are logged and emitted as
   * 'error'; the returned promise always resolves.
   */
  runExclusive(label: string, task: () => void | Promise<void>): Promise<void> {
    return this.lock.runExclusive(task).catch((error: unknown) => {
      this.handleError(label, error);
    });
  }

  private tick(): Promise<void> {
    return this.runExclusive('update', () => {
      this.tickCount++;
      this.emit('tick', this.tickCount);
      if (this.engine.update()) {
        logger.info('Final boss summoned');
        this.emit('finalBossSummoned');
      }
    });
  }

  private refresh(): Promise<void> {
    const callback = this.onRefresh;
    if (!callback) return Promise.resolve();
    return this.runExclusive('refresh', () => callback(this.engine));
  }

  private handleError(label: string, error: unknown): void {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(`${label} failed: ${err.message}`);
    // EventEmitter throws on an unheard 'error'
    if (this.listenerCount('error') > 0) {
      this.emit('error', err);
    }
  }
}
