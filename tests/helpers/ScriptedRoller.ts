import { DiceRoller } from '../../src/engine/core/DiceRoller';

/**
 * DiceRoller that replays queued floats instead of drawing from the PRNG.
 * Runs out loudly unless a fallback value is given.
 */
export class ScriptedRoller extends DiceRoller {
  private queue: number[];
  private draws = 0;

  constructor(values: number[] = [], private readonly fallback?: number) {
    super(0);
    this.queue = [...values];
  }

  push(...values: number[]): this {
    this.queue.push(...values);
    return this;
  }

  // Queue floats that make rollD100() return each of `rolls`
  pushD100(...rolls: number[]): this {
    return this.push(...rolls.map((roll) => (roll - 0.5) / 100));
  }

  // Queue a float that makes nextInt(bound) return k
  pushInt(k: number, bound: number): this {
    return this.push((k + 0.5) / bound);
  }

  override nextFloat(): number {
    const value = this.queue.shift();
    if (value !== undefined) {
      this.draws++;
      return value;
    }
    if (this.fallback === undefined) {
      throw new Error(`ScriptedRoller ran out of values after ${this.draws} draws`);
    }
    this.draws++;
    return this.fallback;
  }

  remaining(): number {
    return this.queue.length;
  }

  drawCount(): number {
    return this.draws;
  }
}
