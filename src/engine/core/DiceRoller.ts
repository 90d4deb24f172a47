export interface DiceState {
  seed: number;
  callCount: number;
}

export class DiceRoller {
  private seed: number;
  private initialSeed: number;
  private callCount: number = 0;

  constructor(seed: number) {
    this.seed = seed;
    this.initialSeed = seed;
  }

  // Mulberry32 PRNG - fast, good distribution
  private next(): number {
    this.callCount++;
    let t = (this.seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  // Uniform float in [0, 1). Every other draw goes through here.
  nextFloat(): number {
    return this.next();
  }

  // Uniform integer in [0, bound)
  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0) {
      throw new Error(`nextInt bound must be a positive integer, got ${bound}`);
    }
    return Math.floor(this.nextFloat() * bound);
  }

  // Roll D100 (1-100)
  rollD100(): number {
    return Math.floor(this.nextFloat() * 100) + 1;
  }

  // Get state for snapshot
  getState(): DiceState {
    return {
      seed: this.initialSeed,
      callCount: this.callCount,
    };
  }

  // Restore state from snapshot
  setState(state: DiceState): void {
    this.seed = state.seed;
    this.initialSeed = state.seed;
    this.callCount = 0;
    // Fast-forward to the correct state
    for (let i = 0; i < state.callCount; i++) {
      this.next();
    }
  }
}
