/**
 * Per-worker randomness. Every worker derives its own seed from the run's base
 * seed so a run is reproducible while workers still draw unrelated sequences.
 */

const ALPHANUMERIC = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

// 32-bit hash combine: rotate h1 left by 5, add h1, xor h2.
export function combineSeed(h1: number, h2: number): number {
  const rol5 = (h1 << 5) | (h1 >>> 27);
  return ((rol5 + h1) | 0) ^ h2;
}

/** mulberry32 PRNG. */
export class SeededRandom {
  private state: number;
  readonly seed: number;

  constructor(seed: number) {
    this.seed = seed | 0;
    this.state = this.seed;
  }

  static forWorker(workerIndex: number, baseSeed: number): SeededRandom {
    return new SeededRandom(combineSeed(workerIndex, baseSeed));
  }

  /** Uniform in [0, 1). */
  next(): number {
    let t = (this.state = (this.state + 0x6d2b79f5) | 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Integer in [min, max). */
  nextInt(min: number, max: number): number {
    if (max <= min) {
      throw new RangeError(`max (${max}) must be greater than min (${min})`);
    }
    return min + Math.floor(this.next() * (max - min));
  }

  nextBoolean(probability = 0.5): boolean {
    return this.next() < probability;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot pick from an empty list');
    }
    return items[this.nextInt(0, items.length)];
  }

  nextString(length: number): string {
    let result = '';
    for (let i = 0; i < length; i++) {
      result += ALPHANUMERIC[this.nextInt(0, ALPHANUMERIC.length)];
    }
    return result;
  }
}
