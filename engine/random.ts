/**
 * Seeded pseudo-random stream (mulberry32). A game owns exactly one of these and
 * draws every random decision from it, so a seed plus a command sequence
 * reproduces the same game. The whole generator state is one 32-bit integer,
 * which is what snapshots persist.
 */
/** Largest seed; seeds are unsigned 32-bit integers. */
export const MAX_SEED = 0xffffffff;

export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let x = this.state;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform integer in [min, max]. */
  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) throw new Error('choice called with empty array');
    return items[this.nextInt(0, items.length - 1)];
  }

  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.nextInt(0, i);
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  }

  /** `count` distinct positions of `items`, drawn without replacement. */
  sample<T>(items: readonly T[], count: number): T[] {
    if (count > items.length) throw new Error('sample larger than population');
    const pool = [...items];
    const picked: T[] = [];
    for (let i = 0; i < count; i++) {
      const index = this.nextInt(0, pool.length - 1);
      picked.push(pool[index]);
      pool.splice(index, 1);
    }
    return picked;
  }

  getState(): number {
    return this.state;
  }

  setState(state: number): void {
    this.state = state >>> 0;
  }
}

export function randomSeed(): number {
  return Math.floor(Math.random() * (MAX_SEED + 1));
}
