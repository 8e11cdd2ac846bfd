/**
 * Random — Seedable source for parameter randomization.
 */

/** Mulberry32: same seed, same sequence */
export class SeededRandom {
  private state: number;

  constructor(seed: number = Math.floor(Math.random() * 2147483647)) {
    this.state = seed;
  }

  /** Uniform in [0, 1) */
  next(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  range(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  /** Integer in [min, max], both inclusive */
  rangeInt(min: number, max: number): number {
    return Math.floor(this.range(min, max + 1));
  }

  pick<T>(items: readonly T[]): T {
    const item = items[this.rangeInt(0, items.length - 1)];
    if (item === undefined) {
      throw new RangeError(`Cannot pick from ${items.length} item(s)`);
    }
    return item;
  }
}
