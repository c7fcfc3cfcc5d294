/**
 * Seedable pseudo-random source (mulberry32).
 * Each detector run owns one, so seeded runs are reproducible and unseeded
 * runs never share generator state.
 */

export class Random {
  private state: number;

  /** Seeds are taken modulo 2^32 */
  constructor(seed: number = Random.entropySeed()) {
    this.state = seed >>> 0;
  }

  /**
   * Fresh 32-bit seed from the platform generator
   */
  static entropySeed(): number {
    return Math.floor(Math.random() * 0x100000000) >>> 0;
  }

  /**
   * Uniform float in [0, 1)
   */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  /**
   * Uniform integer in [0, bound)
   */
  nextInt(bound: number): number {
    return Math.floor(this.next() * bound);
  }

  /**
   * Uniform float in [-width, width)
   */
  jitter(width: number): number {
    return (this.next() * 2 - 1) * width;
  }

  /**
   * In-place Fisher–Yates shuffle
   */
  shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      const tmp = items[i];
      items[i] = items[j];
      items[j] = tmp;
    }
    return items;
  }
}
