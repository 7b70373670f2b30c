/**
 * Deterministic seeded PRNG using xorshift32.
 * String seeds are hashed into a 32-bit integer; numeric seeds go through
 * the same hash via their decimal form. The hash is finalised with a murmur3
 * mix so neighbouring seeds ("game-1", "game-2") start far apart.
 */
export class SeededRng {
  private state: number;

  constructor(seed: string | number) {
    this.state = SeededRng.mix(SeededRng.hashString(String(seed)));
  }

  private static hashString(s: string): number {
    let hash = 0;
    for (let i = 0; i < s.length; i++) {
      hash = ((hash << 5) - hash + s.charCodeAt(i)) | 0;
    }
    return Math.abs(hash);
  }

  private static mix(h: number): number {
    h ^= h >>> 16;
    h = Math.imul(h, 0x85ebca6b);
    h ^= h >>> 13;
    h = Math.imul(h, 0xc2b2ae35);
    h ^= h >>> 16;
    // xorshift cannot leave state 0
    return h === 0 ? 1 : h >>> 0;
  }

  /** Return next pseudo-random 32-bit unsigned integer */
  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  /** Return a float in [0, 1) */
  nextFloat(): number {
    return this.next() / 4294967296;
  }

  /** Return an integer in [0, max) */
  nextInt(max: number): number {
    return Math.floor(this.nextFloat() * max);
  }

  /** Return an integer in [min, max], both inclusive */
  nextIntBetween(min: number, max: number): number {
    return min + this.nextInt(max - min + 1);
  }

  /**
   * Normal deviate via Box-Muller. Consumes two uniforms per call; the
   * second deviate is discarded so each call costs the same.
   */
  nextGaussian(mean = 0, sigma = 1): number {
    const u1 = 1 - this.nextFloat(); // (0, 1], keeps log finite
    const u2 = this.nextFloat();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + z * sigma;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError("Cannot pick from an empty list");
    }
    return items[this.nextInt(items.length)];
  }
}
