/**
 * Seedable random source owned by the primary server and handed to the
 * generators. Uses the Mulberry32 algorithm.
 */
export class RandomSource {
  private state: number;
  private currentSeed: number;

  constructor(
    seed = 0,
    private readonly derive: () => number = deriveSeed,
  ) {
    this.currentSeed = seed;
    this.state = seed >>> 0;
  }

  /**
   * Re-seed the source. A negative seed derives a fresh one from the clock
   * and the process id.
   *
   * @returns the seed actually in use
   */
  setSeed(seed: number): number {
    const effective = seed < 0 ? this.derive() : seed;
    this.currentSeed = effective;
    this.state = effective >>> 0;
    return effective;
  }

  get seed(): number {
    return this.currentSeed;
  }

  /** Float in [0, 1). */
  nextFloat(): number {
    let t = (this.state = (this.state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Float in [min, max). */
  nextInRange(min: number, max: number): number {
    return this.nextFloat() * (max - min) + min;
  }

  /** Standard normal deviate (Box-Muller). */
  nextGaussian(mean = 0, sigma = 1): number {
    const u = 1 - this.nextFloat();
    const v = this.nextFloat();
    return mean + sigma * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  }
}

let derivations = 0;

/** Clock and pid, mixed with a call counter so two derivations in one millisecond differ. */
export function deriveSeed(): number {
  derivations++;
  return ((Date.now() % 1_000_000_000) ^ (process.pid << 8) ^ Math.imul(derivations, 0x9e3779b1)) & 0x7fffffff;
}
