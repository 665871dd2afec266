/**
 * Deterministic pseudo random number generator (mulberry32).
 *
 * Every random choice of a fuzz run goes through an instance of this class, so a run
 * is fully reproducible from its seed.
 */
export class Prng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  /** Float in [0, 1) */
  nextFloat(): number {
    return this.nextUint32() / 0x100000000;
  }

  chance(probability: number): boolean {
    return this.nextFloat() < probability;
  }

  /** Uniform bigint in [lo, hi], both inclusive */
  bigIntBetween(lo: bigint, hi: bigint): bigint {
    if (lo > hi) {
      throw new RangeError(`Empty range [${lo}, ${hi}]`);
    }
    const range = hi - lo + BigInt(1);
    if (range === BigInt(1)) {
      return lo;
    }

    const bits = (range - BigInt(1)).toString(2).length;
    const words = Math.ceil(bits / 32);
    const mask = (BigInt(1) << BigInt(bits)) - BigInt(1);

    // Candidates at or above `range` are discarded
    for (;;) {
      let candidate = BigInt(0);
      for (let i = 0; i < words; i++) {
        candidate = (candidate << BigInt(32)) | BigInt(this.nextUint32());
      }
      candidate &= mask;
      if (candidate < range) {
        return lo + candidate;
      }
    }
  }

  /** Uniform integer in [lo, hi], both inclusive */
  intBetween(lo: number, hi: number): number {
    if (!Number.isSafeInteger(lo) || !Number.isSafeInteger(hi)) {
      throw new RangeError(`Range bounds must be safe integers: [${lo}, ${hi}]`);
    }
    return Number(this.bigIntBetween(BigInt(lo), BigInt(hi)));
  }

  /**
   * Pick a value with probability proportional to its weight. Entries with weight 0 are never picked.
   */
  pickWeighted<T>(entries: readonly (readonly [T, number])[]): T {
    let total = 0;
    for (const [, weight] of entries) {
      if (weight < 0 || !Number.isFinite(weight)) {
        throw new RangeError(`Invalid weight ${weight}`);
      }
      total += weight;
    }
    if (total <= 0) {
      throw new RangeError("Sum of weights must be positive");
    }

    let target = this.nextFloat() * total;
    for (const [value, weight] of entries) {
      if (target < weight) {
        return value;
      }
      target -= weight;
    }
    // Float rounding may leave target at exactly the sum of the remaining weights
    for (let i = entries.length - 1; i >= 0; i--) {
      if (entries[i][1] > 0) return entries[i][0];
    }
    throw new RangeError("Sum of weights must be positive");
  }
}

/**
 * Derive an independent seed for the `index`-th sub stream of `seed`
 */
export function deriveSeed(seed: number, index: number): number {
  let z = (seed ^ Math.imul(index + 1, 0x9e3779b9)) >>> 0;
  z = Math.imul(z ^ (z >>> 16), 0x85ebca6b);
  z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35);
  return (z ^ (z >>> 16)) >>> 0;
}

/**
 * With probability `edgeBias` return `lo` or `hi` (even odds), else a uniform draw in [lo, hi]
 */
export function sampleBigInt(rng: Prng, lo: bigint, hi: bigint, edgeBias: number): bigint {
  if (lo > hi) {
    throw new RangeError(`Empty range [${lo}, ${hi}]`);
  }
  if (rng.chance(edgeBias)) {
    return rng.chance(0.5) ? lo : hi;
  }
  return rng.bigIntBetween(lo, hi);
}

/**
 * Number version of {@link sampleBigInt}
 */
export function sampleInt(rng: Prng, lo: number, hi: number, edgeBias: number): number {
  if (lo > hi) {
    throw new RangeError(`Empty range [${lo}, ${hi}]`);
  }
  if (rng.chance(edgeBias)) {
    return rng.chance(0.5) ? lo : hi;
  }
  return rng.intBetween(lo, hi);
}
