/**
 * Deterministic PRNG using the xoshiro128++ algorithm.
 *
 * - Four 32-bit state words seeded through SplitMix32
 * - Accepts 64-bit seeds (number or bigint); the high word is folded in
 * - State can be saved and restored for exact replays
 *
 * Reference: https://prng.di.unimi.it/xoshiro128plusplus.c
 */

const TWO_POW_32 = 0x100000000;

/**
 * SplitMix32 for state initialization from a single seed.
 */
function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/**
 * Fold a seed into 32 bits through its 64-bit two's complement. Seeds in
 * [0, 2^32) map to themselves; a negative seed differs from its absolute
 * value. Fractions are truncated.
 */
export function foldSeed(seed: number | bigint): number {
  if (typeof seed === "number") {
    if (!Number.isFinite(seed)) {
      throw new RangeError(`Seed must be finite, got ${seed}`);
    }
    return foldSeed(BigInt(Math.trunc(seed)));
  }
  const value = BigInt.asUintN(64, seed);
  const low = Number(value & 0xffffffffn);
  const high = Number(value >> 32n);
  return high === 0 ? low : (low ^ Math.imul(high, 0x9e3779b1)) >>> 0;
}

/**
 * State type for xoshiro128++ (4 x 32-bit words)
 */
export type RngState = [number, number, number, number];

export class SeededRandom {
  private s: RngState;
  readonly seed: number;

  constructor(seed: number | bigint) {
    this.seed = foldSeed(seed);
    const mix = splitmix32(this.seed);
    this.s = [mix(), mix(), mix(), mix()];

    // xoshiro needs at least one non-zero word
    if ((this.s[0] | this.s[1] | this.s[2] | this.s[3]) === 0) {
      this.s[0] = 1;
    }

    for (let i = 0; i < 8; i++) {
      this.next32();
    }
  }

  /**
   * Independent generator for a sub-stream, seeded with `seed + offset`.
   */
  static derive(seed: number, offset: number): SeededRandom {
    return new SeededRandom(seed + offset);
  }

  private next32(): number {
    const s = this.s;
    const result = (rotl((s[0] + s[3]) >>> 0, 7) + s[0]) >>> 0;

    const t = (s[1] << 9) >>> 0;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];

    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result;
  }

  /**
   * Next float in [0, 1)
   */
  next(): number {
    return this.next32() / TWO_POW_32;
  }

  /**
   * Random integer between min and max (inclusive)
   */
  range(min: number, max: number): number {
    if (max < min) return min;
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /**
   * Random integer in [0, bound)
   */
  below(bound: number): number {
    return bound <= 0 ? 0 : Math.floor(this.next() * bound);
  }

  /**
   * Uniform choice from an array
   */
  choice<T>(array: readonly [T, ...T[]]): T;
  choice<T>(array: readonly T[]): T | undefined;
  choice<T>(array: readonly T[]): T | undefined {
    if (array.length === 0) return undefined;
    return array[this.below(array.length)];
  }

  /**
   * Fisher-Yates shuffle into a new array
   */
  shuffle<T>(array: readonly T[]): T[] {
    const result = Array.from(array);
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.range(0, i);
      const temp = result[i] as T;
      result[i] = result[j] as T;
      result[j] = temp;
    }
    return result;
  }

  /**
   * True with the given probability (0 to 1)
   */
  probability(chance: number): boolean {
    return this.next() < chance;
  }

  getState(): RngState {
    return [this.s[0], this.s[1], this.s[2], this.s[3]];
  }

  setState(state: RngState): void {
    this.s = [state[0] >>> 0, state[1] >>> 0, state[2] >>> 0, state[3] >>> 0];
  }
}
