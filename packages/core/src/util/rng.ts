// xorshift32 PRNG backing the process-wide source and seeded strategies

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

const UINT32_RANGE = 0x100000000;
const NONZERO_RANGE = UINT32_RANGE - 1;

/**
 * xorshift32 RNG with uint32 state.
 * Initialization: x = (seed >>> 0) ^ fnv1a32(salt), replaced by the FNV
 * offset basis when that is 0 (xorshift never leaves the all-zero state).
 * Step: x ^= x << 13; x ^= x >>> 17; x ^= x << 5; (all masked to uint32)
 */
export class XorShift32 {
  private x = 0;

  constructor(
    seed: number,
    private readonly salt = ''
  ) {
    this.reseed(seed);
  }

  /** Resets the state as if freshly constructed with `seed`. */
  reseed(seed: number): void {
    const x = ((seed >>> 0) ^ fnv1a32(this.salt)) >>> 0;
    this.x = x === 0 ? 2166136261 : x;
  }

  /** Returns the next uint32 value. */
  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /**
   * Returns an integer uniformly distributed over [0, bound).
   *
   * next() never yields 0, so draws are shifted to [0, 2^32 - 2] and those
   * falling in the incomplete last bucket are redrawn. `bound` must be an
   * integer in [1, 2^32 - 1].
   */
  nextBelow(bound: number): number {
    const limit = NONZERO_RANGE - (NONZERO_RANGE % bound);
    let value = this.next() - 1;
    while (value >= limit) {
      value = this.next() - 1;
    }
    return value % bound;
  }
}
