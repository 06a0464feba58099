/**
 * Uniform random sources for the random-walk simulator
 */

/**
 * Supplies uniform draws in [0, 1).
 *
 * A source carries state, so concurrent simulations should each own one
 * rather than share a single stream.
 */
export interface RandomSource {
  next(): number;
}

/**
 * Process-wide source backed by Math.random
 */
export const defaultRandomSource: RandomSource = {
  next: () => Math.random(),
};

/**
 * Seeded pseudo-random number generator (Mulberry32).
 * Deterministic: same seed = same sequence.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed | 0;
  }

  /** Returns a float in [0, 1) */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}
