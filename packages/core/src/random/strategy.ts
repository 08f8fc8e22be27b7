/**
 * Initializes (or re-initializes) a random source. Called for its side effect.
 */
export type SeedFunction = () => void;

/**
 * Picks a position in `[0, bound)`. `bound` is always at least 1.
 *
 * Callers do not re-check the result; a picker that strays outside the range
 * breaks its contract.
 */
export type PickFunction = (bound: number) => number;

/**
 * The two operations a generator needs from a source of randomness.
 */
export interface RandomStrategy {
  seed: SeedFunction;
  pick: PickFunction;
}
