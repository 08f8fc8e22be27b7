import { XorShift32 } from '../util/rng.js';
import { OnceGuard } from './once-guard.js';
import type { PickFunction, RandomStrategy, SeedFunction } from './strategy.js';

const PROCESS_SALT = 'strand/process';

// Shared by every generator built with the default seed/pick functions.
// Until seeded it runs from a fixed state.
const processSource = new XorShift32(0, PROCESS_SALT);

/**
 * Guards the automatic seeding of the process-wide source. Never reset.
 */
export const defaultSeedGuard = new OnceGuard();

/** Seeds the process-wide source with an explicit value. */
export function seedProcessRandom(seed: number): void {
  processSource.reseed(seed);
}

/** Seeds the process-wide source from the wall clock. */
export const defaultSeed: SeedFunction = () => {
  seedProcessRandom(Date.now());
};

/** Uniform pick in `[0, bound)` from the process-wide source. */
export const defaultPick: PickFunction = (bound) =>
  processSource.nextBelow(bound);

/**
 * A deterministic strategy with its own source. `seed()` rewinds it to the
 * state it was created in.
 */
export function seededStrategy(
  seed: number,
  salt = 'strand/seeded'
): RandomStrategy {
  const source = new XorShift32(seed, salt);
  return {
    seed: () => source.reseed(seed),
    pick: (bound) => source.nextBelow(bound),
  };
}
