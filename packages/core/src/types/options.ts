/**
 * Configuration options for random string generators
 *
 * All options are optional. Omitted randomness falls back to the
 * process-wide source, which is seeded from the clock once per process.
 */

import { ConfigurationError } from './errors.js';
import { defaultPick, defaultSeed } from '../random/process-random.js';
import type {
  PickFunction,
  RandomStrategy,
  SeedFunction,
} from '../random/strategy.js';

export interface GeneratorOptions {
  /** Seeding operation (default: seed the process-wide source from the clock) */
  seed?: SeedFunction;
  /** Index picker (default: uniform pick from the process-wide source) */
  pick?: PickFunction;
  /** Seed and pick supplied together; exclusive with `seed` and `pick` */
  strategy?: RandomStrategy;
  /**
   * Seed the process-wide source on first construction (default: true).
   * Only consulted while the default seed function is in use.
   */
  autoSeed?: boolean;
}

export interface ResolvedGeneratorOptions {
  seed: SeedFunction;
  pick: PickFunction;
  autoSeed: boolean;
  /** True when `seed` is the process-wide default */
  defaultSeeding: boolean;
}

export const DEFAULT_OPTIONS: Readonly<ResolvedGeneratorOptions> =
  Object.freeze({
    seed: defaultSeed,
    pick: defaultPick,
    autoSeed: true,
    defaultSeeding: true,
  });

/**
 * Merge user options with defaults and validate them
 */
export function resolveOptions(
  userOptions: GeneratorOptions = {}
): ResolvedGeneratorOptions {
  validateOptions(userOptions);

  const seed =
    userOptions.strategy?.seed ?? userOptions.seed ?? DEFAULT_OPTIONS.seed;
  const pick =
    userOptions.strategy?.pick ?? userOptions.pick ?? DEFAULT_OPTIONS.pick;

  return {
    seed,
    pick,
    autoSeed: userOptions.autoSeed ?? DEFAULT_OPTIONS.autoSeed,
    defaultSeeding: seed === defaultSeed,
  };
}

/**
 * Values may come from untyped callers, so each one is checked at run time.
 */
function validateOptions(options: GeneratorOptions): void {
  if (options.seed !== undefined && typeof options.seed !== 'function') {
    throw invalidOption('seed', options.seed, 'must be a function');
  }
  if (options.pick !== undefined && typeof options.pick !== 'function') {
    throw invalidOption('pick', options.pick, 'must be a function');
  }
  if (options.autoSeed !== undefined && typeof options.autoSeed !== 'boolean') {
    throw invalidOption('autoSeed', options.autoSeed, 'must be a boolean');
  }

  const { strategy } = options;
  if (strategy === undefined) {
    return;
  }
  if (options.seed !== undefined || options.pick !== undefined) {
    throw new ConfigurationError({
      message: 'Option "strategy" cannot be combined with "seed" or "pick"',
      context: {
        option: 'strategy',
        suggestion: 'Pass either a strategy or individual seed/pick functions.',
      },
    });
  }
  if (
    typeof strategy !== 'object' ||
    strategy === null ||
    typeof strategy.seed !== 'function' ||
    typeof strategy.pick !== 'function'
  ) {
    throw invalidOption(
      'strategy',
      strategy,
      'must provide seed() and pick(bound) functions'
    );
  }
}

function invalidOption(
  option: string,
  value: unknown,
  requirement: string
): ConfigurationError {
  return new ConfigurationError({
    message: `Invalid option "${option}": ${requirement}`,
    context: { option, value },
  });
}
