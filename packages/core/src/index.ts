// @strand/core entry point
//
// Public API:
// - RandomStringGenerator / createGenerator: fill caller buffers or materialize
//   containers with symbols drawn from an owned charset.
// - Charset and container kinds: the construction forms and the output types
//   `generate` can allocate.
// - Randomness: the process-wide source, its once-only seeding guard, and
//   deterministic seeded strategies.
// - Errors, Result and option resolution shared with the CLI.

export {
  RandomStringGenerator,
  createGenerator,
  type CharsetSource,
} from './generator/random-string-generator.js';

export {
  Charset,
  type MutableSequence,
  type SymbolSequence,
} from './charset/charset.js';
export {
  containers,
  type ContainerKind,
  type TypedArrayConstructor,
} from './charset/containers.js';

export type {
  PickFunction,
  RandomStrategy,
  SeedFunction,
} from './random/strategy.js';
export { OnceGuard } from './random/once-guard.js';
export {
  defaultPick,
  defaultSeed,
  defaultSeedGuard,
  seedProcessRandom,
  seededStrategy,
} from './random/process-random.js';
export { XorShift32, fnv1a32 } from './util/rng.js';

export {
  DEFAULT_OPTIONS,
  resolveOptions,
  type GeneratorOptions,
  type ResolvedGeneratorOptions,
} from './types/options.js';

export {
  ErrorCode,
  EXIT_CODES,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export {
  StrandError,
  CharsetError,
  GenerationError,
  ConfigurationError,
  InternalError,
  isStrandError,
  type CharsetForm,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';
export {
  Ok,
  Err,
  ok,
  err,
  isErr,
  type Result,
} from './types/result.js';
