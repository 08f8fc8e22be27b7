/**
 * Random string generator
 *
 * Draws symbols from an owned charset through an injected picker. `fill` is
 * the primitive; `generate` allocates a container and delegates to it.
 */

import {
  Charset,
  type MutableSequence,
  type SymbolSequence,
} from '../charset/charset.js';
import { containers, type ContainerKind } from '../charset/containers.js';
import { GenerationError } from '../types/errors.js';
import { resolveOptions, type GeneratorOptions } from '../types/options.js';
import { defaultSeedGuard } from '../random/process-random.js';
import type { PickFunction, SeedFunction } from '../random/strategy.js';

export class RandomStringGenerator<S> {
  readonly #charset: Charset<S>;
  readonly #symbols: readonly S[];
  readonly #seed: SeedFunction;
  readonly #pick: PickFunction;

  /**
   * Builds a generator over an already validated charset.
   *
   * With the default seed function and `autoSeed` on, the first generator
   * constructed in the process seeds the shared source; later ones skip it.
   * A custom seed function is never called here, only by {@link seed}.
   */
  constructor(charset: Charset<S>, options: GeneratorOptions = {}) {
    const resolved = resolveOptions(options);
    this.#charset = charset;
    this.#symbols = charset.symbols;
    this.#seed = resolved.seed;
    this.#pick = resolved.pick;

    if (resolved.defaultSeeding && resolved.autoSeed) {
      defaultSeedGuard.run(resolved.seed);
    }
  }

  /** Throws the charset's `CharsetError` when the source is empty. */
  static fromSequence<S>(
    source: SymbolSequence<S>,
    options?: GeneratorOptions
  ): RandomStringGenerator<S> {
    return new RandomStringGenerator(
      Charset.fromSequence(source).unwrap(),
      options
    );
  }

  static fromArray<S>(
    array: readonly S[],
    options?: GeneratorOptions
  ): RandomStringGenerator<S> {
    return new RandomStringGenerator(Charset.fromArray(array).unwrap(), options);
  }

  static fromTerminated<S>(
    buffer: SymbolSequence<S>,
    terminator: S,
    options?: GeneratorOptions
  ): RandomStringGenerator<S> {
    return new RandomStringGenerator(
      Charset.fromTerminated(buffer, terminator).unwrap(),
      options
    );
  }

  static fromText(
    text: string,
    options?: GeneratorOptions
  ): RandomStringGenerator<string> {
    return new RandomStringGenerator(Charset.fromText(text).unwrap(), options);
  }

  get charset(): Charset<S> {
    return this.#charset;
  }

  /** Re-seeds unconditionally, whatever the one-time policy has done. */
  seed(): void {
    this.#seed();
  }

  /**
   * Writes `count` random symbols to `buffer[0..count)`.
   *
   * Nothing is checked here: `buffer` must hold `count` symbols and the
   * picker must stay in range. Past its end a typed array drops writes and a
   * plain array grows.
   */
  fill(buffer: MutableSequence<S>, count: number): void {
    const symbols = this.#symbols;
    const pick = this.#pick;
    const bound = symbols.length;
    for (let i = 0; i < count; i++) {
      buffer[i] = symbols[pick(bound)];
    }
  }

  /**
   * Allocates a container of `size` symbols and fills it. Without a kind the
   * result is a plain array.
   */
  generate(size: number): S[];
  generate<C, B extends MutableSequence<S>>(
    size: number,
    kind: ContainerKind<S, C, B>
  ): C;
  generate<C, B extends MutableSequence<S>>(
    size: number,
    kind?: ContainerKind<S, C, B>
  ): C | S[] {
    assertLength(size);
    if (kind === undefined) {
      return this.#materialize(size, containers.array<S>());
    }
    return this.#materialize(size, kind);
  }

  #materialize<C, B extends MutableSequence<S>>(
    size: number,
    kind: ContainerKind<S, C, B>
  ): C {
    const storage = kind.allocate(size);
    this.fill(storage, size);
    return kind.seal(storage);
  }
}

function assertLength(size: number): void {
  if (!Number.isSafeInteger(size) || size < 0) {
    throw new GenerationError({
      message: `Invalid length ${String(size)}: expected a non-negative integer`,
      context: { value: size },
    });
  }
}

export type CharsetSource<S> = Charset<S> | SymbolSequence<S>;

/**
 * Picks the construction form from the source: text is split into code
 * points, a `Charset` is used as-is, anything else is copied as a sequence.
 */
export function createGenerator(
  text: string,
  options?: GeneratorOptions
): RandomStringGenerator<string>;
export function createGenerator<S>(
  source: CharsetSource<S>,
  options?: GeneratorOptions
): RandomStringGenerator<S>;
export function createGenerator<S>(
  source: string | CharsetSource<S>,
  options?: GeneratorOptions
): RandomStringGenerator<S> | RandomStringGenerator<string> {
  if (typeof source === 'string') {
    return RandomStringGenerator.fromText(source, options);
  }
  if (source instanceof Charset) {
    return new RandomStringGenerator(source, options);
  }
  return RandomStringGenerator.fromSequence(source, options);
}
