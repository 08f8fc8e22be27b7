import { ErrorCode } from '../errors/codes.js';
import { CharsetError, type CharsetForm } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

/**
 * A sized sequence with random access by index. Arrays, typed arrays and
 * other array-likes qualify; a `Set` or an iterator does not.
 */
export type SymbolSequence<S> = ArrayLike<S>;

/**
 * Writable random-access storage: plain arrays and typed arrays.
 */
export interface MutableSequence<S> {
  [index: number]: S;
}

const NUL = '\u0000';

/**
 * An owned, non-empty alphabet.
 *
 * Every factory copies its source, so later changes to the caller's buffer
 * do not reach generated output.
 */
export class Charset<S> {
  readonly #symbols: readonly S[];

  private constructor(symbols: readonly S[]) {
    this.#symbols = Object.freeze(symbols);
  }

  /** Copies a sized random-access container, all `source.length` symbols. */
  static fromSequence<S>(
    source: SymbolSequence<S>
  ): Result<Charset<S>, CharsetError> {
    return Charset.#build(Array.from(source), 'sequence');
  }

  /**
   * Copies a fixed-size array. Its whole length is the alphabet: a literal
   * array has no terminator to strip.
   */
  static fromArray<S>(array: readonly S[]): Result<Charset<S>, CharsetError> {
    return Charset.#build(array.slice(), 'array');
  }

  /**
   * Copies the symbols before the first `terminator`. The terminator is not
   * part of the alphabet; a buffer without one is rejected.
   */
  static fromTerminated<S>(
    buffer: SymbolSequence<S>,
    terminator: S
  ): Result<Charset<S>, CharsetError> {
    const symbols: S[] = [];
    for (let i = 0; i < buffer.length; i++) {
      const symbol = buffer[i];
      if (Object.is(symbol, terminator)) {
        return Charset.#build(symbols, 'terminated');
      }
      symbols.push(symbol);
    }
    return err(
      new CharsetError({
        message: `Charset buffer of length ${buffer.length} has no terminator`,
        errorCode: ErrorCode.UNTERMINATED_CHARSET,
        context: {
          form: 'terminated',
          value: terminator,
          suggestion: 'Use fromSequence() for buffers without a sentinel.',
        },
      })
    );
  }

  /**
   * Splits text into code points. One trailing U+0000 is dropped, so text
   * copied out of a NUL-terminated buffer yields the same alphabet.
   */
  static fromText(text: string): Result<Charset<string>, CharsetError> {
    const symbols = Array.from(text);
    if (symbols[symbols.length - 1] === NUL) {
      symbols.pop();
    }
    return Charset.#build(symbols, 'text');
  }

  static #build<S>(
    symbols: S[],
    form: CharsetForm
  ): Result<Charset<S>, CharsetError> {
    if (symbols.length === 0) {
      return err(
        new CharsetError({
          message: 'Charset must contain at least one symbol',
          errorCode: ErrorCode.EMPTY_CHARSET,
          context: { form },
        })
      );
    }
    return ok(new Charset(symbols));
  }

  get size(): number {
    return this.#symbols.length;
  }

  /** The frozen symbol list. Indexing it is the generator's hot path. */
  get symbols(): readonly S[] {
    return this.#symbols;
  }

  at(index: number): S | undefined {
    return this.#symbols[index];
  }

  toArray(): S[] {
    return this.#symbols.slice();
  }

  equals(other: Charset<S>): boolean {
    if (other.size !== this.size) return false;
    return this.#symbols.every((symbol, i) =>
      Object.is(symbol, other.#symbols[i])
    );
  }
}
