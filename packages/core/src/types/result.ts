/**
 * Result<T, E> for operations whose expected failures are values, not throws.
 * Charset construction reports an empty or unterminated alphabet this way.
 */

export type Result<T, E> = Ok<T> | Err<E>;

/**
 * Success variant of Result<T, E>
 */
export class Ok<T> {
  readonly _tag = 'Ok' as const;

  constructor(public readonly value: T) {}

  isErr(): this is never {
    return false;
  }

  unwrap(): T {
    return this.value;
  }
}

/**
 * Error variant of Result<T, E>
 */
export class Err<E> {
  readonly _tag = 'Err' as const;

  constructor(public readonly error: E) {}

  isErr(): this is Err<E> {
    return true;
  }

  /**
   * Throws the carried error. Errors are rethrown as-is so callers can
   * still match on their class; anything else is wrapped.
   */
  unwrap(): never {
    if (this.error instanceof Error) {
      throw this.error;
    }
    throw new Error(`Called unwrap on an Err value: ${String(this.error)}`);
  }
}

export function ok<T>(value: T): Ok<T> {
  return new Ok(value);
}

export function err<E>(error: E): Err<E> {
  return new Err(error);
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.isErr();
}
