/**
 * Container kinds: how `generate` allocates storage for `size` symbols and
 * turns the filled storage into the value handed back to the caller.
 */

import type { MutableSequence } from './charset.js';

export interface ContainerKind<S, C, B extends MutableSequence<S>> {
  /** Allocates storage able to hold exactly `size` symbols */
  allocate(size: number): B;
  /** Produces the caller's container from filled storage */
  seal(storage: B): C;
}

/** Constructors of the typed arrays, e.g. `Uint8Array` or `Uint16Array`. */
export type TypedArrayConstructor<B extends MutableSequence<number>> = new (
  length: number
) => B;

function array<S>(): ContainerKind<S, S[], S[]> {
  return {
    allocate: (size) => new Array<S>(size),
    seal: (storage) => storage,
  };
}

const text: ContainerKind<string, string, string[]> = {
  allocate: (size) => new Array<string>(size),
  seal: (storage) => storage.join(''),
};

function typed<B extends MutableSequence<number>>(
  ctor: TypedArrayConstructor<B>
): ContainerKind<number, B, B> {
  return {
    allocate: (size) => new ctor(size),
    seal: (storage) => storage,
  };
}

// String.fromCharCode takes its arguments on the stack
const CODE_UNIT_CHUNK = 0x2000;

/** UTF-16 code units, sealed into a string. */
const codeUnits: ContainerKind<number, string, Uint16Array> = {
  allocate: (size) => new Uint16Array(size),
  seal: (storage) => {
    let out = '';
    for (let i = 0; i < storage.length; i += CODE_UNIT_CHUNK) {
      out += String.fromCharCode(...storage.subarray(i, i + CODE_UNIT_CHUNK));
    }
    return out;
  },
};

export const containers = {
  array,
  text,
  typed,
  codeUnits,
} as const;
