import { describe, it, expect, expectTypeOf } from 'vitest';

import { Charset, type SymbolSequence } from '../charset.js';
import { ErrorCode } from '../../errors/codes.js';
import { CharsetError } from '../../types/errors.js';
import { isErr } from '../../types/result.js';

describe('Charset', () => {
  describe('fromSequence', () => {
    it('copies every element of an array', () => {
      const charset = Charset.fromSequence(['x', 'y', 'z']).unwrap();

      expect(charset.size).toBe(3);
      expect(charset.toArray()).toEqual(['x', 'y', 'z']);
    });

    it('accepts typed arrays and array-likes', () => {
      const units = Charset.fromSequence(new Uint16Array([97, 98])).unwrap();
      const arrayLike = Charset.fromSequence<string>({
        length: 2,
        0: 'p',
        1: 'q',
      });

      expect(units.toArray()).toEqual([97, 98]);
      expect(arrayLike.unwrap().toArray()).toEqual(['p', 'q']);
    });

    it('only accepts sized random-access containers', () => {
      expectTypeOf<string[]>().toMatchTypeOf<SymbolSequence<string>>();
      expectTypeOf<Uint8Array>().toMatchTypeOf<SymbolSequence<number>>();
      expectTypeOf<Set<string>>().not.toMatchTypeOf<SymbolSequence<string>>();
      expectTypeOf<
        IterableIterator<string>
      >().not.toMatchTypeOf<SymbolSequence<string>>();
    });

    it('reports an empty source as an Err', () => {
      const result = Charset.fromSequence<string>([]);

      expect(result.isErr()).toBe(true);
      if (isErr(result)) {
        expect(result.error).toBeInstanceOf(CharsetError);
        expect(result.error.errorCode).toBe(ErrorCode.EMPTY_CHARSET);
        expect(result.error.context?.form).toBe('sequence');
      }
    });

    it('is unaffected by later changes to the source', () => {
      const source = ['a', 'b'];
      const charset = Charset.fromSequence(source).unwrap();
      source[0] = 'z';
      source.push('c');

      expect(charset.toArray()).toEqual(['a', 'b']);
    });
  });

  describe('fromArray', () => {
    it('uses the full array length', () => {
      const charset = Charset.fromArray(['0', '1', '\u0000']).unwrap();

      expect(charset.size).toBe(3);
      expect(charset.at(2)).toBe('\u0000');
    });

    it('rejects an empty array', () => {
      const result = Charset.fromArray<number>([]);

      expect(result.isErr()).toBe(true);
    });
  });

  describe('fromTerminated', () => {
    it('stops at the first terminator and excludes it', () => {
      const buffer = new Uint8Array([104, 105, 0, 106, 0]);
      const charset = Charset.fromTerminated(buffer, 0).unwrap();

      expect(charset.toArray()).toEqual([104, 105]);
    });

    it('rejects a buffer that starts with the terminator', () => {
      const result = Charset.fromTerminated(['\u0000', 'a'], '\u0000');

      expect(result.isErr()).toBe(true);
      if (isErr(result)) {
        expect(result.error.errorCode).toBe(ErrorCode.EMPTY_CHARSET);
        expect(result.error.context?.form).toBe('terminated');
      }
    });

    it('rejects a buffer with no terminator', () => {
      const result = Charset.fromTerminated(['a', 'b'], '\u0000');

      expect(result.isErr()).toBe(true);
      if (isErr(result)) {
        expect(result.error.errorCode).toBe(ErrorCode.UNTERMINATED_CHARSET);
        expect(result.error.message).toBe(
          'Charset buffer of length 2 has no terminator'
        );
      }
    });
  });

  describe('fromText', () => {
    it('splits text into code points', () => {
      const charset = Charset.fromText('aé😀ж').unwrap();

      expect(charset.toArray()).toEqual(['a', 'é', '😀', 'ж']);
    });

    it('drops one trailing NUL', () => {
      expect(Charset.fromText('ab\u0000').unwrap().toArray()).toEqual([
        'a',
        'b',
      ]);
      expect(Charset.fromText('ab\u0000\u0000').unwrap().size).toBe(3);
    });

    it('rejects empty text and a lone NUL', () => {
      expect(Charset.fromText('').isErr()).toBe(true);
      expect(Charset.fromText('\u0000').isErr()).toBe(true);
    });
  });

  it('yields the same alphabet from every construction form', () => {
    const fromSequence = Charset.fromSequence(['a', 'b', 'c']).unwrap();
    const fromArray = Charset.fromArray(['a', 'b', 'c']).unwrap();
    const fromTerminated = Charset.fromTerminated(
      ['a', 'b', 'c', '\u0000'],
      '\u0000'
    ).unwrap();
    const fromText = Charset.fromText('abc').unwrap();

    for (const other of [fromArray, fromTerminated, fromText]) {
      expect(fromSequence.equals(other)).toBe(true);
      expect(other.toArray()).toEqual(['a', 'b', 'c']);
    }
  });

  it('equals() compares length and order', () => {
    const abc = Charset.fromText('abc').unwrap();

    expect(abc.equals(Charset.fromText('acb').unwrap())).toBe(false);
    expect(abc.equals(Charset.fromText('ab').unwrap())).toBe(false);
  });

  it('exposes a frozen symbol list', () => {
    const charset = Charset.fromText('xy').unwrap();

    expect(Object.isFrozen(charset.symbols)).toBe(true);
    expect(charset.at(5)).toBeUndefined();
  });
});
