import { describe, test, expect } from 'vitest';
import { ErrorCode, EXIT_CODES, getExitCode } from '../codes.js';

describe('Error Code Infrastructure', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    const unique = new Set(codes);
    expect(unique.size).toBe(codes.length);
  });

  test('EXIT_CODES covers every ErrorCode', () => {
    const enumCodes = Object.values(ErrorCode);
    const mappedCodes = Object.keys(EXIT_CODES);
    expect(mappedCodes.length).toBe(enumCodes.length);
    for (const code of enumCodes) {
      expect(EXIT_CODES[code]).toBeTypeOf('number');
    }
  });

  test('exit codes are non-zero and distinct', () => {
    const exits = Object.values(ErrorCode).map(getExitCode);
    expect(exits.every((code) => code > 0)).toBe(true);
    expect(new Set(exits).size).toBe(exits.length);
  });

  test('getExitCode maps known codes', () => {
    expect(getExitCode(ErrorCode.EMPTY_CHARSET)).toBe(10);
    expect(getExitCode(ErrorCode.CONFIGURATION_ERROR)).toBe(50);
    expect(getExitCode(ErrorCode.INTERNAL_ERROR)).toBe(99);
  });
});
