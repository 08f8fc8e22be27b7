import { describe, it, expect } from 'vitest';

import { DEFAULT_OPTIONS, resolveOptions } from '../options.js';
import { ConfigurationError } from '../errors.js';
import { defaultPick, defaultSeed } from '../../random/process-random.js';

// Options as an untyped (JavaScript) caller might pass them
const untyped = (value: unknown) => Object.assign({}, value);

describe('resolveOptions', () => {
  it('falls back to the process-wide defaults', () => {
    const resolved = resolveOptions();

    expect(resolved.seed).toBe(defaultSeed);
    expect(resolved.pick).toBe(defaultPick);
    expect(resolved.autoSeed).toBe(true);
    expect(resolved.defaultSeeding).toBe(true);
  });

  it('exposes frozen defaults', () => {
    expect(Object.isFrozen(DEFAULT_OPTIONS)).toBe(true);
    expect(DEFAULT_OPTIONS.autoSeed).toBe(true);
  });

  it('takes custom seed and pick functions', () => {
    const seed = () => {};
    const pick = () => 0;
    const resolved = resolveOptions({ seed, pick, autoSeed: false });

    expect(resolved.seed).toBe(seed);
    expect(resolved.pick).toBe(pick);
    expect(resolved.autoSeed).toBe(false);
    expect(resolved.defaultSeeding).toBe(false);
  });

  it('keeps default seeding when only the picker is custom', () => {
    const resolved = resolveOptions({ pick: () => 0 });

    expect(resolved.seed).toBe(defaultSeed);
    expect(resolved.defaultSeeding).toBe(true);
  });

  it('unpacks a strategy', () => {
    const strategy = { seed: () => {}, pick: () => 1 };
    const resolved = resolveOptions({ strategy });

    expect(resolved.seed).toBe(strategy.seed);
    expect(resolved.pick).toBe(strategy.pick);
  });

  it('rejects a strategy mixed with seed or pick', () => {
    const strategy = { seed: () => {}, pick: () => 1 };

    expect(() => resolveOptions({ strategy, seed: () => {} })).toThrow(
      'Option "strategy" cannot be combined with "seed" or "pick"'
    );
  });

  it('rejects values of the wrong type from untyped callers', () => {
    const cases: Array<[unknown, string]> = [
      [{ seed: 42 }, 'Invalid option "seed": must be a function'],
      [{ pick: 'random' }, 'Invalid option "pick": must be a function'],
      [{ autoSeed: 'yes' }, 'Invalid option "autoSeed": must be a boolean'],
      [
        { strategy: { seed: () => {} } },
        'Invalid option "strategy": must provide seed() and pick(bound) functions',
      ],
    ];

    for (const [raw, message] of cases) {
      expect(() => resolveOptions(untyped(raw))).toThrow(message);
    }
  });

  it('reports the offending option', () => {
    try {
      resolveOptions(untyped({ autoSeed: 1 }));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.context?.option).toBe('autoSeed');
      }
    }
  });
});
