import { ConfigurationError } from '@strand/core';

import { DEFAULT_PRESET, PRESETS, isPresetName } from './presets.js';

export type OutputFormat = 'text' | 'json';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  charset?: string;
  preset?: string;
  length?: string | number;
  count?: string | number;
  rows?: string | number;
  seed?: string | number;
  out?: string;
  debug?: boolean;
  // Allow additional CLI options that we don't process
  [key: string]: unknown;
}

/**
 * Everything `strand generate` needs once flags are parsed and checked
 */
export interface GenerateSettings {
  /** Charset text, split into code points by the generator */
  charset: string;
  /** Where the charset came from: `preset:<name>` or `--charset` */
  charsetSource: string;
  length: number;
  count: number;
  /** Present when output must be reproducible */
  seed?: number;
  out: OutputFormat;
}

export const DEFAULT_LENGTH = 10;

export function resolveGenerateSettings(options: CliOptions): GenerateSettings {
  const { charset, charsetSource } = resolveCharset(options);
  const settings: GenerateSettings = {
    charset,
    charsetSource,
    length: resolveLength(options.length),
    count: resolveLineCount(options),
    out: resolveOutputFormat(options.out),
  };
  const seed = resolveSeed(options.seed);
  if (seed !== undefined) {
    settings.seed = seed;
  }
  return settings;
}

/**
 * Resolve --charset/--preset into charset text.
 *
 * The two flags are exclusive; with neither, the default preset applies.
 */
export function resolveCharset(
  options: Pick<CliOptions, 'charset' | 'preset'>
): { charset: string; charsetSource: string } {
  if (options.charset !== undefined && options.preset !== undefined) {
    throw new ConfigurationError({
      message: 'Use either --charset or --preset, not both',
      context: { option: '--charset' },
    });
  }
  if (options.charset !== undefined) {
    return { charset: options.charset, charsetSource: '--charset' };
  }

  const name = (options.preset ?? DEFAULT_PRESET).toLowerCase();
  if (!isPresetName(name)) {
    throw new ConfigurationError({
      message: `Unknown preset "${options.preset ?? ''}"`,
      context: {
        option: '--preset',
        value: options.preset,
        suggestion: `Expected one of: ${Object.keys(PRESETS).join(', ')}.`,
      },
    });
  }
  return { charset: PRESETS[name], charsetSource: `preset:${name}` };
}

/**
 * Resolve --length into a non-negative integer (default 10).
 */
export function resolveLength(value: unknown): number {
  if (value === undefined) {
    return DEFAULT_LENGTH;
  }
  const num = parseInteger(value);
  if (num === undefined || num < 0) {
    throw new ConfigurationError({
      message: `Invalid length value "${String(value)}". Expected a non-negative integer.`,
      context: { option: '--length', value },
    });
  }
  return num;
}

/**
 * Resolve count/rows into a single positive integer.
 *
 * - If neither flag is provided, defaults to 1.
 * - If both are provided, they must agree on the same numeric value.
 */
export function resolveLineCount(
  options: Pick<CliOptions, 'count' | 'rows'>
): number {
  const rawValues: Array<[string, unknown]> = [
    ['count', options.count],
    ['rows', options.rows],
  ];

  const provided = rawValues.filter(([, value]) => value !== undefined);
  if (provided.length === 0) {
    return 1;
  }

  const parsed = provided.map(([name, value]): [string, number] => {
    const num = parseInteger(value);
    if (num === undefined || num <= 0) {
      throw new ConfigurationError({
        message: `Invalid ${name} value "${String(value)}". Expected a positive integer.`,
        context: { option: `--${name}`, value },
      });
    }
    return [name, num];
  });

  const [first, ...rest] = parsed;
  if (first === undefined) {
    return 1;
  }
  if (rest.some(([, value]) => value !== first[1])) {
    const names = parsed.map(([n]) => `--${n}`).join(', ');
    throw new ConfigurationError({
      message: `Conflicting line count flags (${names}) with different values.`,
      context: { option: '--count' },
    });
  }
  return first[1];
}

/**
 * Resolve --seed into an integer, or undefined for clock seeding.
 */
export function resolveSeed(value: unknown): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const num = parseInteger(value);
  if (num === undefined) {
    throw new ConfigurationError({
      message: `Invalid seed value "${String(value)}". Expected an integer.`,
      context: { option: '--seed', value },
    });
  }
  return num;
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'text';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'text' || raw === 'json') {
    return raw;
  }
  throw new ConfigurationError({
    message: `Invalid --out value "${String(value)}". Supported formats are "text" and "json".`,
    context: { option: '--out', value },
  });
}

function parseInteger(value: unknown): number | undefined {
  if (typeof value !== 'number' && typeof value !== 'string') {
    return undefined;
  }
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  const num = typeof value === 'number' ? value : Number(value);
  return Number.isSafeInteger(num) ? num : undefined;
}
