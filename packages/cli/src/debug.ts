import type { StrandError } from '@strand/core';

import type { GenerateSettings } from './flags.js';

/**
 * Print the effective generate settings to stderr.
 * Intended to be used behind the --debug flag.
 */
export function printEffectiveConfig(
  settings: GenerateSettings,
  charsetSize: number
): void {
  const { charset: _charset, ...rest } = settings;
  const effective = {
    ...rest,
    charsetSize,
    seeding: settings.seed === undefined ? 'clock' : 'fixed',
  };
  process.stderr.write(
    `[strand] effective config: ${JSON.stringify(effective, null, 2)}\n`
  );
}

/**
 * Print a serialized error to stderr ahead of the rendered view.
 * Production output leaves out the stack and the offending value.
 */
export function printErrorDebug(error: StrandError): void {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  process.stderr.write(
    `[strand] error: ${JSON.stringify(error.toJSON(env), null, 2)}\n`
  );
}
