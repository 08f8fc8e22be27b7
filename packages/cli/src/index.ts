#!/usr/bin/env node

// CLI entry point
// - Command name: `strand` with subcommands `generate` and `presets`.
// - `generate` draws --count strings of --length symbols from a preset or an
//   explicit --charset and prints them as text lines or a JSON array.
// - Errors are rendered to stderr and mapped to process.exitCode.

import { Command, CommanderError } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  InternalError,
  createGenerator,
  isStrandError,
  seededStrategy,
  type GeneratorOptions,
  type StrandError,
} from '@strand/core';
import { renderCLIView } from './render.js';
import {
  resolveGenerateSettings,
  type CliOptions,
  type GenerateSettings,
} from './flags.js';
import { printEffectiveConfig, printErrorDebug } from './debug.js';
import { listPresets } from './presets.js';

// Salt for --seed so CLI output does not replay other seeded sources
const CLI_SEED_SALT = 'strand/cli';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('strand')
    .description('Generate random strings from a charset')
    .version('0.1.0')
    .exitOverride();

  program
    .command('generate')
    .description('Generate random strings')
    .option('--charset <symbols>', 'Symbols to draw from')
    .option(
      '-p, --preset <name>',
      'Named charset (see `strand presets`), default alnum'
    )
    .option('-l, --length <number>', 'Symbols per string (default 10)')
    .option('-c, --count <number>', 'Number of strings to generate')
    .option('-r, --rows <number>', 'Alias for --count')
    .option('--seed <number>', 'Deterministic seed (default: clock)')
    .option('--out <format>', 'Output format: text|json', 'text')
    .option('--debug', 'Print the effective configuration to stderr')
    .action((options: CliOptions) => {
      const debug = options.debug === true;
      try {
        const settings = resolveGenerateSettings(options);
        const lines = generateLines(settings, debug);
        writeLines(lines, settings);
      } catch (err: unknown) {
        if (debug && isStrandError(err)) {
          printErrorDebug(err);
        }
        throw err;
      }
    });

  program
    .command('presets')
    .description('List the named charsets')
    .action(() => {
      const rows = listPresets().map(([name, charset]) => `${name}\t${charset}`);
      process.stdout.write(rows.join('\n') + '\n');
    });

  return program;
}

function generateLines(settings: GenerateSettings, debug: boolean): string[] {
  const options: GeneratorOptions =
    settings.seed === undefined
      ? {}
      : { strategy: seededStrategy(settings.seed, CLI_SEED_SALT) };
  const generator = createGenerator(settings.charset, options);

  if (debug) {
    printEffectiveConfig(settings, generator.charset.size);
  }

  // One buffer for every line; fill overwrites [0, length)
  const buffer = new Array<string>(settings.length);
  const lines: string[] = [];
  for (let i = 0; i < settings.count; i++) {
    generator.fill(buffer, settings.length);
    lines.push(buffer.join(''));
  }
  return lines;
}

function writeLines(lines: string[], settings: GenerateSettings): void {
  if (settings.out === 'json') {
    process.stdout.write(JSON.stringify(lines, null, 2) + '\n');
    return;
  }
  process.stdout.write(lines.join('\n') + '\n');
}

function handleCliError(err: unknown): void {
  if (err instanceof CommanderError) {
    // Commander has already printed help, version or its own message
    process.exitCode = err.exitCode;
    return;
  }

  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: StrandError;
  if (isStrandError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError(
      message || 'Unexpected error',
      err instanceof Error ? err : undefined
    );
  }

  console.error(renderCLIView(presenter.formatForCLI(error)));
  process.exitCode = error.getExitCode();
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
