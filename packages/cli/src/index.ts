#!/usr/bin/env node

// CLI entry point
// - Command name: `passforge` with a single default subcommand `generate`.
// - `generate` builds the demo rule from --length/--no-special/--forbid, draws
//   --count passwords from PasswordGenerator and prints one per line on stdout.
// - Diagnostics (--debug, --print-metrics) go to stderr with a `[passforge]` prefix.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  InternalError,
  PasswordGenerator,
  isPassforgeError,
  type GenerationMetrics,
  type GeneratorOptions,
  type PassforgeError,
} from '@passforge/core';
import { DemoRule } from './demo-rule.js';
import { resolveCliSettings, type CliOptions } from './flags.js';
import { printEffectiveConfig, printMetrics } from './debug.js';
import { renderCLIView } from './render.js';

/**
 * Generate passwords for parsed `generate` options.
 * `overrides.random` replaces the crypto source, for tests only.
 */
export function runGenerate(
  options: CliOptions,
  overrides: Pick<GeneratorOptions, 'random'> = {}
): void {
  const settings = resolveCliSettings(options);
  const rule = new DemoRule(settings.rule);

  if (settings.debug) {
    printEffectiveConfig(rule.config(), settings);
  }

  const generator = new PasswordGenerator(rule, {
    ...settings.generator,
    ...overrides,
  });
  const passwords: string[] = [];
  const metrics: GenerationMetrics[] = [];
  for (let i = 0; i < settings.count; i++) {
    passwords.push(generator.generateOrThrow());
    if (generator.lastMetrics) metrics.push(generator.lastMetrics);
  }

  process.stdout.write(`${passwords.join('\n')}\n`);
  if (settings.printMetrics) {
    printMetrics(metrics);
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('passforge')
    .description('Generate random passwords that satisfy composition rules')
    .version('0.1.0');

  program
    .command('generate', { isDefault: true })
    .description('Generate passwords with the built-in demo rule')
    .option('-l, --length <number>', 'Minimum password length', '8')
    .option('--no-special', 'Exclude special characters')
    .option('-c, --count <number>', 'Number of passwords to print', '1')
    .option('--forbid <pattern>', 'Reject passwords matching this pattern')
    .option(
      '--max-rejections <number>',
      'Rejected characters tolerated per password',
      '10'
    )
    .option('--print-metrics', 'Print generation metrics as JSON to stderr')
    .option('--debug', 'Print the effective configuration to stderr')
    .action((options: CliOptions) => {
      runGenerate(options);
    });

  return program;
}

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: PassforgeError;
  if (isPassforgeError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError(
      message || 'Unexpected error',
      err instanceof Error ? err : undefined
    );
  }

  if (env === 'prod') {
    console.error(JSON.stringify(presenter.formatForProduction(error)));
  } else {
    console.error(renderCLIView(presenter.formatForCLI(error)));
  }

  process.exit(error.getExitCode());
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
