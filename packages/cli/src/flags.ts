import { CliOptionError, type GeneratorOptions } from '@passforge/core';
import type { DemoRuleOptions } from './demo-rule.js';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  length?: string | number;
  special?: boolean;
  count?: string | number;
  forbid?: string;
  maxRejections?: string | number;
  printMetrics?: boolean;
  debug?: boolean;
}

export interface CliSettings {
  rule: DemoRuleOptions;
  generator: GeneratorOptions;
  count: number;
  printMetrics: boolean;
  debug: boolean;
}

export function parsePositiveInteger(
  raw: string | number | undefined,
  flag: string,
  fallback: number
): number {
  if (raw === undefined) return fallback;
  const text = String(raw).trim();
  const value = Number(text);
  if (!/^\d+$/.test(text) || !Number.isSafeInteger(value) || value <= 0) {
    throw new CliOptionError(
      `Invalid ${flag} "${String(raw)}": expected a positive integer`,
      flag,
      raw,
      `Pass a whole number greater than zero, e.g. ${flag} ${fallback}`
    );
  }
  return value;
}

export function parseForbidPattern(raw: string | undefined): RegExp | undefined {
  if (raw === undefined) return undefined;
  if (raw.length === 0) {
    throw new CliOptionError(
      'Invalid --forbid: pattern must not be empty',
      '--forbid',
      raw,
      'Omit --forbid to accept every password'
    );
  }
  try {
    return new RegExp(raw, 'u');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliOptionError(
      `Invalid --forbid: ${reason}`,
      '--forbid',
      raw,
      'Escape regular expression metacharacters such as [ ( and \\'
    );
  }
}

/**
 * Parse CLI options into the demo rule and generator settings
 */
export function resolveCliSettings(options: CliOptions): CliSettings {
  return {
    rule: {
      length: parsePositiveInteger(options.length, '--length', 8),
      specialCharacters: options.special !== false,
      forbid: parseForbidPattern(options.forbid),
    },
    generator: {
      maxRejections: parsePositiveInteger(
        options.maxRejections,
        '--max-rejections',
        10
      ),
    },
    count: parsePositiveInteger(options.count, '--count', 1),
    printMetrics: options.printMetrics === true,
    debug: options.debug === true,
  };
}
