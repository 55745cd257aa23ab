/**
 * Password generator options
 *
 * All options are optional; defaults match the behavior described for
 * PasswordGenerator.
 */

import type { RandomSource } from '../util/rng.js';
import { defaultRandomSource } from '../util/rng.js';
import { ConfigurationError } from './errors.js';

/**
 * How a generator treats a rule whose configuration changes over time.
 * - refresh: rebuild the character source whenever the classes change, so
 *   weights and completion thresholds always come from the same configuration.
 * - fixed: keep the weights computed at construction; completion is still
 *   checked against the configuration read on each call.
 */
export type ConfigPolicy = 'refresh' | 'fixed';

export interface GeneratorOptions {
  /** Invalid-candidate rejections tolerated per generate() call (default: 10) */
  maxRejections?: number;
  /** Restart when length exceeds floor(overflowFactor * length) (default: 1.5) */
  overflowFactor?: number;
  /** Entropy for character draws (default: process crypto source) */
  random?: RandomSource;
  /** See ConfigPolicy (default: 'refresh') */
  configPolicy?: ConfigPolicy;
}

export interface ResolvedGeneratorOptions {
  maxRejections: number;
  overflowFactor: number;
  random: RandomSource;
  configPolicy: ConfigPolicy;
}

export const DEFAULT_OPTIONS: Readonly<
  Omit<ResolvedGeneratorOptions, 'random'>
> = {
  maxRejections: 10,
  overflowFactor: 1.5,
  configPolicy: 'refresh',
};

export function resolveOptions(
  userOptions: GeneratorOptions = {}
): ResolvedGeneratorOptions {
  const resolved: ResolvedGeneratorOptions = {
    maxRejections: userOptions.maxRejections ?? DEFAULT_OPTIONS.maxRejections,
    overflowFactor:
      userOptions.overflowFactor ?? DEFAULT_OPTIONS.overflowFactor,
    configPolicy: userOptions.configPolicy ?? DEFAULT_OPTIONS.configPolicy,
    random: userOptions.random ?? defaultRandomSource(),
  };

  validateOptions(resolved);
  return resolved;
}

function validateOptions(options: ResolvedGeneratorOptions): void {
  if (!Number.isInteger(options.maxRejections) || options.maxRejections <= 0) {
    throw new ConfigurationError({
      message: 'maxRejections must be a positive integer',
    });
  }
  if (!Number.isFinite(options.overflowFactor) || options.overflowFactor < 1) {
    throw new ConfigurationError({
      message: 'overflowFactor must be a finite number >= 1',
    });
  }
  if (
    options.configPolicy !== 'refresh' &&
    options.configPolicy !== 'fixed'
  ) {
    throw new ConfigurationError({
      message: "configPolicy must be 'refresh' or 'fixed'",
    });
  }
}
