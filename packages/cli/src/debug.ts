import {
  maxPasswordLength,
  resolveOptions,
  type Configuration,
  type GenerationMetrics,
} from '@passforge/core';
import type { CliSettings } from './flags.js';

/**
 * Print the effective rule configuration and generator settings to stderr.
 * Intended to be used behind the --debug flag.
 */
export function printEffectiveConfig(
  config: Configuration,
  settings: CliSettings
): void {
  const resolved = resolveOptions(settings.generator);
  const effective = {
    length: config.length,
    maxLength: maxPasswordLength(config, resolved.overflowFactor),
    characterClasses: config.characterClasses,
    forbid: settings.rule.forbid?.source ?? null,
    maxRejections: resolved.maxRejections,
    overflowFactor: resolved.overflowFactor,
    configPolicy: resolved.configPolicy,
    count: settings.count,
  };
  process.stderr.write(
    `[passforge] effective config: ${JSON.stringify(effective, null, 2)}\n`
  );
}

// Passwords never reach stderr; only counters do.
export function printMetrics(metrics: readonly GenerationMetrics[]): void {
  const totals = metrics.reduce(
    (acc, m) => ({
      draws: acc.draws + m.draws,
      rejections: acc.rejections + m.rejections,
      restarts: acc.restarts + m.restarts,
    }),
    { draws: 0, rejections: 0, restarts: 0 }
  );
  const summary = { passwords: metrics.length, ...totals };
  process.stderr.write(`[passforge] metrics: ${JSON.stringify(summary)}\n`);
}
