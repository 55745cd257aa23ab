/**
 * Password generator: rejection sampling over a weighted character source.
 *
 * Each generate() call grows a candidate one character at a time:
 * - the candidate is returned as soon as it is complete (checked before every
 *   append, so a complete candidate is never extended);
 * - a character the rule rejects is rolled back and counts toward the
 *   rejection ceiling;
 * - a candidate longer than floor(overflowFactor * length) is discarded and
 *   assembly restarts from empty. Restarts do not reset the rejection count.
 *
 * The ceiling bounds the work against a rule that rejects nearly everything;
 * the restart bounds the tail of the length distribution.
 */

import { ErrorCode } from '../errors/codes.js';
import { ConfigurationError, RuleRejectionError } from '../types/errors.js';
import {
  resolveOptions,
  type GeneratorOptions,
  type ResolvedGeneratorOptions,
} from '../types/options.js';
import { err, ok, type Result } from '../types/result.js';
import type { Configuration, Rule } from '../types/rule.js';
import {
  buildCharacterSource,
  compileClasses,
  isComplete,
  maxPasswordLength,
  validateConfiguration,
  weightsFingerprint,
} from './character-source.js';
import type { WeightedRandomSet } from './weighted-random-set.js';

export interface GenerationMetrics {
  /** Characters drawn from the character source */
  draws: number;
  /** Characters rolled back because the rule rejected the candidate */
  rejections: number;
  /** Candidates discarded for exceeding the maximum length */
  restarts: number;
  /** Length of the returned password (0 on failure) */
  length: number;
}

export class PasswordGenerator {
  readonly #rule: Rule;
  readonly #options: ResolvedGeneratorOptions;
  #characterSource: WeightedRandomSet<string>;
  #fingerprint: string;
  #lastMetrics: GenerationMetrics | undefined;

  /**
   * Reads `rule.config()` once to build the character source.
   * @throws ConfigurationError when the configuration can never produce a password
   */
  constructor(rule: Rule, options: GeneratorOptions = {}) {
    this.#options = resolveOptions(options);
    this.#rule = rule;

    const config = rule.config();
    validateConfiguration(config, this.#options.overflowFactor);
    this.#characterSource = buildCharacterSource(config, this.#options.random);
    this.#fingerprint = weightsFingerprint(config);
  }

  /** Counters from the most recent generate() call. */
  get lastMetrics(): GenerationMetrics | undefined {
    return this.#lastMetrics;
  }

  get options(): Readonly<ResolvedGeneratorOptions> {
    return this.#options;
  }

  /**
   * Generate a new random password.
   *
   * Returns Err(RuleRejectionError) once the rule has rejected
   * `maxRejections` characters. Entropy failures and configurations that
   * can never complete are thrown.
   */
  generate(): Result<string, RuleRejectionError> {
    const config = this.#rule.config();
    validateConfiguration(config, this.#options.overflowFactor);

    const source = this.#sourceFor(config);
    const classes = compileClasses(config);
    const maxLength = maxPasswordLength(config, this.#options.overflowFactor);
    const metrics: GenerationMetrics = {
      draws: 0,
      rejections: 0,
      restarts: 0,
      length: 0,
    };

    let password: string[] = [];
    while (metrics.rejections < this.#options.maxRejections) {
      if (isComplete(password, config.length, classes)) {
        metrics.length = password.length;
        this.#lastMetrics = metrics;
        return ok(password.join(''));
      }

      password.push(source.next());
      metrics.draws++;

      if (!this.#rule.valid(password.join(''))) {
        password.pop();
        metrics.rejections++;
        continue;
      }

      if (password.length > maxLength) {
        password = [];
        metrics.restarts++;
      }
    }

    this.#lastMetrics = metrics;
    return err(
      new RuleRejectionError(metrics.rejections, {
        draws: metrics.draws,
        restarts: metrics.restarts,
      })
    );
  }

  /**
   * Like generate(), but throws the RuleRejectionError.
   */
  generateOrThrow(): string {
    return this.generate().unwrap();
  }

  #sourceFor(config: Configuration): WeightedRandomSet<string> {
    if (this.#options.configPolicy === 'fixed') {
      assertReachable(config, this.#characterSource);
      return this.#characterSource;
    }

    const fingerprint = weightsFingerprint(config);
    if (fingerprint !== this.#fingerprint) {
      this.#characterSource = buildCharacterSource(
        config,
        this.#options.random
      );
      this.#fingerprint = fingerprint;
    }
    return this.#characterSource;
  }
}

/**
 * Every class with a positive minimum needs at least one character the
 * source can draw, or no candidate ever completes and the loop only restarts.
 */
function assertReachable(
  config: Configuration,
  source: WeightedRandomSet<string>
): void {
  config.characterClasses.forEach(({ characters, minimum }, classIndex) => {
    if (minimum === 0) return;
    const reachable = Array.from(characters).some(
      (c) => source.probabilityOf(c) > 0
    );
    if (!reachable) {
      throw new ConfigurationError({
        message: `character class ${classIndex} has no character the fixed character source can draw`,
        errorCode: ErrorCode.UNSATISFIABLE_CONFIGURATION,
        context: { classIndex, value: minimum },
        suggestions: ["Use configPolicy 'refresh' to rebuild the weights"],
      });
    }
  });
}
