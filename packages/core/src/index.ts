// @passforge/core entry point
//
// Public API:
// - PasswordGenerator over a caller-supplied Rule (config + validity predicate).
// - WeightedRandomSet and the IntervalIndex it samples through.
// - Random sources: crypto-backed by default, seeded for reproducible tests.
// - Error hierarchy, stable error codes and the CLI error presenter.

export {
  PasswordGenerator,
  type GenerationMetrics,
  WeightedRandomSet,
  type WeightedEntry,
  buildCharacterSource,
  characterWeights,
  countOccurrences,
  distinctCharacters,
  maxPasswordLength,
  validateConfiguration,
} from './generator/index.js';

export type {
  CharacterClassConfiguration,
  Configuration,
  Rule,
} from './types/rule.js';
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  type ConfigPolicy,
  type GeneratorOptions,
  type ResolvedGeneratorOptions,
} from './types/options.js';
export {
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
  type Result,
} from './types/result.js';

// Errors
export {
  PassforgeError,
  RuleRejectionError,
  ConfigurationError,
  EntropySourceError,
  CliOptionError,
  InternalError,
  isPassforgeError,
  isRuleRejectionError,
  isEntropySourceError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';
export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';

// Randomness
export {
  CryptoRandomSource,
  SeededRandomSource,
  defaultRandomSource,
  fnv1a32,
  uint64ToFloat64,
  type ByteFiller,
  type RandomSource,
} from './util/rng.js';
export { IntervalIndex } from './util/interval-index.js';

export * from './charsets.js';
