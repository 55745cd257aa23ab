/**
 * Error Code Infrastructure
 * Stable error codes and exit-code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error' | 'fatal';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Generation Errors (E100–E199)
  RULE_REJECTION_LIMIT = 'E100',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
  INVALID_WEIGHTS = 'E301',
  UNSATISFIABLE_CONFIGURATION = 'E302',

  // CLI Errors (E400–E499)
  INVALID_CLI_OPTION = 'E400',

  // Entropy / Internal Errors (E500–E599)
  ENTROPY_SOURCE_FAILURE = 'E500',
  INTERNAL_ERROR = 'E599',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.RULE_REJECTION_LIMIT]: 30,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INVALID_WEIGHTS]: 51,
  [ErrorCode.UNSATISFIABLE_CONFIGURATION]: 52,
  [ErrorCode.INVALID_CLI_OPTION]: 60,
  [ErrorCode.ENTROPY_SOURCE_FAILURE]: 98,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
