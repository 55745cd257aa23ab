/**
 * ErrorPresenter - pure presentation layer for PassforgeError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode, Severity } from './codes.js';
import type { PassforgeError, SerializedError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  severity: Severity;
  location?: string;
  workaround?: string;
  cause?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: PassforgeError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      severity: error.severity,
      location: this.#formatLocation(error),
      workaround: this.#formatWorkaround(error),
      cause:
        this._env === 'dev' && error.cause ? error.cause.message : undefined,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout?.columns || 80,
    };
  }

  /** Stack-free, redacted record for machine consumption. */
  formatForProduction(error: PassforgeError): SerializedError {
    return error.toJSON('prod');
  }

  #formatLocation(error: PassforgeError): string | undefined {
    const ctx = error.context;
    if (!ctx) return undefined;
    if (ctx.option) return `Option: ${ctx.option}`;
    if (typeof ctx.classIndex === 'number') {
      return `Character class: ${ctx.classIndex}`;
    }
    return undefined;
  }

  #formatWorkaround(error: PassforgeError): string | undefined {
    return error.suggestions?.[0];
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }
}
