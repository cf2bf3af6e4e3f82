/**
 * ErrorPresenter - pure presentation layer for EvoError instances
 * - No business logic; formats into view objects the CLI renders
 */

import { ErrorCode } from './codes.js';
import type { ErrorContext, EvoError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  path?: string;
  schemaPath?: string;
  setting?: string;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: EvoError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      path: error.context?.path,
      schemaPath: error.context?.schemaPath,
      setting: error.context?.setting,
      workaround: this.#formatWorkaround(error),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  /** View for errors that did not originate in evoschema. */
  formatUnexpected(error: unknown): CLIErrorView {
    const message = error instanceof Error ? error.message : String(error);
    return {
      title: `Error ${ErrorCode.INTERNAL_ERROR}: ${message}`,
      code: ErrorCode.INTERNAL_ERROR,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  // Helpers
  #formatLocation(ctx?: ErrorContext): string | undefined {
    const loc = ctx?.path ?? ctx?.schemaPath ?? ctx?.setting;
    return loc ? `Location: ${loc}` : undefined;
  }

  #formatWorkaround(error: EvoError): string | undefined {
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

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout.columns || 80;
  }
}
