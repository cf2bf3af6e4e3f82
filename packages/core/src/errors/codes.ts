/**
 * Error Code Infrastructure
 * Stable error codes and their CLI exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Schema input errors (E001–E099)
  INVALID_SCHEMA_STRUCTURE = 'E010',
  SCHEMA_PARSE_FAILED = 'E011',
  UNSUPPORTED_SCHEMA_TYPE = 'E012',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_SCHEMA_STRUCTURE]: 20,
  [ErrorCode.SCHEMA_PARSE_FAILED]: 21,
  [ErrorCode.UNSUPPORTED_SCHEMA_TYPE]: 22,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
