import { describe, test, expect } from 'vitest';
import { ErrorCode, EXIT_CODES, getExitCode, type Severity } from '../codes.js';

describe('Error Code Infrastructure', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    expect(new Set(codes).size).toBe(codes.length);
  });

  test('EXIT_CODES covers every ErrorCode', () => {
    const enumCodes = Object.values(ErrorCode);
    expect(Object.keys(EXIT_CODES).length).toBe(enumCodes.length);
    for (const code of enumCodes) {
      expect(getExitCode(code)).toBeTypeOf('number');
    }
  });

  test('exit codes are within valid 1-255 range', () => {
    for (const exit of Object.values(EXIT_CODES)) {
      expect(exit).toBeGreaterThanOrEqual(1);
      expect(exit).toBeLessThanOrEqual(255);
    }
  });

  test('input errors map to the 20s, configuration to 50', () => {
    expect(getExitCode(ErrorCode.INVALID_SCHEMA_STRUCTURE)).toBe(20);
    expect(getExitCode(ErrorCode.SCHEMA_PARSE_FAILED)).toBe(21);
    expect(getExitCode(ErrorCode.UNSUPPORTED_SCHEMA_TYPE)).toBe(22);
    expect(getExitCode(ErrorCode.CONFIGURATION_ERROR)).toBe(50);
    expect(getExitCode(ErrorCode.INTERNAL_ERROR)).toBe(99);
  });

  test('Severity type is exported and constrained', () => {
    const sev: Severity = 'warn';
    expect(sev).toBe('warn');
  });
});
