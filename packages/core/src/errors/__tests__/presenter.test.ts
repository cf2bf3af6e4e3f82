import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ErrorPresenter } from '../presenter.js';
import { ErrorCode } from '../codes.js';
import { ConfigError, MalformedInputError } from '../../types/errors.js';

describe('ErrorPresenter', () => {
  const saved = { NO_COLOR: process.env.NO_COLOR, FORCE_COLOR: process.env.FORCE_COLOR };

  beforeEach(() => {
    delete process.env.NO_COLOR;
    delete process.env.FORCE_COLOR;
  });

  afterEach(() => {
    for (const [key, value] of Object.entries(saved)) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it('formats a malformed-input error for the CLI', () => {
    const error = new MalformedInputError({
      message: 'Malformed schema at /properties: must be object',
      context: { schemaPath: '/properties' },
    });
    error.suggestions = ['Check the properties keyword'];

    const view = new ErrorPresenter('dev', { terminalWidth: 100 }).formatForCLI(error);

    expect(view).toEqual({
      title: 'Error E010: Malformed schema at /properties: must be object',
      code: ErrorCode.INVALID_SCHEMA_STRUCTURE,
      location: 'Location: /properties',
      path: undefined,
      schemaPath: '/properties',
      setting: undefined,
      workaround: 'Check the properties keyword',
      colors: true,
      terminalWidth: 100,
    });
  });

  it('uses the setting as location for config errors', () => {
    const error = new ConfigError({
      message: 'bad',
      context: { setting: '--versions' },
    });
    const view = new ErrorPresenter('prod', { terminalWidth: 80 }).formatForCLI(error);
    expect(view.location).toBe('Location: --versions');
    expect(view.colors).toBe(false);
  });

  it('honours NO_COLOR over the option', () => {
    process.env.NO_COLOR = '1';
    const error = new ConfigError({ message: 'bad' });
    const view = new ErrorPresenter('dev', { colors: true }).formatForCLI(error);
    expect(view.colors).toBe(false);
  });

  it('wraps unexpected errors as internal errors', () => {
    const view = new ErrorPresenter('prod', { terminalWidth: 80 }).formatUnexpected(
      new TypeError('x is undefined')
    );
    expect(view.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(view.title).toBe('Error E500: x is undefined');
    expect(view.location).toBeUndefined();
  });
});
