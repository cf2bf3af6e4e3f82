import { describe, it, expect } from 'vitest';
import { ConfigError, DEFAULT_SEED, DEFAULT_VERSIONS } from '@evoschema/core';
import {
  buildEvoOptions,
  parseInteger,
  parseOperatorList,
  resolveCoverage,
  resolveOutputFormat,
  resolveSeed,
  resolveThreshold,
  resolveVersions,
} from './flags.js';

describe('parseInteger', () => {
  it('accepts integers given as strings or numbers', () => {
    expect(parseInteger('--versions', '12')).toBe(12);
    expect(parseInteger('--versions', ' 3 ')).toBe(3);
    expect(parseInteger('--versions', 0)).toBe(0);
  });

  it('rejects non-integers with the flag name and the expected shape', () => {
    expect(() => parseInteger('--versions', 'abc')).toThrow(
      'Invalid --versions value "abc". Expected a non-negative integer.'
    );
    expect(() => parseInteger('--versions', '1.5')).toThrow(ConfigError);
    expect(() => parseInteger('--versions', '')).toThrow(ConfigError);
    expect(() => parseInteger('--max-properties', '0', 1)).toThrow(
      'Invalid --max-properties value "0". Expected an integer >= 1.'
    );
  });

  it('records the setting in the error context', () => {
    let caught: unknown;
    try {
      parseInteger('--seed', '-4');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.context).toEqual({ setting: '--seed', value: '-4' });
    }
  });
});

describe('defaults', () => {
  it('falls back to the core defaults for versions and seed', () => {
    expect(resolveVersions({})).toBe(DEFAULT_VERSIONS);
    expect(resolveSeed({})).toBe(DEFAULT_SEED);
    expect(resolveVersions({ versions: '2' })).toBe(2);
    expect(resolveSeed({ seed: '7' })).toBe(7);
  });
});

describe('resolveOutputFormat', () => {
  it('defaults to json and is case-insensitive', () => {
    expect(resolveOutputFormat(undefined)).toBe('json');
    expect(resolveOutputFormat('NDJSON')).toBe('ndjson');
    expect(resolveOutputFormat('changelog')).toBe('changelog');
  });

  it('rejects unknown formats', () => {
    expect(() => resolveOutputFormat('yaml')).toThrow(
      'Invalid --out value "yaml". Expected "json", "ndjson" or "changelog".'
    );
  });
});

describe('resolveCoverage and resolveThreshold', () => {
  it('accepts the two coverage strategies', () => {
    expect(resolveCoverage('Exhaustive')).toBe('exhaustive');
    expect(() => resolveCoverage('all')).toThrow(ConfigError);
  });

  it('bounds the threshold to [0, 1]', () => {
    expect(resolveThreshold('0.75')).toBe(0.75);
    expect(resolveThreshold(1)).toBe(1);
    expect(() => resolveThreshold('1.2')).toThrow(
      'Invalid --threshold value "1.2". Expected a number between 0 and 1.'
    );
    expect(() => resolveThreshold('x')).toThrow(ConfigError);
  });
});

describe('parseOperatorList', () => {
  it('splits and trims names', () => {
    expect(parseOperatorList('addField, renameField,')).toEqual(['addField', 'renameField']);
  });

  it('names the unknown operators', () => {
    expect(() => parseOperatorList('addField,explode')).toThrow(/^Invalid --operators value "explode"/);
    expect(() => parseOperatorList(' , ')).toThrow(/^Invalid --operators value " , "/);
  });
});

describe('buildEvoOptions', () => {
  it('leaves unset flags to the core defaults', () => {
    expect(buildEvoOptions({ versions: '3', seed: '1', out: 'json' })).toEqual({});
  });

  it('maps diff and mutation flags', () => {
    expect(
      buildEvoOptions({
        threshold: '0.5',
        rootName: 'doc',
        operators: 'addField,removeField',
        coverage: 'exhaustive',
        maxProperties: '30',
        minProperties: '2',
      })
    ).toEqual({
      rootName: 'doc',
      similarity: { threshold: 0.5 },
      mutation: {
        operators: ['addField', 'removeField'],
        coverage: 'exhaustive',
        maxProperties: 30,
        minProperties: 2,
      },
    });
  });
});
