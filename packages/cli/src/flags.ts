import {
  ConfigError,
  DEFAULT_SEED,
  DEFAULT_VERSIONS,
  type CoverageStrategy,
  type EvoOptions,
  operatorNames,
} from '@evoschema/core';

export type OutputFormat = 'json' | 'ndjson' | 'changelog';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  versions?: string | number;
  seed?: string | number;
  operators?: string;
  coverage?: string;
  maxProperties?: string | number;
  minProperties?: string | number;
  threshold?: string | number;
  rootName?: string;
  out?: string;
  debug?: boolean;
}

function invalid(setting: string, value: unknown, expected: string): ConfigError {
  return new ConfigError({
    message: `Invalid ${setting} value "${String(value)}". Expected ${expected}.`,
    context: { setting, value: String(value) },
  });
}

/**
 * Parse a non-negative integer flag. Commander hands values over as strings.
 */
export function parseInteger(
  setting: string,
  value: unknown,
  min = 0
): number {
  const num = typeof value === 'number' ? value : Number(String(value).trim());
  if (String(value).trim() === '' || !Number.isInteger(num) || num < min) {
    throw invalid(setting, value, min === 0 ? 'a non-negative integer' : `an integer >= ${min}`);
  }
  return num;
}

export function resolveVersions(options: Pick<CliOptions, 'versions'>): number {
  return options.versions === undefined ? DEFAULT_VERSIONS : parseInteger('--versions', options.versions);
}

export function resolveSeed(options: Pick<CliOptions, 'seed'>): number {
  return options.seed === undefined ? DEFAULT_SEED : parseInteger('--seed', options.seed);
}

export function resolveCoverage(value: unknown): CoverageStrategy {
  const raw = String(value).toLowerCase();
  if (raw === 'weighted' || raw === 'exhaustive') return raw;
  throw invalid('--coverage', value, '"weighted" or "exhaustive"');
}

export function resolveThreshold(value: unknown): number {
  const num = Number(String(value));
  if (String(value).trim() === '' || !Number.isFinite(num) || num < 0 || num > 1) {
    throw invalid('--threshold', value, 'a number between 0 and 1');
  }
  return num;
}

/**
 * Split a comma-separated operator list, rejecting names outside the catalog.
 */
export function parseOperatorList(value: string): string[] {
  const names = value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  const known = new Set(operatorNames());
  const unknown = names.filter((name) => !known.has(name));
  if (names.length === 0 || unknown.length > 0) {
    throw invalid('--operators', unknown.join(',') || value, `operator names from: ${operatorNames().join(', ')}`);
  }
  return names;
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'json';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'json' || raw === 'ndjson' || raw === 'changelog') {
    return raw;
  }
  throw invalid('--out', value, '"json", "ndjson" or "changelog"');
}

/**
 * Map CLI flags onto EvoOptions. Only flags that were given are set, so
 * core defaults apply to everything else.
 */
export function buildEvoOptions(options: CliOptions): EvoOptions {
  const evoOptions: EvoOptions = {};

  if (options.rootName !== undefined) {
    evoOptions.rootName = options.rootName;
  }

  if (options.threshold !== undefined) {
    evoOptions.similarity = { threshold: resolveThreshold(options.threshold) };
  }

  if (
    options.operators !== undefined ||
    options.coverage !== undefined ||
    options.maxProperties !== undefined ||
    options.minProperties !== undefined
  ) {
    evoOptions.mutation = {};
    if (options.operators !== undefined) {
      evoOptions.mutation.operators = parseOperatorList(options.operators);
    }
    if (options.coverage !== undefined) {
      evoOptions.mutation.coverage = resolveCoverage(options.coverage);
    }
    if (options.maxProperties !== undefined) {
      evoOptions.mutation.maxProperties = parseInteger('--max-properties', options.maxProperties, 1);
    }
    if (options.minProperties !== undefined) {
      evoOptions.mutation.minProperties = parseInteger('--min-properties', options.minProperties);
    }
  }

  return evoOptions;
}
