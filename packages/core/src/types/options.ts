/**
 * Configuration for the diff and mutation engines.
 *
 * All options are optional with conservative defaults; nested groups are
 * merged key by key so callers can override a single weight.
 */

import { ConfigError } from './errors.js';

/**
 * Weights of the rename/move similarity heuristic. They are not a metric;
 * with the defaults identical objects score 0.9 and identical arrays 0.7.
 */
export interface SimilarityWeights {
  /** Declared kinds are equal (default: 0.4) */
  kind: number;
  /** Multiplied by the Jaccard index of child property names, objects only (default: 0.3) */
  childKeys: number;
  /** Both or neither side carries an enum (default: 0.1) */
  enumPresence: number;
  /** Both or neither side has an item node (default: 0.1) */
  itemsPresence: number;
  /** Item kinds are equal, arrays only (default: 0.1) */
  itemKind: number;
}

export interface SimilarityOptions {
  /** Minimum score for a rename/move candidate, inclusive (default: 0.6) */
  threshold?: number;
  weights?: Partial<SimilarityWeights>;
}

export type CoverageStrategy = 'weighted' | 'exhaustive';

export interface MutationOptions {
  /** add-style operators require fewer root properties than this (default: 20) */
  maxProperties?: number;
  /** removeField requires more root properties than this (default: 3) */
  minProperties?: number;
  /** Weight multiplier for operators not yet used in the run (default: 2) */
  unusedWeightMultiplier?: number;
  /**
   * 'weighted': unused operators only get the multiplier (default).
   * 'exhaustive': while a viable operator is unused, draw among unused ones only.
   */
  coverage?: CoverageStrategy;
  /** Restrict the catalog to these operator names (default: all) */
  operators?: string[];
}

export interface EvoOptions {
  /** Name of the root path segment (default: '$') */
  rootName?: string;
  similarity?: SimilarityOptions;
  mutation?: MutationOptions;
}

export interface ResolvedOptions {
  rootName: string;
  similarity: {
    threshold: number;
    weights: SimilarityWeights;
  };
  mutation: Required<Omit<MutationOptions, 'operators'>> & {
    operators?: string[];
  };
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  rootName: '$',
  similarity: {
    threshold: 0.6,
    weights: {
      kind: 0.4,
      childKeys: 0.3,
      enumPresence: 0.1,
      itemsPresence: 0.1,
      itemKind: 0.1,
    },
  },
  mutation: {
    maxProperties: 20,
    minProperties: 3,
    unusedWeightMultiplier: 2,
    coverage: 'weighted',
  },
};

function assertFiniteAtLeast(
  value: number,
  min: number,
  setting: string
): void {
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigError({
      message: `Option ${setting} must be a finite number >= ${min}`,
      context: { setting, value },
    });
  }
}

/**
 * Merge user options with defaults and validate the result.
 * Throws ConfigError on invalid values.
 */
export function resolveOptions(userOptions: EvoOptions = {}): ResolvedOptions {
  const resolved: ResolvedOptions = {
    rootName: userOptions.rootName ?? DEFAULT_OPTIONS.rootName,
    similarity: {
      threshold:
        userOptions.similarity?.threshold ??
        DEFAULT_OPTIONS.similarity.threshold,
      weights: {
        ...DEFAULT_OPTIONS.similarity.weights,
        ...userOptions.similarity?.weights,
      },
    },
    mutation: {
      ...DEFAULT_OPTIONS.mutation,
      ...userOptions.mutation,
    },
  };

  if (resolved.rootName.length === 0) {
    throw new ConfigError({
      message: 'Option rootName must not be empty',
      context: { setting: 'rootName' },
    });
  }

  const { threshold, weights } = resolved.similarity;
  assertFiniteAtLeast(threshold, 0, 'similarity.threshold');
  if (threshold > 1) {
    throw new ConfigError({
      message: 'Option similarity.threshold must be within [0, 1]',
      context: { setting: 'similarity.threshold', value: threshold },
    });
  }
  for (const [key, weight] of Object.entries(weights)) {
    assertFiniteAtLeast(weight, 0, `similarity.weights.${key}`);
  }

  const { mutation } = resolved;
  assertFiniteAtLeast(mutation.minProperties, 0, 'mutation.minProperties');
  assertFiniteAtLeast(mutation.maxProperties, 1, 'mutation.maxProperties');
  assertFiniteAtLeast(
    mutation.unusedWeightMultiplier,
    1,
    'mutation.unusedWeightMultiplier'
  );
  if (mutation.maxProperties <= mutation.minProperties) {
    throw new ConfigError({
      message:
        'Option mutation.maxProperties must be greater than mutation.minProperties',
      context: { setting: 'mutation.maxProperties' },
    });
  }
  if (mutation.coverage !== 'weighted' && mutation.coverage !== 'exhaustive') {
    throw new ConfigError({
      message: `Unknown coverage strategy '${String(mutation.coverage)}'`,
      context: { setting: 'mutation.coverage', value: mutation.coverage },
    });
  }

  return resolved;
}
