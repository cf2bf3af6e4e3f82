import type { Diagnostic } from './diag/codes.js';
import { DiffEngine } from './diff/diff-engine.js';
import { type EvolutionRun, MutationEngine, formatChangeLog } from './mutation/engine.js';
import { SchemaTree } from './tree/schema-tree.js';
import type { SchemaDocument } from './tree/serialize.js';
import type { Operation } from './types/operations.js';
import type { EvoOptions } from './types/options.js';
import { type RandomSource, createRandom } from './util/rng.js';

// NOTE: The CLI is a thin wrapper over these facades. Any change to their
// signatures or defaults should be reflected in the CLI flags.

export const DEFAULT_SEED = 424242;
export const DEFAULT_VERSIONS = 8;

export interface DiffApiResult {
  /**
   * Ordered operation log relating `from` to `to`. `JSON.stringify` of this
   * list is the interchange format.
   */
  operations: Operation[];
  /**
   * Non-fatal findings: ambiguous matches, dangling required names.
   */
  diagnostics: Diagnostic[];
}

export interface EvolveApiOptions {
  /**
   * Number of versions to produce after the seed schema.
   * Defaults to 8.
   */
  versions?: number;
  /**
   * Seed for the run's random source. Ignored when `random` is given.
   * Defaults to 424242.
   */
  seed?: number;
  /**
   * Explicit random source; takes precedence over `seed`.
   */
  random?: RandomSource;
  options?: EvoOptions;
}

export interface EvolvedVersion {
  version: number;
  schema: SchemaDocument;
  description: string;
  operator?: string;
}

export interface EvolveApiResult {
  versions: EvolvedVersion[];
  usedOperators: string[];
  /**
   * `v<N>: <description>` lines, one per version.
   */
  changeLog: string;
  diagnostics: Diagnostic[];
  /**
   * The underlying run, for callers that need the in-memory snapshots.
   */
  run: EvolutionRun;
}

function toTree(input: unknown): SchemaTree {
  return input instanceof SchemaTree ? input : SchemaTree.fromDocument(input);
}

/**
 * Diff: reconstruct the operation log between two schema documents.
 *
 * Accepts parsed SchemaTree snapshots or raw documents. Documents are
 * validated against the minimal dialect first; a malformed one raises
 * MalformedInputError. Inputs are never mutated.
 */
export function Diff(
  from: unknown,
  to: unknown,
  options: EvoOptions = {}
): DiffApiResult {
  const engine = new DiffEngine(options);
  return engine.diff(toTree(from), toTree(to));
}

/**
 * Evolve: produce a deterministic sequence of schema versions.
 *
 * Each version is the previous one plus one catalog mutation; identical
 * seeds and options give identical sequences.
 */
export function Evolve(
  schema: unknown,
  options: EvolveApiOptions = {}
): EvolveApiResult {
  const engine = new MutationEngine(options.options);
  const random = options.random ?? createRandom(options.seed ?? DEFAULT_SEED, 'evolve');
  const run = engine.evolve(
    toTree(schema),
    options.versions ?? DEFAULT_VERSIONS,
    random
  );
  return {
    versions: run.versions.map((record) => ({
      version: record.version,
      schema: record.document,
      description: record.description,
      operator: record.operator,
    })),
    usedOperators: run.usedOperators,
    changeLog: formatChangeLog(run),
    diagnostics: run.versions.flatMap((record) => record.diagnostics),
    run,
  };
}
