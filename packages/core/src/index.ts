// @evoschema/core entry point
//
// - High-level facades Diff/Evolve via ./api.js; the CLI uses only these.
// - Low-level building blocks: schema tree, aligner, comparators, operator
//   catalog and engines, for callers that work on in-memory trees.

export * from './api.js';

// Schema tree model
export * from './tree/schema-node.js';
export {
  DEFAULT_ROOT_NAME,
  ITEM_SEGMENT,
  type FlatIndex,
  flatten,
  childPath,
  escapeSegment,
  itemPath,
  isItemPath,
  parentPath,
  leafName,
  fieldPaths,
} from './tree/flatten.js';
export {
  MINIMAL_DIALECT_SCHEMA,
  detectDialect,
  parseSchema,
  parseSchemaText,
  loadSchema,
} from './tree/parse.js';
export { type SchemaDocument, toDocument } from './tree/serialize.js';
export { SchemaTree } from './tree/schema-tree.js';

// Operations, options, results
export * from './types/operations.js';
export * from './types/options.js';
export * from './types/result.js';
export {
  type ErrorContext,
  type SerializedError,
  EvoError,
  MalformedInputError,
  ConfigError,
  isEvoError,
} from './types/errors.js';

// Diff engine
export {
  type Signature,
  type Match,
  type MatchKind,
  type Candidate,
  type Alignment,
  signatureOf,
  similarity,
  classifyMatch,
  scoreCandidates,
  align,
} from './diff/aligner.js';
export {
  compareRange,
  compareEnum,
  comparePattern,
  compareItems,
  compareConditionals,
  compareConstraints,
  compareRequired,
} from './diff/constraints.js';
export { classifyTypeChange } from './diff/type-change.js';
export {
  type DiffResult,
  type DanglingRequiredDetails,
  DiffEngine,
  diffSchemas,
} from './diff/diff-engine.js';
export { applyStructuralOperations } from './diff/replay.js';

// Mutation engine
export type {
  MutationCategory,
  MutationContext,
  MutationOperator,
} from './mutation/types.js';
export { OPERATOR_CATALOG, operatorNames, selectOperators } from './mutation/catalog.js';
export {
  type VersionRecord,
  NO_OP_DESCRIPTION,
  EvolutionRun,
  MutationEngine,
  formatChangeLog,
} from './mutation/engine.js';

// Errors
export { ErrorCode, type Severity, EXIT_CODES, getExitCode } from './errors/codes.js';
export { ErrorPresenter, type CLIErrorView, type PresenterOptions } from './errors/presenter.js';

// Diagnostics
export {
  DIAGNOSTIC_CODES,
  type DiagnosticCode,
  type Diagnostic,
  type AmbiguousMatchDetails,
} from './diag/codes.js';

// Random sources
export {
  type RandomSource,
  XorShift32,
  createRandom,
  randomInt,
  weightedPick,
} from './util/rng.js';
export { canonicalJson, compareCodeUnits } from './util/canonical-json.js';
