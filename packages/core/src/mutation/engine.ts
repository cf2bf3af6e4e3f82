import { type Diagnostic, DIAGNOSTIC_CODES } from '../diag/codes.js';
import { SchemaTree } from '../tree/schema-tree.js';
import type { SchemaNode } from '../tree/schema-node.js';
import type { SchemaDocument } from '../tree/serialize.js';
import { ConfigError } from '../types/errors.js';
import { type EvoOptions, type ResolvedOptions, resolveOptions } from '../types/options.js';
import { type RandomSource, weightedPick } from '../util/rng.js';
import { selectOperators } from './catalog.js';
import { pruneRequired } from './object-edit.js';
import {
  type MutationCategory,
  type MutationOperator,
  OperatorInapplicable,
} from './types.js';

export const NO_OP_DESCRIPTION = 'no viable operator; schema unchanged';

export interface VersionRecord {
  version: number;
  schema: SchemaTree;
  document: SchemaDocument;
  /** `<category>: <what changed>`, or the no-op text. */
  description: string;
  operator?: string;
  category?: MutationCategory;
  diagnostics: Diagnostic[];
}

/**
 * State of one evolution run: the snapshots produced so far and the set of
 * operators already applied. A run owns its random source and its used set;
 * nothing is shared between runs.
 */
export class EvolutionRun {
  readonly versions: VersionRecord[] = [];
  private readonly used = new Set<string>();

  constructor(
    readonly seedSchema: SchemaTree,
    private readonly operators: readonly MutationOperator[],
    private readonly options: ResolvedOptions,
    private readonly random: RandomSource
  ) {}

  /** Names of applied operators, in catalog order. */
  get usedOperators(): string[] {
    return this.operators
      .filter((operator) => this.used.has(operator.name))
      .map((operator) => operator.name);
  }

  get latest(): SchemaTree {
    return this.versions.at(-1)?.schema ?? this.seedSchema;
  }

  viableOperators(tree: SchemaTree = this.latest): MutationOperator[] {
    const { root } = tree;
    if (root.kind !== 'object') return [];
    return this.operators.filter((operator) =>
      operator.isViable(root, this.options.mutation)
    );
  }

  private select(viable: readonly MutationOperator[]): MutationOperator | undefined {
    const { coverage, unusedWeightMultiplier } = this.options.mutation;
    let pool = viable;
    if (coverage === 'exhaustive') {
      const unused = viable.filter((operator) => !this.used.has(operator.name));
      if (unused.length > 0) pool = unused;
    }
    return weightedPick(
      this.random,
      pool.map((operator) => ({
        item: operator,
        weight: this.used.has(operator.name)
          ? operator.weight
          : operator.weight * unusedWeightMultiplier,
      }))
    );
  }

  private noOp(version: number, reason: string): VersionRecord {
    const schema = this.latest.clone();
    const record: VersionRecord = {
      version,
      schema,
      document: schema.toDocument(),
      description: NO_OP_DESCRIPTION,
      diagnostics: [
        {
          code: DIAGNOSTIC_CODES.NO_VIABLE_OPERATOR,
          severity: 'info',
          path: this.options.rootName,
          details: { version, reason },
        },
      ],
    };
    this.versions.push(record);
    return record;
  }

  /** Produce the next version. The version counter advances even on a no-op. */
  step(): VersionRecord {
    const version = this.versions.length + 1;
    const selected = this.select(this.viableOperators());
    if (!selected) return this.noOp(version, 'no operator passed its viability check');

    const next = this.latest.clone();
    const { root } = next;
    if (root.kind !== 'object') return this.noOp(version, 'root is not an object');

    let change: string;
    try {
      change = selected.mutate(root, {
        version,
        random: this.random,
        options: this.options.mutation,
      });
    } catch (error) {
      if (error instanceof OperatorInapplicable) return this.noOp(version, error.message);
      throw error;
    }
    pruneRequired(root);
    this.used.add(selected.name);

    const record: VersionRecord = {
      version,
      schema: next,
      document: next.toDocument(),
      description: `${selected.category}: ${change}`,
      operator: selected.name,
      category: selected.category,
      diagnostics: [],
    };
    this.versions.push(record);
    return record;
  }
}

/**
 * Drives evolution runs over a fixed, optionally narrowed, operator catalog.
 *
 * The engine itself holds no run state; every call to `startRun`/`evolve`
 * gets a fresh used-operator set and the random source passed in.
 */
export class MutationEngine {
  readonly options: ResolvedOptions;
  readonly operators: readonly MutationOperator[];

  constructor(options: EvoOptions = {}) {
    this.options = resolveOptions(options);
    this.operators = selectOperators(this.options.mutation.operators);
  }

  startRun(schema: SchemaTree | SchemaNode, random: RandomSource): EvolutionRun {
    const seed = schema instanceof SchemaTree ? schema.clone() : new SchemaTree(schema).clone();
    return new EvolutionRun(seed, this.operators, this.options, random);
  }

  evolve(
    schema: SchemaTree | SchemaNode,
    versions: number,
    random: RandomSource
  ): EvolutionRun {
    if (!Number.isInteger(versions) || versions < 0) {
      throw new ConfigError({
        message: 'Version count must be a non-negative integer',
        context: { setting: 'versions', value: versions },
      });
    }
    const run = this.startRun(schema, random);
    for (let i = 0; i < versions; i++) run.step();
    return run;
  }
}

/** One `v<N>: <description>` line per version. */
export function formatChangeLog(run: Pick<EvolutionRun, 'versions'>): string {
  return run.versions
    .map((record) => `v${record.version}: ${record.description}`)
    .join('\n');
}
