import { type Diagnostic, DIAGNOSTIC_CODES } from '../diag/codes.js';
import { type FlatIndex, fieldPaths, flatten, parentPath } from '../tree/flatten.js';
import { type SchemaNode, declaredKind } from '../tree/schema-node.js';
import { SchemaTree } from '../tree/schema-tree.js';
import {
  type Operation,
  type OperationName,
  type StructuralOperation,
  primaryPath,
} from '../types/operations.js';
import { type EvoOptions, type ResolvedOptions, resolveOptions } from '../types/options.js';
import { compareCodeUnits } from '../util/canonical-json.js';
import { type Alignment, align } from './aligner.js';
import {
  compareConstraints,
  compareRequired,
  danglingRequired,
} from './constraints.js';
import { classifyTypeChange } from './type-change.js';

export interface DiffResult {
  /** Structural operations first, then per-path type/constraint operations. */
  operations: Operation[];
  diagnostics: Diagnostic[];
}

export interface DanglingRequiredDetails {
  snapshot: 'from' | 'to';
  names: string[];
}

const STRUCTURAL_RANK: Record<StructuralOperation['op'], number> = {
  DropField: 0,
  AddField: 1,
  MoveField: 2,
  RenameField: 3,
};

function structuralOperations(
  alignment: Alignment,
  indexB: FlatIndex
): StructuralOperation[] {
  const ops: StructuralOperation[] = [];
  for (const path of alignment.dropped) ops.push({ op: 'DropField', path });
  for (const path of alignment.added) {
    const node = indexB.get(path);
    if (node) ops.push({ op: 'AddField', path, dtype: declaredKind(node) });
  }
  for (const match of alignment.matches) {
    const { from, to } = match;
    if (match.kind !== 'rename') ops.push({ op: 'MoveField', from, to });
    if (match.kind !== 'move') ops.push({ op: 'RenameField', from, to });
  }
  return ops.sort(
    (a, b) =>
      compareCodeUnits(primaryPath(a), primaryPath(b)) ||
      STRUCTURAL_RANK[a.op] - STRUCTURAL_RANK[b.op]
  );
}

interface Sectioned {
  section: string;
  rank: number;
  subject: string;
  op: Operation;
}

const REQUIRED_RANK: Partial<Record<OperationName, number>> = {
  AddRequired: 2,
  DropRequired: 3,
};

function sectionedOperations(
  indexA: FlatIndex,
  indexB: FlatIndex,
  alignment: Alignment
): Operation[] {
  const entries: Sectioned[] = [];
  for (const [path, a] of indexA) {
    const b = indexB.get(path);
    if (!b) continue;
    const typeChange = classifyTypeChange(path, a, b);
    if (typeChange) {
      entries.push({ section: path, rank: 0, subject: path, op: typeChange });
    }
    for (const op of compareConstraints(path, a, b)) {
      entries.push({ section: path, rank: 1, subject: path, op });
    }
  }

  const correspondence = new Map<string, string>();
  for (const path of fieldPaths(indexA)) {
    if (indexB.has(path)) correspondence.set(path, path);
  }
  for (const match of alignment.matches) correspondence.set(match.from, match.to);

  for (const op of compareRequired(indexA, indexB, correspondence)) {
    const subject = primaryPath(op);
    entries.push({
      section: parentPath(subject),
      rank: REQUIRED_RANK[op.op] ?? 2,
      subject,
      op,
    });
  }

  // Stable sort keeps the comparator's kind order inside one section.
  return entries
    .sort(
      (x, y) =>
        compareCodeUnits(x.section, y.section) ||
        x.rank - y.rank ||
        compareCodeUnits(x.subject, y.subject)
    )
    .map((entry) => entry.op);
}

function danglingDiagnostics(
  index: FlatIndex,
  snapshot: DanglingRequiredDetails['snapshot']
): Diagnostic<DanglingRequiredDetails>[] {
  const out: Diagnostic<DanglingRequiredDetails>[] = [];
  for (const [path, node] of index) {
    if (node.kind !== 'object') continue;
    const names = danglingRequired(node);
    if (names.length === 0) continue;
    out.push({
      code: DIAGNOSTIC_CODES.DANGLING_REQUIRED,
      severity: 'info',
      path,
      details: { snapshot, names },
    });
  }
  return out;
}

/**
 * Reconstructs an operation log relating two snapshots.
 *
 * The engine is pure: inputs are never modified and equal inputs give
 * byte-identical output. Required names that do not resolve against their
 * object are ignored for comparison and reported as DANGLING_REQUIRED.
 */
export class DiffEngine {
  readonly options: ResolvedOptions;

  constructor(options: EvoOptions = {}) {
    this.options = resolveOptions(options);
  }

  diff(from: SchemaNode | SchemaTree, to: SchemaNode | SchemaTree): DiffResult {
    const rootName = this.options.rootName;
    const indexA = flatten(from instanceof SchemaTree ? from.root : from, rootName);
    const indexB = flatten(to instanceof SchemaTree ? to.root : to, rootName);

    const alignment = align(indexA, indexB, this.options.similarity);
    const operations: Operation[] = [
      ...structuralOperations(alignment, indexB),
      ...sectionedOperations(indexA, indexB, alignment),
    ];

    return {
      operations,
      diagnostics: [
        ...alignment.diagnostics,
        ...danglingDiagnostics(indexA, 'from'),
        ...danglingDiagnostics(indexB, 'to'),
      ],
    };
  }
}

export function diffSchemas(
  from: SchemaNode | SchemaTree,
  to: SchemaNode | SchemaTree,
  options: EvoOptions = {}
): DiffResult {
  return new DiffEngine(options).diff(from, to);
}
