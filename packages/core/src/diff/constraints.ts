/**
 * Pairwise constraint comparison of two nodes that sit at the same path.
 *
 * Set-like fields (enum literals, required names, conditional rules) are
 * compared without regard to order; payloads carry the lists as declared.
 */

import {
  type JsonValue,
  type ObjectNode,
  type SchemaNode,
  cloneJson,
  effectiveRequired,
} from '../tree/schema-node.js';
import { childPath, parentPath } from '../tree/flatten.js';
import {
  canonicalJson,
  compareCodeUnits,
  sameLiteralSet,
} from '../util/canonical-json.js';
import type {
  ConditionalSpec,
  ItemsSpec,
  Operation,
  RangeSpec,
} from '../types/operations.js';

function rangeOf(node: SchemaNode): RangeSpec {
  if (node.kind !== 'scalar') return { minimum: null, maximum: null };
  return { minimum: node.minimum ?? null, maximum: node.maximum ?? null };
}

function itemsOf(node: SchemaNode): ItemsSpec {
  if (node.kind !== 'array') {
    return { minItems: null, maxItems: null, uniqueItems: null };
  }
  return {
    minItems: node.minItems ?? null,
    maxItems: node.maxItems ?? null,
    uniqueItems: node.uniqueItems ?? null,
  };
}

function enumOf(node: SchemaNode): JsonValue[] | undefined {
  if (node.kind !== 'scalar' || !node.enum || node.enum.length === 0) {
    return undefined;
  }
  return node.enum;
}

function patternOf(node: SchemaNode): string | undefined {
  return node.kind === 'scalar' ? node.pattern : undefined;
}

function isEmptySpec(spec: object): boolean {
  return Object.values(spec).every((v) => v === null);
}

function sameSpec(a: object, b: object): boolean {
  return canonicalJson(a) === canonicalJson(b);
}

/**
 * Add when nothing was bounded before and something is now; Drop when
 * something was bounded and nothing is now; Modify when values differ.
 */
export function compareRange(
  path: string,
  a: SchemaNode,
  b: SchemaNode
): Operation[] {
  const from = rangeOf(a);
  const to = rangeOf(b);
  if (sameSpec(from, to)) return [];
  if (isEmptySpec(from)) return [{ op: 'AddRange', path, spec: to }];
  if (isEmptySpec(to)) return [{ op: 'DropRange', path }];
  return [{ op: 'ModifyRange', path, from, to }];
}

export function compareItems(
  path: string,
  a: SchemaNode,
  b: SchemaNode
): Operation[] {
  const from = itemsOf(a);
  const to = itemsOf(b);
  if (sameSpec(from, to)) return [];
  if (isEmptySpec(from)) return [{ op: 'AddItemsConstraint', path, spec: to }];
  if (isEmptySpec(to)) return [{ op: 'DropItemsConstraint', path }];
  return [{ op: 'ModifyItemsConstraint', path, from, to }];
}

export function compareEnum(
  path: string,
  a: SchemaNode,
  b: SchemaNode
): Operation[] {
  const from = enumOf(a);
  const to = enumOf(b);
  if (!from && !to) return [];
  if (!from && to) {
    return [{ op: 'AddEnum', path, values: to.map((v) => cloneJson(v)) }];
  }
  if (from && !to) return [{ op: 'DropEnum', path }];
  if (from && to && !sameLiteralSet(from, to)) {
    return [
      {
        op: 'ModifyEnum',
        path,
        from: from.map((v) => cloneJson(v)),
        to: to.map((v) => cloneJson(v)),
      },
    ];
  }
  return [];
}

export function comparePattern(
  path: string,
  a: SchemaNode,
  b: SchemaNode
): Operation[] {
  const from = patternOf(a);
  const to = patternOf(b);
  if (from === to) return [];
  if (from === undefined && to !== undefined) {
    return [{ op: 'AddPattern', path, to }];
  }
  if (from !== undefined && to === undefined) {
    return [{ op: 'DropPattern', path, from }];
  }
  if (from !== undefined && to !== undefined) {
    return [{ op: 'ModifyPattern', path, from, to }];
  }
  return [];
}

function conditionalKey(spec: ConditionalSpec): string {
  return canonicalJson({
    field: spec.field,
    equals: spec.equals,
    requires: [...new Set(spec.requires)].sort(compareCodeUnits),
  });
}

function conditionalsOf(node: SchemaNode): Map<string, ConditionalSpec> {
  const out = new Map<string, ConditionalSpec>();
  if (node.kind !== 'object') return out;
  for (const rule of node.conditionals) {
    const spec: ConditionalSpec = {
      field: rule.field,
      equals: cloneJson(rule.equals),
      requires: [...rule.requires],
    };
    out.set(conditionalKey(spec), spec);
  }
  return out;
}

export function compareConditionals(
  path: string,
  a: SchemaNode,
  b: SchemaNode
): Operation[] {
  const from = conditionalsOf(a);
  const to = conditionalsOf(b);
  const ops: Operation[] = [];
  for (const key of [...to.keys()].sort(compareCodeUnits)) {
    const spec = to.get(key);
    if (spec && !from.has(key)) ops.push({ op: 'AddConditional', path, spec });
  }
  for (const key of [...from.keys()].sort(compareCodeUnits)) {
    const spec = from.get(key);
    if (spec && !to.has(key)) ops.push({ op: 'DropConditional', path, spec });
  }
  return ops;
}

/**
 * All constraint operations for one path, in fixed kind order:
 * range, enum, pattern, items, conditionals.
 */
export function compareConstraints(
  path: string,
  a: SchemaNode,
  b: SchemaNode
): Operation[] {
  return [
    ...compareRange(path, a, b),
    ...compareEnum(path, a, b),
    ...comparePattern(path, a, b),
    ...compareItems(path, a, b),
    ...compareConditionals(path, a, b),
  ];
}

/**
 * Where each field of snapshot A ended up in snapshot B: the same path for
 * common fields, the partner path for matched renames/moves, absent for
 * dropped fields.
 */
export type FieldCorrespondence = ReadonlyMap<string, string>;

function requiredPaths(
  index: ReadonlyMap<string, SchemaNode>
): Set<string> {
  const out = new Set<string>();
  for (const [path, node] of index) {
    if (node.kind !== 'object') continue;
    for (const name of effectiveRequired(node)) out.add(childPath(path, name));
  }
  return out;
}

function isObjectAt(
  index: ReadonlyMap<string, SchemaNode>,
  path: string
): boolean {
  return index.get(path)?.kind === 'object';
}

/**
 * Required-set changes, following fields through renames and moves so a
 * renamed required field does not show up as Drop+Add of requiredness.
 *
 * - survivor whose requiredness changed: Add/DropRequired at its B path
 * - unmatched added field, required, parent object in both snapshots: AddRequired
 * - unmatched dropped field, required, parent object in both snapshots: DropRequired
 */
export function compareRequired(
  indexA: ReadonlyMap<string, SchemaNode>,
  indexB: ReadonlyMap<string, SchemaNode>,
  correspondence: FieldCorrespondence
): Operation[] {
  const reqA = requiredPaths(indexA);
  const reqB = requiredPaths(indexB);
  const reached = new Set(correspondence.values());
  const ops: Operation[] = [];

  for (const [from, to] of correspondence) {
    const before = reqA.has(from);
    const after = reqB.has(to);
    if (!before && after) ops.push({ op: 'AddRequired', path: to });
    if (before && !after) ops.push({ op: 'DropRequired', path: to });
  }

  for (const path of reqB) {
    if (reached.has(path)) continue;
    const parent = parentPath(path);
    if (isObjectAt(indexA, parent) && isObjectAt(indexB, parent)) {
      ops.push({ op: 'AddRequired', path });
    }
  }

  for (const path of reqA) {
    if (correspondence.has(path)) continue;
    const parent = parentPath(path);
    if (isObjectAt(indexA, parent) && isObjectAt(indexB, parent)) {
      ops.push({ op: 'DropRequired', path });
    }
  }

  return ops;
}

/** Required names that do not resolve against the node's properties. */
export function danglingRequired(node: ObjectNode): string[] {
  return node.required.filter((name) => !node.properties.has(name));
}
