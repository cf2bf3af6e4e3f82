/**
 * In-place edits of one object node that keep its required list and
 * conditional rules pointing at property names that exist.
 */

import {
  type ObjectNode,
  type ScalarKind,
  type SchemaNode,
  SCALAR_KINDS,
} from '../tree/schema-node.js';
import { type RandomSource, pickOne } from '../util/rng.js';
import { OperatorInapplicable } from './types.js';

/** `base` if free, else `base_2`, `base_3`, ... */
export function uniqueName(node: ObjectNode, base: string): string {
  if (!node.properties.has(base)) return base;
  let i = 2;
  while (node.properties.has(`${base}_${i}`)) i++;
  return `${base}_${i}`;
}

export function isRequired(node: ObjectNode, name: string): boolean {
  return node.required.includes(name);
}

export function markRequired(node: ObjectNode, name: string): void {
  if (node.properties.has(name) && !node.required.includes(name)) {
    node.required.push(name);
  }
}

export function unmarkRequired(node: ObjectNode, name: string): void {
  node.required = node.required.filter((entry) => entry !== name);
}

/**
 * Delete a property and every reference to it. Returns the detached child.
 */
export function detachProperty(
  node: ObjectNode,
  name: string
): SchemaNode | undefined {
  const child = node.properties.get(name);
  if (!child) return undefined;
  node.properties.delete(name);
  unmarkRequired(node, name);
  node.conditionals = node.conditionals
    .filter((rule) => rule.field !== name)
    .map((rule) => ({
      ...rule,
      requires: rule.requires.filter((entry) => entry !== name),
    }))
    .filter((rule) => rule.requires.length > 0);
  return child;
}

/** Rename in place; the renamed property moves to the end of the map. */
export function renameProperty(
  node: ObjectNode,
  from: string,
  to: string
): void {
  const child = node.properties.get(from);
  if (!child || from === to) return;
  node.properties.delete(from);
  node.properties.set(to, child);
  node.required = node.required.map((entry) => (entry === from ? to : entry));
  node.conditionals = node.conditionals.map((rule) => ({
    field: rule.field === from ? to : rule.field,
    equals: rule.equals,
    requires: rule.requires.map((entry) => (entry === from ? to : entry)),
  }));
}

/** Drop required names that no longer resolve, at every object level. */
export function pruneRequired(node: SchemaNode): void {
  if (node.kind === 'array') {
    pruneRequired(node.items);
    return;
  }
  if (node.kind !== 'object') return;
  node.required = node.required.filter(
    (name, i, all) => node.properties.has(name) && all.indexOf(name) === i
  );
  for (const child of node.properties.values()) pruneRequired(child);
}

export function propertyNames(node: ObjectNode): string[] {
  return [...node.properties.keys()];
}

export function namesWhere(
  node: ObjectNode,
  predicate: (child: SchemaNode) => boolean
): string[] {
  return propertyNames(node).filter((name) => {
    const child = node.properties.get(name);
    return child !== undefined && predicate(child);
  });
}

export function isScalarOf(
  child: SchemaNode,
  ...kinds: ScalarKind[]
): boolean {
  return (
    child.kind === 'scalar' &&
    (kinds.length === 0 ? SCALAR_KINDS.includes(child.type) : kinds.includes(child.type))
  );
}

export function isPopulatedObject(child: SchemaNode): child is ObjectNode {
  return child.kind === 'object' && child.properties.size > 0;
}

export function pickOrFail<T>(
  random: RandomSource,
  items: readonly T[],
  operator: string,
  what: string
): T {
  const picked = pickOne(random, items);
  if (picked === undefined) {
    throw new OperatorInapplicable(operator, `no ${what}`);
  }
  return picked;
}
