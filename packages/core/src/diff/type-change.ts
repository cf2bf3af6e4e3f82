import type { Operation } from '../types/operations.js';
import { type SchemaNode, declaredKind } from '../tree/schema-node.js';

/**
 * Classify a declared-kind change at one path.
 *
 * Cardinality changes (scalar/object to array and back) get their own
 * operations; every other difference is a plain ChangeType.
 */
export function classifyTypeChange(
  path: string,
  a: SchemaNode,
  b: SchemaNode
): Operation | undefined {
  const from = declaredKind(a);
  const to = declaredKind(b);
  if (from === to) return undefined;
  if (to === 'array') return { op: 'ToArray', path };
  if (from === 'array') return { op: 'ToScalar', path };
  return { op: 'ChangeType', path, from, to };
}
