/**
 * Schema evolution operations.
 *
 * Operations are plain data with an `op` discriminator; `JSON.stringify` of
 * an operation list is the interchange format consumed by downstream tooling.
 * Payload keys are created in a fixed order so equal lists stringify to
 * identical text.
 */

import type { JsonValue, NodeKind } from '../tree/schema-node.js';

export interface RangeSpec {
  minimum: number | null;
  maximum: number | null;
}

export interface ItemsSpec {
  minItems: number | null;
  maxItems: number | null;
  uniqueItems: boolean | null;
}

export interface ConditionalSpec {
  field: string;
  equals: JsonValue;
  requires: string[];
}

export type Operation =
  // Structural
  | { op: 'AddField'; path: string; dtype: NodeKind }
  | { op: 'DropField'; path: string }
  | { op: 'RenameField'; from: string; to: string }
  | { op: 'MoveField'; from: string; to: string }
  // Type
  | { op: 'ChangeType'; path: string; from: NodeKind; to: NodeKind }
  | { op: 'ToArray'; path: string }
  | { op: 'ToScalar'; path: string }
  // Constraint
  | { op: 'AddRequired'; path: string }
  | { op: 'DropRequired'; path: string }
  | { op: 'AddRange'; path: string; spec: RangeSpec }
  | { op: 'ModifyRange'; path: string; from: RangeSpec; to: RangeSpec }
  | { op: 'DropRange'; path: string }
  | { op: 'AddEnum'; path: string; values: JsonValue[] }
  | { op: 'ModifyEnum'; path: string; from: JsonValue[]; to: JsonValue[] }
  | { op: 'DropEnum'; path: string }
  | { op: 'AddPattern'; path: string; to: string }
  | { op: 'ModifyPattern'; path: string; from: string; to: string }
  | { op: 'DropPattern'; path: string; from: string }
  | { op: 'AddItemsConstraint'; path: string; spec: ItemsSpec }
  | { op: 'ModifyItemsConstraint'; path: string; from: ItemsSpec; to: ItemsSpec }
  | { op: 'DropItemsConstraint'; path: string }
  | { op: 'AddConditional'; path: string; spec: ConditionalSpec }
  | { op: 'DropConditional'; path: string; spec: ConditionalSpec };

export type OperationName = Operation['op'];

export type OperationOf<K extends OperationName> = Extract<Operation, { op: K }>;

export type StructuralOperation = OperationOf<
  'AddField' | 'DropField' | 'RenameField' | 'MoveField'
>;

const STRUCTURAL_NAMES: ReadonlySet<OperationName> = new Set([
  'AddField',
  'DropField',
  'RenameField',
  'MoveField',
]);

export function isStructural(op: Operation): op is StructuralOperation {
  return STRUCTURAL_NAMES.has(op.op);
}

/** The path an operation is filed under when sorting. */
export function primaryPath(op: Operation): string {
  return 'path' in op ? op.path : op.from;
}

export function serializeOperations(ops: readonly Operation[], indent = 2): string {
  return JSON.stringify(ops, null, indent);
}
