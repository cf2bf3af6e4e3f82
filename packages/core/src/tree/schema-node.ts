/**
 * In-memory schema tree for the minimal dialect: object / array / scalar
 * nodes with the handful of constraints the engines compare.
 */

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ScalarKind = 'string' | 'integer' | 'number' | 'boolean';
export type NodeKind = ScalarKind | 'object' | 'array';

export const SCALAR_KINDS: readonly ScalarKind[] = [
  'string',
  'integer',
  'number',
  'boolean',
];

/** `type` for JSON Schema documents, `bsonType` for MongoDB `$jsonSchema`. */
export type Dialect = 'json' | 'bson';

export interface ScalarNode {
  kind: 'scalar';
  type: ScalarKind;
  enum?: JsonValue[];
  minimum?: number;
  maximum?: number;
  pattern?: string;
  format?: string;
}

/**
 * `if <field> == <equals> then require <requires>`; serialized as one
 * `allOf` entry with `if`/`then`.
 */
export interface ConditionalRule {
  field: string;
  equals: JsonValue;
  requires: string[];
}

export interface ObjectNode {
  kind: 'object';
  /** Insertion-ordered; Map keeps integer-like names in document order too. */
  properties: Map<string, SchemaNode>;
  /**
   * Names that should exist in `properties`. Dangling names are tolerated
   * and ignored by the engines; mutations can transiently produce them.
   */
  required: string[];
  conditionals: ConditionalRule[];
}

export interface ArrayNode {
  kind: 'array';
  items: SchemaNode;
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;
}

export type SchemaNode = ScalarNode | ObjectNode | ArrayNode;

export function declaredKind(node: SchemaNode): NodeKind {
  return node.kind === 'scalar' ? node.type : node.kind;
}

export function isScalarKind(kind: NodeKind): kind is ScalarKind {
  return kind !== 'object' && kind !== 'array';
}

export function scalar(
  type: ScalarKind,
  extra: Omit<ScalarNode, 'kind' | 'type'> = {}
): ScalarNode {
  return { kind: 'scalar', type, ...extra };
}

export function object(
  properties: Iterable<[string, SchemaNode]> = [],
  required: string[] = []
): ObjectNode {
  return {
    kind: 'object',
    properties: new Map(properties),
    required: [...required],
    conditionals: [],
  };
}

export function array(
  items: SchemaNode,
  extra: Omit<ArrayNode, 'kind' | 'items'> = {}
): ArrayNode {
  return { kind: 'array', items, ...extra };
}

export function cloneJson(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map((item) => cloneJson(item));
  if (value !== null && typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const [k, v] of Object.entries(value)) {
      Object.defineProperty(out, k, {
        value: cloneJson(v),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return out;
  }
  return value;
}

export function cloneNode<N extends SchemaNode>(node: N): N;
export function cloneNode(node: SchemaNode): SchemaNode {
  switch (node.kind) {
    case 'scalar': {
      const copy: ScalarNode = { ...node };
      if (node.enum) copy.enum = node.enum.map((v) => cloneJson(v));
      return copy;
    }
    case 'object':
      return {
        kind: 'object',
        properties: new Map(
          [...node.properties].map(([name, child]) => [name, cloneNode(child)])
        ),
        required: [...node.required],
        conditionals: node.conditionals.map((rule) => ({
          field: rule.field,
          equals: cloneJson(rule.equals),
          requires: [...rule.requires],
        })),
      };
    case 'array':
      return { ...node, items: cloneNode(node.items) };
  }
}

/**
 * Required names that resolve against the node's properties, in declared
 * order and without duplicates.
 */
export function effectiveRequired(node: ObjectNode): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const name of node.required) {
    if (node.properties.has(name) && !seen.has(name)) {
      seen.add(name);
      out.push(name);
    }
  }
  return out;
}

/**
 * Number of fields, descending through object properties and through
 * array items that are objects.
 */
export function countFields(node: SchemaNode): number {
  if (node.kind === 'array') {
    return node.items.kind === 'object' ? countFields(node.items) : 0;
  }
  if (node.kind !== 'object') return 0;
  let count = node.properties.size;
  for (const child of node.properties.values()) {
    if (child.kind === 'object') count += countFields(child);
    else if (child.kind === 'array' && child.items.kind === 'object') {
      count += countFields(child.items);
    }
  }
  return count;
}
