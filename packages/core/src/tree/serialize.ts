import type { Dialect, JsonValue, NodeKind, SchemaNode } from './schema-node.js';
import { cloneJson, declaredKind } from './schema-node.js';

const BSON_NAMES: Record<NodeKind, string> = {
  string: 'string',
  integer: 'int',
  number: 'double',
  boolean: 'bool',
  object: 'object',
  array: 'array',
};

export type SchemaDocument = { [key: string]: JsonValue };

function typeEntry(kind: NodeKind, dialect: Dialect): SchemaDocument {
  return dialect === 'bson'
    ? { bsonType: BSON_NAMES[kind] }
    : { type: kind };
}

/**
 * SchemaNode → plain mapping in the requested dialect. Keys are written in
 * a fixed order so equal trees serialize to identical text.
 */
export function toDocument(
  node: SchemaNode,
  dialect: Dialect = 'json'
): SchemaDocument {
  const doc = typeEntry(declaredKind(node), dialect);

  switch (node.kind) {
    case 'object': {
      const properties: SchemaDocument = {};
      for (const [name, child] of node.properties) {
        // Own data property even for names such as "__proto__".
        Object.defineProperty(properties, name, {
          value: toDocument(child, dialect),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      doc.properties = properties;
      if (node.required.length > 0) doc.required = [...node.required];
      if (node.conditionals.length > 0) {
        doc.allOf = node.conditionals.map((rule) => ({
          if: { properties: { [rule.field]: { const: cloneJson(rule.equals) } } },
          then: { required: [...rule.requires] },
        }));
      }
      break;
    }
    case 'array':
      doc.items = toDocument(node.items, dialect);
      if (node.minItems !== undefined) doc.minItems = node.minItems;
      if (node.maxItems !== undefined) doc.maxItems = node.maxItems;
      if (node.uniqueItems !== undefined) doc.uniqueItems = node.uniqueItems;
      break;
    case 'scalar':
      if (node.enum !== undefined) doc.enum = node.enum.map((v) => cloneJson(v));
      if (node.minimum !== undefined) doc.minimum = node.minimum;
      if (node.maximum !== undefined) doc.maximum = node.maximum;
      if (node.pattern !== undefined) doc.pattern = node.pattern;
      if (node.format !== undefined) doc.format = node.format;
      break;
  }

  return doc;
}
