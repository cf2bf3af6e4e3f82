/**
 * Document → SchemaNode conversion for the minimal dialect.
 *
 * Structure is checked first with ajv against a recursive meta-schema, so a
 * malformed document is rejected with the location of the first violation;
 * the conversion below then only has to narrow values it knows are present.
 */

import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';

import { ErrorCode } from '../errors/codes.js';
import { MalformedInputError } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import {
  type ArrayNode,
  type ConditionalRule,
  type Dialect,
  type JsonValue,
  type NodeKind,
  type ObjectNode,
  type ScalarNode,
  type SchemaNode,
} from './schema-node.js';

const TYPE_NAME = {
  anyOf: [
    { type: 'string' },
    { type: 'array', items: { type: 'string' }, minItems: 1 },
  ],
} as const;

export const MINIMAL_DIALECT_SCHEMA = {
  $id: 'https://evoschema.local/minimal-dialect.json',
  type: 'object',
  properties: {
    type: TYPE_NAME,
    bsonType: TYPE_NAME,
    properties: { type: 'object', additionalProperties: { $ref: '#' } },
    required: { type: 'array', items: { type: 'string' } },
    items: { $ref: '#' },
    enum: { type: 'array' },
    minimum: { type: 'number' },
    maximum: { type: 'number' },
    pattern: { type: 'string' },
    format: { type: 'string' },
    minItems: { type: 'integer', minimum: 0 },
    maxItems: { type: 'integer', minimum: 0 },
    uniqueItems: { type: 'boolean' },
    allOf: { type: 'array', items: { type: 'object' } },
  },
} as const;

const KIND_ALIASES: ReadonlyMap<string, NodeKind> = new Map<string, NodeKind>([
  ['string', 'string'],
  ['integer', 'integer'],
  ['int', 'integer'],
  ['long', 'integer'],
  ['number', 'number'],
  ['double', 'number'],
  ['decimal', 'number'],
  ['boolean', 'boolean'],
  ['bool', 'boolean'],
  ['object', 'object'],
  ['array', 'array'],
]);

let cachedValidator: ValidateFunction | undefined;

function getValidator(): ValidateFunction {
  if (!cachedValidator) {
    const ajv = new Ajv({ allErrors: false, strict: false });
    cachedValidator = ajv.compile(MINIMAL_DIALECT_SCHEMA);
  }
  return cachedValidator;
}

function describeAjvError(error: ErrorObject): string {
  const where = error.instancePath === '' ? 'document root' : error.instancePath;
  return `Malformed schema at ${where}: ${error.message ?? error.keyword}`;
}

type Doc = Record<string, unknown>;

function isRecord(value: unknown): value is Doc {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

function pointer(base: string, ...segments: string[]): string {
  return (
    base +
    segments
      .map((s) => `/${s.replace(/~/g, '~0').replace(/\//g, '~1')}`)
      .join('')
  );
}

export function detectDialect(doc: unknown): Dialect {
  if (!isRecord(doc)) return 'json';
  if ('bsonType' in doc && !('type' in doc)) return 'bson';
  // Root-level objects often omit the type; look one level down
  if (isRecord(doc.properties)) {
    for (const child of Object.values(doc.properties)) {
      if (isRecord(child) && 'bsonType' in child) return 'bson';
    }
  }
  return 'json';
}

function resolveKind(doc: Doc, schemaPath: string): NodeKind {
  const raw = doc.bsonType ?? doc.type;
  let name: string | undefined;
  if (typeof raw === 'string') {
    name = raw;
  } else if (Array.isArray(raw)) {
    const names = raw.filter((v): v is string => typeof v === 'string');
    name = names.find((v) => v !== 'null') ?? names[0];
  }

  if (name === undefined) {
    if (isRecord(doc.properties)) return 'object';
    if (doc.items !== undefined) return 'array';
    return 'string';
  }

  const kind = KIND_ALIASES.get(name);
  if (!kind) {
    throw new MalformedInputError({
      message: `Unsupported schema type '${name}'`,
      errorCode: ErrorCode.UNSUPPORTED_SCHEMA_TYPE,
      context: { schemaPath: pointer(schemaPath, 'type'), value: name },
    });
  }
  return kind;
}

function readEnum(doc: Doc, schemaPath: string): JsonValue[] | undefined {
  if (!Array.isArray(doc.enum)) return undefined;
  const values: JsonValue[] = [];
  doc.enum.forEach((value: unknown, index: number) => {
    if (!isJsonValue(value)) {
      throw new MalformedInputError({
        message: 'Enum literals must be JSON values',
        context: { schemaPath: pointer(schemaPath, 'enum', String(index)) },
      });
    }
    values.push(value);
  });
  return values;
}

function readConditionals(doc: Doc): ConditionalRule[] {
  if (!Array.isArray(doc.allOf)) return [];
  const rules: ConditionalRule[] = [];
  for (const entry of doc.allOf) {
    if (!isRecord(entry) || !isRecord(entry.if) || !isRecord(entry.then)) {
      continue;
    }
    const ifProps = entry.if.properties;
    const requires = entry.then.required;
    if (!isRecord(ifProps) || !Array.isArray(requires)) continue;
    const names = Object.keys(ifProps);
    const field = names[0];
    if (names.length !== 1 || field === undefined) continue;
    const condition = ifProps[field];
    if (!isRecord(condition) || !('const' in condition)) continue;
    const equals = condition.const;
    if (!isJsonValue(equals)) continue;
    rules.push({
      field,
      equals,
      requires: requires.filter((v): v is string => typeof v === 'string'),
    });
  }
  return rules;
}

function convertObject(doc: Doc, schemaPath: string): ObjectNode {
  const properties = new Map<string, SchemaNode>();
  if (isRecord(doc.properties)) {
    for (const [name, child] of Object.entries(doc.properties)) {
      properties.set(
        name,
        convert(child, pointer(schemaPath, 'properties', name))
      );
    }
  }

  const required: string[] = [];
  if (Array.isArray(doc.required)) {
    for (const name of doc.required) {
      if (typeof name === 'string' && !required.includes(name)) {
        required.push(name);
      }
    }
  }

  return {
    kind: 'object',
    properties,
    required,
    conditionals: readConditionals(doc),
  };
}

function convertArray(doc: Doc, schemaPath: string): ArrayNode {
  const items: SchemaNode =
    doc.items === undefined
      ? { kind: 'scalar', type: 'string' }
      : convert(doc.items, pointer(schemaPath, 'items'));
  const node: ArrayNode = { kind: 'array', items };
  if (typeof doc.minItems === 'number') node.minItems = doc.minItems;
  if (typeof doc.maxItems === 'number') node.maxItems = doc.maxItems;
  if (typeof doc.uniqueItems === 'boolean') node.uniqueItems = doc.uniqueItems;
  return node;
}

function convert(doc: unknown, schemaPath: string): SchemaNode {
  if (!isRecord(doc)) {
    throw new MalformedInputError({
      message: 'Schema node must be a mapping',
      context: { schemaPath: schemaPath || '/' },
    });
  }

  const kind = resolveKind(doc, schemaPath);
  if (kind === 'object') return convertObject(doc, schemaPath);
  if (kind === 'array') return convertArray(doc, schemaPath);

  const node: ScalarNode = { kind: 'scalar', type: kind };
  const values = readEnum(doc, schemaPath);
  if (values !== undefined) node.enum = values;
  if (typeof doc.minimum === 'number') node.minimum = doc.minimum;
  if (typeof doc.maximum === 'number') node.maximum = doc.maximum;
  if (typeof doc.pattern === 'string') node.pattern = doc.pattern;
  if (typeof doc.format === 'string') node.format = doc.format;
  return node;
}

/**
 * Parse a schema document without throwing.
 */
export function parseSchema(
  doc: unknown
): Result<SchemaNode, MalformedInputError> {
  const validate = getValidator();
  if (!validate(doc)) {
    const first = validate.errors?.[0];
    return err(
      new MalformedInputError({
        message: first ? describeAjvError(first) : 'Malformed schema',
        context: { schemaPath: first?.instancePath || '/' },
      })
    );
  }

  try {
    return ok(convert(doc, ''));
  } catch (error) {
    if (error instanceof MalformedInputError) return err(error);
    throw error;
  }
}

/**
 * Parse a schema document, throwing MalformedInputError on violation.
 */
export function loadSchema(doc: unknown): SchemaNode {
  const result = parseSchema(doc);
  if (result.isErr()) throw result.error;
  return result.value;
}

/**
 * Parse JSON text; syntax errors surface as SCHEMA_PARSE_FAILED.
 */
export function parseSchemaText(
  text: string
): Result<{ node: SchemaNode; dialect: Dialect }, MalformedInputError> {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (error) {
    return err(
      new MalformedInputError({
        message: 'Schema document is not valid JSON',
        errorCode: ErrorCode.SCHEMA_PARSE_FAILED,
        cause: error instanceof Error ? error : undefined,
      })
    );
  }
  const parsed = parseSchema(doc);
  if (parsed.isErr()) return parsed;
  return ok({ node: parsed.value, dialect: detectDialect(doc) });
}
