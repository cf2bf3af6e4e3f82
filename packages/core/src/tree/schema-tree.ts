import type { MalformedInputError } from '../types/errors.js';
import { type Result, ok } from '../types/result.js';
import { DEFAULT_ROOT_NAME, type FlatIndex, flatten } from './flatten.js';
import { detectDialect, parseSchema } from './parse.js';
import {
  type Dialect,
  type SchemaNode,
  cloneNode,
  countFields,
} from './schema-node.js';
import { type SchemaDocument, toDocument } from './serialize.js';

/**
 * One schema snapshot: a root node plus the dialect it was read in.
 *
 * Snapshots handed out by the engines are never modified afterwards;
 * anything that wants to change a tree works on `clone()`.
 */
export class SchemaTree {
  constructor(
    public readonly root: SchemaNode,
    public readonly dialect: Dialect = 'json'
  ) {}

  static parse(doc: unknown): Result<SchemaTree, MalformedInputError> {
    const parsed = parseSchema(doc);
    if (parsed.isErr()) return parsed;
    return ok(new SchemaTree(parsed.value, detectDialect(doc)));
  }

  /** Throws MalformedInputError when the document is not in the dialect. */
  static fromDocument(doc: unknown): SchemaTree {
    const parsed = SchemaTree.parse(doc);
    if (parsed.isErr()) throw parsed.error;
    return parsed.value;
  }

  clone(): SchemaTree {
    return new SchemaTree(cloneNode(this.root), this.dialect);
  }

  flatten(rootName: string = DEFAULT_ROOT_NAME): FlatIndex {
    return flatten(this.root, rootName);
  }

  toDocument(): SchemaDocument {
    return toDocument(this.root, this.dialect);
  }

  countFields(): number {
    return countFields(this.root);
  }
}
