import type { SchemaNode } from './schema-node.js';

/**
 * Path addressing: "." descends into an object field, "[]" into an array's
 * item node. Inside a field segment `\`, `.`, `[` and `]` are escaped with a
 * backslash, so every node of a snapshot gets its own path.
 */
export const DEFAULT_ROOT_NAME = '$';
export const ITEM_SEGMENT = '[]';

/** Path → node for one snapshot, in depth-first document order. */
export type FlatIndex = Map<string, SchemaNode>;

export function flatten(
  node: SchemaNode,
  rootName: string = DEFAULT_ROOT_NAME
): FlatIndex {
  const index: FlatIndex = new Map();
  const visit = (path: string, current: SchemaNode): void => {
    index.set(path, current);
    if (current.kind === 'object') {
      for (const [name, child] of current.properties) {
        visit(childPath(path, name), child);
      }
    } else if (current.kind === 'array') {
      visit(itemPath(path), current.items);
    }
  };
  visit(rootName, node);
  return index;
}

const SEGMENT_SPECIALS = /[\\.[\]]/g;

export function escapeSegment(name: string): string {
  return name.replace(SEGMENT_SPECIALS, '\\$&');
}

export function childPath(parent: string, name: string): string {
  return `${parent}.${escapeSegment(name)}`;
}

export function itemPath(parent: string): string {
  return `${parent}${ITEM_SEGMENT}`;
}

/**
 * Array-item placeholders follow their parent field and are never matched.
 * A `]` that comes from a field name is always escaped, so only a real item
 * segment ends in "[]".
 */
export function isItemPath(path: string): boolean {
  return path.endsWith(ITEM_SEGMENT);
}

/** Index of the last "." not escaped by an odd run of backslashes, or -1. */
function lastSeparator(path: string): number {
  for (let i = path.length - 1; i >= 0; i--) {
    if (path.charAt(i) !== '.') continue;
    let backslashes = 0;
    for (let j = i - 1; j >= 0 && path.charAt(j) === '\\'; j--) backslashes++;
    if (backslashes % 2 === 0) return i;
  }
  return -1;
}

export function parentPath(path: string): string {
  if (isItemPath(path)) return path.slice(0, -ITEM_SEGMENT.length);
  const dot = lastSeparator(path);
  return dot === -1 ? '' : path.slice(0, dot);
}

/** Last segment as it appears in the path (escapes kept). */
export function leafName(path: string): string {
  if (isItemPath(path)) return ITEM_SEGMENT;
  const dot = lastSeparator(path);
  return dot === -1 ? path : path.slice(dot + 1);
}

/** Every path of the index except array-item placeholders. */
export function fieldPaths(index: FlatIndex): string[] {
  return [...index.keys()].filter((path) => !isItemPath(path));
}
