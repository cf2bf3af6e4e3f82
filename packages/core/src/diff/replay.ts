import { isItemPath } from '../tree/flatten.js';
import { type Operation, isStructural } from '../types/operations.js';

/**
 * Replay the structural operations of a diff over snapshot A's field paths.
 *
 * Each operation touches exactly the paths it names. Rename and Move both
 * remove `from` and add `to`, so a pair that carries both applies cleanly.
 * Non-structural operations are skipped.
 */
export function applyStructuralOperations(
  paths: Iterable<string>,
  ops: readonly Operation[]
): Set<string> {
  const out = new Set<string>();
  for (const path of paths) {
    if (!isItemPath(path)) out.add(path);
  }
  for (const op of ops) {
    if (!isStructural(op)) continue;
    switch (op.op) {
      case 'DropField':
        out.delete(op.path);
        break;
      case 'AddField':
        out.add(op.path);
        break;
      case 'RenameField':
      case 'MoveField':
        out.delete(op.from);
        out.add(op.to);
        break;
    }
  }
  return out;
}
