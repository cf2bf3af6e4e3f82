import type { ObjectNode } from '../tree/schema-node.js';
import type { ResolvedOptions } from '../types/options.js';
import type { RandomSource } from '../util/rng.js';

export type MutationCategory = 'structural' | 'constraint' | 'semantic';

export interface MutationContext {
  /** Version being produced (1-based). Used to derive fresh names. */
  version: number;
  random: RandomSource;
  options: ResolvedOptions['mutation'];
}

/**
 * A catalog entry. `mutate` receives a private deep copy of the root
 * object and edits it in place; the returned text describes the change.
 */
export interface MutationOperator {
  name: string;
  category: MutationCategory;
  weight: number;
  /** One-line summary for listings. */
  summary: string;
  isViable(root: ObjectNode, options: ResolvedOptions['mutation']): boolean;
  mutate(root: ObjectNode, ctx: MutationContext): string;
}

/**
 * Raised by an operator that finds nothing to work on despite passing its
 * viability check. The engine turns it into a no-op step; it never leaves
 * the mutation package.
 */
export class OperatorInapplicable extends Error {
  constructor(
    public readonly operator: string,
    reason: string
  ) {
    super(`${operator}: ${reason}`);
    this.name = 'OperatorInapplicable';
  }
}
