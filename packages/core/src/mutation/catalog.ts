import { ConfigError } from '../types/errors.js';
import { CONSTRAINT_OPERATORS } from './operators/constraint.js';
import { SEMANTIC_OPERATORS } from './operators/semantic.js';
import { STRUCTURAL_OPERATORS } from './operators/structural.js';
import type { MutationOperator } from './types.js';

/** Every operator, in listing order. */
export const OPERATOR_CATALOG: readonly MutationOperator[] = [
  ...STRUCTURAL_OPERATORS,
  ...CONSTRAINT_OPERATORS,
  ...SEMANTIC_OPERATORS,
];

export function operatorNames(): string[] {
  return OPERATOR_CATALOG.map((operator) => operator.name);
}

/**
 * The catalog narrowed to `names` (catalog order is kept).
 * Throws ConfigError on names the catalog does not know.
 */
export function selectOperators(names?: readonly string[]): MutationOperator[] {
  if (!names) return [...OPERATOR_CATALOG];
  const known = new Set(operatorNames());
  const unknown = names.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigError({
      message: `Unknown mutation operator(s): ${unknown.join(', ')}`,
      context: { setting: 'mutation.operators', value: unknown },
    });
  }
  const wanted = new Set(names);
  if (wanted.size === 0) {
    throw new ConfigError({
      message: 'Option mutation.operators must name at least one operator',
      context: { setting: 'mutation.operators' },
    });
  }
  return OPERATOR_CATALOG.filter((operator) => wanted.has(operator.name));
}
