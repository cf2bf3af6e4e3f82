import { type ConditionalRule, scalar } from '../../tree/schema-node.js';
import { canonicalJson } from '../../util/canonical-json.js';
import { chance, sample } from '../../util/rng.js';
import {
  detachProperty,
  isRequired,
  isScalarOf,
  markRequired,
  namesWhere,
  pickOrFail,
  propertyNames,
  uniqueName,
} from '../object-edit.js';
import { type MutationOperator, OperatorInapplicable } from '../types.js';

const CONDITION_VALUES = ['true', 'false', 'yes', 'no', 'required', 'optional'];

export const splitField: MutationOperator = {
  name: 'splitField',
  category: 'semantic',
  weight: 3,
  summary: 'split a string field into two parts',
  isViable: (root) => namesWhere(root, (child) => isScalarOf(child, 'string')).length > 0,
  mutate(root, ctx) {
    const name = pickOrFail(
      ctx.random,
      namesWhere(root, (child) => isScalarOf(child, 'string')),
      this.name,
      'string field'
    );
    const wasRequired = isRequired(root, name);
    detachProperty(root, name);
    const first = uniqueName(root, `${name}_part1`);
    root.properties.set(first, scalar('string'));
    const second = uniqueName(root, `${name}_part2`);
    root.properties.set(second, scalar('string'));
    if (wasRequired && chance(ctx.random, 0.5)) {
      markRequired(root, first);
      markRequired(root, second);
    }
    return `split field '${name}' -> '${first}', '${second}'`;
  },
};

export const mergeFields: MutationOperator = {
  name: 'mergeFields',
  category: 'semantic',
  weight: 3,
  summary: 'merge up to three fields into one string field',
  isViable: (root) => root.properties.size >= 2,
  mutate(root, ctx) {
    const names = propertyNames(root);
    const chosen = sample(ctx.random, names, Math.min(3, names.length));
    if (chosen.length < 2) {
      throw new OperatorInapplicable(this.name, 'fewer than two fields');
    }
    for (const name of chosen) detachProperty(root, name);
    const merged = uniqueName(root, `merged_field_v${ctx.version}`);
    root.properties.set(merged, scalar('string'));
    if (chance(ctx.random, 0.5)) markRequired(root, merged);
    return `merged fields ${chosen.map((name) => `'${name}'`).join(', ')} -> '${merged}'`;
  },
};

export const addConditional: MutationOperator = {
  name: 'addConditional',
  category: 'semantic',
  weight: 4,
  summary: 'require one field when another has a given value',
  isViable: (root) => root.properties.size >= 2,
  mutate(root, ctx) {
    const [field, target] = sample(ctx.random, propertyNames(root), 2);
    if (field === undefined || target === undefined) {
      throw new OperatorInapplicable(this.name, 'fewer than two fields');
    }
    const value = pickOrFail(ctx.random, CONDITION_VALUES, this.name, 'value');
    const rule: ConditionalRule = { field, equals: value, requires: [target] };
    const key = canonicalJson(rule);
    if (!root.conditionals.some((existing) => canonicalJson(existing) === key)) {
      root.conditionals.push(rule);
    }
    return `when '${field}' = '${value}', '${target}' is required`;
  },
};

export const SEMANTIC_OPERATORS: readonly MutationOperator[] = [
  splitField,
  mergeFields,
  addConditional,
];
