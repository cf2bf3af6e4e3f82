import {
  type JsonValue,
  type ObjectNode,
  type ScalarKind,
  type ScalarNode,
  effectiveRequired,
} from '../../tree/schema-node.js';
import { canonicalJson } from '../../util/canonical-json.js';
import { type RandomSource, chance, randomInt } from '../../util/rng.js';
import {
  isRequired,
  isScalarOf,
  markRequired,
  namesWhere,
  pickOrFail,
  propertyNames,
  unmarkRequired,
} from '../object-edit.js';
import { type MutationOperator, OperatorInapplicable } from '../types.js';

const PATTERNS = [
  '^[A-Za-z]+$',
  '^[0-9]+$',
  '^[A-Za-z0-9]+$',
  '^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\\.[a-zA-Z]{2,}$',
  '^(https?|ftp)://[^\\s/$.?#].[^\\s]*$',
];

const MAX_ENUM_SIZE = 10;

function scalarChild(root: ObjectNode, name: string, operator: string): ScalarNode {
  const child = root.properties.get(name);
  if (child?.kind !== 'scalar') {
    throw new OperatorInapplicable(operator, `'${name}' is not a scalar`);
  }
  return child;
}

function hasEnum(child: ScalarNode): child is ScalarNode & { enum: JsonValue[] } {
  return child.enum !== undefined && child.enum.length > 0;
}

function enumLiteral(type: ScalarKind, label: string, ordinal: number): JsonValue {
  switch (type) {
    case 'string':
      return label;
    case 'boolean':
      return ordinal % 2 === 1;
    case 'integer':
    case 'number':
      return ordinal;
  }
}

function freshLiteral(child: ScalarNode, values: readonly JsonValue[], version: number): JsonValue {
  const taken = new Set(values.map((value) => canonicalJson(value)));
  for (let n = 0; ; n++) {
    const label = n === 0 ? `option_v${version}` : `option_v${version}_${n}`;
    const candidate = enumLiteral(child.type, label, version + n);
    if (!taken.has(canonicalJson(candidate))) return candidate;
  }
}

function describeLiteral(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

export const changeRequired: MutationOperator = {
  name: 'changeRequired',
  category: 'constraint',
  weight: 8,
  summary: 'toggle whether a root field is required',
  isViable: (root) => effectiveRequired(root).length > 0,
  mutate(root, ctx) {
    const name = pickOrFail(ctx.random, propertyNames(root), this.name, 'field');
    if (isRequired(root, name)) {
      unmarkRequired(root, name);
      return `field '${name}' changed from required to optional`;
    }
    markRequired(root, name);
    return `field '${name}' changed from optional to required`;
  },
};

export const changeEnumOptions: MutationOperator = {
  name: 'changeEnumOptions',
  category: 'constraint',
  weight: 6,
  summary: 'add, remove or replace enum options of a field',
  isViable: (root) =>
    namesWhere(root, (child) => child.kind === 'scalar' && hasEnum(child)).length > 0,
  mutate(root, ctx) {
    const { random } = ctx;
    const name = pickOrFail(
      random,
      namesWhere(root, (child) => child.kind === 'scalar' && hasEnum(child)),
      this.name,
      'enum field'
    );
    const child = scalarChild(root, name, this.name);
    const values = child.enum ?? [];
    const variant = pickOrFail(random, ['add', 'remove', 'replace'] as const, this.name, 'variant');

    if (variant === 'add' && values.length < MAX_ENUM_SIZE && child.type !== 'boolean') {
      const option = freshLiteral(child, values, ctx.version);
      child.enum = [...values, option];
      return `added option '${describeLiteral(option)}' to enum field '${name}'`;
    }

    if (variant === 'remove' && values.length > 1) {
      const option = pickOrFail(random, values, this.name, 'option');
      const key = canonicalJson(option);
      child.enum = values.filter((value) => canonicalJson(value) !== key);
      return `removed option '${describeLiteral(option)}' from enum field '${name}'`;
    }

    const count = child.type === 'boolean' ? 2 : randomInt(random, 1, 5);
    child.enum = Array.from({ length: count }, (_, i) =>
      enumLiteral(child.type, `new_opt_${i + 1}`, i + 1)
    );
    return `replaced all options of enum field '${name}'`;
  },
};

function shift(random: RandomSource): number {
  const magnitude = randomInt(random, 1, 10);
  return chance(random, 0.5) ? -magnitude : magnitude;
}

export const changeRange: MutationOperator = {
  name: 'changeRange',
  category: 'constraint',
  weight: 7,
  summary: 'add or shift minimum/maximum of a numeric field',
  isViable: (root) =>
    namesWhere(root, (child) => isScalarOf(child, 'integer', 'number')).length > 0,
  mutate(root, ctx) {
    const { random } = ctx;
    const name = pickOrFail(
      random,
      namesWhere(root, (child) => isScalarOf(child, 'integer', 'number')),
      this.name,
      'numeric field'
    );
    const child = scalarChild(root, name, this.name);
    const which = pickOrFail(random, ['minimum', 'maximum', 'both'] as const, this.name, 'bound');
    const changes: string[] = [];

    if (which !== 'maximum') {
      if (child.minimum === undefined) {
        child.minimum = randomInt(random, 0, 10);
        changes.push(`added minimum: ${child.minimum}`);
      } else {
        const from = child.minimum;
        child.minimum = from + shift(random);
        changes.push(`minimum: ${from} -> ${child.minimum}`);
      }
    }
    if (which !== 'minimum') {
      if (child.maximum === undefined) {
        child.maximum = randomInt(random, 100, 200);
        changes.push(`added maximum: ${child.maximum}`);
      } else {
        const from = child.maximum;
        child.maximum = from + shift(random);
        changes.push(`maximum: ${from} -> ${child.maximum}`);
      }
    }
    return `changed numeric bounds of '${name}': ${changes.join(', ')}`;
  },
};

export const changePattern: MutationOperator = {
  name: 'changePattern',
  category: 'constraint',
  weight: 4,
  summary: 'add, replace or drop the pattern of a string field',
  isViable: (root) => namesWhere(root, (child) => isScalarOf(child, 'string')).length > 0,
  mutate(root, ctx) {
    const { random } = ctx;
    const name = pickOrFail(
      random,
      namesWhere(root, (child) => isScalarOf(child, 'string')),
      this.name,
      'string field'
    );
    const child = scalarChild(root, name, this.name);
    const from = child.pattern;
    if (from === undefined) {
      child.pattern = pickOrFail(random, PATTERNS, this.name, 'pattern');
      return `added pattern to '${name}': '${child.pattern}'`;
    }
    if (chance(random, 0.25)) {
      delete child.pattern;
      return `dropped pattern '${from}' from '${name}'`;
    }
    const to = pickOrFail(
      random,
      PATTERNS.filter((pattern) => pattern !== from),
      this.name,
      'pattern'
    );
    child.pattern = to;
    return `changed pattern of '${name}': '${from}' -> '${to}'`;
  },
};

export const CONSTRAINT_OPERATORS: readonly MutationOperator[] = [
  changeRequired,
  changeEnumOptions,
  changeRange,
  changePattern,
];
