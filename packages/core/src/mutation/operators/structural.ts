import {
  type ArrayNode,
  type NodeKind,
  type ObjectNode,
  type ScalarKind,
  type ScalarNode,
  type SchemaNode,
  array,
  declaredKind,
  isScalarKind,
  object,
  scalar,
} from '../../tree/schema-node.js';
import { chance, randomInt, sample } from '../../util/rng.js';
import {
  detachProperty,
  isPopulatedObject,
  isRequired,
  isScalarOf,
  markRequired,
  namesWhere,
  pickOrFail,
  propertyNames,
  renameProperty,
  uniqueName,
} from '../object-edit.js';
import {
  type MutationContext,
  type MutationOperator,
  OperatorInapplicable,
} from '../types.js';

const FIELD_BASES = ['field', 'property', 'attr', 'item', 'running_case'];
const NEW_FIELD_KINDS: NodeKind[] = [
  'string',
  'integer',
  'number',
  'boolean',
  'object',
  'array',
];
const ITEM_KINDS: NodeKind[] = ['string', 'integer', 'number', 'boolean', 'object'];
const STRING_FORMATS = ['email', 'date-time', 'uri', 'hostname'];
const ALPHANUMERIC = '^[A-Za-z0-9]+$';

const TYPE_CONVERSIONS: Record<ScalarKind, ScalarKind[]> = {
  string: ['integer', 'number', 'boolean'],
  integer: ['string', 'number'],
  number: ['string', 'integer'],
  boolean: ['string'],
};

function freshScalar(type: ScalarKind, ctx: MutationContext): ScalarNode {
  const { random } = ctx;
  const node = scalar(type);
  if (type === 'string') {
    if (chance(random, 0.8)) {
      node.format = pickOrFail(random, STRING_FORMATS, 'addField', 'format');
    }
    if (chance(random, 0.2)) node.pattern = ALPHANUMERIC;
  } else if (type === 'integer' || type === 'number') {
    if (chance(random, 0.5)) node.minimum = randomInt(random, 0, 100);
    if (chance(random, 0.5)) node.maximum = randomInt(random, 101, 200);
  }
  return node;
}

function itemNode(kind: NodeKind): SchemaNode {
  if (isScalarKind(kind)) return scalar(kind);
  return kind === 'object' ? object() : array(scalar('string'));
}

function freshNode(kind: NodeKind, ctx: MutationContext): SchemaNode {
  if (isScalarKind(kind)) return freshScalar(kind, ctx);
  if (kind === 'object') {
    return object([
      [`nested_${ctx.version}_1`, scalar('string')],
      [`nested_${ctx.version}_2`, scalar('integer')],
    ]);
  }
  const { random } = ctx;
  const node = array(itemNode(pickOrFail(random, ITEM_KINDS, 'addField', 'item kind')));
  if (chance(random, 0.5)) node.minItems = randomInt(random, 1, 5);
  if (chance(random, 0.5)) node.maxItems = randomInt(random, 6, 20);
  return node;
}

function objectChild(root: ObjectNode, name: string, operator: string): ObjectNode {
  const child = root.properties.get(name);
  if (child?.kind !== 'object') {
    throw new OperatorInapplicable(operator, `'${name}' is not an object`);
  }
  return child;
}

function arrayChild(root: ObjectNode, name: string, operator: string): ArrayNode {
  const child = root.properties.get(name);
  if (child?.kind !== 'array') {
    throw new OperatorInapplicable(operator, `'${name}' is not an array`);
  }
  return child;
}

function detachOrFail(node: ObjectNode, name: string, operator: string): SchemaNode {
  const child = detachProperty(node, name);
  if (!child) throw new OperatorInapplicable(operator, `'${name}' is missing`);
  return child;
}

export const addField: MutationOperator = {
  name: 'addField',
  category: 'structural',
  weight: 15,
  summary: 'add a new field of a random kind',
  isViable: (root, options) => root.properties.size < options.maxProperties,
  mutate(root, ctx) {
    const kind = pickOrFail(ctx.random, NEW_FIELD_KINDS, this.name, 'kind');
    const base = pickOrFail(ctx.random, FIELD_BASES, this.name, 'name');
    const name = uniqueName(root, `${base}_${ctx.version}`);
    root.properties.set(name, freshNode(kind, ctx));
    if (chance(ctx.random, 0.5)) markRequired(root, name);
    return `added field '${name}' (type: ${kind})`;
  },
};

export const removeField: MutationOperator = {
  name: 'removeField',
  category: 'structural',
  weight: 10,
  summary: 'remove a field, preferring optional ones',
  isViable: (root, options) => root.properties.size > options.minProperties,
  mutate(root, ctx) {
    const all = propertyNames(root);
    const optional = all.filter((name) => !isRequired(root, name));
    const name = pickOrFail(ctx.random, optional.length > 0 ? optional : all, this.name, 'field');
    detachOrFail(root, name, this.name);
    return `removed field '${name}'`;
  },
};

export const renameField: MutationOperator = {
  name: 'renameField',
  category: 'structural',
  weight: 8,
  summary: 'rename a field',
  isViable: (root) => root.properties.size > 0,
  mutate(root, ctx) {
    const from = pickOrFail(ctx.random, propertyNames(root), this.name, 'field');
    const to = uniqueName(root, `${from}_renamed_v${ctx.version}`);
    renameProperty(root, from, to);
    return `renamed field '${from}' -> '${to}'`;
  },
};

export const changeFieldType: MutationOperator = {
  name: 'changeFieldType',
  category: 'structural',
  weight: 5,
  summary: 'change the type of a scalar field',
  isViable: (root) => namesWhere(root, (child) => isScalarOf(child)).length > 0,
  mutate(root, ctx) {
    const name = pickOrFail(
      ctx.random,
      namesWhere(root, (child) => isScalarOf(child)),
      this.name,
      'scalar field'
    );
    const child = root.properties.get(name);
    if (child?.kind !== 'scalar') {
      throw new OperatorInapplicable(this.name, `'${name}' is not a scalar`);
    }
    const to = pickOrFail(ctx.random, TYPE_CONVERSIONS[child.type], this.name, 'target type');
    // Old constraints rarely fit the new type; start clean.
    root.properties.set(name, scalar(to));
    return `changed type of '${name}': ${child.type} -> ${to}`;
  },
};

export const nestFields: MutationOperator = {
  name: 'nestFields',
  category: 'structural',
  weight: 5,
  summary: 'group up to three fields into a new nested object',
  isViable: (root) => root.properties.size >= 2,
  mutate(root, ctx) {
    const names = propertyNames(root);
    const chosen = sample(ctx.random, names, Math.min(3, names.length));
    const nestName = uniqueName(root, `nested_object_v${ctx.version}`);
    const nested = object();
    for (const name of chosen) {
      const wasRequired = isRequired(root, name);
      nested.properties.set(name, detachOrFail(root, name, this.name));
      if (wasRequired) markRequired(nested, name);
    }
    root.properties.set(nestName, nested);
    if (chance(ctx.random, 0.5)) markRequired(root, nestName);
    return `created nested object '${nestName}' with fields: ${chosen.join(', ')}`;
  },
};

/**
 * Lift `names` out of `parentName` into the root under `targetName(name)`.
 * The parent is removed once it has no properties left.
 */
function liftFields(
  root: ObjectNode,
  parentName: string,
  names: readonly string[],
  targetName: (name: string) => string,
  ctx: MutationContext,
  operator: string
): string[] {
  const parent = objectChild(root, parentName, operator);
  const parentRequired = isRequired(root, parentName);
  const placed: string[] = [];
  for (const name of names) {
    const child = detachOrFail(parent, name, operator);
    const target = uniqueName(root, targetName(name));
    root.properties.set(target, child);
    if (parentRequired && chance(ctx.random, 0.5)) markRequired(root, target);
    placed.push(target);
  }
  if (parent.properties.size === 0) detachProperty(root, parentName);
  return placed;
}

export const unnestField: MutationOperator = {
  name: 'unnestField',
  category: 'structural',
  weight: 5,
  summary: 'move fields of a nested object up to the root',
  isViable: (root) => namesWhere(root, isPopulatedObject).length > 0,
  mutate(root, ctx) {
    const parentName = pickOrFail(
      ctx.random,
      namesWhere(root, isPopulatedObject),
      this.name,
      'nested object'
    );
    const inner = propertyNames(objectChild(root, parentName, this.name));
    const chosen = sample(ctx.random, inner, randomInt(ctx.random, 1, inner.length));
    const placed = liftFields(root, parentName, chosen, (name) => name, ctx, this.name);
    return `unnested fields from '${parentName}': ${placed.join(', ')}`;
  },
};

export const promoteField: MutationOperator = {
  name: 'promoteField',
  category: 'structural',
  weight: 4,
  summary: 'promote one nested field to a prefixed root field',
  isViable: (root) => namesWhere(root, isPopulatedObject).length > 0,
  mutate(root, ctx) {
    const parentName = pickOrFail(
      ctx.random,
      namesWhere(root, isPopulatedObject),
      this.name,
      'nested object'
    );
    const inner = propertyNames(objectChild(root, parentName, this.name));
    const name = pickOrFail(ctx.random, inner, this.name, 'nested field');
    const [placed] = liftFields(
      root,
      parentName,
      [name],
      (field) => `${parentName}_${field}`,
      ctx,
      this.name
    );
    return `promoted field '${name}' from '${parentName}' to '${placed ?? name}'`;
  },
};

export const demoteField: MutationOperator = {
  name: 'demoteField',
  category: 'structural',
  weight: 4,
  summary: 'move a root field into a nested object',
  isViable: (root) => namesWhere(root, (child) => isScalarOf(child)).length >= 2,
  mutate(root, ctx) {
    const existing = namesWhere(root, isPopulatedObject);
    let targetName: string;
    if (existing.length > 0) {
      targetName = pickOrFail(ctx.random, existing, this.name, 'nested object');
    } else {
      targetName = uniqueName(root, `nested_object_v${ctx.version}`);
      root.properties.set(targetName, object());
    }
    const target = objectChild(root, targetName, this.name);
    const candidates = namesWhere(root, (child) => child.kind !== 'object');
    const name = pickOrFail(ctx.random, candidates, this.name, 'field to demote');
    const wasRequired = isRequired(root, name);
    const child = detachOrFail(root, name, this.name);
    const placed = uniqueName(target, name);
    target.properties.set(placed, child);
    if (wasRequired && chance(ctx.random, 0.5)) markRequired(target, placed);
    return `demoted field '${name}' into nested object '${targetName}'`;
  },
};

export const changeArrayStructure: MutationOperator = {
  name: 'changeArrayStructure',
  category: 'structural',
  weight: 4,
  summary: 'change item type, item bounds or uniqueness of an array field',
  isViable: (root) => namesWhere(root, (child) => child.kind === 'array').length > 0,
  mutate(root, ctx) {
    const { random } = ctx;
    const name = pickOrFail(
      random,
      namesWhere(root, (child) => child.kind === 'array'),
      this.name,
      'array field'
    );
    const node = arrayChild(root, name, this.name);
    const variant = pickOrFail(random, ['itemType', 'bounds', 'unique'] as const, this.name, 'variant');

    if (variant === 'itemType') {
      const from = declaredKind(node.items);
      const to = pickOrFail(
        random,
        ITEM_KINDS.filter((kind) => kind !== from),
        this.name,
        'item kind'
      );
      node.items = itemNode(to);
      return `changed item type of array '${name}': ${from} -> ${to}`;
    }

    if (variant === 'bounds') {
      const setMin = chance(random, 0.5);
      const setMax = chance(random, 0.5);
      if (setMin || !setMax) node.minItems = randomInt(random, 1, 5);
      if (setMax) node.maxItems = randomInt(random, 6, 20);
      return `set item count limits on array '${name}'`;
    }

    if (node.uniqueItems === true) {
      delete node.uniqueItems;
      return `allowed duplicate items in array '${name}'`;
    }
    node.uniqueItems = true;
    return `required unique items in array '${name}'`;
  },
};

export const STRUCTURAL_OPERATORS: readonly MutationOperator[] = [
  addField,
  removeField,
  renameField,
  changeFieldType,
  nestFields,
  unnestField,
  promoteField,
  demoteField,
  changeArrayStructure,
];
