import { describe, it, expect } from 'vitest';
import { array, object, scalar } from '../../tree/schema-node.js';
import { DEFAULT_OPTIONS } from '../../types/options.js';
import type { RandomSource } from '../../util/rng.js';
import {
  changeEnumOptions,
  changePattern,
  changeRange,
  changeRequired,
} from '../operators/constraint.js';
import { addConditional, mergeFields, splitField } from '../operators/semantic.js';
import {
  addField,
  changeArrayStructure,
  changeFieldType,
  demoteField,
  nestFields,
  promoteField,
  removeField,
  renameField,
  unnestField,
} from '../operators/structural.js';
import { type MutationContext, OperatorInapplicable } from '../types.js';
import { scriptedRandom } from './scripted-random.js';

const options = DEFAULT_OPTIONS.mutation;

function ctx(version: number, random: RandomSource = scriptedRandom()): MutationContext {
  return { version, random, options };
}

function keys(node: { properties: Map<string, unknown> }): string[] {
  return [...node.properties.keys()];
}

describe('structural operators', () => {
  it('addField names the field after the version and marks it required on a low draw', () => {
    const root = object([['a', scalar('string')]]);
    expect(addField.mutate(root, ctx(3))).toBe("added field 'field_3' (type: string)");
    expect(root.properties.get('field_3')).toEqual(
      scalar('string', { format: 'email', pattern: '^[A-Za-z0-9]+$' })
    );
    expect(root.required).toEqual(['field_3']);
  });

  it('addField is viable only below maxProperties', () => {
    const fields = (n: number) => {
      const root = object();
      for (let i = 0; i < n; i++) root.properties.set(`f${i}`, scalar('string'));
      return root;
    };
    expect(addField.isViable(fields(19), options)).toBe(true);
    expect(addField.isViable(fields(20), options)).toBe(false);
  });

  it('removeField prefers optional fields and needs more than minProperties', () => {
    const root = object(
      [
        ['a', scalar('string')],
        ['b', scalar('string')],
        ['c', scalar('string')],
        ['d', scalar('string')],
      ],
      ['a']
    );
    expect(removeField.isViable(root, options)).toBe(true);
    expect(removeField.mutate(root, ctx(1))).toBe("removed field 'b'");
    expect(keys(root)).toEqual(['a', 'c', 'd']);
    expect(removeField.isViable(root, options)).toBe(false);
  });

  it('renameField carries requiredness to the new name', () => {
    const root = object(
      [
        ['a', scalar('string')],
        ['b', scalar('string')],
      ],
      ['a']
    );
    expect(renameField.mutate(root, ctx(2))).toBe("renamed field 'a' -> 'a_renamed_v2'");
    expect(keys(root)).toEqual(['b', 'a_renamed_v2']);
    expect(root.required).toEqual(['a_renamed_v2']);
  });

  it('changeFieldType replaces the scalar and its constraints', () => {
    const root = object([['a', scalar('string', { pattern: '^x$' })]]);
    expect(changeFieldType.mutate(root, ctx(1))).toBe("changed type of 'a': string -> integer");
    expect(root.properties.get('a')).toEqual(scalar('integer'));
  });

  it('changeFieldType signals when there is no scalar to change', () => {
    expect(() => changeFieldType.mutate(object([['o', object()]]), ctx(1))).toThrow(
      OperatorInapplicable
    );
  });

  it('nestFields groups up to three fields and keeps their requiredness', () => {
    const root = object(
      [
        ['a', scalar('string')],
        ['b', scalar('string')],
        ['c', scalar('string')],
        ['d', scalar('string')],
      ],
      ['a']
    );
    expect(nestFields.mutate(root, ctx(1))).toBe(
      "created nested object 'nested_object_v1' with fields: a, b, c"
    );
    expect(keys(root)).toEqual(['d', 'nested_object_v1']);
    expect(root.required).toEqual(['nested_object_v1']);
    const nested = root.properties.get('nested_object_v1');
    expect(nested?.kind === 'object' && nested.required).toEqual(['a']);
  });

  it('unnestField lifts fields out of a nested object', () => {
    const root = object(
      [
        [
          'addr',
          object([
            ['street', scalar('string')],
            ['city', scalar('string')],
          ]),
        ],
      ],
      ['addr']
    );
    expect(unnestField.mutate(root, ctx(1))).toBe("unnested fields from 'addr': street");
    expect(keys(root)).toEqual(['addr', 'street']);
    expect(root.required).toEqual(['addr', 'street']);
  });

  it('promoteField prefixes the parent name and drops an emptied parent', () => {
    const root = object([['addr', object([['street', scalar('string')]])]]);
    expect(promoteField.mutate(root, ctx(1))).toBe(
      "promoted field 'street' from 'addr' to 'addr_street'"
    );
    expect(keys(root)).toEqual(['addr_street']);
  });

  it('demoteField creates a nested object when none exists', () => {
    const root = object([
      ['a', scalar('string')],
      ['b', scalar('string')],
    ]);
    expect(demoteField.isViable(root, options)).toBe(true);
    expect(demoteField.mutate(root, ctx(1))).toBe(
      "demoted field 'a' into nested object 'nested_object_v1'"
    );
    expect(keys(root)).toEqual(['b', 'nested_object_v1']);
    const nested = root.properties.get('nested_object_v1');
    expect(nested?.kind === 'object' && keys(nested)).toEqual(['a']);
  });

  it('changeArrayStructure can change the item kind', () => {
    const root = object([['tags', array(scalar('string'))]]);
    expect(changeArrayStructure.mutate(root, ctx(1))).toBe(
      "changed item type of array 'tags': string -> integer"
    );
    expect(root.properties.get('tags')).toEqual(array(scalar('integer')));
  });

  it('changeArrayStructure toggles uniqueness', () => {
    const root = object([['tags', array(scalar('string'), { uniqueItems: true })]]);
    // field, then the third variant
    expect(changeArrayStructure.mutate(root, ctx(1, scriptedRandom(0, 0.9)))).toBe(
      "allowed duplicate items in array 'tags'"
    );
    expect(root.properties.get('tags')).toEqual(array(scalar('string')));
  });
});

describe('constraint operators', () => {
  it('changeRequired needs at least one required field and toggles it', () => {
    const root = object(
      [
        ['a', scalar('string')],
        ['b', scalar('string')],
      ],
      ['a']
    );
    expect(changeRequired.isViable(object([['a', scalar('string')]]), options)).toBe(false);
    expect(changeRequired.mutate(root, ctx(1))).toBe("field 'a' changed from required to optional");
    expect(changeRequired.mutate(root, ctx(2, scriptedRandom(0.99)))).toBe(
      "field 'b' changed from optional to required"
    );
    expect(root.required).toEqual(['b']);
  });

  it('changeEnumOptions adds a fresh option', () => {
    const root = object([['status', scalar('string', { enum: ['a', 'b'] })]]);
    expect(changeEnumOptions.mutate(root, ctx(4))).toBe(
      "added option 'option_v4' to enum field 'status'"
    );
    expect(root.properties.get('status')).toEqual(scalar('string', { enum: ['a', 'b', 'option_v4'] }));
  });

  it('changeEnumOptions removes an option', () => {
    const root = object([['status', scalar('string', { enum: ['a', 'b'] })]]);
    expect(changeEnumOptions.mutate(root, ctx(1, scriptedRandom(0, 0.5, 0.5)))).toBe(
      "removed option 'b' from enum field 'status'"
    );
    expect(root.properties.get('status')).toEqual(scalar('string', { enum: ['a'] }));
  });

  it('changeEnumOptions replaces a boolean enum with both literals', () => {
    const root = object([['flag', scalar('boolean', { enum: [true] })]]);
    expect(changeEnumOptions.mutate(root, ctx(1))).toBe("replaced all options of enum field 'flag'");
    expect(root.properties.get('flag')).toEqual(scalar('boolean', { enum: [true, false] }));
  });

  it('changeRange adds a missing minimum', () => {
    const root = object([['n', scalar('integer')]]);
    expect(changeRange.mutate(root, ctx(1))).toBe("changed numeric bounds of 'n': added minimum: 0");
    expect(root.properties.get('n')).toEqual(scalar('integer', { minimum: 0 }));
  });

  it('changeRange shifts existing bounds', () => {
    const root = object([['n', scalar('number', { minimum: 10, maximum: 50 })]]);
    const random = scriptedRandom(0, 0.9, 0.5, 0.9, 0, 0.9);
    expect(changeRange.mutate(root, ctx(1, random))).toBe(
      "changed numeric bounds of 'n': minimum: 10 -> 16, maximum: 50 -> 51"
    );
  });

  it('changePattern adds, drops and replaces', () => {
    const root = object([['s', scalar('string')]]);
    expect(changePattern.mutate(root, ctx(1))).toBe("added pattern to 's': '^[A-Za-z]+$'");

    const withPattern = object([['s', scalar('string', { pattern: '^[0-9]+$' })]]);
    expect(changePattern.mutate(withPattern, ctx(1, scriptedRandom(0, 0.5, 0)))).toBe(
      "changed pattern of 's': '^[0-9]+$' -> '^[A-Za-z]+$'"
    );
    expect(changePattern.mutate(withPattern, ctx(2))).toBe("dropped pattern '^[A-Za-z]+$' from 's'");
    expect(withPattern.properties.get('s')).toEqual(scalar('string'));
  });
});

describe('semantic operators', () => {
  it('splitField replaces a string with two parts', () => {
    const root = object([['name', scalar('string')]], ['name']);
    expect(splitField.mutate(root, ctx(1))).toBe("split field 'name' -> 'name_part1', 'name_part2'");
    expect(keys(root)).toEqual(['name_part1', 'name_part2']);
    expect(root.required).toEqual(['name_part1', 'name_part2']);
  });

  it('mergeFields folds up to three fields into one string', () => {
    const root = object([
      ['a', scalar('integer')],
      ['b', scalar('string')],
      ['c', scalar('string')],
      ['d', scalar('string')],
    ]);
    expect(mergeFields.mutate(root, ctx(5))).toBe("merged fields 'a', 'b', 'c' -> 'merged_field_v5'");
    expect(keys(root)).toEqual(['d', 'merged_field_v5']);
    expect(root.properties.get('merged_field_v5')).toEqual(scalar('string'));
  });

  it('addConditional records the rule once', () => {
    const root = object([
      ['a', scalar('string')],
      ['b', scalar('string')],
    ]);
    expect(addConditional.mutate(root, ctx(1))).toBe("when 'a' = 'true', 'b' is required");
    addConditional.mutate(root, ctx(2));
    expect(root.conditionals).toEqual([{ field: 'a', equals: 'true', requires: ['b'] }]);
  });

  it('needs at least two fields to merge or condition', () => {
    const single = object([['a', scalar('string')]]);
    expect(mergeFields.isViable(single, options)).toBe(false);
    expect(addConditional.isViable(single, options)).toBe(false);
  });
});
