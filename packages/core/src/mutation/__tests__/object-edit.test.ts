import { describe, it, expect } from 'vitest';
import { array, object, scalar } from '../../tree/schema-node.js';
import {
  detachProperty,
  markRequired,
  pruneRequired,
  renameProperty,
  uniqueName,
} from '../object-edit.js';

describe('object edits', () => {
  it('uniqueName appends a counter until the name is free', () => {
    const node = object([
      ['f', scalar('string')],
      ['f_2', scalar('string')],
    ]);
    expect(uniqueName(node, 'g')).toBe('g');
    expect(uniqueName(node, 'f')).toBe('f_3');
  });

  it('markRequired only adds existing names, once', () => {
    const node = object([['a', scalar('string')]]);
    markRequired(node, 'a');
    markRequired(node, 'a');
    markRequired(node, 'ghost');
    expect(node.required).toEqual(['a']);
  });

  it('detachProperty removes required entries and conditional references', () => {
    const node = object(
      [
        ['kind', scalar('string')],
        ['vat', scalar('string')],
        ['iban', scalar('string')],
      ],
      ['vat', 'kind']
    );
    node.conditionals.push(
      { field: 'kind', equals: 'b2b', requires: ['vat'] },
      { field: 'iban', equals: 'x', requires: ['vat', 'kind'] }
    );
    expect(detachProperty(node, 'vat')).toEqual(scalar('string'));
    expect(node.required).toEqual(['kind']);
    expect(node.conditionals).toEqual([{ field: 'iban', equals: 'x', requires: ['kind'] }]);
    expect(detachProperty(node, 'vat')).toBeUndefined();
  });

  it('renameProperty moves the field last and follows references', () => {
    const node = object(
      [
        ['a', scalar('string')],
        ['b', scalar('integer')],
      ],
      ['a']
    );
    node.conditionals.push({ field: 'b', equals: 1, requires: ['a'] });
    renameProperty(node, 'a', 'z');
    expect([...node.properties.keys()]).toEqual(['b', 'z']);
    expect(node.required).toEqual(['z']);
    expect(node.conditionals).toEqual([{ field: 'b', equals: 1, requires: ['z'] }]);
  });

  it('pruneRequired clears dangling and duplicate names at every level', () => {
    const inner = object([['x', scalar('string')]], ['x', 'gone', 'x']);
    const node = object(
      [
        ['inner', inner],
        ['list', array(object([['y', scalar('string')]], ['nope']))],
      ],
      ['inner', 'missing']
    );
    pruneRequired(node);
    expect(node.required).toEqual(['inner']);
    expect(inner.required).toEqual(['x']);
    const list = node.properties.get('list');
    expect(list?.kind === 'array' && list.items.kind === 'object' && list.items.required).toEqual([]);
  });
});
