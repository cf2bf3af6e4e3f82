import { describe, it, expect } from 'vitest';
import { array, object, scalar } from '../../tree/schema-node.js';
import { classifyTypeChange } from '../type-change.js';

describe('classifyTypeChange', () => {
  it('returns nothing when the declared kind is unchanged', () => {
    expect(classifyTypeChange('$.a', scalar('string', { pattern: '^a' }), scalar('string'))).toBeUndefined();
    expect(classifyTypeChange('$.a', array(scalar('string')), array(scalar('integer')))).toBeUndefined();
  });

  it('uses ToArray and ToScalar for cardinality changes', () => {
    expect(classifyTypeChange('$.a', scalar('string'), array(scalar('string')))).toEqual({
      op: 'ToArray',
      path: '$.a',
    });
    expect(classifyTypeChange('$.a', object(), array(object()))).toEqual({ op: 'ToArray', path: '$.a' });
    expect(classifyTypeChange('$.a', array(scalar('string')), object())).toEqual({
      op: 'ToScalar',
      path: '$.a',
    });
  });

  it('reports other kind changes as ChangeType', () => {
    expect(classifyTypeChange('$.a', scalar('integer'), scalar('number'))).toEqual({
      op: 'ChangeType',
      path: '$.a',
      from: 'integer',
      to: 'number',
    });
    expect(classifyTypeChange('$.a', object(), scalar('string'))).toEqual({
      op: 'ChangeType',
      path: '$.a',
      from: 'object',
      to: 'string',
    });
  });
});
