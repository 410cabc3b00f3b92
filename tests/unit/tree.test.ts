/**
 * Unit tests for the document tree accessors
 */

import { describe, it, expect } from '@jest/globals';
import { first, items, keys, textAt, toTree } from '../../src/utils/tree.js';

describe('tree accessors', () => {
  const doc = toTree({
    single: { name: 'one' },
    repeated: [{ name: 'a' }, { name: 'b' }],
    blank: '   ',
    attributed: { '#text': ' inner ', '@_status': 'current' },
    count: 3,
  });

  it('should read nested text through missing steps without throwing', () => {
    expect(textAt(doc, 'single', 'name')).toBe('one');
    expect(textAt(doc, 'missing', 'name')).toBeUndefined();
    expect(textAt(doc, 'count', 'name')).toBeUndefined();
  });

  it('should treat a single element and a repeated one alike', () => {
    expect(items(toTree(null))).toEqual([]);
    expect(items(toTree({ name: 'one' }))).toHaveLength(1);
    expect(items(toTree([1, 2, 3]))).toHaveLength(3);
    expect(textAt(first(toTree([{ name: 'a' }, { name: 'b' }])), 'name')).toBe('a');
  });

  it('should treat blank text as missing and trim the rest', () => {
    expect(textAt(doc, 'blank')).toBeUndefined();
    expect(textAt(doc, 'attributed')).toBe('inner');
    expect(textAt(doc, 'count')).toBe('3');
  });

  it('should list mapping keys in document order', () => {
    expect(keys(doc)).toEqual(['single', 'repeated', 'blank', 'attributed', 'count']);
    expect(keys(toTree('scalar'))).toEqual([]);
  });
});
