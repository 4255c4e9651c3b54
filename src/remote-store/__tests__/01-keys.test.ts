/**
 * Key Ordering Tests
 */

import { compareKeys, sortKeys } from '../keys';

describe('compareKeys', () => {
  it('should order numeric keys by value', () => {
    expect(['10', '9', '100'].sort(compareKeys)).toEqual(['9', '10', '100']);
  });

  it('should handle ids beyond the safe integer range', () => {
    expect(compareKeys('90071992547409931', '90071992547409930')).toBe(1);
  });

  it('should put numeric keys before other keys', () => {
    expect(['b', '2', 'a', '1'].sort(compareKeys)).toEqual(['1', '2', 'a', 'b']);
  });
});

describe('sortKeys', () => {
  it('should take the first page in the requested direction', () => {
    const keys = ['1700000000001', '1700000000003', '1700000000002'];

    expect(sortKeys(keys, true, 2)).toEqual(['1700000000003', '1700000000002']);
    expect(sortKeys(keys, false, 1)).toEqual(['1700000000001']);
  });

  it('should return nothing for a non-positive page size', () => {
    expect(sortKeys(['1', '2'], true, 0)).toEqual([]);
  });
});
