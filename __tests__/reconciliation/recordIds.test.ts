import { compareRecordIds, isRecordId } from '../../src/reconciliation/recordIds';

describe('compareRecordIds', () => {
  it('should order numbers numerically', () => {
    expect([10, 2, 33].sort(compareRecordIds)).toEqual([2, 10, 33]);
  });

  it('should order numbers before strings', () => {
    expect(['b', 7, 'a'].sort(compareRecordIds)).toEqual([7, 'a', 'b']);
  });

  it('should order missing ids last', () => {
    expect([null, 'x', 3].sort(compareRecordIds)).toEqual([3, 'x', null]);
  });

  it('should treat two missing ids as equal', () => {
    expect(compareRecordIds(null, undefined)).toBe(0);
  });
});

describe('isRecordId', () => {
  it('should accept numbers and strings, including 0', () => {
    expect(isRecordId(0)).toBe(true);
    expect(isRecordId('rec-1')).toBe(true);
    expect(isRecordId(null)).toBe(false);
    expect(isRecordId(undefined)).toBe(false);
  });
});
