/**
 * Tests for Date Proximity Scoring
 */

import { calculateDateScore, daysBetween, scoreDayGap } from '../../src/reconciliation/dateProximity';

describe('scoreDayGap', () => {
  it.each([
    [0, 100],
    [1, 85],
    [2, 70],
    [3, 50],
    [4, 40],
    [5, 25],
    [6, 10],
    [7, 0],
    [30, 0],
  ])('should score a %i day gap as %i', (gap, expected) => {
    expect(scoreDayGap(gap)).toBe(expected);
  });
});

describe('daysBetween', () => {
  it('should be absolute', () => {
    const first = new Date(Date.UTC(2024, 0, 10));
    const second = new Date(Date.UTC(2024, 0, 13));

    expect(daysBetween(first, second)).toBe(3);
    expect(daysBetween(second, first)).toBe(3);
  });
});

describe('calculateDateScore', () => {
  it('should match the same day written in different formats', () => {
    expect(calculateDateScore('2024-01-10', '10/01/2024')).toBe(100);
  });

  it('should score the gap between two dates', () => {
    expect(calculateDateScore('2024-01-10', '2024-01-13')).toBe(50);
  });

  it('should honor the date order for ambiguous input', () => {
    expect(calculateDateScore('2024-03-04', '03/04/2024', 'MDY')).toBe(100);
    expect(calculateDateScore('2024-03-04', '03/04/2024', 'DMY')).toBe(0);
  });

  it('should return 0 when a date cannot be parsed', () => {
    expect(calculateDateScore('2024-01-10', 'n/a')).toBe(0);
    expect(calculateDateScore(null, '2024-01-10')).toBe(0);
  });
});
