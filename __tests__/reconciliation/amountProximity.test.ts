/**
 * Tests for Amount Proximity Scoring
 */

import {
  calculateAmountScore,
  extractAmount,
  percentageDifference,
} from '../../src/reconciliation/amountProximity';

describe('calculateAmountScore', () => {
  it('should return 100 for equal amounts', () => {
    expect(calculateAmountScore(550, 550)).toBe(100);
  });

  it('should return 100 within 1%', () => {
    expect(calculateAmountScore(550, 555)).toBe(100);
  });

  it('should return 90 within 5%', () => {
    expect(calculateAmountScore(1000, 1040)).toBe(90);
  });

  it('should return 70 within 10%', () => {
    expect(calculateAmountScore(100, 92)).toBe(70);
  });

  it('should decay linearly beyond 10%', () => {
    // 20% apart: 100 - 1.5 × 20
    expect(calculateAmountScore(100, 80)).toBe(70);
    // 50% apart: 100 - 1.5 × 50
    expect(calculateAmountScore(200, 100)).toBe(25);
  });

  it('should floor at 0', () => {
    expect(calculateAmountScore(100, 10)).toBe(0);
  });

  it('should return 0 when an amount is missing', () => {
    expect(calculateAmountScore(null, 100)).toBe(0);
    expect(calculateAmountScore(100, null)).toBe(0);
  });
});

describe('extractAmount', () => {
  it('should take income first, then expense, then amount', () => {
    expect(extractAmount({ income: 300, expense: 50 })).toBe(300);
    expect(extractAmount({ income: 0, expense: 550 })).toBe(550);
    expect(extractAmount({ amount: 75 })).toBe(75);
  });

  it('should return the magnitude of a signed amount', () => {
    expect(extractAmount({ amount: -1200 })).toBe(1200);
  });

  it('should return null when no field carries money', () => {
    expect(extractAmount({ income: 0, expense: 0 })).toBeNull();
    expect(extractAmount({})).toBeNull();
  });
});

describe('percentageDifference', () => {
  it('should be relative to the larger magnitude', () => {
    expect(percentageDifference(100, 80)).toBe(20);
    expect(percentageDifference(80, 100)).toBe(20);
  });

  it('should return 0 for two zeros', () => {
    expect(percentageDifference(0, 0)).toBe(0);
  });
});
