/**
 * Rounding helpers for scores and money.
 */

/** Rounds to two decimal places */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Converts a currency amount to integer minor units */
export function toCents(value: number): number {
  return Math.round(value * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

/**
 * Exact integer minor units for ledger arithmetic, or null when the
 * amount has none (NaN, or so large that ×100 overflows).
 */
export function toMinorUnits(value: number): bigint | null {
  const cents = Math.round(value * 100);
  return Number.isFinite(cents) ? BigInt(cents) : null;
}

export function fromMinorUnits(units: bigint): number {
  return Number(units) / 100;
}
