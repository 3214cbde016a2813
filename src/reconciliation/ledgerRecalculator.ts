/**
 * Ledger Recalculator
 *
 * Recomputes every running balance from scratch. Called whenever a
 * record is added, edited or removed, or the opening balance changes.
 *
 * Ordering: parsed date ascending, then id ascending. Records whose
 * date cannot be parsed go after all dated records, ordered by id.
 *
 * Money is accumulated in exact integer minor units. Totals are summed
 * in a separate pass over the input, and opening + income - expense
 * must equal the final running balance. A mismatch is a bug and raises
 * a non-operational AppError.
 */

import { AppError } from '../utils/AppError';
import { DEFAULT_CONFIG } from './config';
import { parseDate } from './dateNormalizer';
import { compareRecordIds } from './recordIds';
import { fromMinorUnits, toMinorUnits } from './rounding';
import type { DateOrder } from './config';
import type { LedgerEntry, LedgerResult, TransactionRecord } from './types';

export interface LedgerOptions {
  /** Stamped on the resulting Balance; defaults to the current time */
  now?: Date;
  dateOrder?: DateOrder;
}

interface SortKey<T> {
  record: T;
  time: number | null;
}

/**
 * Chronological order used for running balances.
 */
export function sortChronologically<T extends Pick<TransactionRecord, 'id' | 'date'>>(
  records: readonly T[],
  dateOrder: DateOrder = DEFAULT_CONFIG.dateOrder
): T[] {
  const keyed: SortKey<T>[] = records.map((record) => {
    const parsed = parseDate(record.date, { dateOrder });
    return { record, time: parsed.ok ? parsed.date.getTime() : null };
  });

  keyed.sort((a, b) => {
    if (a.time !== b.time) {
      if (a.time === null) return 1;
      if (b.time === null) return -1;
      return a.time - b.time;
    }
    return compareRecordIds(a.record.id, b.record.id);
  });

  return keyed.map((key) => key.record);
}

/**
 * Sum of one money field over the records in the order given.
 */
function sumField(records: readonly TransactionRecord[], field: 'income' | 'expense'): bigint {
  return records.reduce((sum, record) => sum + (toMinorUnits(record[field]) ?? 0n), 0n);
}

/**
 * Recalculates running balances and totals for a full record set.
 *
 * Pure: the input records are not modified; annotated copies are returned.
 * An amount with no exact minor-unit value (NaN, or too large to scale)
 * counts as 0 and its record comes back with needsReview set.
 *
 * @example
 * recalculateLedger(1000, [
 *   { ...expense, date: '2024-01-01', expense: 200 },
 *   { ...income, date: '2024-01-02', income: 500 },
 * ])
 * // entries: [{ runningBalance: 800 }, { runningBalance: 1300 }]
 * // totals: { income: 500, expense: 200, current: 1300 }
 */
export function recalculateLedger(
  openingBalance: number,
  records: readonly TransactionRecord[],
  options: LedgerOptions = {}
): LedgerResult {
  const now = options.now ?? new Date();
  const ordered = sortChronologically(records, options.dateOrder);

  const opening = toMinorUnits(openingBalance) ?? 0n;
  let running = opening;

  const annotated: TransactionRecord[] = [];
  const entries: LedgerEntry[] = [];

  for (const record of ordered) {
    const income = toMinorUnits(record.income);
    const expense = toMinorUnits(record.expense);

    running += (income ?? 0n) - (expense ?? 0n);

    const runningBalance = fromMinorUnits(running);
    const unreadable = income === null || expense === null;
    annotated.push({ ...record, remainingBalance: runningBalance, ...(unreadable && { needsReview: true }) });
    entries.push({ id: record.id, runningBalance });
  }

  // Totals come from a second pass over the input, not the sorted walk
  const totalIncome = sumField(records, 'income');
  const totalExpense = sumField(records, 'expense');
  const current = opening + totalIncome - totalExpense;

  if (current !== running) {
    throw AppError.internal(
      `Ledger invariant violated: running balance ${fromMinorUnits(running)} != ${fromMinorUnits(current)}`
    );
  }

  const totals = {
    income: fromMinorUnits(totalIncome),
    expense: fromMinorUnits(totalExpense),
    current: fromMinorUnits(current),
  };

  return {
    records: annotated,
    entries,
    totals,
    balance: {
      openingBalance: fromMinorUnits(opening),
      currentBalance: totals.current,
      totalIncome: totals.income,
      totalExpense: totals.expense,
      lastUpdated: now.toISOString(),
    },
  };
}

export default recalculateLedger;
