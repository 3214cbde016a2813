/**
 * Shared helpers for risk rules.
 */

import { extractAmount } from '../amountProximity';
import { parseDate } from '../dateNormalizer';
import { isRecordId } from '../recordIds';
import { round2 } from '../rounding';
import type { DateOrder } from '../config';
import type { RecordId, TransactionLike } from '../types';

export interface DatedRecord<T> {
  record: T;
  date: Date;
}

/**
 * Representative magnitude of a record, 0 when it carries no money.
 */
export function amountOf(record: TransactionLike): number {
  return extractAmount(record) ?? 0;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }

  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Identifiers of the given records, skipping records not yet persisted.
 */
export function idsOf(records: readonly TransactionLike[]): RecordId[] {
  const ids: RecordId[] = [];
  for (const record of records) {
    if (isRecordId(record.id)) {
      ids.push(record.id);
    }
  }
  return ids;
}

/**
 * Records whose date parses, paired with the parsed date. Input order is kept.
 */
export function withDates<T extends TransactionLike>(
  records: readonly T[],
  dateOrder: DateOrder
): DatedRecord<T>[] {
  const dated: DatedRecord<T>[] = [];
  for (const record of records) {
    const parsed = parseDate(record.date, { dateOrder });
    if (parsed.ok) {
      dated.push({ record, date: parsed.date });
    }
  }
  return dated;
}

/**
 * YYYY-MM of a calendar date.
 */
export function monthKey(date: Date): string {
  return date.toISOString().slice(0, 7);
}

export function isWeekend(date: Date): boolean {
  const day = date.getUTCDay();
  return day === 0 || day === 6;
}

/**
 * Two-decimal text for messages, e.g. 1533.3333 → "1533.33".
 */
export function formatMoney(value: number): string {
  return round2(value).toFixed(2);
}
