import type { RecordId } from './types';

/**
 * Total order over record identifiers.
 *
 * Numbers sort numerically and before strings; strings sort by code point.
 * A missing id sorts last.
 */
export function compareRecordIds(a: RecordId | null | undefined, b: RecordId | null | undefined): number {
  if (!isRecordId(a) || !isRecordId(b)) {
    return Number(!isRecordId(a)) - Number(!isRecordId(b));
  }

  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }

  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;

  return a < b ? -1 : a > b ? 1 : 0;
}

export function isRecordId(value: RecordId | null | undefined): value is RecordId {
  return value !== null && value !== undefined;
}
