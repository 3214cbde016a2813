/**
 * Date Proximity Scoring
 *
 * The same purchase extracted twice (photo of the receipt, then the bank
 * statement line) usually lands on the same day, sometimes a day or two
 * later once the charge posts.
 *
 * Scoring logic:
 * - Same day: 100
 * - 1 day apart: 85
 * - 2 days apart: 70
 * - 3 days apart: 50
 * - Further: 100 - 15 per day, floored at 0 (0 from a week on)
 */

import { DATE_DECAY_PER_DAY, DATE_GAP_SCORES } from './constants';
import { dayDifference, parseDate } from './dateNormalizer';
import type { DateOrder } from './config';

/**
 * Number of days between two calendar dates (absolute).
 */
export function daysBetween(date1: Date, date2: Date): number {
  return Math.abs(dayDifference(date1, date2));
}

/**
 * Maps a day gap to a 0-100 score.
 *
 * @example
 * scoreDayGap(0) // 100
 * scoreDayGap(2) // 70
 * scoreDayGap(5) // 25
 */
export function scoreDayGap(gap: number): number {
  const tiered = DATE_GAP_SCORES[gap];
  if (tiered !== undefined) {
    return tiered;
  }

  return Math.max(0, 100 - DATE_DECAY_PER_DAY * gap);
}

/**
 * Scores how close two date strings are.
 *
 * @returns 0 if either date cannot be parsed
 *
 * @example
 * calculateDateScore('2024-01-10', '10/01/2024') // 100
 * calculateDateScore('2024-01-10', '2024-01-13') // 50
 * calculateDateScore('2024-01-10', 'n/a')        // 0
 */
export function calculateDateScore(
  a: string | null | undefined,
  b: string | null | undefined,
  dateOrder: DateOrder = 'DMY'
): number {
  const first = parseDate(a, { dateOrder });
  const second = parseDate(b, { dateOrder });

  if (!first.ok || !second.ok) {
    return 0;
  }

  return scoreDayGap(daysBetween(first.date, second.date));
}

export default calculateDateScore;
