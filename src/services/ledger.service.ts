/**
 * Ledger Service
 *
 * Full running-balance recomputation for a record snapshot.
 */

import { engineConfig } from '../config';
import { recalculateLedger } from '../reconciliation';
import { Logging } from '../utils';
import type { LedgerResult, TransactionRecord } from '../reconciliation';

export function recalculate(
  openingBalance: number,
  records: readonly TransactionRecord[],
  now: Date = new Date()
): LedgerResult {
  const result = recalculateLedger(openingBalance, records, { now, dateOrder: engineConfig.dateOrder });

  Logging.info(
    `Ledger recalculated: ${records.length} records, opening ${result.balance.openingBalance}, ` +
      `current ${result.balance.currentBalance}`
  );

  return result;
}

export const ledgerService = {
  recalculate,
};

export default ledgerService;
