/**
 * Ledger API Routes
 *
 * Endpoints:
 * - POST /recalculate - Recompute running balances and totals
 */

import { Router } from 'express';
import { asyncHandler, sendSuccess } from '../utils';
import { validateRequest } from '../middlewares';
import { recalculateLedgerBody } from '../schemas';
import { recalculate } from '../services/ledger.service';
import type { RecalculateLedgerBody } from '../schemas';

const router = Router();

/**
 * @route   POST /api/v1/ledger/recalculate
 * @desc    Full recompute of every running balance, in (date, id) order
 * @access  Public
 *
 * Body: { openingBalance?: number (default 0), records: TransactionRecord[] }
 *
 * Response:
 * - 200 OK: { records, entries, totals, balance }
 */
router.post(
  '/recalculate',
  validateRequest({ body: recalculateLedgerBody }),
  asyncHandler<RecalculateLedgerBody>(async (req, res): Promise<void> => {
    const { openingBalance, records } = req.body;
    const result = recalculate(openingBalance, records);

    sendSuccess(res, result, `Recalculated ${result.entries.length} entries`);
  })
);

export default router;
