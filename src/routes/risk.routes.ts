/**
 * Risk API Routes
 *
 * Endpoints:
 * - POST /analyze - Run every risk rule over a record snapshot
 */

import { Router } from 'express';
import { asyncHandler, sendSuccess } from '../utils';
import { validateRequest } from '../middlewares';
import { recordsBody } from '../schemas';
import { analyzeRisks } from '../services/risk.service';
import type { RecordsBody } from '../schemas';

const router = Router();

/**
 * @route   POST /api/v1/risk/analyze
 * @desc    Risk alerts for the full snapshot (computed fresh, never stored)
 * @access  Public
 *
 * Response:
 * - 200 OK: { alerts: RiskAlert[], noAlerts: boolean }
 */
router.post(
  '/analyze',
  validateRequest({ body: recordsBody }),
  asyncHandler<RecordsBody>(async (req, res): Promise<void> => {
    const result = analyzeRisks(req.body.records);

    sendSuccess(
      res,
      result,
      result.noAlerts ? 'No risks found' : `${result.alerts.length} risk alert(s) raised`
    );
  })
);

export default router;
