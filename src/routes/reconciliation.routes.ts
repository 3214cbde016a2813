/**
 * Reconciliation API Routes
 *
 * Stateless endpoints over the reconciliation engine. Each request
 * carries the records it works on; nothing is stored.
 *
 * Endpoints:
 * - POST /candidates - Normalize, analyze and duplicate-check a new candidate
 * - POST /confidence - Confidence analysis of one record
 * - POST /duplicates - Find duplicates of a candidate among records
 * - POST /duplicates/batch - Duplicate check of every record against the others
 * - POST /summary - Dashboard statistics for a record set
 */

import { Router } from 'express';
import { asyncHandler, sendSuccess } from '../utils';
import { validateRequest } from '../middlewares';
import {
  analyzeConfidenceBody,
  batchCheckBody,
  findDuplicatesBody,
  reconcileCandidateBody,
  recordsBody,
} from '../schemas';
import {
  checkBatchDuplicates,
  checkConfidence,
  reconcileCandidate,
  searchDuplicates,
  summarize,
} from '../services/reconciliation.service';
import type {
  AnalyzeConfidenceBody,
  BatchCheckBody,
  FindDuplicatesBody,
  ReconcileCandidateBody,
  RecordsBody,
} from '../schemas';

const router = Router();

/**
 * @route   POST /api/v1/reconciliation/candidates
 * @desc    Full ingestion check for a freshly extracted candidate
 * @access  Public
 *
 * Body: { candidate: RawCandidate, existing?: TransactionRecord[] }
 *
 * Response:
 * - 200 OK: { record, analysis, confidenceLevel, duplicates, duplicateSummary }
 * - 400 Bad Request: Validation failed
 */
router.post(
  '/candidates',
  validateRequest({ body: reconcileCandidateBody }),
  asyncHandler<ReconcileCandidateBody>(async (req, res): Promise<void> => {
    const { candidate, existing } = req.body;
    const result = reconcileCandidate(candidate, existing);

    const message = result.record.isDuplicate
      ? `Candidate is a possible duplicate of #${String(result.record.duplicateOf)}`
      : result.record.needsReview
        ? 'Candidate needs review'
        : 'Candidate looks clean';

    sendSuccess(res, result, message);
  })
);

/**
 * @route   POST /api/v1/reconciliation/confidence
 * @desc    Flags, warnings and review verdict for one record
 * @access  Public
 */
router.post(
  '/confidence',
  validateRequest({ body: analyzeConfidenceBody }),
  asyncHandler<AnalyzeConfidenceBody>(async (req, res): Promise<void> => {
    sendSuccess(res, checkConfidence(req.body.record), 'Confidence analyzed');
  })
);

/**
 * @route   POST /api/v1/reconciliation/duplicates
 * @desc    Ranked duplicates of a candidate (score ≥ threshold, default 70)
 * @access  Public
 */
router.post(
  '/duplicates',
  validateRequest({ body: findDuplicatesBody }),
  asyncHandler<FindDuplicatesBody>(async (req, res): Promise<void> => {
    const { candidate, existing, threshold } = req.body;
    const matches = searchDuplicates(candidate, existing, threshold);

    sendSuccess(res, { matches }, `Found ${matches.length} possible duplicate(s)`);
  })
);

/**
 * @route   POST /api/v1/reconciliation/duplicates/batch
 * @desc    Duplicate check of every identified record against all others
 * @access  Public
 */
router.post(
  '/duplicates/batch',
  validateRequest({ body: batchCheckBody }),
  asyncHandler<BatchCheckBody>(async (req, res): Promise<void> => {
    const { records, threshold } = req.body;
    const results = checkBatchDuplicates(records, threshold);

    sendSuccess(res, { results }, `${results.length} record(s) with possible duplicates`);
  })
);

/**
 * @route   POST /api/v1/reconciliation/summary
 * @desc    Totals, review counts, category and confidence distribution
 * @access  Public
 */
router.post(
  '/summary',
  validateRequest({ body: recordsBody }),
  asyncHandler<RecordsBody>(async (req, res): Promise<void> => {
    sendSuccess(res, summarize(req.body.records), 'Summary calculated');
  })
);

export default router;
