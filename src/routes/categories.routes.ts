/**
 * Category API Routes
 *
 * Endpoints:
 * - GET / - List configured categories
 * - POST /suggest - Suggest a category for a vendor (and optional notes)
 */

import { Router } from 'express';
import { asyncHandler, sendSuccess } from '../utils';
import { validateRequest } from '../middlewares';
import { suggestCategoryBody } from '../schemas';
import { listCategories, suggestCategory } from '../services/category.service';
import type { SuggestCategoryBody } from '../schemas';

const router = Router();

/**
 * @route   GET /api/v1/categories
 * @desc    List every category the categorizer can assign
 * @access  Public
 */
router.get(
  '/',
  asyncHandler(async (_req, res): Promise<void> => {
    const categories = listCategories();
    sendSuccess(res, { categories }, `${categories.length} categories available`);
  })
);

/**
 * @route   POST /api/v1/categories/suggest
 * @desc    Suggest a category with reasoning and alternatives
 * @access  Public
 *
 * Body: { vendor: string, notes?: string }
 */
router.post(
  '/suggest',
  validateRequest({ body: suggestCategoryBody }),
  asyncHandler<SuggestCategoryBody>(async (req, res): Promise<void> => {
    const { vendor, notes } = req.body;
    const suggestion = suggestCategory(vendor, notes);

    sendSuccess(res, suggestion, `Suggested category: ${suggestion.category}`);
  })
);

export default router;
