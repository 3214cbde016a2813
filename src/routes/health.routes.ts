import { Router } from 'express';
import { healthController } from '../controllers';

const router = Router();

/**
 * @route   GET /health
 * @desc    Health status with the engine settings in effect
 *          (date order, currency, thresholds, categories, risk rules)
 * @access  Public
 */
router.get('/', healthController.getHealth);

/**
 * @route   GET /health/ready
 * @desc    Readiness: engine configuration validates, category table
 *          has categories besides Other, rule registry is non-empty
 * @access  Public
 */
router.get('/ready', healthController.getReadiness);

/**
 * @route   GET /health/live
 * @desc    Liveness check (not access-logged)
 * @access  Public
 */
router.get('/live', healthController.getLiveness);

export default router;
