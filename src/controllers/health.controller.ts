import { Request, Response } from 'express';
import { healthService } from '../services';
import { sendSuccess, sendError } from '../utils';

/**
 * Health check controller
 *
 * Health checks stay synchronous: the engine holds no connections to wait on.
 */
export class HealthController {
  /**
   * GET /health
   * Status plus the thresholds, categories and rules in effect
   */
  getHealth = (_req: Request, res: Response): void => {
    sendSuccess(res, healthService.getHealthStatus(), 'Service is healthy');
  };

  /**
   * GET /health/ready
   * 503 with the failing checks as details when any check fails
   */
  getReadiness = (_req: Request, res: Response): void => {
    const { ready, checks } = healthService.checkReadiness();

    if (!ready) {
      sendError(res, 'Service is not ready', 503, checks);
      return;
    }

    sendSuccess(res, { ready, checks }, 'Service is ready');
  };

  /**
   * GET /health/live
   */
  getLiveness = (_req: Request, res: Response): void => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  };
}

export const healthController = new HealthController();

export default healthController;
