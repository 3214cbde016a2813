import { Response } from 'express';
import { ApiResponse } from '../types';

/**
 * Send a success response in the `{ success, data, message, timestamp }` envelope
 */
export const sendSuccess = <T>(
  res: Response,
  data: T,
  message?: string,
  statusCode = 200
): Response => {
  const response: ApiResponse<T> = {
    success: true,
    data,
    message,
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};

/**
 * Send an error response. `details` carries structured context, such as
 * the failing readiness checks.
 */
export const sendError = (
  res: Response,
  error: string,
  statusCode = 500,
  details?: unknown
): Response => {
  const response: ApiResponse = {
    success: false,
    error,
    ...(details !== undefined && { details }),
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};
