import { Request, Response, NextFunction } from 'express';
import { AppError, logger } from '../utils';
import { env } from '../config';

interface BodyParserError extends Error {
  type: string;
  status: number;
}

const isBodyParserError = (err: Error): err is BodyParserError =>
  'type' in err && typeof err.type === 'string' && 'status' in err && typeof err.status === 'number';

/**
 * Maps errors raised by express.json() to operational AppErrors
 */
const fromBodyParser = (err: BodyParserError): AppError | null => {
  switch (err.type) {
    case 'entity.parse.failed':
      return AppError.badRequest('Malformed JSON body');
    case 'entity.too.large':
      return AppError.payloadTooLarge('Request body exceeds the size limit');
    default:
      return null;
  }
};

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: Error | AppError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const error = err instanceof AppError ? err : isBodyParserError(err) ? fromBodyParser(err) : null;

  // Default error values
  const statusCode = error?.statusCode ?? 500;
  const message = error?.message ?? 'Internal Server Error';
  const isOperational = error?.isOperational ?? false;

  // Log error
  if (!isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error: ${message}`);
  }

  // Send response
  res.status(statusCode).json({
    success: false,
    error: message,
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
