export { default as logger, Logging } from './logger';
export { sendSuccess, sendError } from './response';
export { asyncHandler } from './asyncHandler';
export type { ValidatedRequest } from './asyncHandler';
export { AppError } from './AppError';
