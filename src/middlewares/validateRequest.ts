import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodSchema } from 'zod';
import { AppError } from '../utils';

interface ValidationSchemas {
  body?: ZodSchema;
  query?: ZodSchema;
  params?: ZodSchema;
}

/**
 * Formats zod issues as `[{ field, message }]`, e.g.
 * [{"field":"records.0.expense","message":"Number must be greater than or equal to 0"}]
 */
export const formatZodError = (error: ZodError): string => {
  const errorMessages = error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
  }));

  return JSON.stringify(errorMessages);
};

/**
 * Middleware to validate request body, query, and params using Zod schemas.
 * Parsed values (with defaults applied) replace the raw ones.
 */
export const validateRequest = (schemas: ValidationSchemas) => {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      if (schemas.body) {
        req.body = await schemas.body.parseAsync(req.body);
      }
      if (schemas.query) {
        req.query = await schemas.query.parseAsync(req.query);
      }
      if (schemas.params) {
        req.params = await schemas.params.parseAsync(req.params);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        next(AppError.badRequest(`Validation failed: ${formatZodError(error)}`));
      } else {
        next(error);
      }
    }
  };
};

export default validateRequest;
