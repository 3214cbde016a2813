import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Request whose body already went through validateRequest
 */
export type ValidatedRequest<TBody> = Request<Record<string, string>, unknown, TBody>;

type RouteHandler<TBody> = (
  req: ValidatedRequest<TBody>,
  res: Response,
  next: NextFunction
) => Promise<unknown> | unknown;

/**
 * Wraps a route handler so that thrown errors and rejections both reach
 * the error handler. The type parameter names the body shape the
 * preceding validateRequest guarantees.
 *
 * @example
 * router.post('/recalculate', validateRequest({ body: recalculateLedgerBody }),
 *   asyncHandler<RecalculateLedgerBody>(async (req, res) => { ... }))
 */
export const asyncHandler = <TBody = unknown>(fn: RouteHandler<TBody>): RequestHandler => {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => fn(req, res, next))
      .catch(next);
  };
};

export default asyncHandler;
