import type { NextFunction, Request, RequestHandler, Response } from 'express';

/** Forwards a rejected handler promise to the error middleware. */
export const asyncHandler =
  (handler: (req: Request, res: Response, next: NextFunction) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };
