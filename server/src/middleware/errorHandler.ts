import type { ErrorRequestHandler, RequestHandler } from 'express';
import { AppError, NotFoundError, RateLimitedError } from '../errors/AppError';
import { createLogger } from '../utils/logger';

const logger = createLogger({ component: 'HTTP' });

// body-parser marks malformed JSON with a 400 status and type "entity.parse.failed"
const isBodyParseError = (err: unknown): boolean =>
  err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';

export const notFound: RequestHandler = (req, _res, next) => {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
};

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (isBodyParseError(err)) {
    logger.warn(`${req.method} ${req.path} -> 400 malformed JSON body`);
    res.status(400).json({ error: 'Request body is not valid JSON', code: 'InvalidInput' });
    return;
  }

  if (err instanceof AppError) {
    const log = err.status >= 500 ? logger.error : logger.warn;
    log(`${req.method} ${req.path} -> ${err.status} ${err.code}: ${err.message}`);
    if (err instanceof RateLimitedError) {
      res.setHeader('Retry-After', String(err.retryAfterSeconds));
    }
    res.status(err.status).json({ error: err.message, code: err.code });
    return;
  }

  logger.error(`${req.method} ${req.path} -> 500 unexpected error`, err);
  res.status(500).json({ error: 'Internal server error', code: 'InternalError' });
};
