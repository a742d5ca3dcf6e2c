import type { Request, Response, NextFunction, RequestHandler } from 'express';
import morgan from 'morgan';
import { createLogger } from '@shared/logger';

const log = createLogger('ERROR');

export const requestLogger = morgan('dev');

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  log.error(err.message);
  res.status(500).json({ success: false, error: err.message });
}

/** Forwards rejections of async handlers to the error middleware. */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}
