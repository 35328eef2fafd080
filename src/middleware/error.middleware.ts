import { NextFunction, Request, Response } from 'express';
import { isStoreFailure } from '../storage/errors';
import { sendStoreError } from '../routes/respond';
import { safeLogger } from '../security/safeLogger';

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') return err.status;
  return 500;
}

/** Last handler: anything thrown past a route ends up here as JSON. */
export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) return next(err);
  if (isStoreFailure(err)) return sendStoreError(res, err.error);

  const status = statusOf(err);
  // body-parser rejects malformed JSON with a 4xx
  if (status < 500) {
    return res.status(status).json({ error: err instanceof Error ? err.message : 'Bad request' });
  }
  safeLogger.error('http.unhandled_error', { method: req.method, path: req.path, error: err });
  return res.status(500).json({ error: 'Internal Server Error' });
}
