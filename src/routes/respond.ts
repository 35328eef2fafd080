import { Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { StoreError, StoreResult } from '../storage/errors';
import { safeLogger } from '../security/safeLogger';

export function statusFor(error: StoreError): number {
  switch (error.kind) {
    case 'NotFound':
      return 404;
    case 'ConnectionError':
      return 503;
    case 'SerializationError':
      return 500;
    case 'OperationError':
      if (error.reason === 'invalid_input') return 400;
      if (error.reason === 'conflict') return 409;
      if (error.reason === 'retry_exhausted') return 503;
      return 500;
  }
}

export function sendStoreError(res: Response, error: StoreError) {
  const status = statusFor(error);
  if (status >= 500) safeLogger.error('store.request_failed', { kind: error.kind, message: error.message });
  if (error.kind === 'OperationError' && error.reason === 'retry_exhausted') {
    return res.status(status).json({ error: 'The record is busy, please try again', detail: error.message });
  }
  return res.status(status).json({ error: error.message });
}

/** Sends `data` (or `map(data)`) on success, the mapped store error otherwise. */
export function sendResult<T>(res: Response, result: StoreResult<T>, status = 200, map?: (data: T) => unknown) {
  if (!result.success) return sendStoreError(res, result.error);
  return res.status(status).json(map ? map(result.data) : result.data);
}

/** Parses `value` or answers 400 with the zod issues; `undefined` means a response was sent. */
export function parseOr400<S extends z.ZodTypeAny>(res: Response, schema: S, value: unknown): z.output<S> | undefined {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;
  const issues: z.ZodIssue[] = parsed.error.issues;
  res.status(400).json({
    error: issues[0]?.message ?? 'Invalid request',
    issues: issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
  });
  return undefined;
}

/** Runs an async handler; a rejection goes to the error middleware. */
export const handle =
  (handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

/** Like {@link handle}, with the authenticated user's id as the record owner. */
export const owned =
  (handler: (req: Request, res: Response, ownerId: string) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    const auth = req.authContext;
    if (!auth) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    handler(req, res, auth.userId).catch(next);
  };
