import { Request, Response, NextFunction } from 'express';
import { AuthAdapter } from './adapter';
import { InvalidSessionError } from './sessionAdapter';
import { safeLogger } from '../security/safeLogger';

export function resolveAuthContext(adapter: AuthAdapter) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      req.authContext = await adapter.resolve(req);
      return next();
    } catch (err) {
      if (err instanceof InvalidSessionError) {
        return res.status(401).json({ error: 'Unauthorized' });
      }
      safeLogger.error('auth.resolve_failed', { error: err });
      return res.status(503).json({ error: 'Authentication is temporarily unavailable' });
    }
  };
}

export function requireAuthContext(req: Request, res: Response, next: NextFunction) {
  if (!req.authContext) {
    return res.status(401).json({ error: 'Unauthorized' });
  }
  return next();
}

export type { AuthContext, Role } from './types';
