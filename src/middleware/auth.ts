import { NextFunction, Request, Response } from 'express';
import { Role } from '../auth/types';

export const requireRole = (allowedRoles: Role[]) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const auth = req.authContext;
    if (!auth) {
      return res.status(401).json({ error: 'Unauthorized' });
    }

    if (!allowedRoles.includes(auth.role)) {
      return res.status(403).json({ error: `Forbidden: requires ${allowedRoles.join(' or ')}` });
    }

    return next();
  };
};
