import { Response } from 'express';
import { SESSION_COOKIE } from '../../auth/sessionAdapter';

export function setSessionCookie(res: Response, token: string, ttlSeconds: number) {
  res.cookie(SESSION_COOKIE, token, {
    httpOnly: true,
    sameSite: 'lax',
    secure: process.env.NODE_ENV === 'production',
    maxAge: ttlSeconds * 1000,
    path: '/',
  });
}

export function clearSessionCookie(res: Response) {
  res.clearCookie(SESSION_COOKIE, { path: '/' });
}
