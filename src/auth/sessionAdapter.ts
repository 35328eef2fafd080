import { Request } from 'express';
import { Storage } from '../storage/storage';
import { AuthAdapter } from './adapter';
import { AuthContext } from './types';

export const SESSION_COOKIE = 'ms_session';

export class InvalidSessionError extends Error {
  constructor(message = 'Invalid or expired session') {
    super(message);
    this.name = 'InvalidSessionError';
  }
}

function cookieValue(header: string | undefined, name: string): string | undefined {
  if (!header) return undefined;
  for (const part of header.split(';')) {
    const eq = part.indexOf('=');
    if (eq === -1) continue;
    if (part.slice(0, eq).trim() !== name) continue;
    const raw = part.slice(eq + 1).trim();
    try {
      return decodeURIComponent(raw);
    } catch {
      return raw;
    }
  }
  return undefined;
}

/** Bearer header first, then the session cookie. */
export function sessionTokenOf(req: Request): string | undefined {
  const header = req.headers.authorization ?? '';
  if (header.startsWith('Bearer ')) {
    const token = header.slice('Bearer '.length).trim();
    if (token) return token;
  }
  return cookieValue(req.headers.cookie, SESSION_COOKIE) || undefined;
}

export class SessionAuthAdapter implements AuthAdapter {
  constructor(private readonly storage: Storage) {}

  async resolve(req: Request): Promise<AuthContext | undefined> {
    const token = sessionTokenOf(req);
    if (!token) return undefined;

    const result = await this.storage.resolveSession(token);
    if (!result.success) {
      if (result.error.kind === 'NotFound') throw new InvalidSessionError();
      throw new Error(result.error.message);
    }
    const { user, isAdmin, sessionId } = result.data;
    return { userId: user.id, username: user.username, role: isAdmin ? 'admin' : 'user', sessionId, source: 'session' };
  }
}
