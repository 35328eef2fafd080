import { NextFunction, Request, Response } from 'express';

const REDACT_KEYS = ['password', 'newPassword', 'passwordHash', 'token', 'refreshToken', 'authorization', 'cookie'];

type Level = 'debug' | 'info' | 'warn' | 'error';
export type LogLevel = Level | 'silent';

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const isLogLevel = (value: string | undefined): value is LogLevel => value !== undefined && value in ORDER;

const fromEnv = process.env.LOG_LEVEL;
let threshold: LogLevel = isLogLevel(fromEnv) ? fromEnv : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (value && typeof value === 'object') {
    const copy: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      copy[k] = REDACT_KEYS.includes(k) ? '[REDACTED]' : redact(v);
    }
    return copy;
  }
  return value;
}

function emit(level: Level, event: string, meta: Record<string, unknown>) {
  if (ORDER[level] < ORDER[threshold]) return;
  const payload = redact(meta);
  // eslint-disable-next-line no-console
  console[level](event, payload);
}

export const safeLogger = {
  debug(event: string, meta: Record<string, unknown> = {}) {
    emit('debug', event, meta);
  },
  info(event: string, meta: Record<string, unknown> = {}) {
    emit('info', event, meta);
  },
  warn(event: string, meta: Record<string, unknown> = {}) {
    emit('warn', event, meta);
  },
  error(event: string, meta: Record<string, unknown> = {}) {
    emit('error', event, meta);
  },
};

declare global {
  namespace Express {
    interface Request {
      bodyForLogs?: string;
    }
  }
}

/** Credentials never reach request logging: the body is hidden from enumeration. */
export const preventBodyLogging = (req: Request, _res: Response, next: NextFunction) => {
  Object.defineProperty(req, 'body', {
    configurable: true,
    enumerable: false,
    writable: false,
    value: req.body,
  });
  req.bodyForLogs = '[REDACTED]';
  next();
};
