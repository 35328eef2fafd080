import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: intFromEnv(4000),
  APP_ENV: z.string().min(1).regex(/^[a-z0-9_-]+$/i, 'APP_ENV may not contain ":"').default('dev'),
  KEY_NAMESPACE: z.string().min(1).regex(/^[a-z0-9_-]+$/i).default('medicate'),
  STORE_DRIVER: z.enum(['redis', 'memory']).default('redis'),
  REDIS_URL: z.string().optional(),
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: intFromEnv(6379),
  REDIS_TX_POOL_SIZE: intFromEnv(4),
  TX_MAX_ATTEMPTS: intFromEnv(10),
  SCAN_PAGE_SIZE: intFromEnv(100),
  SESSION_TTL_SECONDS: intFromEnv(30 * 24 * 3600),
  RESET_TOKEN_TTL_SECONDS: intFromEnv(3600),
  VERIFICATION_TOKEN_TTL_SECONDS: intFromEnv(24 * 3600),
  APP_URL: z.string().default('http://localhost:5173'),
  MAIL_FROM: z.string().default('no-reply@medicate.local'),
  SMTP_HOST: z.string().optional(),
  SMTP_PORT: intFromEnv(587),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  CORS_ORIGINS: z.string().default('http://localhost:3000,http://localhost:5173'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type AppConfig = {
  port: number;
  environment: string;
  namespace: string;
  store: {
    driver: 'redis' | 'memory';
    url?: string;
    host: string;
    port: number;
    txPoolSize: number;
    maxAttempts: number;
    scanPageSize: number;
  };
  tokens: {
    sessionTtlSeconds: number;
    resetTtlSeconds: number;
    verificationTtlSeconds: number;
  };
  mail: {
    appUrl: string;
    from: string;
    smtp?: { host: string; port: number; user?: string; pass?: string };
  };
  corsOrigins: string[];
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    environment: e.APP_ENV,
    namespace: e.KEY_NAMESPACE,
    store: {
      driver: e.STORE_DRIVER,
      url: e.REDIS_URL || undefined,
      host: e.REDIS_HOST,
      port: e.REDIS_PORT,
      txPoolSize: e.REDIS_TX_POOL_SIZE,
      maxAttempts: e.TX_MAX_ATTEMPTS,
      scanPageSize: e.SCAN_PAGE_SIZE,
    },
    tokens: {
      sessionTtlSeconds: e.SESSION_TTL_SECONDS,
      resetTtlSeconds: e.RESET_TOKEN_TTL_SECONDS,
      verificationTtlSeconds: e.VERIFICATION_TOKEN_TTL_SECONDS,
    },
    mail: {
      appUrl: e.APP_URL.replace(/\/+$/, ''),
      from: e.MAIL_FROM,
      smtp: e.SMTP_HOST ? { host: e.SMTP_HOST, port: e.SMTP_PORT, user: e.SMTP_USER, pass: e.SMTP_PASS } : undefined,
    },
    corsOrigins: e.CORS_ORIGINS.split(',')
      .map((o) => o.trim())
      .filter(Boolean),
    logLevel: e.LOG_LEVEL,
  };
}
