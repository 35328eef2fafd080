import cors from 'cors';
import express from 'express';
import morgan from 'morgan';
import helmet from 'helmet';
import { apiRoutes } from './routes';
import { resolveAuthContext } from './auth';
import { SessionAuthAdapter } from './auth/sessionAdapter';
import { Mailer } from './mailer';
import { errorHandler } from './middleware/error.middleware';
import { Storage } from './storage/storage';

export type AppDeps = {
  storage: Storage;
  mailer: Mailer;
  corsOrigins: string[];
  appUrl: string;
  sessionTtlSeconds: number;
};

export function createApp(deps: AppDeps) {
  const app = express();

  app.use(
    cors({
      origin: deps.corsOrigins,
      credentials: true,
    })
  );
  app.use(helmet());
  app.use(express.json({ limit: '100kb' }));
  if (process.env.NODE_ENV !== 'test') app.use(morgan('dev'));

  app.get('/health', async (_req, res) => {
    const storeUp = await deps.storage.ping();
    res.status(storeUp ? 200 : 503).json({
      status: storeUp ? 'ok' : 'degraded',
      service: 'medicate-server',
      store: storeUp ? 'up' : 'down',
      timestamp: new Date().toISOString(),
    });
  });

  // Auth context for API routes (health is public)
  app.use(resolveAuthContext(new SessionAuthAdapter(deps.storage)));

  app.use('/api', apiRoutes(deps.storage, deps.mailer, { appUrl: deps.appUrl, sessionTtlSeconds: deps.sessionTtlSeconds }));

  app.use((req, res) => {
    res.status(404).json({ error: `Not found: ${req.path}` });
  });
  app.use(errorHandler);

  return app;
}
