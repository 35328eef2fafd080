import { createApp } from './app';
import { loadConfig } from './config';
import { createMailer } from './mailer';
import { setLogLevel, safeLogger } from './security/safeLogger';
import { createStorage } from './storage';

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const storage = createStorage(config);
  const app = createApp({
    storage,
    mailer: createMailer(config.mail),
    corsOrigins: config.corsOrigins,
    appUrl: config.mail.appUrl,
    sessionTtlSeconds: config.tokens.sessionTtlSeconds,
  });

  const server = app.listen(config.port, () => {
    safeLogger.info('server.listening', { port: config.port, environment: config.environment, store: config.store.driver });
  });

  const shutdown = (signal: string) => {
    safeLogger.info('server.shutting_down', { signal });
    server.close(() => {
      storage
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          safeLogger.error('server.store_close_failed', { error: err });
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  safeLogger.error('server.start_failed', { error: err });
  process.exit(1);
});
