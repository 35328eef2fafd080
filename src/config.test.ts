import { loadConfig } from './config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});
    expect(config).toMatchObject({
      port: 4000,
      environment: 'dev',
      namespace: 'medicate',
      store: { driver: 'redis', host: 'localhost', port: 6379, txPoolSize: 4, maxAttempts: 10, scanPageSize: 100 },
      tokens: { sessionTtlSeconds: 2592000, resetTtlSeconds: 3600, verificationTtlSeconds: 86400 },
      logLevel: 'info',
    });
    expect(config.mail.smtp).toBeUndefined();
    expect(config.corsOrigins).toEqual(['http://localhost:3000', 'http://localhost:5173']);
  });

  it('keeps an unset APP_ENV out of the test namespace', () => {
    expect(loadConfig({}).environment).toBe('dev');
    expect(loadConfig({ APP_ENV: 'test' }).environment).toBe('test');
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      APP_ENV: 'prod',
      STORE_DRIVER: 'memory',
      TX_MAX_ATTEMPTS: '5',
      SMTP_HOST: 'smtp.example.test',
      SMTP_PORT: '465',
      APP_URL: 'https://app.example.test/',
      CORS_ORIGINS: ' https://a.example.test , ',
    });
    expect(config.environment).toBe('prod');
    expect(config.store.driver).toBe('memory');
    expect(config.store.maxAttempts).toBe(5);
    expect(config.mail).toEqual({
      appUrl: 'https://app.example.test',
      from: 'no-reply@medicate.local',
      smtp: { host: 'smtp.example.test', port: 465, user: undefined, pass: undefined },
    });
    expect(config.corsOrigins).toEqual(['https://a.example.test']);
  });

  it('fails fast on invalid values', () => {
    expect(() => loadConfig({ STORE_DRIVER: 'postgres' })).toThrow(/^Invalid configuration: STORE_DRIVER/);
    expect(() => loadConfig({ APP_ENV: 'a:b' })).toThrow('APP_ENV may not contain ":"');
  });
});
