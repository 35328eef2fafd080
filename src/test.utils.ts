import { createApp } from './app';
import { NoopMailer } from './mailer';
import { StorageContext, createStorageContext } from './storage/context';
import { MemoryStore, MemoryStoreOptions } from './storage/memoryStore';
import { Storage } from './storage/storage';

export type TestHarness = {
  store: MemoryStore;
  ctx: StorageContext;
  storage: Storage;
  /** Moves the injected clock. */
  setNow: (date: Date) => void;
};

export function createTestStorage(
  options: { now?: Date; maxAttempts?: number; scanPageSize?: number; store?: MemoryStoreOptions } = {}
): TestHarness {
  let now = options.now ?? new Date(2024, 2, 13, 9, 30, 0);
  const store = new MemoryStore(options.store);
  const ctx = createStorageContext({
    store,
    environment: 'test',
    maxAttempts: options.maxAttempts,
    scanPageSize: options.scanPageSize ?? 3,
    now: () => now,
  });
  return {
    store,
    ctx,
    storage: new Storage(ctx),
    setNow: (date) => {
      now = date;
    },
  };
}

export function createTestApp(harness: TestHarness = createTestStorage()) {
  const mailer = new NoopMailer();
  const app = createApp({
    storage: harness.storage,
    mailer,
    corsOrigins: ['http://localhost:5173'],
    appUrl: 'http://localhost:5173',
    sessionTtlSeconds: 3600,
  });
  return { ...harness, app, mailer };
}

/** Pulls the token query parameter out of the last mail sent to `to`. */
export function tokenFromMail(mailer: NoopMailer, to: string): string {
  const mail = [...mailer.outbox].reverse().find((m) => m.to === to);
  const match = mail?.text.match(/token=([^\s&]+)/);
  if (!match) throw new Error(`No token mailed to ${to}`);
  return decodeURIComponent(match[1]);
}
