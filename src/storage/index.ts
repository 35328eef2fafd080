import { AppConfig } from '../config';
import { KeyValueStore } from './client';
import { createStorageContext } from './context';
import { MemoryStore } from './memoryStore';
import { createRedisStore } from './redisStore';
import { Storage } from './storage';

export function createStore(config: AppConfig): KeyValueStore {
  if (config.store.driver === 'memory') return new MemoryStore();
  return createRedisStore({
    url: config.store.url,
    host: config.store.host,
    port: config.store.port,
    txPoolSize: config.store.txPoolSize,
  });
}

export function createStorage(config: AppConfig, store: KeyValueStore = createStore(config)): Storage {
  return new Storage(
    createStorageContext({
      store,
      namespace: config.namespace,
      environment: config.environment,
      scanPageSize: config.store.scanPageSize,
      maxAttempts: config.store.maxAttempts,
      tokens: config.tokens,
    })
  );
}

export { Storage } from './storage';
export type { StoreError, StoreResult } from './errors';
