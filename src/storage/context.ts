import { KeyValueStore } from './client';
import { RecordCodec } from './codec';
import { StoreFailure, storeErrors } from './errors';
import { KeySchema } from './keys';
import { ScanIndexReader } from './scan';
import { DEFAULT_MAX_ATTEMPTS } from './transaction';
import { newId } from '../security/crypto';

export type TokenTtls = {
  sessionTtlSeconds: number;
  resetTtlSeconds: number;
  verificationTtlSeconds: number;
};

/** Everything a service needs to reach the store. Shared by every module service. */
export type StorageContext = {
  store: KeyValueStore;
  keys: KeySchema;
  scanner: ScanIndexReader;
  maxAttempts: number;
  tokens: TokenTtls;
  now: () => Date;
  newId: () => string;
};

export type StorageContextOptions = {
  store: KeyValueStore;
  namespace?: string;
  environment: string;
  scanPageSize?: number;
  maxAttempts?: number;
  tokens?: Partial<TokenTtls>;
  now?: () => Date;
  newId?: () => string;
};

export function createStorageContext(options: StorageContextOptions): StorageContext {
  return {
    store: options.store,
    keys: new KeySchema(options.namespace ?? 'medicate', options.environment),
    scanner: new ScanIndexReader(options.store, options.scanPageSize ?? 100),
    maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    tokens: {
      sessionTtlSeconds: options.tokens?.sessionTtlSeconds ?? 30 * 24 * 3600,
      resetTtlSeconds: options.tokens?.resetTtlSeconds ?? 3600,
      verificationTtlSeconds: options.tokens?.verificationTtlSeconds ?? 24 * 3600,
    },
    now: options.now ?? (() => new Date()),
    newId: options.newId ?? newId,
  };
}

/** Decodes a fetched value; absent → NotFound, corrupt → SerializationError. */
export function requireRecord<T>(raw: string | null, codec: RecordCodec<T>, notFoundMessage: string): T {
  if (raw === null) throw new StoreFailure(storeErrors.notFound(notFoundMessage));
  return codec.decode(raw);
}

export async function loadRecord<T>(
  ctx: StorageContext,
  key: string,
  codec: RecordCodec<T>,
  notFoundMessage: string
): Promise<T> {
  return requireRecord(await ctx.store.get(key), codec, notFoundMessage);
}
