/**
 * Narrow contract the storage layer needs from a key-value store. The ioredis driver
 * (`redisStore.ts`) implements it against a real server; `memoryStore.ts` implements it
 * in process for local runs and tests.
 */

export type WriteOp =
  | { op: 'set'; key: string; value: string; ttlSeconds?: number }
  | { op: 'del'; key: string }
  | { op: 'sadd'; key: string; member: string }
  | { op: 'srem'; key: string; member: string };

export type ScanPage = { cursor: string; keys: string[] };

export interface KeyValueCommands {
  get(key: string): Promise<string | null>;
  mget(keys: string[]): Promise<(string | null)[]>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  /** Number of keys that existed and were removed. */
  del(keys: string[]): Promise<number>;
  /** One SCAN step. A returned cursor of "0" means iteration is complete. */
  scan(cursor: string, pattern: string, count: number): Promise<ScanPage>;
  sadd(key: string, member: string): Promise<number>;
  srem(key: string, member: string): Promise<number>;
  smembers(key: string): Promise<string[]>;
  sismember(key: string, member: string): Promise<boolean>;
}

/**
 * A connection reserved for one guarded transaction. WATCH state belongs to the
 * connection, so it must not be shared with concurrent callers.
 */
export interface WatchSession {
  watch(keys: string[]): Promise<void>;
  unwatch(): Promise<void>;
  get(key: string): Promise<string | null>;
  /**
   * MULTI, queue `writes`, EXEC. Resolves `false` when the server discarded the
   * transaction because a watched key changed.
   */
  commit(writes: WriteOp[]): Promise<boolean>;
}

export interface KeyValueStore extends KeyValueCommands {
  /** Borrow a dedicated connection for the duration of `fn`. */
  withSession<T>(fn: (session: WatchSession) => Promise<T>): Promise<T>;
  /** Apply writes atomically without watching anything. */
  batch(writes: WriteOp[]): Promise<void>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}
