import Redis from 'ioredis';
import { safeLogger } from '../security/safeLogger';
import { StoreFailure, storeErrors } from './errors';
import { KeyValueStore, ScanPage, WatchSession, WriteOp } from './client';

export type RedisStoreOptions = {
  url?: string;
  host: string;
  port: number;
  /** Dedicated connections available to concurrent guarded transactions. */
  txPoolSize: number;
};

const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EPIPE', 'EHOSTUNREACH']);

export function toStoreFailure(err: unknown, context: string): StoreFailure {
  if (err instanceof StoreFailure) return err;
  const message = err instanceof Error ? err.message : String(err);
  const name = err instanceof Error ? err.name : '';
  const code = typeof err === 'object' && err !== null && 'code' in err ? String(err.code) : '';
  if (
    CONNECTION_CODES.has(code) ||
    name === 'MaxRetriesPerRequestError' ||
    /connection is closed|stream isn't writeable/i.test(message)
  ) {
    return new StoreFailure(storeErrors.connection(`${context}: ${message}`));
  }
  return new StoreFailure(storeErrors.operation(`${context}: ${message}`));
}

async function guard<T>(context: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw toStoreFailure(err, context);
  }
}

type Queue = ReturnType<Redis['pipeline']>;

function queueWrites(tx: Queue, writes: WriteOp[]): Queue {
  for (const w of writes) {
    switch (w.op) {
      case 'set':
        if (w.ttlSeconds) tx.set(w.key, w.value, 'EX', w.ttlSeconds);
        else tx.set(w.key, w.value);
        break;
      case 'del':
        tx.del(w.key);
        break;
      case 'sadd':
        tx.sadd(w.key, w.member);
        break;
      case 'srem':
        tx.srem(w.key, w.member);
        break;
    }
  }
  return tx;
}

/** `null` means EXEC was aborted by WATCH. Command-level errors are raised. */
async function execQueue(tx: Queue): Promise<boolean> {
  const results = await tx.exec();
  if (results === null) return false;
  for (const [err] of results) {
    if (err) throw err;
  }
  return true;
}

/**
 * Hands out duplicated connections for WATCH/MULTI/EXEC. At most `max` exist; extra
 * callers wait for one to be released.
 */
class SessionPool {
  #base: Redis;
  #max: number;
  #idle: Redis[] = [];
  #all = new Set<Redis>();
  #waiters: ((conn: Redis) => void)[] = [];

  constructor(base: Redis, max: number) {
    this.#base = base;
    this.#max = Math.max(1, max);
  }

  async acquire(): Promise<Redis> {
    const idle = this.#idle.pop();
    if (idle) return idle;
    if (this.#all.size < this.#max) {
      const conn = this.#base.duplicate();
      this.#all.add(conn);
      return conn;
    }
    return new Promise<Redis>((resolve) => this.#waiters.push(resolve));
  }

  release(conn: Redis): void {
    const waiter = this.#waiters.shift();
    if (waiter) waiter(conn);
    else this.#idle.push(conn);
  }

  /** Drops a connection whose WATCH state could not be cleared. */
  discard(conn: Redis): void {
    this.#all.delete(conn);
    conn.disconnect();
    const waiter = this.#waiters.shift();
    if (waiter) {
      const fresh = this.#base.duplicate();
      this.#all.add(fresh);
      waiter(fresh);
    }
  }

  async drain(): Promise<void> {
    const conns = Array.from(this.#all);
    this.#all.clear();
    this.#idle = [];
    await Promise.all(conns.map((c) => c.quit()));
  }
}

export class RedisStore implements KeyValueStore {
  #redis: Redis;
  #pool: SessionPool;

  constructor(redis: Redis, txPoolSize: number) {
    this.#redis = redis;
    this.#pool = new SessionPool(redis, txPoolSize);
  }

  get(key: string): Promise<string | null> {
    return guard('GET failed', () => this.#redis.get(key));
  }

  mget(keys: string[]): Promise<(string | null)[]> {
    if (!keys.length) return Promise.resolve([]);
    return guard('MGET failed', () => this.#redis.mget(...keys));
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    await guard('SET failed', () =>
      ttlSeconds ? this.#redis.set(key, value, 'EX', ttlSeconds) : this.#redis.set(key, value)
    );
  }

  del(keys: string[]): Promise<number> {
    if (!keys.length) return Promise.resolve(0);
    return guard('DEL failed', () => this.#redis.del(...keys));
  }

  async scan(cursor: string, pattern: string, count: number): Promise<ScanPage> {
    const [next, keys] = await guard('SCAN failed', () => this.#redis.scan(cursor, 'MATCH', pattern, 'COUNT', count));
    return { cursor: next, keys };
  }

  sadd(key: string, member: string): Promise<number> {
    return guard('SADD failed', () => this.#redis.sadd(key, member));
  }

  srem(key: string, member: string): Promise<number> {
    return guard('SREM failed', () => this.#redis.srem(key, member));
  }

  smembers(key: string): Promise<string[]> {
    return guard('SMEMBERS failed', () => this.#redis.smembers(key));
  }

  async sismember(key: string, member: string): Promise<boolean> {
    const found = await guard('SISMEMBER failed', () => this.#redis.sismember(key, member));
    return found === 1;
  }

  async batch(writes: WriteOp[]): Promise<void> {
    if (!writes.length) return;
    const applied = await guard('MULTI/EXEC failed', () => execQueue(queueWrites(this.#redis.multi(), writes)));
    if (!applied) throw new StoreFailure(storeErrors.operation('Unwatched transaction was discarded'));
  }

  async withSession<T>(fn: (session: WatchSession) => Promise<T>): Promise<T> {
    const conn = await this.#pool.acquire();
    const session: WatchSession = {
      watch: async (keys) => {
        await guard('WATCH failed', () => conn.watch(...keys));
      },
      unwatch: async () => {
        await guard('UNWATCH failed', () => conn.unwatch());
      },
      get: (key) => guard('GET failed', () => conn.get(key)),
      commit: (writes) => guard('EXEC failed', () => execQueue(queueWrites(conn.multi(), writes))),
    };

    try {
      return await fn(session);
    } finally {
      try {
        await conn.unwatch();
        this.#pool.release(conn);
      } catch (err) {
        safeLogger.warn('store.session.unwatch_failed', { error: err });
        this.#pool.discard(conn);
      }
    }
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.#redis.ping()) === 'PONG';
    } catch (err) {
      safeLogger.warn('store.ping_failed', { error: err });
      return false;
    }
  }

  async close(): Promise<void> {
    await this.#pool.drain();
    await this.#redis.quit();
  }
}

export function createRedisStore(options: RedisStoreOptions): RedisStore {
  const redisOptions = { maxRetriesPerRequest: 3, enableOfflineQueue: true };
  const redis = options.url
    ? new Redis(options.url, redisOptions)
    : new Redis({ host: options.host, port: options.port, ...redisOptions });

  redis.on('ready', () => safeLogger.info('store.connected', { host: options.url ?? `${options.host}:${options.port}` }));
  redis.on('error', (err: Error) => safeLogger.error('store.connection_error', { error: err }));

  return new RedisStore(redis, options.txPoolSize);
}
