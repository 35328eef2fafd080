import { StoreFailure, storeErrors } from './errors';
import { KeyValueStore, ScanPage, WatchSession, WriteOp } from './client';

type Entry = { kind: 'string'; value: string; expiresAt?: number } | { kind: 'set'; members: Set<string> };

export type MemoryStoreOptions = {
  now?: () => number;
  /**
   * Runs right before a guarded commit is checked against its watched keys. Tests
   * use it to write to a watched key and force the commit to be discarded.
   */
  beforeCommit?: (store: MemoryStore, watchedKeys: string[]) => void | Promise<void>;
};

const REGEX_SPECIALS = /[.+^${}()|]/;

export function globToRegExp(pattern: string): RegExp {
  let out = '^';
  for (let i = 0; i < pattern.length; i++) {
    const c = pattern[i];
    if (c === '\\' && i + 1 < pattern.length) {
      i++;
      out += `\\${pattern[i]}`;
    } else if (c === '*') {
      out += '.*';
    } else if (c === '?') {
      out += '.';
    } else if (c === '[') {
      const end = pattern.indexOf(']', i + 1);
      if (end === -1) {
        out += '\\[';
      } else {
        const body = pattern.slice(i + 1, end).replace(/\\/g, '\\\\');
        out += body.startsWith('^') ? `[^${body.slice(1)}]` : `[${body}]`;
        i = end;
      }
    } else if (REGEX_SPECIALS.test(c) || c === ']') {
      out += `\\${c}`;
    } else {
      out += c;
    }
  }
  return new RegExp(`${out}$`);
}

const nextTick = () => new Promise<void>((resolve) => setImmediate(resolve));

/**
 * In-process stand-in for Redis with the semantics the storage layer relies on:
 * per-key versions for WATCH, atomic MULTI/EXEC, cursor SCAN with MATCH, TTLs and sets.
 * Every command yields to the event loop so concurrent callers interleave the way
 * network round-trips would.
 */
export class MemoryStore implements KeyValueStore {
  #data = new Map<string, Entry>();
  #versions = new Map<string, number>();
  #clock = 0;
  #closed = false;
  #now: () => number;
  #beforeCommit?: MemoryStoreOptions['beforeCommit'];

  commits = 0;
  discardedCommits = 0;

  constructor(options: MemoryStoreOptions = {}) {
    this.#now = options.now ?? Date.now;
    this.#beforeCommit = options.beforeCommit;
  }

  setBeforeCommit(hook: MemoryStoreOptions['beforeCommit']): void {
    this.#beforeCommit = hook;
  }

  async get(key: string): Promise<string | null> {
    await this.#enter();
    const entry = this.#read(key);
    if (!entry) return null;
    if (entry.kind !== 'string') throw this.#wrongType(key);
    return entry.value;
  }

  async mget(keys: string[]): Promise<(string | null)[]> {
    await this.#enter();
    return keys.map((key) => {
      const entry = this.#read(key);
      return entry && entry.kind === 'string' ? entry.value : null;
    });
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    await this.#enter();
    this.#apply({ op: 'set', key, value, ttlSeconds });
  }

  async del(keys: string[]): Promise<number> {
    await this.#enter();
    let removed = 0;
    for (const key of keys) {
      if (this.#read(key)) removed++;
      this.#apply({ op: 'del', key });
    }
    return removed;
  }

  async scan(cursor: string, pattern: string, count: number): Promise<ScanPage> {
    await this.#enter();
    const start = Number(cursor) || 0;
    const all = Array.from(this.#data.keys()).sort();
    const end = start + Math.max(1, count);
    const matcher = globToRegExp(pattern);
    const keys = all.slice(start, end).filter((key) => this.#read(key) !== undefined && matcher.test(key));
    return { cursor: end >= all.length ? '0' : String(end), keys };
  }

  async sadd(key: string, member: string): Promise<number> {
    await this.#enter();
    const had = this.#members(key).has(member);
    this.#apply({ op: 'sadd', key, member });
    return had ? 0 : 1;
  }

  async srem(key: string, member: string): Promise<number> {
    await this.#enter();
    const had = this.#members(key).has(member);
    this.#apply({ op: 'srem', key, member });
    return had ? 1 : 0;
  }

  async smembers(key: string): Promise<string[]> {
    await this.#enter();
    return Array.from(this.#members(key));
  }

  async sismember(key: string, member: string): Promise<boolean> {
    await this.#enter();
    return this.#members(key).has(member);
  }

  async batch(writes: WriteOp[]): Promise<void> {
    await this.#enter();
    writes.forEach((w) => this.#apply(w));
  }

  async withSession<T>(fn: (session: WatchSession) => Promise<T>): Promise<T> {
    await this.#enter();
    const watched = new Map<string, number>();
    const session: WatchSession = {
      watch: async (keys) => {
        await this.#enter();
        keys.forEach((key) => {
          this.#read(key);
          watched.set(key, this.#versions.get(key) ?? 0);
        });
      },
      unwatch: async () => {
        await this.#enter();
        watched.clear();
      },
      get: (key) => this.get(key),
      commit: async (writes) => {
        if (this.#beforeCommit) await this.#beforeCommit(this, Array.from(watched.keys()));
        await this.#enter();
        const stale = Array.from(watched.entries()).some(([key, version]) => {
          this.#read(key);
          return (this.#versions.get(key) ?? 0) !== version;
        });
        watched.clear();
        if (stale) {
          this.discardedCommits++;
          return false;
        }
        writes.forEach((w) => this.#apply(w));
        this.commits++;
        return true;
      },
    };
    try {
      return await fn(session);
    } finally {
      watched.clear();
    }
  }

  async ping(): Promise<boolean> {
    return !this.#closed;
  }

  async close(): Promise<void> {
    this.#closed = true;
  }

  /** Remaining lifetime in seconds; -1 without expiry, -2 when the key is absent (as Redis TTL). */
  ttl(key: string): number {
    const entry = this.#read(key);
    if (!entry) return -2;
    if (entry.kind !== 'string' || entry.expiresAt === undefined) return -1;
    return Math.ceil((entry.expiresAt - this.#now()) / 1000);
  }

  /** Synchronous snapshot of live keys matching `pattern`, for assertions. */
  keys(pattern = '*'): string[] {
    const matcher = globToRegExp(pattern);
    return Array.from(this.#data.keys())
      .filter((key) => this.#read(key) !== undefined && matcher.test(key))
      .sort();
  }

  async #enter(): Promise<void> {
    if (this.#closed) throw new StoreFailure(storeErrors.connection('Store connection is closed'));
    await nextTick();
    if (this.#closed) throw new StoreFailure(storeErrors.connection('Store connection is closed'));
  }

  #read(key: string): Entry | undefined {
    const entry = this.#data.get(key);
    if (entry && entry.kind === 'string' && entry.expiresAt !== undefined && entry.expiresAt <= this.#now()) {
      this.#data.delete(key);
      this.#touch(key);
      return undefined;
    }
    return entry;
  }

  #members(key: string): Set<string> {
    const entry = this.#read(key);
    if (!entry) return new Set();
    if (entry.kind !== 'set') throw this.#wrongType(key);
    return entry.members;
  }

  #apply(write: WriteOp): void {
    switch (write.op) {
      case 'set':
        this.#data.set(write.key, {
          kind: 'string',
          value: write.value,
          expiresAt: write.ttlSeconds ? this.#now() + write.ttlSeconds * 1000 : undefined,
        });
        break;
      case 'del':
        if (!this.#data.delete(write.key)) return;
        break;
      case 'sadd': {
        const members = new Set(this.#members(write.key));
        members.add(write.member);
        this.#data.set(write.key, { kind: 'set', members });
        break;
      }
      case 'srem': {
        const members = new Set(this.#members(write.key));
        if (!members.delete(write.member)) return;
        if (members.size) this.#data.set(write.key, { kind: 'set', members });
        else this.#data.delete(write.key);
        break;
      }
    }
    this.#touch(write.key);
  }

  #touch(key: string): void {
    this.#clock++;
    this.#versions.set(key, this.#clock);
  }

  #wrongType(key: string): StoreFailure {
    return new StoreFailure(
      storeErrors.operation(`WRONGTYPE Operation against a key holding the wrong kind of value: ${key}`)
    );
  }
}
