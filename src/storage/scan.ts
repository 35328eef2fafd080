import { KeyValueCommands } from './client';
import { RecordCodec } from './codec';
import { safeLogger } from '../security/safeLogger';

const FETCH_CHUNK = 200;

/**
 * Enumerates keys by SCAN pattern and bulk-loads their records. Listings are
 * best-effort under concurrent writes: a key created mid-scan may be missed, one
 * deleted mid-scan is dropped at fetch time.
 */
export class ScanIndexReader {
  constructor(private readonly store: KeyValueCommands, private readonly pageSize = 100) {}

  async scanAll(pattern: string): Promise<string[]> {
    const seen = new Set<string>();
    let cursor = '0';
    do {
      const page = await this.store.scan(cursor, pattern, this.pageSize);
      page.keys.forEach((key) => seen.add(key));
      cursor = page.cursor;
    } while (cursor !== '0');
    return Array.from(seen);
  }

  /** Absent and undecodable values are skipped. */
  async fetchAll<T>(keys: string[], codec: RecordCodec<T>): Promise<T[]> {
    const out: T[] = [];
    for (let i = 0; i < keys.length; i += FETCH_CHUNK) {
      const chunk = keys.slice(i, i + FETCH_CHUNK);
      const values = await this.store.mget(chunk);
      values.forEach((raw, idx) => {
        if (raw === null) return;
        const record = codec.tryDecode(raw);
        if (record === null) {
          safeLogger.warn('store.scan.skipped_corrupt_record', { key: chunk[idx], codec: codec.name });
          return;
        }
        out.push(record);
      });
    }
    return out;
  }

  async loadAll<T>(pattern: string, codec: RecordCodec<T>): Promise<T[]> {
    return this.fetchAll(await this.scanAll(pattern), codec);
  }
}
