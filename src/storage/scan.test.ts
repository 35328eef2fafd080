import { KeyValueCommands, ScanPage } from './client';
import { medicineCodec } from './codec';
import { ScanIndexReader } from './scan';

const medicine = (id: string) => medicineCodec.encode({ id, name: `Med ${id}`, dose: 1, unit: 'mg', stock: 10 });

function stubStore(pages: ScanPage[], values: Record<string, string>): KeyValueCommands {
  const queue = [...pages];
  return {
    get: jest.fn(),
    set: jest.fn(),
    del: jest.fn(),
    sadd: jest.fn(),
    srem: jest.fn(),
    smembers: jest.fn(),
    sismember: jest.fn(),
    scan: jest.fn(async () => {
      const page = queue.shift();
      if (!page) throw new Error('scanned past the last page');
      return page;
    }),
    mget: jest.fn(async (keys: string[]) => keys.map((k) => values[k] ?? null)),
  };
}

describe('ScanIndexReader', () => {
  it('follows the cursor and drops keys returned twice', async () => {
    const store = stubStore(
      [
        { cursor: '7', keys: ['m:1', 'm:2'] },
        { cursor: '3', keys: ['m:2', 'm:3'] },
        { cursor: '0', keys: ['m:1'] },
      ],
      {}
    );
    const reader = new ScanIndexReader(store, 2);
    expect((await reader.scanAll('m:*')).sort()).toEqual(['m:1', 'm:2', 'm:3']);
    expect(store.scan).toHaveBeenCalledTimes(3);
    expect(store.scan).toHaveBeenNthCalledWith(2, '7', 'm:*', 2);
  });

  it('skips absent and corrupt records when fetching', async () => {
    const store = stubStore([{ cursor: '0', keys: ['m:1', 'm:2', 'm:3'] }], {
      'm:1': medicine('1'),
      'm:3': '{"id":',
    });
    const reader = new ScanIndexReader(store);
    const loaded = await reader.loadAll('m:*', medicineCodec);
    expect(loaded.map((m) => m.id)).toEqual(['1']);
  });

  it('returns exactly K records whatever the page size', async () => {
    const values: Record<string, string> = {};
    const keys = ['a', 'b', 'c', 'd', 'e'].map((id) => {
      values[`m:${id}`] = medicine(id);
      return `m:${id}`;
    });
    // Overlapping pages, as SCAN may produce during a rehash
    const store = stubStore(
      [
        { cursor: '1', keys: keys.slice(0, 3) },
        { cursor: '2', keys: keys.slice(2, 5) },
        { cursor: '0', keys: keys.slice(4) },
      ],
      values
    );
    const loaded = await new ScanIndexReader(store, 3).loadAll('m:*', medicineCodec);
    expect(loaded.map((m) => m.id).sort()).toEqual(['a', 'b', 'c', 'd', 'e']);
  });
});
