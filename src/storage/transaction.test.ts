import { MemoryStore } from './memoryStore';
import { StoreFailure, storeErrors } from './errors';
import { runGuarded } from './transaction';

describe('runGuarded', () => {
  it('commits the planned writes and returns the result', async () => {
    const store = new MemoryStore();
    await store.set('counter', '1');
    const result = await runGuarded(store, { watchKeys: ['counter'], label: 'bump' }, async (session) => {
      const next = Number(await session.get('counter')) + 1;
      return { writes: [{ op: 'set', key: 'counter', value: String(next) }], result: next };
    });
    expect(result).toBe(2);
    expect(await store.get('counter')).toBe('2');
  });

  it('retries after a conflicting write and then succeeds', async () => {
    const store = new MemoryStore();
    await store.set('counter', '1');
    let collisions = 1;
    store.setBeforeCommit(async (s) => {
      if (collisions-- > 0) await s.set('counter', '10');
    });
    const body = jest.fn(async (session: { get(key: string): Promise<string | null> }) => {
      const next = Number(await session.get('counter')) + 1;
      return { writes: [{ op: 'set' as const, key: 'counter', value: String(next) }], result: next };
    });

    const result = await runGuarded(store, { watchKeys: ['counter'], label: 'bump' }, body);
    expect(result).toBe(11);
    expect(body).toHaveBeenCalledTimes(2);
    expect(store.discardedCommits).toBe(1);
  });

  it('reports retry exhaustion after exactly maxAttempts commits', async () => {
    const store = new MemoryStore();
    await store.set('k', '0');
    store.setBeforeCommit(async (s, watched) => {
      for (const key of watched) await s.set(key, 'interfered');
    });
    const body = jest.fn(async () => ({ writes: [{ op: 'set' as const, key: 'k', value: 'mine' }], result: 'done' }));

    const outcome = runGuarded(store, { watchKeys: ['k'], maxAttempts: 4, label: 'write k' }, body);
    await expect(outcome).rejects.toMatchObject({
      error: {
        kind: 'OperationError',
        reason: 'retry_exhausted',
        message: 'Failed to write k after 4 attempts due to concurrent modifications',
      },
    });
    expect(body).toHaveBeenCalledTimes(4);
    expect(store.discardedCommits).toBe(4);
    expect(store.commits).toBe(0);
    expect(await store.get('k')).toBe('interfered');
  });

  it('aborts the whole operation on a terminal error from the body', async () => {
    const store = new MemoryStore();
    const body = jest.fn(async (): Promise<{ writes: []; result: number }> => {
      throw new StoreFailure(storeErrors.notFound('Medicine with id m1 not found'));
    });
    await expect(runGuarded(store, { watchKeys: ['k'], label: 'x' }, body)).rejects.toMatchObject({
      error: { kind: 'NotFound' },
    });
    expect(body).toHaveBeenCalledTimes(1);
    expect(store.commits).toBe(0);
  });

  it('needs something to watch', async () => {
    await expect(runGuarded(new MemoryStore(), { watchKeys: [], label: 'x' }, jest.fn())).rejects.toThrow(
      'runGuarded needs at least one key to watch'
    );
  });
});
