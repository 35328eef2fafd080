import { KeyValueStore, WatchSession, WriteOp } from './client';
import { StoreFailure, storeErrors } from './errors';
import { safeLogger } from '../security/safeLogger';

export const DEFAULT_MAX_ATTEMPTS = 10;

export type TxPlan<T> = { writes: WriteOp[]; result: T };

export type GuardedOptions = {
  watchKeys: string[];
  maxAttempts?: number;
  /** Used in the exhaustion message, e.g. "create dosage history". */
  label: string;
};

/**
 * Optimistic read-modify-write. Each attempt WATCHes `watchKeys`, lets `body` read
 * current state through the session and decide the write set, then commits it with
 * MULTI/EXEC. A discarded EXEC (a watched key changed) is retried until `maxAttempts`
 * commits have been tried. A {@link StoreFailure} thrown by `body` ends the whole
 * operation, not just the attempt.
 */
export async function runGuarded<T>(
  store: KeyValueStore,
  options: GuardedOptions,
  body: (session: WatchSession, attempt: number) => Promise<TxPlan<T>>
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  if (!options.watchKeys.length) throw new Error('runGuarded needs at least one key to watch');

  return store.withSession(async (session) => {
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      await session.watch(options.watchKeys);

      let committed: boolean;
      let plan: TxPlan<T>;
      try {
        plan = await body(session, attempt);
        committed = await session.commit(plan.writes);
      } catch (err) {
        await session
          .unwatch()
          .catch((unwatchErr: unknown) => safeLogger.warn('store.tx.unwatch_failed', { label: options.label, error: unwatchErr }));
        throw err;
      }

      if (committed) {
        if (attempt > 1) safeLogger.debug('store.tx.committed_after_retry', { label: options.label, attempt });
        return plan.result;
      }

      await session.unwatch();
      safeLogger.debug('store.tx.conflict', { label: options.label, attempt });
    }

    safeLogger.warn('store.tx.retries_exhausted', { label: options.label, maxAttempts });
    throw new StoreFailure(
      storeErrors.operation(
        `Failed to ${options.label} after ${maxAttempts} attempts due to concurrent modifications`,
        'retry_exhausted'
      )
    );
  });
}
