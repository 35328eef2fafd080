export type OperationReason = 'store_failure' | 'retry_exhausted' | 'ambiguous_token' | 'conflict' | 'invalid_input';

export type StoreError =
  | { kind: 'ConnectionError'; message: string }
  | { kind: 'OperationError'; message: string; reason: OperationReason }
  | { kind: 'NotFound'; message: string }
  | { kind: 'SerializationError'; message: string };

export type StoreErrorKind = StoreError['kind'];

/** Shaped like zod's `safeParse` result so callers branch on `success`. */
export type StoreResult<T> = { success: true; data: T } | { success: false; error: StoreError };

export const storeErrors = {
  connection: (message: string): StoreError => ({ kind: 'ConnectionError', message }),
  operation: (message: string, reason: OperationReason = 'store_failure'): StoreError => ({
    kind: 'OperationError',
    message,
    reason,
  }),
  notFound: (message: string): StoreError => ({ kind: 'NotFound', message }),
  serialization: (message: string): StoreError => ({ kind: 'SerializationError', message }),
};

/**
 * Thrown inside the storage layer and converted to a {@link StoreResult} at the facade.
 */
export class StoreFailure extends Error {
  readonly error: StoreError;

  constructor(error: StoreError) {
    super(error.message);
    this.name = 'StoreFailure';
    this.error = error;
  }
}

export function isStoreFailure(err: unknown): err is StoreFailure {
  return err instanceof StoreFailure;
}

function describe(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Runs `fn` and maps the outcome to a result. A {@link StoreFailure} keeps its own
 * error; anything else becomes an OperationError prefixed with `context`.
 */
export async function capture<T>(context: string, fn: () => Promise<T>): Promise<StoreResult<T>> {
  try {
    return { success: true, data: await fn() };
  } catch (err) {
    if (isStoreFailure(err)) {
      return { success: false, error: err.error };
    }
    return { success: false, error: storeErrors.operation(`${context}: ${describe(err)}`) };
  }
}
