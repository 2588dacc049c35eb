/**
 * Failure reported by a record store.
 *
 * `transient` errors (connection blips, timeouts) are retried for the current
 * page; permanent ones stop the run on the first attempt.
 */
export class StoreError extends Error {
  readonly transient: boolean;

  constructor(message: string, options: { transient: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'StoreError';
    this.transient = options.transient;
  }
}

/** Default classifier: store errors carry their own flag, anything else may be retried. */
export function isTransientError(error: unknown): boolean {
  if (error instanceof StoreError) return error.transient;
  return true;
}
