import type { TokenRecord } from '../domain/model/TokenRecord.js';
import type { RecordStore } from '../domain/ports/RecordStore.js';

/** Outcome of committing one page. A page is written entirely or not at all. */
export type WriteResult =
  | { readonly success: true; readonly count: number }
  | { readonly success: false; readonly error: string; readonly transient: boolean; readonly cause: unknown };

/**
 * Persists the mutated records of one page through a single `commitBatch`
 * call and reports the result as a unit.
 */
export class BatchWriter {
  constructor(
    private readonly store: RecordStore,
    private readonly isTransient: (error: unknown) => boolean,
  ) {}

  async write(records: readonly TokenRecord[]): Promise<WriteResult> {
    if (records.length === 0) {
      return { success: true, count: 0 };
    }

    try {
      await this.store.commitBatch(records);
      return { success: true, count: records.length };
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
        transient: this.isTransient(error),
        cause: error,
      };
    }
  }
}
