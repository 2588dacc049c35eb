import type { PageDescriptor, PagingStrategy } from '../model/Page.js';
import type { TokenRecord } from '../model/TokenRecord.js';

/**
 * Port for the table being mutated.
 *
 * Implementations order records by `id` ascending, both when counting pages and
 * when fetching them. A page is read with memory proportional to the page size
 * and committed as one bulk operation.
 */
export interface RecordStore {
  /** Number of rows the run covers. */
  countRecords(): Promise<number>;
  /**
   * Stream the records of one page in `id` order. Must not materialise more
   * than the page. Rejects (or throws while iterating) on store failure.
   */
  fetchPage(page: PageDescriptor, strategy: PagingStrategy): AsyncIterable<TokenRecord>;
  /**
   * Persist the mutated records of one page in a single bulk operation.
   * Resolves only when the whole batch is durable; rejects otherwise.
   * Throw `StoreError` to mark a failure as transient or permanent.
   */
  commitBatch(records: readonly TokenRecord[]): Promise<void>;
}
