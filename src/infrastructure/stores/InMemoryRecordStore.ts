import type { PageDescriptor, PagingStrategy } from '../../domain/model/Page.js';
import type { RecordId, TokenRecord } from '../../domain/model/TokenRecord.js';
import type { RecordStore } from '../../domain/ports/RecordStore.js';
import { compareRecordIds } from '../../domain/model/TokenRecord.js';
import { StoreError } from '../../domain/errors/StoreError.js';

/**
 * Record store over an in-process array, kept sorted by `id`.
 *
 * Implements both paging strategies the same way a database adapter would:
 * `offset` slices by position, `keyset` seeks past the last id it streamed
 * and falls back to an offset seek unless that id closed the row just before
 * the requested page. Used by tests and for embedding the engine over data
 * that is already in memory.
 */
export class InMemoryRecordStore implements RecordStore {
  private rows: TokenRecord[];
  private readonly positionById = new Map<RecordId, number>();
  private boundary: { readonly end: number; readonly lastId: RecordId } | null = null;

  constructor(records: Iterable<TokenRecord> = []) {
    this.rows = [...records].sort((a, b) => compareRecordIds(a.id, b.id));
    this.reindex();
  }

  countRecords(): Promise<number> {
    return Promise.resolve(this.rows.length);
  }

  async *fetchPage(page: PageDescriptor, strategy: PagingStrategy): AsyncIterable<TokenRecord> {
    const from = strategy === 'keyset' ? this.keysetStart(page) : page.start;
    let lastId: RecordId | null = null;
    let streamed = 0;

    for (let position = from; position < from + page.size && position < this.rows.length; position++) {
      const row = this.rows[position];
      if (!row) break;
      lastId = row.id;
      streamed++;
      await Promise.resolve();
      yield { ...row };
    }

    if (lastId !== null) {
      this.boundary = { end: page.start + streamed, lastId };
    }
  }

  commitBatch(records: readonly TokenRecord[]): Promise<void> {
    const positions: number[] = [];
    for (const record of records) {
      const position = this.positionById.get(record.id);
      if (position === undefined) {
        return Promise.reject(
          new StoreError(`Record ${String(record.id)} does not exist`, { transient: false }),
        );
      }
      positions.push(position);
    }

    records.forEach((record, i) => {
      const position = positions[i];
      if (position !== undefined) {
        this.rows[position] = { ...record };
      }
    });
    return Promise.resolve();
  }

  /** Copy of every row in `id` order. */
  snapshot(): TokenRecord[] {
    return this.rows.map((row) => ({ ...row }));
  }

  /** Add rows (test fixtures, or growth between runs). */
  insert(records: Iterable<TokenRecord>): void {
    this.rows = [...this.rows, ...records].sort((a, b) => compareRecordIds(a.id, b.id));
    this.reindex();
  }

  private keysetStart(page: PageDescriptor): number {
    const boundary = this.boundary;
    if (!boundary || boundary.end !== page.start) {
      return page.start;
    }
    const lastId = boundary.lastId;
    // First position whose id sorts after the previous page's last id.
    let low = 0;
    let high = this.rows.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const row = this.rows[mid];
      if (row && compareRecordIds(row.id, lastId) <= 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }

  private reindex(): void {
    this.positionById.clear();
    this.rows.forEach((row, position) => {
      this.positionById.set(row.id, position);
    });
    this.boundary = null;
  }
}
