import type { PageDescriptor } from '../model/Page.js';

/**
 * Turns a row count and a fixed page size into a deterministic, increasing
 * sequence of page descriptors.
 *
 * Page `i` always covers rows `[(i - 1) * pageSize, i * pageSize)` clipped to
 * `totalRows`, so a page index saved in a checkpoint maps back to the same rows
 * as long as the row count and page size are unchanged.
 */
export class PageCursor {
  readonly totalRows: number;
  readonly pageSize: number;
  readonly totalPages: number;

  constructor(totalRows: number, pageSize: number) {
    if (!Number.isInteger(totalRows) || totalRows < 0) {
      throw new RangeError(`totalRows must be a non-negative integer, got ${String(totalRows)}`);
    }
    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new RangeError(`pageSize must be a positive integer, got ${String(pageSize)}`);
    }
    this.totalRows = totalRows;
    this.pageSize = pageSize;
    this.totalPages = Math.ceil(totalRows / pageSize);
  }

  /** `true` when `index` names an existing page. */
  contains(index: number): boolean {
    return Number.isInteger(index) && index >= 1 && index <= this.totalPages;
  }

  /** Row range of page `index` (1-based). */
  pageAt(index: number): PageDescriptor {
    if (!this.contains(index)) {
      throw new RangeError(`Page ${String(index)} is outside [1, ${String(this.totalPages)}]`);
    }
    const start = (index - 1) * this.pageSize;
    return {
      index,
      size: this.pageSize,
      start,
      end: Math.min(start + this.pageSize, this.totalRows),
    };
  }

  /**
   * Yield pages from `fromIndex` to the last page. Earlier pages are never
   * visited. A `fromIndex` past the last page yields nothing.
   */
  *pages(fromIndex = 1): Generator<PageDescriptor> {
    if (!Number.isInteger(fromIndex) || fromIndex < 1) {
      throw new RangeError(`fromIndex must be a positive integer, got ${String(fromIndex)}`);
    }
    for (let index = fromIndex; index <= this.totalPages; index++) {
      yield this.pageAt(index);
    }
  }
}
