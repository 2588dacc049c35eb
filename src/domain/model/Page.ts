/** Where the engine reads a page from. Chosen once per run. */
export const PagingStrategy = {
  /** Windowed range query: `ORDER BY id OFFSET start LIMIT size`. */
  OFFSET: 'offset',
  /** Seek past the last key of the previous page: `WHERE id > :last ORDER BY id LIMIT size`. */
  KEYSET: 'keyset',
} as const;

export type PagingStrategy = (typeof PagingStrategy)[keyof typeof PagingStrategy];

/** A fixed-size contiguous range of rows processed as one fetch + mutate + commit unit. */
export interface PageDescriptor {
  /** 1-based page number. */
  readonly index: number;
  /** Fixed row count per page for the whole run. */
  readonly size: number;
  /** Zero-based first row of the page (inclusive). */
  readonly start: number;
  /** Zero-based end row of the page (exclusive), clipped to the total row count. */
  readonly end: number;
}

/** Number of rows a page actually covers (the final page may be partial). */
export function pageRowCount(page: PageDescriptor): number {
  return page.end - page.start;
}
