/** Stable ordering key of a row. Immutable for the duration of a run. */
export type RecordId = number | string;

/** A row of the mutated table: its ordering key and the regenerable token. */
export interface TokenRecord {
  readonly id: RecordId;
  readonly token: string;
}

/** Compare two ids in the order the record store sorts them (ascending). */
export function compareRecordIds(a: RecordId, b: RecordId): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = String(a);
  const right = String(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}
