import { randomUUID } from 'node:crypto';
import type { TokenRecord } from '../model/TokenRecord.js';

/** Pure transform applied to every record of a page. */
export type Mutator = (record: TokenRecord) => TokenRecord;

/** Produces a fresh token value. */
export type TokenGenerator = () => string;

/**
 * Create the mutator that replaces `token` with a freshly generated value.
 *
 * Uses random UUID v4 tokens by default. The mutator reads nothing but its
 * input, so applying it twice to the same row (a page re-processed after a
 * stop) only costs a second regeneration.
 */
export function createTokenMutator(generate: TokenGenerator = randomUUID): Mutator {
  return (record) => ({ ...record, token: generate() });
}
