import type { Checkpoint, CheckpointLookup } from '../../../domain/model/Checkpoint.js';
import { parseCheckpoint } from '../../../domain/model/Checkpoint.js';
import type { CheckpointRow } from '../models/CheckpointModel.js';

export function toRow(name: string, checkpoint: Checkpoint): CheckpointRow {
  return {
    name,
    lastCommittedPage: checkpoint.lastCommittedPage,
    totalPages: checkpoint.totalPages,
    pageSize: checkpoint.pageSize,
    status: checkpoint.status,
    timestamp: checkpoint.timestamp,
  };
}

/** BIGINT columns come back as strings on PostgreSQL. */
export function toLookup(plain: unknown): CheckpointLookup {
  if (plain === null || typeof plain !== 'object') {
    return { found: false, reason: 'UNPARSABLE', detail: 'checkpoint row is not an object' };
  }
  const timestamp: unknown = 'timestamp' in plain ? plain.timestamp : undefined;
  return parseCheckpoint({
    ...plain,
    timestamp: typeof timestamp === 'string' ? Number(timestamp) : timestamp,
  });
}
