import { z } from 'zod';

/** `PENDING` marks a resumable stop; `COMPLETE` is the sentinel written after a clean run. */
export const CheckpointStatus = {
  PENDING: 'PENDING',
  COMPLETE: 'COMPLETE',
} as const;

export type CheckpointStatus = (typeof CheckpointStatus)[keyof typeof CheckpointStatus];

/** Durable record of the last page known to be fully committed. */
export interface Checkpoint {
  /** Last page whose bulk commit was confirmed. `0` means nothing committed yet. */
  readonly lastCommittedPage: number;
  /** Page count computed when the checkpoint was written. */
  readonly totalPages: number;
  /** Page size the page indexes refer to. */
  readonly pageSize: number;
  readonly status: CheckpointStatus;
  /** Epoch milliseconds of the write. */
  readonly timestamp: number;
}

/** Why a stored checkpoint could not be used. */
export type CheckpointMissReason = 'ABSENT' | 'UNPARSABLE';

/** Result of reading a checkpoint. "No valid checkpoint" is a normal variant, not an exception. */
export type CheckpointLookup =
  | { readonly found: true; readonly checkpoint: Checkpoint }
  | { readonly found: false; readonly reason: CheckpointMissReason; readonly detail?: string };

const checkpointSchema = z.object({
  lastCommittedPage: z.number().int().nonnegative(),
  totalPages: z.number().int().nonnegative(),
  pageSize: z.number().int().positive(),
  status: z.enum([CheckpointStatus.PENDING, CheckpointStatus.COMPLETE]),
  timestamp: z.number().int().nonnegative(),
});

/** Build a resumable checkpoint for a stopped run. */
export function pendingCheckpoint(
  lastCommittedPage: number,
  totalPages: number,
  pageSize: number,
  timestamp: number = Date.now(),
): Checkpoint {
  return { lastCommittedPage, totalPages, pageSize, status: CheckpointStatus.PENDING, timestamp };
}

/** Build the "done" sentinel written after every page committed. */
export function completedCheckpoint(totalPages: number, pageSize: number, timestamp: number = Date.now()): Checkpoint {
  return { lastCommittedPage: totalPages, totalPages, pageSize, status: CheckpointStatus.COMPLETE, timestamp };
}

/**
 * Validate an already-decoded value (a parsed JSON document or a database row)
 * as a checkpoint. Anything that does not match is reported as `UNPARSABLE`.
 */
export function parseCheckpoint(value: unknown): CheckpointLookup {
  const result = checkpointSchema.safeParse(value);
  if (!result.success) {
    return { found: false, reason: 'UNPARSABLE', detail: result.error.issues.map(formatIssue).join('; ') };
  }
  return { found: true, checkpoint: result.data };
}

/** Decode a JSON document and validate it as a checkpoint. */
export function parseCheckpointJson(text: string): CheckpointLookup {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    return { found: false, reason: 'UNPARSABLE', detail: error instanceof Error ? error.message : String(error) };
  }
  return parseCheckpoint(decoded);
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}
