import type { Checkpoint } from '../model/Checkpoint.js';
import type { RunConfig, RunProgress, RunSummary, StopCause } from '../model/Run.js';

/** Why a stored checkpoint was ignored on startup. */
export type CheckpointDiscardReason = 'UNPARSABLE' | 'PAGE_SIZE_CHANGED' | 'ROW_COUNT_CHANGED' | 'OUT_OF_RANGE';

/** Emitted once the row count is known and the start page is decided. */
export interface RunStartedEvent {
  readonly type: 'run:started';
  readonly runId: string;
  readonly totalRows: number;
  readonly totalPages: number;
  readonly startPage: number;
  readonly config: RunConfig;
  readonly timestamp: number;
}

/** Emitted when a stored checkpoint cannot be used and the run starts over. */
export interface CheckpointDiscardedEvent {
  readonly type: 'checkpoint:discarded';
  readonly runId: string;
  readonly reason: CheckpointDiscardReason;
  readonly detail: string;
  readonly timestamp: number;
}

/** Emitted when a valid checkpoint is honoured. */
export interface RunResumedEvent {
  readonly type: 'run:resumed';
  readonly runId: string;
  readonly lastCommittedPage: number;
  readonly startPage: number;
  readonly timestamp: number;
}

/** Emitted before a page is fetched. */
export interface PageStartedEvent {
  readonly type: 'page:started';
  readonly runId: string;
  readonly pageIndex: number;
  readonly rowCount: number;
  readonly timestamp: number;
}

/** Emitted after a page's bulk commit succeeded. */
export interface PageCommittedEvent {
  readonly type: 'page:committed';
  readonly runId: string;
  readonly pageIndex: number;
  readonly rowCount: number;
  /** Attempts needed, `1` when the first one succeeded. */
  readonly attempts: number;
  readonly elapsedMs: number;
  readonly timestamp: number;
}

/** Emitted when a page failed transiently and is about to be retried. */
export interface PageRetriedEvent {
  readonly type: 'page:retried';
  readonly runId: string;
  readonly pageIndex: number;
  /** Attempt that failed (1-based). */
  readonly attempt: number;
  readonly maxRetries: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted once per committed page with the updated estimate. */
export interface RunProgressEvent {
  readonly type: 'run:progress';
  readonly runId: string;
  readonly progress: RunProgress;
  readonly timestamp: number;
}

/** Emitted after CHECKPOINTING persisted the stop position. */
export interface RunCheckpointedEvent {
  readonly type: 'run:checkpointed';
  readonly runId: string;
  readonly checkpoint: Checkpoint;
  readonly cause: StopCause;
  readonly timestamp: number;
}

/** Emitted when every page committed. */
export interface RunCompletedEvent {
  readonly type: 'run:completed';
  readonly runId: string;
  readonly summary: RunSummary;
  readonly timestamp: number;
}

/** Emitted when the run stopped early, after the checkpoint was written. */
export interface RunInterruptedEvent {
  readonly type: 'run:interrupted';
  readonly runId: string;
  readonly cause: StopCause;
  readonly summary: RunSummary;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | RunStartedEvent
  | CheckpointDiscardedEvent
  | RunResumedEvent
  | PageStartedEvent
  | PageCommittedEvent
  | PageRetriedEvent
  | RunProgressEvent
  | RunCheckpointedEvent
  | RunCompletedEvent
  | RunInterruptedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
