import type { Checkpoint } from './Checkpoint.js';
import type { PagingStrategy } from './Page.js';

/** Configuration snapshot reported with `run:started`. */
export interface RunConfig {
  readonly pageSize: number;
  readonly strategy: PagingStrategy;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
}

/** Why a run stopped before its last page. Both causes route through CHECKPOINTING. */
export type StopCause =
  | {
      readonly kind: 'interrupted';
      /** Signal name or caller-supplied reason. */
      readonly reason: string;
    }
  | {
      readonly kind: 'failed';
      /** Page whose fetch or commit could not be completed. */
      readonly page: number;
      readonly attempts: number;
      readonly error: string;
    };

/** Real-time progress counters for an in-flight run. */
export interface RunProgress {
  readonly totalRows: number;
  /** Rows in committed pages, including pages committed by an earlier invocation. */
  readonly rowsProcessed: number;
  readonly totalPages: number;
  readonly lastCommittedPage: number;
  /** Completion percentage (0–100). */
  readonly percent: number;
  /** Smoothed estimate; `Infinity` until the first page commits. */
  readonly remainingMs: number;
  readonly elapsedMs: number;
}

/** Counters describing what a single invocation did. */
export interface RunSummary {
  readonly totalRows: number;
  readonly totalPages: number;
  /** Page the invocation started from (1 for a fresh run). */
  readonly startPage: number;
  readonly lastCommittedPage: number;
  /** Pages committed by this invocation. */
  readonly pagesCommitted: number;
  /** Rows rewritten by this invocation. */
  readonly rowsMutated: number;
  readonly elapsedMs: number;
}

/** Final result of `MutationEngine.run()`. */
export type RunOutcome =
  | { readonly status: 'DONE'; readonly summary: RunSummary }
  | {
      readonly status: 'INTERRUPTED';
      readonly cause: StopCause;
      readonly checkpoint: Checkpoint;
      readonly summary: RunSummary;
    };
