import { randomUUID } from 'node:crypto';
import type { PagingStrategy } from '../domain/model/Page.js';
import type { RunConfig, RunProgress, RunSummary } from '../domain/model/Run.js';
import type { RecordStore } from '../domain/ports/RecordStore.js';
import type { CheckpointStore } from '../domain/ports/CheckpointStore.js';
import type { RunLogger } from '../domain/ports/RunLogger.js';
import type { Mutator } from '../domain/services/TokenMutator.js';
import type { ProgressReport } from '../domain/services/ProgressEstimator.js';
import { RunStatus, canTransition } from '../domain/model/RunStatus.js';
import { PageCursor } from '../domain/services/PageCursor.js';
import { ProgressEstimator } from '../domain/services/ProgressEstimator.js';
import { EventBus } from './EventBus.js';

/** Fully-resolved settings a run operates with. */
export interface RunSettings {
  readonly recordStore: RecordStore;
  readonly checkpointStore: CheckpointStore;
  readonly mutator: Mutator;
  readonly logger: RunLogger;
  readonly pageSize: number;
  readonly strategy: PagingStrategy;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly isTransient: (error: unknown) => boolean;
}

/**
 * Mutable state holder shared across the use cases of one run.
 *
 * Internal: use cases receive a reference to this context and advance it as
 * pages commit. Nothing here outlives the invocation except what CHECKPOINTING
 * writes to the checkpoint store.
 */
export class RunContext {
  readonly eventBus: EventBus;
  readonly settings: RunSettings;
  readonly runId: string;
  readonly abortController = new AbortController();

  status: RunStatus = RunStatus.INIT;
  cursor: PageCursor | null = null;
  estimator: ProgressEstimator | null = null;
  startPage = 1;
  lastCommittedPage = 0;
  pagesCommitted = 0;
  rowsMutated = 0;
  startedAt?: number;
  interruptReason: string | null = null;
  lastReport: ProgressReport | null = null;

  constructor(settings: RunSettings) {
    this.settings = settings;
    this.eventBus = new EventBus(settings.logger);
    this.runId = randomUUID();
  }

  get logger(): RunLogger {
    return this.settings.logger;
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  /** `true` once a stop was requested. */
  get stopRequested(): boolean {
    return this.interruptReason !== null;
  }

  transitionTo(newStatus: RunStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.logger.debug(`Run ${this.status} → ${newStatus}`, { runId: this.runId });
    this.status = newStatus;
  }

  /** Build the cursor and estimator for a known row count (INIT). */
  initialise(totalRows: number): PageCursor {
    const cursor = new PageCursor(totalRows, this.settings.pageSize);
    this.cursor = cursor;
    this.estimator = new ProgressEstimator(totalRows, this.settings.pageSize);
    return cursor;
  }

  requireCursor(): PageCursor {
    if (!this.cursor) {
      throw new Error('Run has not been initialised. The row count is unknown.');
    }
    return this.cursor;
  }

  requestStop(reason: string): void {
    if (this.interruptReason !== null) return;
    this.interruptReason = reason;
    this.abortController.abort();
  }

  buildConfig(): RunConfig {
    return {
      pageSize: this.settings.pageSize,
      strategy: this.settings.strategy,
      maxRetries: this.settings.maxRetries,
      retryDelayMs: this.settings.retryDelayMs,
    };
  }

  buildProgress(): RunProgress {
    const totalRows = this.cursor?.totalRows ?? 0;
    const totalPages = this.cursor?.totalPages ?? 0;
    const rowsProcessed =
      this.cursor && this.lastCommittedPage > 0 ? this.cursor.pageAt(this.lastCommittedPage).end : 0;

    return {
      totalRows,
      rowsProcessed,
      totalPages,
      lastCommittedPage: this.lastCommittedPage,
      percent: this.lastReport?.percent ?? (totalRows > 0 ? (rowsProcessed / totalRows) * 100 : 0),
      remainingMs: this.lastReport?.remainingMs ?? Number.POSITIVE_INFINITY,
      elapsedMs: this.elapsed(),
    };
  }

  buildSummary(): RunSummary {
    return {
      totalRows: this.cursor?.totalRows ?? 0,
      totalPages: this.cursor?.totalPages ?? 0,
      startPage: this.startPage,
      lastCommittedPage: this.lastCommittedPage,
      pagesCommitted: this.pagesCommitted,
      rowsMutated: this.rowsMutated,
      elapsedMs: this.elapsed(),
    };
  }

  private elapsed(): number {
    return this.startedAt !== undefined ? Date.now() - this.startedAt : 0;
  }
}
