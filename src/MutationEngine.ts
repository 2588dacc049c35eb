import type { PagingStrategy } from './domain/model/Page.js';
import type { RunOutcome } from './domain/model/Run.js';
import type { RecordStore } from './domain/ports/RecordStore.js';
import type { CheckpointStore } from './domain/ports/CheckpointStore.js';
import type { RunLogger } from './domain/ports/RunLogger.js';
import type { Mutator } from './domain/services/TokenMutator.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { silentLogger } from './domain/ports/RunLogger.js';
import { createTokenMutator } from './domain/services/TokenMutator.js';
import { isTransientError } from './domain/errors/StoreError.js';
import { RunContext } from './application/RunContext.js';
import { ExecuteRun } from './application/usecases/ExecuteRun.js';
import { InterruptRun } from './application/usecases/InterruptRun.js';
import { GetRunStatus } from './application/usecases/GetRunStatus.js';
import type { RunStatusResult } from './application/usecases/GetRunStatus.js';
import { InMemoryCheckpointStore } from './infrastructure/state/InMemoryCheckpointStore.js';

/** Configuration for a regeneration run. */
export interface MutationEngineConfig {
  /** Table being rewritten. */
  readonly recordStore: RecordStore;
  /** Where the resume point lives. Default: `InMemoryCheckpointStore` (not durable). */
  readonly checkpointStore?: CheckpointStore;
  /** Rows per page. Default: `1000`. */
  readonly pageSize?: number;
  /** How pages are read from the store. Default: `'keyset'`. */
  readonly strategy?: PagingStrategy;
  /** Per-record transform. Default: replace `token` with a random UUID. */
  readonly mutator?: Mutator;
  /**
   * Retries of a page after a transient fetch or commit failure.
   * Default: `3`.
   */
  readonly maxRetries?: number;
  /**
   * Base delay between retries of a page. Exponential back-off:
   * `retryDelayMs * 2^(attempt - 1)`. Default: `500`.
   */
  readonly retryDelayMs?: number;
  /** Decides which errors are worth retrying. Default: `isTransientError`. */
  readonly isTransient?: (error: unknown) => boolean;
  readonly logger?: RunLogger;
}

/**
 * Facade over one resumable regeneration run:
 * count → resume → (fetch → mutate → commit)* → checkpoint.
 *
 * Each engine instance drives exactly one run. A later invocation builds a new
 * engine with the same checkpoint store and continues after the last committed
 * page.
 *
 * @example
 * ```typescript
 * const engine = new MutationEngine({
 *   recordStore,
 *   checkpointStore: new FileCheckpointStore({ path: '.rowsweep/checkpoint.json' }),
 *   pageSize: 1000,
 * });
 * process.once('SIGINT', () => engine.interrupt('SIGINT'));
 * const outcome = await engine.run();
 * ```
 */
export class MutationEngine {
  private readonly ctx: RunContext;

  constructor(config: MutationEngineConfig) {
    const pageSize = config.pageSize ?? 1000;
    const maxRetries = config.maxRetries ?? 3;
    const retryDelayMs = config.retryDelayMs ?? 500;

    if (!Number.isInteger(pageSize) || pageSize < 1) {
      throw new RangeError(`pageSize must be a positive integer, got ${String(pageSize)}`);
    }
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${String(maxRetries)}`);
    }
    if (!Number.isFinite(retryDelayMs) || retryDelayMs < 0) {
      throw new RangeError(`retryDelayMs must be a non-negative number, got ${String(retryDelayMs)}`);
    }

    this.ctx = new RunContext({
      recordStore: config.recordStore,
      checkpointStore: config.checkpointStore ?? new InMemoryCheckpointStore(),
      mutator: config.mutator ?? createTokenMutator(),
      logger: config.logger ?? silentLogger,
      pageSize,
      strategy: config.strategy ?? 'keyset',
      maxRetries,
      retryDelayMs,
      isTransient: config.isTransient ?? isTransientError,
    });
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Run to completion or until stopped.
   *
   * Resolves with `DONE` after every page committed, or `INTERRUPTED` after a
   * stop request or an unrecoverable page failure (the checkpoint is written
   * before it resolves). Rejects when the row count, or the checkpoint itself,
   * cannot be read or written.
   *
   * @param signal - Optional external cancellation, equivalent to calling `interrupt()`.
   */
  async run(signal?: AbortSignal): Promise<RunOutcome> {
    if (!signal) {
      return new ExecuteRun(this.ctx).execute();
    }

    const onAbort = (): void => {
      this.interrupt(describeAbortReason(signal.reason));
    };
    if (signal.aborted) onAbort();
    signal.addEventListener('abort', onAbort, { once: true });
    try {
      return await new ExecuteRun(this.ctx).execute();
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Ask the run to stop after the page in flight.
   *
   * @returns `false` when the run already ended or was already asked to stop.
   */
  interrupt(reason = 'interrupted'): boolean {
    return new InterruptRun(this.ctx).execute(reason);
  }

  /** Get current status and progress counters. */
  getStatus(): RunStatusResult {
    return new GetRunStatus(this.ctx).execute();
  }

  /** Unique identifier of this run (used in every event). */
  getRunId(): string {
    return this.ctx.runId;
  }
}

function describeAbortReason(reason: unknown): string {
  if (typeof reason === 'string') return reason;
  if (reason instanceof Error) return reason.message;
  return 'aborted';
}
