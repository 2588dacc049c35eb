import type { PageDescriptor } from '../../domain/model/Page.js';
import type { RunOutcome, StopCause } from '../../domain/model/Run.js';
import { completedCheckpoint, pendingCheckpoint } from '../../domain/model/Checkpoint.js';
import { RunStatus } from '../../domain/model/RunStatus.js';
import { BatchWriter } from '../BatchWriter.js';
import type { RunContext } from '../RunContext.js';
import { PrepareRun } from './PrepareRun.js';
import { ProcessPage } from './ProcessPage.js';

/**
 * Use case: drive a run from INIT to DONE or INTERRUPTED.
 *
 * Pages are processed one at a time in increasing order. `lastCommittedPage`
 * only moves after the page's commit resolved, so the checkpoint written by
 * CHECKPOINTING never points past an unconfirmed page. Interruptions and
 * unrecoverable page failures both end in that single checkpoint write.
 */
export class ExecuteRun {
  constructor(private readonly ctx: RunContext) {}

  async execute(): Promise<RunOutcome> {
    if (this.ctx.status !== RunStatus.INIT) {
      throw new Error(`Cannot run from status '${this.ctx.status}'. Create a new engine for each run.`);
    }
    // status stays INIT until the row count resolves
    if (this.ctx.startedAt !== undefined) {
      throw new Error('Run already started. Create a new engine for each run.');
    }

    this.ctx.startedAt = Date.now();
    await new PrepareRun(this.ctx).execute();
    const cursor = this.ctx.requireCursor();

    this.ctx.transitionTo(RunStatus.RUNNING);
    this.ctx.eventBus.emit({
      type: 'run:started',
      runId: this.ctx.runId,
      totalRows: cursor.totalRows,
      totalPages: cursor.totalPages,
      startPage: this.ctx.startPage,
      config: this.ctx.buildConfig(),
      timestamp: Date.now(),
    });

    const processPage = new ProcessPage(
      this.ctx,
      new BatchWriter(this.ctx.settings.recordStore, this.ctx.settings.isTransient),
    );
    let stop: StopCause | null = null;

    for (const page of cursor.pages(this.ctx.startPage)) {
      if (this.ctx.stopRequested) {
        stop = this.interruption();
        break;
      }

      this.ctx.eventBus.emit({
        type: 'page:started',
        runId: this.ctx.runId,
        pageIndex: page.index,
        rowCount: page.end - page.start,
        timestamp: Date.now(),
      });

      const result = await processPage.execute(page);

      if (result.kind === 'committed') {
        this.recordCommit(page, result.rowCount, result.attempts, result.elapsedMs);
      } else if (result.kind === 'interrupted') {
        stop = this.interruption();
        break;
      } else {
        stop = { kind: 'failed', page: page.index, attempts: result.attempts, error: result.error };
        break;
      }
    }

    return stop ? this.checkpoint(stop) : this.complete();
  }

  private interruption(): StopCause {
    return { kind: 'interrupted', reason: this.ctx.interruptReason ?? 'interrupted' };
  }

  private recordCommit(page: PageDescriptor, rowCount: number, attempts: number, elapsedMs: number): void {
    this.ctx.lastCommittedPage = page.index;
    this.ctx.pagesCommitted++;
    this.ctx.rowsMutated += rowCount;

    if (this.ctx.estimator) {
      this.ctx.lastReport = this.ctx.estimator.record({ rowsProcessed: page.end, elapsedMs });
    }

    this.ctx.eventBus.emit({
      type: 'page:committed',
      runId: this.ctx.runId,
      pageIndex: page.index,
      rowCount,
      attempts,
      elapsedMs,
      timestamp: Date.now(),
    });

    this.ctx.eventBus.emit({
      type: 'run:progress',
      runId: this.ctx.runId,
      progress: this.ctx.buildProgress(),
      timestamp: Date.now(),
    });
  }

  private async checkpoint(cause: StopCause): Promise<RunOutcome> {
    const cursor = this.ctx.requireCursor();
    this.ctx.transitionTo(RunStatus.CHECKPOINTING);

    const checkpoint = pendingCheckpoint(this.ctx.lastCommittedPage, cursor.totalPages, cursor.pageSize);
    await this.ctx.settings.checkpointStore.write(checkpoint);
    this.ctx.eventBus.emit({
      type: 'run:checkpointed',
      runId: this.ctx.runId,
      checkpoint,
      cause,
      timestamp: Date.now(),
    });

    this.ctx.transitionTo(RunStatus.INTERRUPTED);
    const summary = this.ctx.buildSummary();

    if (cause.kind === 'failed') {
      this.ctx.logger.error(`Page ${String(cause.page)} failed, run stopped`, {
        attempts: cause.attempts,
        error: cause.error,
        lastCommittedPage: checkpoint.lastCommittedPage,
        totalPages: checkpoint.totalPages,
      });
    } else {
      this.ctx.logger.warn(`Run interrupted (${cause.reason})`, {
        lastCommittedPage: checkpoint.lastCommittedPage,
        totalPages: checkpoint.totalPages,
      });
    }

    this.ctx.eventBus.emit({
      type: 'run:interrupted',
      runId: this.ctx.runId,
      cause,
      summary,
      timestamp: Date.now(),
    });

    return { status: 'INTERRUPTED', cause, checkpoint, summary };
  }

  private async complete(): Promise<RunOutcome> {
    const cursor = this.ctx.requireCursor();
    await this.ctx.settings.checkpointStore.write(completedCheckpoint(cursor.totalPages, cursor.pageSize));
    this.ctx.transitionTo(RunStatus.DONE);

    const summary = this.ctx.buildSummary();
    this.ctx.logger.info('Run complete', { pagesCommitted: summary.pagesCommitted, rowsMutated: summary.rowsMutated });
    this.ctx.eventBus.emit({
      type: 'run:completed',
      runId: this.ctx.runId,
      summary,
      timestamp: Date.now(),
    });

    return { status: 'DONE', summary };
  }
}
