import type { Checkpoint } from '../../domain/model/Checkpoint.js';
import type { CheckpointDiscardReason } from '../../domain/events/DomainEvents.js';
import type { PageCursor } from '../../domain/services/PageCursor.js';
import { CheckpointStatus } from '../../domain/model/Checkpoint.js';
import { RunStatus } from '../../domain/model/RunStatus.js';
import type { RunContext } from '../RunContext.js';

type ResumeDecision =
  | { readonly resume: true; readonly lastCommittedPage: number }
  | { readonly resume: false; readonly discard?: { readonly reason: CheckpointDiscardReason; readonly detail: string } };

/**
 * Use case: INIT and RESUMING.
 *
 * Counts the rows, builds the cursor, then reads the checkpoint exactly once to
 * decide the start page. A checkpoint that does not describe the current table
 * (different page size or page count, index out of range) is discarded with a
 * warning and the run starts at page 1.
 */
export class PrepareRun {
  constructor(private readonly ctx: RunContext) {}

  async execute(): Promise<void> {
    const totalRows = await this.ctx.settings.recordStore.countRecords();
    const cursor = this.ctx.initialise(totalRows);
    this.ctx.logger.info('Counted rows', { totalRows, totalPages: cursor.totalPages, pageSize: cursor.pageSize });

    this.ctx.transitionTo(RunStatus.RESUMING);
    const lookup = await this.ctx.settings.checkpointStore.read();

    let decision: ResumeDecision;
    if (lookup.found) {
      decision = this.decide(lookup.checkpoint, cursor);
    } else if (lookup.reason === 'UNPARSABLE') {
      decision = { resume: false, discard: { reason: 'UNPARSABLE', detail: lookup.detail ?? 'unreadable checkpoint' } };
    } else {
      this.ctx.logger.info('No checkpoint found, starting at page 1');
      decision = { resume: false };
    }

    if (decision.resume) {
      this.ctx.lastCommittedPage = decision.lastCommittedPage;
      this.ctx.startPage = decision.lastCommittedPage + 1;
      this.ctx.logger.info(`Resuming after page ${String(decision.lastCommittedPage)}`, {
        startPage: this.ctx.startPage,
      });
      this.ctx.eventBus.emit({
        type: 'run:resumed',
        runId: this.ctx.runId,
        lastCommittedPage: decision.lastCommittedPage,
        startPage: this.ctx.startPage,
        timestamp: Date.now(),
      });
    } else {
      this.ctx.lastCommittedPage = 0;
      this.ctx.startPage = 1;
      if (decision.discard) {
        this.ctx.logger.warn(`Discarding checkpoint (${decision.discard.reason}), starting at page 1`, {
          detail: decision.discard.detail,
        });
        this.ctx.eventBus.emit({
          type: 'checkpoint:discarded',
          runId: this.ctx.runId,
          reason: decision.discard.reason,
          detail: decision.discard.detail,
          timestamp: Date.now(),
        });
      }
    }
  }

  private decide(checkpoint: Checkpoint, cursor: PageCursor): ResumeDecision {
    if (checkpoint.status === CheckpointStatus.COMPLETE) {
      this.ctx.logger.info('Previous run completed, starting a fresh run at page 1');
      return { resume: false };
    }
    if (checkpoint.pageSize !== cursor.pageSize) {
      return {
        resume: false,
        discard: {
          reason: 'PAGE_SIZE_CHANGED',
          detail: `checkpoint page size ${String(checkpoint.pageSize)}, current ${String(cursor.pageSize)}`,
        },
      };
    }
    if (checkpoint.totalPages !== cursor.totalPages) {
      return {
        resume: false,
        discard: {
          reason: 'ROW_COUNT_CHANGED',
          detail: `checkpoint has ${String(checkpoint.totalPages)} pages, table now has ${String(cursor.totalPages)}`,
        },
      };
    }
    if (checkpoint.lastCommittedPage > cursor.totalPages) {
      return {
        resume: false,
        discard: {
          reason: 'OUT_OF_RANGE',
          detail: `page ${String(checkpoint.lastCommittedPage)} is past the last page ${String(cursor.totalPages)}`,
        },
      };
    }
    return { resume: true, lastCommittedPage: checkpoint.lastCommittedPage };
  }
}
