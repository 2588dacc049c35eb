import { isTerminal } from '../../domain/model/RunStatus.js';
import type { RunContext } from '../RunContext.js';

/**
 * Use case: ask a run to stop at the next page boundary.
 *
 * The page being committed finishes; a pending retry back-off is cut short.
 * Returns `false` when the run already ended or a stop was already requested.
 */
export class InterruptRun {
  constructor(private readonly ctx: RunContext) {}

  execute(reason: string): boolean {
    if (isTerminal(this.ctx.status) || this.ctx.stopRequested) {
      return false;
    }
    this.ctx.logger.info(`Stop requested (${reason}), finishing the current page`, {
      lastCommittedPage: this.ctx.lastCommittedPage,
    });
    this.ctx.requestStop(reason);
    return true;
  }
}
