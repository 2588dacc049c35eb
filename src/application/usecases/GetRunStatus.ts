import type { RunStatus } from '../../domain/model/RunStatus.js';
import type { RunProgress } from '../../domain/model/Run.js';
import type { RunContext } from '../RunContext.js';

/** Result of querying a run's status. */
export interface RunStatusResult {
  readonly status: RunStatus;
  readonly progress: RunProgress;
  readonly startPage: number;
  readonly stopRequested: boolean;
}

/** Use case: snapshot of the run's state and progress. */
export class GetRunStatus {
  constructor(private readonly ctx: RunContext) {}

  execute(): RunStatusResult {
    return {
      status: this.ctx.status,
      progress: this.ctx.buildProgress(),
      startPage: this.ctx.startPage,
      stopRequested: this.ctx.stopRequested,
    };
  }
}
