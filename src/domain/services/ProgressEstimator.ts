/** One timing sample per committed page. */
export interface ProgressSample {
  /** Rows in all committed pages so far, including earlier invocations of a resumed run. */
  readonly rowsProcessed: number;
  /** Wall time spent on the page that just committed. */
  readonly elapsedMs: number;
}

/** What the estimator reports after each sample. */
export interface ProgressReport {
  readonly percent: number;
  /** Smoothed estimate shown to the user. Never increases during a run. */
  readonly remainingMs: number;
  /** Unsmoothed estimate from the last page alone. */
  readonly rawRemainingMs: number;
}

/**
 * Percent-complete and time-remaining estimator.
 *
 * Per-page timings are noisy, so the displayed estimate only ever moves down:
 * a sample that predicts more time than currently shown is ignored. The
 * estimate under-reacts when pages get slower and is inaccurate early in a run.
 */
export class ProgressEstimator {
  private readonly totalRows: number;
  private readonly pageSize: number;
  private displayed = Number.POSITIVE_INFINITY;

  constructor(totalRows: number, pageSize: number) {
    this.totalRows = totalRows;
    this.pageSize = pageSize;
  }

  /** Current smoothed estimate. `Infinity` until the first sample. */
  get displayedRemainingMs(): number {
    return this.displayed;
  }

  record(sample: ProgressSample): ProgressReport {
    const percent = this.totalRows > 0 ? (sample.rowsProcessed / this.totalRows) * 100 : 100;
    const remainingRows = Math.max(0, this.totalRows - sample.rowsProcessed);
    const rawRemainingMs = (remainingRows / this.pageSize) * sample.elapsedMs;

    if (rawRemainingMs < this.displayed) {
      this.displayed = rawRemainingMs;
    }

    return { percent, remainingMs: this.displayed, rawRemainingMs };
  }
}

/** Render the single progress line: `Progress: 42.0% Remain: 17s`. */
export function formatProgressLine(report: Pick<ProgressReport, 'percent' | 'remainingMs'>): string {
  const remain = Number.isFinite(report.remainingMs) ? `${(report.remainingMs / 1000).toFixed(0)}s` : '?s';
  return `Progress: ${report.percent.toFixed(1)}% Remain: ${remain}`;
}
