import { describe, it, expect } from 'vitest';
import { ProgressEstimator, formatProgressLine } from '../../../src/domain/services/ProgressEstimator.js';

describe('ProgressEstimator', () => {
  it('should start with an unknown (infinite) remaining time', () => {
    const estimator = new ProgressEstimator(1000, 100);

    expect(estimator.displayedRemainingMs).toBe(Number.POSITIVE_INFINITY);
  });

  it('should compute percent and remaining time from the last page', () => {
    const estimator = new ProgressEstimator(1000, 100);

    const report = estimator.record({ rowsProcessed: 100, elapsedMs: 50 });

    expect(report.percent).toBe(10);
    // 900 rows left = 9 pages at 50 ms
    expect(report.rawRemainingMs).toBe(450);
    expect(report.remainingMs).toBe(450);
  });

  it('should never increase the displayed estimate when a page is slower', () => {
    const estimator = new ProgressEstimator(1000, 100);

    estimator.record({ rowsProcessed: 100, elapsedMs: 50 });
    const slower = estimator.record({ rowsProcessed: 200, elapsedMs: 500 });

    expect(slower.rawRemainingMs).toBe(4000);
    expect(slower.remainingMs).toBe(450);
    expect(estimator.displayedRemainingMs).toBe(450);
  });

  it('should lower the displayed estimate when a page is faster', () => {
    const estimator = new ProgressEstimator(1000, 100);

    estimator.record({ rowsProcessed: 100, elapsedMs: 50 });
    const faster = estimator.record({ rowsProcessed: 200, elapsedMs: 10 });

    expect(faster.remainingMs).toBe(80);
  });

  it('should produce a monotone non-increasing sequence for arbitrary timings', () => {
    const estimator = new ProgressEstimator(2000, 100);
    const timings = [30, 80, 10, 200, 5, 5, 90, 1, 300, 40];

    const shown = timings.map(
      (elapsedMs, i) => estimator.record({ rowsProcessed: (i + 1) * 100, elapsedMs }).remainingMs,
    );

    for (let i = 1; i < shown.length; i++) {
      expect(shown[i]).toBeLessThanOrEqual(shown[i - 1] ?? Number.POSITIVE_INFINITY);
    }
  });

  it('should count rows committed by an earlier invocation', () => {
    const estimator = new ProgressEstimator(1000, 100);

    const report = estimator.record({ rowsProcessed: 400, elapsedMs: 20 });

    expect(report.percent).toBe(40);
    expect(report.remainingMs).toBe(120);
  });

  it('should reach 100% and zero remaining on the last page', () => {
    const estimator = new ProgressEstimator(250, 100);

    const report = estimator.record({ rowsProcessed: 250, elapsedMs: 70 });

    expect(report.percent).toBe(100);
    expect(report.remainingMs).toBe(0);
  });
});

describe('formatProgressLine', () => {
  it('should render percent with one decimal and whole seconds', () => {
    expect(formatProgressLine({ percent: 42, remainingMs: 17_400 })).toBe('Progress: 42.0% Remain: 17s');
    expect(formatProgressLine({ percent: 33.3333, remainingMs: 0 })).toBe('Progress: 33.3% Remain: 0s');
  });

  it('should render an unknown estimate as ?s', () => {
    expect(formatProgressLine({ percent: 0, remainingMs: Number.POSITIVE_INFINITY })).toBe(
      'Progress: 0.0% Remain: ?s',
    );
  });
});
