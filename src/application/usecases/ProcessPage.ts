import type { PageDescriptor } from '../../domain/model/Page.js';
import type { TokenRecord } from '../../domain/model/TokenRecord.js';
import { pageRowCount } from '../../domain/model/Page.js';
import type { BatchWriter, WriteResult } from '../BatchWriter.js';
import type { RunContext } from '../RunContext.js';

/** Outcome of one page, after retries. */
export type PageResult =
  | { readonly kind: 'committed'; readonly rowCount: number; readonly attempts: number; readonly elapsedMs: number }
  | { readonly kind: 'interrupted'; readonly attempts: number }
  | { readonly kind: 'failed'; readonly attempts: number; readonly error: string; readonly cause: unknown };

/**
 * Use case: fetch one page, mutate every record, commit the batch.
 *
 * A transient failure in either the fetch or the commit retries the whole page
 * with exponential back-off `retryDelayMs * 2^(attempt - 1)`. Nothing is held
 * beyond the current page's records.
 */
export class ProcessPage {
  constructor(
    private readonly ctx: RunContext,
    private readonly writer: BatchWriter,
  ) {}

  async execute(page: PageDescriptor): Promise<PageResult> {
    const { maxRetries, retryDelayMs } = this.ctx.settings;
    const maxAttempts = 1 + maxRetries;
    const startedAt = Date.now();

    for (let attempt = 1; ; attempt++) {
      const result = await this.attempt(page);

      if (result.success) {
        return { kind: 'committed', rowCount: result.count, attempts: attempt, elapsedMs: Date.now() - startedAt };
      }

      if (!result.transient || attempt >= maxAttempts) {
        return { kind: 'failed', attempts: attempt, error: result.error, cause: result.cause };
      }

      this.ctx.logger.warn(`Page ${String(page.index)} failed, retrying`, {
        attempt,
        maxRetries,
        error: result.error,
      });
      this.ctx.eventBus.emit({
        type: 'page:retried',
        runId: this.ctx.runId,
        pageIndex: page.index,
        attempt,
        maxRetries,
        error: result.error,
        timestamp: Date.now(),
      });

      await this.sleep(retryDelayMs * Math.pow(2, attempt - 1));
      if (this.ctx.stopRequested) {
        return { kind: 'interrupted', attempts: attempt };
      }
    }
  }

  private async attempt(page: PageDescriptor): Promise<WriteResult> {
    const { recordStore, strategy, mutator, isTransient } = this.ctx.settings;
    const fetched: TokenRecord[] = [];

    try {
      for await (const record of recordStore.fetchPage(page, strategy)) {
        fetched.push(record);
      }
    } catch (error) {
      return {
        success: false,
        error: `fetch failed: ${errorMessage(error)}`,
        transient: isTransient(error),
        cause: error,
      };
    }

    let mutated: TokenRecord[];
    try {
      mutated = fetched.map((record) => mutator(record));
    } catch (error) {
      // mutator errors are never retried
      return { success: false, error: `mutation failed: ${errorMessage(error)}`, transient: false, cause: error };
    }

    const expected = pageRowCount(page);
    if (mutated.length !== expected) {
      this.ctx.logger.warn(`Page ${String(page.index)} returned an unexpected row count`, {
        expected,
        actual: mutated.length,
      });
    }

    return this.writer.write(mutated);
  }

  /** Back-off that returns early when a stop is requested. */
  private sleep(ms: number): Promise<void> {
    const signal = this.ctx.signal;
    return new Promise((resolve) => {
      if (signal.aborted) {
        resolve();
        return;
      }
      const done = (): void => {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal.addEventListener('abort', done, { once: true });
    });
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
