import { MutationEngine } from '../../MutationEngine.js';
import type { CheckpointStore } from '../../domain/ports/CheckpointStore.js';
import type { RunOutcome } from '../../domain/model/Run.js';
import { PageCommitError } from '../../domain/errors/PageCommitError.js';
import { formatProgressLine } from '../../domain/services/ProgressEstimator.js';
import { createSequelize } from '../../infrastructure/sequelize/createSequelize.js';
import { SequelizeRecordStore } from '../../infrastructure/sequelize/SequelizeRecordStore.js';
import { SequelizeCheckpointStore } from '../../infrastructure/sequelize/SequelizeCheckpointStore.js';
import { FileCheckpointStore } from '../../infrastructure/state/FileCheckpointStore.js';
import type { RegenerateConfig } from '../config.js';
import type { CliContext } from '../CliContext.js';

/** Exit code of a run stopped by a signal (128 + SIGINT). */
export const EXIT_INTERRUPTED = 130;

/** `--checkpoint db` keeps the checkpoint in a table next to the data. */
export const DB_CHECKPOINT = 'db';

/**
 * Regenerate every token of the table, resuming from the checkpoint.
 *
 * @returns Process exit code. Throws `PageCommitError` when a page cannot be committed.
 */
export async function regenerateCommand(config: RegenerateConfig, ctx: CliContext): Promise<number> {
  const logger = ctx.logger.child('regenerate');
  const sequelize = createSequelize(config.databaseUrl, ctx.logger.child('sql'));

  try {
    const recordStore = new SequelizeRecordStore(sequelize, { tableName: config.table });
    await recordStore.initialize();

    let checkpointStore: CheckpointStore;
    if (config.checkpoint === DB_CHECKPOINT) {
      const store = new SequelizeCheckpointStore(sequelize, { name: `${config.table}.token` });
      await store.initialize();
      checkpointStore = store;
    } else {
      checkpointStore = new FileCheckpointStore({ path: config.checkpoint });
    }

    const engine = new MutationEngine({
      recordStore,
      checkpointStore,
      pageSize: config.pageSize,
      strategy: config.strategy,
      maxRetries: config.maxRetries,
      retryDelayMs: config.retryDelayMs,
      logger,
    });
    engine.on('run:progress', (event) => {
      ctx.progress.update(formatProgressLine(event.progress));
    });

    const outcome = await engine.run(ctx.signal);
    ctx.progress.finish();
    return report(outcome, ctx);
  } finally {
    await sequelize.close();
  }
}

function report(outcome: RunOutcome, ctx: CliContext): number {
  const { summary } = outcome;

  if (outcome.status === 'DONE') {
    ctx.print(
      `Regenerated ${String(summary.rowsMutated)} rows in ${String(summary.pagesCommitted)} pages ` +
        `(${String(summary.totalRows)} rows in table)`,
      'success',
    );
    return 0;
  }

  const { cause, checkpoint } = outcome;
  if (cause.kind === 'failed') {
    throw new PageCommitError(cause.page, cause.attempts, checkpoint.lastCommittedPage, cause.error);
  }

  ctx.print(
    `Interrupted (${cause.reason}) with ${String(checkpoint.lastCommittedPage)} of ` +
      `${String(checkpoint.totalPages)} pages committed. Run again to resume.`,
    'warning',
  );
  return EXIT_INTERRUPTED;
}
