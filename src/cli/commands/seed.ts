import { ProgressEstimator, formatProgressLine } from '../../domain/services/ProgressEstimator.js';
import { createSequelize } from '../../infrastructure/sequelize/createSequelize.js';
import { SequelizeRecordStore } from '../../infrastructure/sequelize/SequelizeRecordStore.js';
import type { SeedConfig } from '../config.js';
import type { CliContext } from '../CliContext.js';
import { EXIT_INTERRUPTED } from './regenerate.js';

/** Insert `count` rows with fresh tokens in bounded batches. */
export async function seedCommand(config: SeedConfig, ctx: CliContext): Promise<number> {
  const logger = ctx.logger.child('seed');
  const sequelize = createSequelize(config.databaseUrl, ctx.logger.child('sql'));

  try {
    const store = new SequelizeRecordStore(sequelize, { tableName: config.table });
    await store.initialize();

    logger.info(`Inserting ${String(config.count)} rows`, { batchSize: config.batchSize, table: config.table });
    const estimator = new ProgressEstimator(config.count, config.batchSize);
    const inserted = await store.seed(config.count, {
      batchSize: config.batchSize,
      signal: ctx.signal,
      onBatch: (rowsProcessed, elapsedMs) => {
        ctx.progress.update(formatProgressLine(estimator.record({ rowsProcessed, elapsedMs })));
      },
    });
    ctx.progress.finish();

    if (inserted < config.count) {
      ctx.print(`Interrupted after inserting ${String(inserted)} of ${String(config.count)} rows`, 'warning');
      return EXIT_INTERRUPTED;
    }
    ctx.print(`Inserted ${String(inserted)} rows`, 'success');
    return 0;
  } finally {
    await sequelize.close();
  }
}
