import { createSequelize } from '../../infrastructure/sequelize/createSequelize.js';
import { SequelizeRecordStore } from '../../infrastructure/sequelize/SequelizeRecordStore.js';
import type { GlobalConfig } from '../config.js';
import type { CliContext } from '../CliContext.js';

/** Delete every row of the table. */
export async function purgeCommand(config: GlobalConfig, ctx: CliContext): Promise<number> {
  const sequelize = createSequelize(config.databaseUrl, ctx.logger.child('sql'));

  try {
    const store = new SequelizeRecordStore(sequelize, { tableName: config.table });
    await store.initialize();
    const deleted = await store.purge();
    ctx.print(`Deleted ${String(deleted)} rows from ${config.table}`, 'success');
    return 0;
  } finally {
    await sequelize.close();
  }
}
