import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { Sequelize } from 'sequelize';
import type { RunLogger } from '../../domain/ports/RunLogger.js';
import { BetterSqlite3Database } from './dialects/BetterSqlite3Database.js';

const SQLITE_PREFIX = 'sqlite:';

/**
 * Build a Sequelize instance for a connection URL.
 *
 * `sqlite:<path>` (or `sqlite::memory:`) runs on better-sqlite3; every other
 * URL is passed to Sequelize as is (`postgres://…` needs the `pg` driver).
 * SQL statements are logged at debug level.
 */
export function createSequelize(url: string, logger?: RunLogger): Sequelize {
  const logging = logger
    ? (sql: string): void => {
        logger.debug(sql);
      }
    : false;

  if (url.startsWith(SQLITE_PREFIX)) {
    const storage = url.slice(SQLITE_PREFIX.length).replace(/^\/\//, '') || ':memory:';
    if (storage !== ':memory:') {
      mkdirSync(dirname(storage), { recursive: true });
    }
    return new Sequelize({
      dialect: 'sqlite',
      storage,
      logging,
      dialectModule: { Database: BetterSqlite3Database },
      pool: { max: 1, min: 1, idle: 30000, acquire: 60000, evict: 30000 },
    });
  }

  return new Sequelize(url, { logging });
}
