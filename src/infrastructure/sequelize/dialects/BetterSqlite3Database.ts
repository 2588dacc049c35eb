import Database from 'better-sqlite3';

type Callback = (...args: unknown[]) => void;
type BindValue = string | number | bigint | Buffer | null | Uint8Array;
type BindRecord = { [key: string]: BindValue };
type BindParam = BindValue | BindRecord | BindValue[];

interface RunResult {
  lastID: number;
  changes: number;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function isCallback(value: unknown): value is Callback {
  return typeof value === 'function';
}

function isPlainObject(value: unknown): value is { [key: string]: unknown } {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  return !(value instanceof Buffer || value instanceof Date || value instanceof Uint8Array);
}

/** better-sqlite3 binds no booleans, dates or undefined. */
function toBindValue(value: unknown): BindValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.getTime();
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    value instanceof Buffer ||
    value instanceof Uint8Array
  ) {
    return value;
  }
  return JSON.stringify(value);
}

/** Named parameters arrive as `$name`, `:name` or `@name`; better-sqlite3 wants the bare name. */
function toBindParam(value: unknown): BindParam {
  if (Array.isArray(value)) return value.map(toBindValue);
  if (isPlainObject(value)) {
    const named: BindRecord = {};
    for (const [key, entry] of Object.entries(value)) {
      named[/^[$:@]/.test(key) ? key.slice(1) : key] = toBindValue(entry);
    }
    return named;
  }
  return toBindValue(value);
}

function splitArgs(params: unknown[]): { args: BindParam[]; callback?: Callback } {
  const last = params[params.length - 1];
  if (isCallback(last)) {
    return { args: params.slice(0, -1).map(toBindParam), callback: last };
  }
  return { args: params.map(toBindParam) };
}

/**
 * `sqlite3`-compatible connection backed by better-sqlite3, handed to
 * Sequelize as `dialectModule: { Database: BetterSqlite3Database }`.
 *
 * Implements the subset of the callback API Sequelize's sqlite dialect calls:
 * `run`, `all`, `exec`, `serialize`, `parallelize` and `close`. better-sqlite3
 * compiles from source on install, so no prebuilt sqlite3 binary is needed.
 */
export class BetterSqlite3Database {
  private readonly handle: Database.Database | null;

  constructor(filename: string, mode?: number | Callback, callback?: Callback) {
    const done = isCallback(mode) ? mode : callback;

    try {
      this.handle = new Database(filename);
    } catch (err) {
      if (!done) throw err;
      this.handle = null;
      setTimeout(() => {
        done(toError(err));
      }, 0);
      return;
    }

    if (done) {
      // Sequelize registers the connection after the constructor returns.
      setTimeout(() => {
        done(null);
      }, 0);
    }
  }

  run(sql: string, ...params: unknown[]): this {
    const { args, callback } = splitArgs(params);

    try {
      const info = this.db().prepare(sql).run(...args);
      if (callback) {
        const context: RunResult = { lastID: Number(info.lastInsertRowid), changes: info.changes };
        callback.call(context, null);
      }
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
    return this;
  }

  all(sql: string, ...params: unknown[]): this {
    const { args, callback } = splitArgs(params);

    try {
      const statement = this.db().prepare(sql);
      // DDL reaches all() too; those statements return no rows.
      if (statement.reader) {
        const rows = statement.all(...args);
        if (callback) callback(null, rows);
      } else {
        statement.run(...args);
        if (callback) callback(null, []);
      }
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
    return this;
  }

  exec(sql: string, callback?: Callback): this {
    try {
      this.db().exec(sql);
      if (callback) callback(null);
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
    return this;
  }

  close(callback?: Callback): void {
    try {
      if (this.handle?.open) this.handle.close();
      if (callback) callback(null);
    } catch (err) {
      if (!callback) throw err;
      callback(toError(err));
    }
  }

  private db(): Database.Database {
    if (!this.handle) throw new Error('SQLite database failed to open');
    return this.handle;
  }

  serialize(callback?: Callback): void {
    if (callback) callback();
  }

  parallelize(callback?: Callback): void {
    if (callback) callback();
  }
}
