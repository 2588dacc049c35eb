import { randomUUID } from 'node:crypto';
import { Op } from 'sequelize';
import type { FindOptions, Model, Sequelize } from 'sequelize';
import type { PageDescriptor, PagingStrategy } from '../../domain/model/Page.js';
import type { RecordId, TokenRecord } from '../../domain/model/TokenRecord.js';
import type { RecordStore } from '../../domain/ports/RecordStore.js';
import type { TokenGenerator } from '../../domain/services/TokenMutator.js';
import { defineTicketModel } from './models/TicketModel.js';
import type { TicketModel } from './models/TicketModel.js';
import * as TicketMapper from './mappers/TicketMapper.js';
import { toStoreError } from './toStoreError.js';

export interface SeedOptions {
  /** Rows per INSERT. Default: `1000`. */
  readonly batchSize?: number;
  readonly generate?: TokenGenerator;
  /** Called after each batch with the running total and the batch's duration. */
  readonly onBatch?: (inserted: number, elapsedMs: number) => void;
  readonly signal?: AbortSignal;
}

export interface SequelizeRecordStoreOptions {
  /** Table holding the rows to rewrite. Default: `'tickets'`. */
  readonly tableName?: string;
}

/**
 * Sequelize-based RecordStore over a `(id, token)` table.
 *
 * Pages are windowed range queries ordered by primary key, so at most one page
 * of rows is in memory. `keyset` paging seeks with `id > :lastId` when the
 * last row streamed sits right before the requested page, and uses `OFFSET`
 * otherwise.
 * A page commits as one multi-row `INSERT … ON CONFLICT (id) DO UPDATE SET
 * token` inside a transaction.
 *
 * Call `initialize()` after construction to create the table.
 */
export class SequelizeRecordStore implements RecordStore {
  private readonly sequelize: Sequelize;
  private readonly Ticket: TicketModel;
  private boundary: { readonly end: number; readonly lastId: RecordId } | null = null;

  constructor(sequelize: Sequelize, options?: SequelizeRecordStoreOptions) {
    this.sequelize = sequelize;
    this.Ticket = defineTicketModel(this.sequelize, options?.tableName ?? 'tickets');
  }

  async initialize(): Promise<void> {
    await this.Ticket.sync();
  }

  async countRecords(): Promise<number> {
    try {
      return await this.Ticket.count();
    } catch (error) {
      throw toStoreError('count', error);
    }
  }

  async *fetchPage(page: PageDescriptor, strategy: PagingStrategy): AsyncIterable<TokenRecord> {
    let rows: Model[];
    try {
      rows = await this.Ticket.findAll(this.pageQuery(page, strategy));
    } catch (error) {
      throw toStoreError(`fetch of page ${String(page.index)}`, error);
    }

    let lastId: RecordId | null = null;
    let streamed = 0;
    for (const row of rows) {
      const record = TicketMapper.toDomain(row.get({ plain: true }));
      lastId = record.id;
      streamed++;
      yield record;
    }

    if (lastId !== null) {
      this.boundary = { end: page.start + streamed, lastId };
    }
  }

  async commitBatch(records: readonly TokenRecord[]): Promise<void> {
    if (records.length === 0) return;

    try {
      await this.sequelize.transaction(async (transaction) => {
        await this.Ticket.bulkCreate(records.map(TicketMapper.toRow), {
          updateOnDuplicate: ['token'],
          transaction,
        });
      });
    } catch (error) {
      throw toStoreError(`commit of ${String(records.length)} rows`, error);
    }
  }

  /**
   * Insert `count` rows with fresh tokens, `batchSize` rows per statement.
   * Memory stays proportional to `batchSize`. An aborted `signal` stops the
   * insert between batches.
   *
   * @returns Number of rows inserted.
   */
  async seed(count: number, options: SeedOptions = {}): Promise<number> {
    const batchSize = options.batchSize ?? 1000;
    const generate = options.generate ?? randomUUID;
    let inserted = 0;
    try {
      while (inserted < count && !options.signal?.aborted) {
        const started = Date.now();
        const size = Math.min(batchSize, count - inserted);
        const rows = Array.from({ length: size }, () => ({ token: generate() }));
        await this.Ticket.bulkCreate(rows);
        inserted += size;
        options.onBatch?.(inserted, Date.now() - started);
      }
    } catch (error) {
      throw toStoreError(`seed after ${String(inserted)} rows`, error);
    } finally {
      this.boundary = null;
    }
    return inserted;
  }

  /** Delete every row. Returns the number of rows deleted. */
  async purge(): Promise<number> {
    try {
      const deleted = await this.Ticket.destroy({ where: {} });
      this.boundary = null;
      return deleted;
    } catch (error) {
      throw toStoreError('purge', error);
    }
  }

  private pageQuery(page: PageDescriptor, strategy: PagingStrategy): FindOptions {
    const query: FindOptions = {
      attributes: ['id', 'token'],
      order: [['id', 'ASC']],
      limit: page.size,
    };

    const boundary = this.boundary;
    if (strategy === 'keyset' && boundary && boundary.end === page.start) {
      return { ...query, where: { id: { [Op.gt]: boundary.lastId } } };
    }
    return { ...query, offset: page.start };
  }
}
