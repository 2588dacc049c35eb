import type { Sequelize } from 'sequelize';
import type { Checkpoint, CheckpointLookup } from '../../domain/model/Checkpoint.js';
import type { CheckpointStore } from '../../domain/ports/CheckpointStore.js';
import { defineCheckpointModel } from './models/CheckpointModel.js';
import type { CheckpointModel } from './models/CheckpointModel.js';
import * as CheckpointMapper from './mappers/CheckpointMapper.js';

export interface SequelizeCheckpointStoreOptions {
  /** Checkpoint key, one per mutated table. Default: `'tickets.token'`. */
  readonly name?: string;
  /** Default: `'rowsweep_checkpoints'`. */
  readonly tableName?: string;
}

/**
 * Checkpoint stored as a metadata row next to the mutated table.
 *
 * Each write is a single-row upsert, so readers see either the old or the new
 * checkpoint. Call `initialize()` after construction to create the table.
 */
export class SequelizeCheckpointStore implements CheckpointStore {
  private readonly Checkpoint: CheckpointModel;
  private readonly name: string;

  constructor(sequelize: Sequelize, options?: SequelizeCheckpointStoreOptions) {
    this.Checkpoint = defineCheckpointModel(sequelize, options?.tableName ?? 'rowsweep_checkpoints');
    this.name = options?.name ?? 'tickets.token';
  }

  async initialize(): Promise<void> {
    await this.Checkpoint.sync();
  }

  async read(): Promise<CheckpointLookup> {
    const row = await this.Checkpoint.findByPk(this.name);
    if (!row) return { found: false, reason: 'ABSENT' };
    return CheckpointMapper.toLookup(row.get({ plain: true }));
  }

  async write(checkpoint: Checkpoint): Promise<void> {
    await this.Checkpoint.upsert(CheckpointMapper.toRow(this.name, checkpoint));
  }
}
