import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface CheckpointRow {
  name: string;
  lastCommittedPage: number;
  totalPages: number;
  pageSize: number;
  status: string;
  timestamp: number | string;
}

export type CheckpointModel = ModelStatic<Model<CheckpointRow>>;

export function defineCheckpointModel(sequelize: Sequelize, tableName: string): CheckpointModel {
  return sequelize.define(
    'RowsweepCheckpoint',
    {
      name: {
        type: DataTypes.STRING(128),
        primaryKey: true,
        allowNull: false,
      },
      lastCommittedPage: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      totalPages: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      pageSize: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      status: {
        type: DataTypes.STRING(16),
        allowNull: false,
      },
      timestamp: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
    },
    {
      tableName,
      timestamps: false,
    },
  );
}
