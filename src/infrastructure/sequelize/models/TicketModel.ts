import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export type TicketModel = ModelStatic<Model>;

export function defineTicketModel(sequelize: Sequelize, tableName: string): TicketModel {
  return sequelize.define(
    'Ticket',
    {
      id: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        autoIncrement: true,
        allowNull: false,
      },
      token: {
        type: DataTypes.UUID,
        allowNull: false,
        defaultValue: DataTypes.UUIDV4,
      },
    },
    {
      tableName,
      timestamps: false,
    },
  );
}
