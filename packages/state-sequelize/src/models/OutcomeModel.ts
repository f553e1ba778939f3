import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model, Optional } from 'sequelize';

export interface OutcomeRow {
  id: number;
  jobId: string;
  rowKey: string;
  position: number;
  status: string;
  /** JSON text of the resolved cell, so numbers and booleans keep their type. */
  value: string | null;
  error: string | null;
  attempts: number;
}

export type OutcomeCreationRow = Optional<OutcomeRow, 'id'>;
export type OutcomeInstance = Model<OutcomeRow, OutcomeCreationRow>;
export type OutcomeModel = ModelStatic<OutcomeInstance>;

export function defineOutcomeModel(sequelize: Sequelize, tablePrefix: string): OutcomeModel {
  return sequelize.define<OutcomeInstance>(
    'EnrichmentOutcome',
    {
      id: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        autoIncrement: true,
      },
      jobId: {
        type: DataTypes.STRING(64),
        allowNull: false,
        // Composite unique key: bulkCreate's updateOnDuplicate conflicts on it.
        unique: 'job_row_key',
      },
      rowKey: {
        type: DataTypes.STRING(255),
        allowNull: false,
        unique: 'job_row_key',
      },
      position: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      status: {
        type: DataTypes.STRING(10),
        allowNull: false,
      },
      value: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      error: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      attempts: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
    },
    {
      tableName: `${tablePrefix}enrichment_outcomes`,
      timestamps: false,
      indexes: [{ fields: ['jobId', 'status'] }],
    },
  );
}
