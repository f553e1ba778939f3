import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface JobRow {
  id: string;
  keyColumn: string;
  column: string;
  status: string;
  totalRows: number;
  startedAt: number | string | null;
  completedAt: number | string | null;
}

export type JobInstance = Model<JobRow, JobRow>;
export type JobModel = ModelStatic<JobInstance>;

export function defineJobModel(sequelize: Sequelize, tablePrefix: string): JobModel {
  return sequelize.define<JobInstance>(
    'EnrichmentJob',
    {
      id: {
        type: DataTypes.STRING(64),
        primaryKey: true,
        allowNull: false,
      },
      keyColumn: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      column: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      status: {
        type: DataTypes.STRING(20),
        allowNull: false,
      },
      totalRows: {
        type: DataTypes.INTEGER,
        allowNull: false,
        defaultValue: 0,
      },
      startedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
      completedAt: {
        type: DataTypes.BIGINT,
        allowNull: true,
      },
    },
    {
      tableName: `${tablePrefix}enrichment_jobs`,
      timestamps: false,
    },
  );
}
