import { quoteIdentifier, sqlStringLiteral } from '@bizlake/core';
import type { ModelDefinition } from './types.ts';

export const stgTransactionsModel: ModelDefinition = {
  name: 'stg_transactions',
  stage: 'staging',
  materialized: 'view',
  tags: ['staging', 'transactions'],
  dependsOn: [],
  readsRawSource: true,
  description:
    'Raw transactions with ingestion metadata exposed as regular columns and partition date parts. '
    + 'Rows without a partition time are dropped.',
  columns: [
    {
      name: 'record_id',
      description: 'Sequential row number assigned at read time.',
      tests: [{ type: 'not_null' }, { type: 'unique' }],
    },
    {
      name: 'partition_time',
      description: 'Ingestion partition timestamp (UTC, day-truncated).',
      tests: [{ type: 'not_null' }],
    },
    { name: 'source_file', description: 'File the record was loaded from.', tests: [] },
    { name: 'file_load_time', description: 'Start time of the load job.', tests: [] },
    {
      name: 'partition_date',
      description: 'Calendar date of the partition (YYYY-MM-DD).',
      tests: [{ type: 'not_null' }],
    },
    { name: 'partition_year', description: 'Year of the partition date.', tests: [] },
    { name: 'partition_month', description: 'Month of the partition date (1-12).', tests: [] },
    { name: 'partition_day', description: 'Day of month of the partition date.', tests: [] },
    { name: 'processed_at', description: 'Time the model was last built.', tests: [] },
    { name: 'run_id', description: 'Invocation that built the model.', tests: [] },
  ],
  modelTests: [],
  render: (context) => `
    SELECT
      src.*,
      ROW_NUMBER() OVER () AS record_id,
      src._partition_time AS partition_time,
      src._file_name AS source_file,
      src._file_load_time AS file_load_time,
      date(src._partition_time) AS partition_date,
      CAST(strftime('%Y', src._partition_time) AS INTEGER) AS partition_year,
      CAST(strftime('%m', src._partition_time) AS INTEGER) AS partition_month,
      CAST(strftime('%d', src._partition_time) AS INTEGER) AS partition_day,
      ${sqlStringLiteral(context.processedAt)} AS processed_at,
      ${sqlStringLiteral(context.runId)} AS run_id
    FROM ${quoteIdentifier(context.rawTable)} AS src
    WHERE src._partition_time IS NOT NULL
  `,
};
