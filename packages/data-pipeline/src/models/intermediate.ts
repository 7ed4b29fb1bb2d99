import { sqlStringLiteral } from '@bizlake/core';
import type { ModelDefinition } from './types.ts';

export const intDailyMetricsModel: ModelDefinition = {
  name: 'int_daily_metrics',
  stage: 'intermediate',
  materialized: 'table',
  tags: ['intermediate', 'daily'],
  dependsOn: ['stg_transactions'],
  readsRawSource: false,
  description:
    'One row per partition date with record volume, null-indicator counts, neighbouring-day volumes, '
    + 'day-over-day change and trailing 7 and 30 day averages.',
  columns: [
    {
      name: 'date',
      description: 'Partition date.',
      tests: [
        { type: 'not_null' },
        { type: 'unique' },
        { type: 'relationships', toModel: 'stg_transactions', field: 'partition_date' },
      ],
    },
    { name: 'year', description: 'Year of the date.', tests: [] },
    { name: 'month', description: 'Month of the date (1-12).', tests: [] },
    { name: 'day', description: 'Day of month.', tests: [] },
    { name: 'day_of_week', description: '1 = Sunday ... 7 = Saturday.', tests: [] },
    {
      name: 'total_records',
      description: 'Staging rows on the date.',
      tests: [{ type: 'not_null' }],
    },
    { name: 'source_files_count', description: 'Distinct non-null source files on the date.', tests: [] },
    { name: 'null_timestamp_count', description: 'Rows with a null partition time.', tests: [] },
    { name: 'null_source_file_count', description: 'Rows with a null source file.', tests: [] },
    { name: 'earliest_record_time', description: 'Minimum partition time on the date.', tests: [] },
    { name: 'latest_record_time', description: 'Maximum partition time on the date.', tests: [] },
    { name: 'prev_day_records', description: 'total_records of the previous present date.', tests: [] },
    { name: 'next_day_records', description: 'total_records of the next present date.', tests: [] },
    {
      name: 'daily_change_percentage',
      description: 'Change against prev_day_records in percent; null when that is null or zero.',
      tests: [],
    },
    { name: 'moving_avg_7d', description: 'Average total_records over the last 7 rows.', tests: [] },
    { name: 'moving_avg_30d', description: 'Average total_records over the last 30 rows.', tests: [] },
    { name: 'processed_at', description: 'Time the model was built.', tests: [] },
    { name: 'run_id', description: 'Invocation that built the model.', tests: [] },
  ],
  modelTests: [],
  render: (context) => `
    WITH daily AS (
      SELECT
        partition_date AS date,
        partition_year AS year,
        partition_month AS month,
        partition_day AS day,
        CAST(strftime('%w', partition_date) AS INTEGER) + 1 AS day_of_week,
        COUNT(*) AS total_records,
        COUNT(DISTINCT source_file) AS source_files_count,
        SUM(CASE WHEN partition_time IS NULL THEN 1 ELSE 0 END) AS null_timestamp_count,
        SUM(CASE WHEN source_file IS NULL THEN 1 ELSE 0 END) AS null_source_file_count,
        MIN(partition_time) AS earliest_record_time,
        MAX(partition_time) AS latest_record_time
      FROM stg_transactions
      GROUP BY 1, 2, 3, 4, 5
    ),
    windowed AS (
      SELECT
        daily.*,
        LAG(total_records) OVER by_date AS prev_day_records,
        LEAD(total_records) OVER by_date AS next_day_records,
        AVG(total_records) OVER (by_date ROWS BETWEEN 6 PRECEDING AND CURRENT ROW) AS moving_avg_7d,
        AVG(total_records) OVER (by_date ROWS BETWEEN 29 PRECEDING AND CURRENT ROW) AS moving_avg_30d
      FROM daily
      WINDOW by_date AS (ORDER BY date)
    )
    SELECT
      date,
      year,
      month,
      day,
      day_of_week,
      total_records,
      source_files_count,
      null_timestamp_count,
      null_source_file_count,
      earliest_record_time,
      latest_record_time,
      prev_day_records,
      next_day_records,
      CASE
        WHEN prev_day_records > 0
          THEN CAST(total_records - prev_day_records AS REAL) / prev_day_records * 100
      END AS daily_change_percentage,
      moving_avg_7d,
      moving_avg_30d,
      ${sqlStringLiteral(context.processedAt)} AS processed_at,
      ${sqlStringLiteral(context.runId)} AS run_id
    FROM windowed
    ORDER BY date ASC
  `,
};
