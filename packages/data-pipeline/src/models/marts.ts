import { sqlStringLiteral } from '@bizlake/core';
import type { ModelDefinition } from './types.ts';

export const martBusinessInsightsModel: ModelDefinition = {
  name: 'mart_business_insights',
  stage: 'marts',
  materialized: 'table',
  tags: ['marts', 'insights'],
  dependsOn: ['int_daily_metrics'],
  readsRawSource: false,
  description:
    'Monthly, quarterly and annual rollups of daily volume. Quarterly and annual rows re-aggregate the '
    + 'monthly summary; quarterly rows carry no variability columns.',
  columns: [
    {
      name: 'granularity',
      description: 'monthly, quarterly or annual.',
      tests: [
        { type: 'not_null' },
        { type: 'accepted_values', values: ['monthly', 'quarterly', 'annual'] },
      ],
    },
    { name: 'year', description: 'Calendar year.', tests: [{ type: 'not_null' }] },
    {
      name: 'period',
      description: 'Month (1-12), quarter (1-4) or the year itself.',
      tests: [{ type: 'not_null' }],
    },
    {
      name: 'period_start',
      description: 'First day of the period (YYYY-MM-DD).',
      tests: [{ type: 'not_null' }],
    },
    { name: 'total_records', description: 'Records in the period.', tests: [{ type: 'not_null' }] },
    { name: 'avg_daily_records', description: 'Average records per present day.', tests: [] },
    { name: 'total_source_files', description: 'Sum of daily distinct file counts.', tests: [] },
    {
      name: 'data_quality_percentage',
      description: 'Null partition timestamps as a percentage of total_records; 0 for empty periods.',
      tests: [],
    },
    { name: 'avg_daily_change', description: 'Average day-over-day change percentage.', tests: [] },
    { name: 'avg_7d_moving_avg', description: 'Average of the 7 day moving average.', tests: [] },
    { name: 'avg_30d_moving_avg', description: 'Average of the 30 day moving average.', tests: [] },
    {
      name: 'stddev_records',
      description: 'Sample standard deviation of daily (monthly rows) or monthly (annual rows) totals.',
      tests: [],
    },
    { name: 'min_records', description: 'Smallest daily or monthly total.', tests: [] },
    { name: 'max_records', description: 'Largest daily or monthly total.', tests: [] },
    { name: 'processed_at', description: 'Time the model was built.', tests: [] },
    { name: 'run_id', description: 'Invocation that built the model.', tests: [] },
  ],
  modelTests: [{ type: 'unique_combination', columns: ['granularity', 'year', 'period'] }],
  render: (context) => {
    const processedAt = sqlStringLiteral(context.processedAt);
    const runId = sqlStringLiteral(context.runId);
    return `
      WITH monthly_summary AS (
        SELECT
          year,
          month,
          SUM(total_records) AS total_records,
          AVG(total_records) AS avg_daily_records,
          SUM(source_files_count) AS total_source_files,
          SUM(null_timestamp_count) AS total_null_timestamps,
          SUM(null_source_file_count) AS total_null_source_files,
          AVG(daily_change_percentage) AS avg_daily_change,
          AVG(moving_avg_7d) AS avg_7d_moving_avg,
          AVG(moving_avg_30d) AS avg_30d_moving_avg,
          COALESCE(stddev_samp(total_records), 0.0) AS stddev_records,
          MIN(total_records) AS min_records,
          MAX(total_records) AS max_records
        FROM int_daily_metrics
        GROUP BY year, month
      ),
      quarterly_summary AS (
        SELECT
          year,
          ((month - 1) / 3) + 1 AS quarter,
          SUM(total_records) AS total_records,
          AVG(avg_daily_records) AS avg_daily_records,
          SUM(total_source_files) AS total_source_files,
          SUM(total_null_timestamps) AS total_null_timestamps,
          AVG(avg_daily_change) AS avg_daily_change,
          AVG(avg_7d_moving_avg) AS avg_7d_moving_avg,
          AVG(avg_30d_moving_avg) AS avg_30d_moving_avg
        FROM monthly_summary
        GROUP BY year, quarter
      ),
      annual_summary AS (
        SELECT
          year,
          SUM(total_records) AS total_records,
          AVG(avg_daily_records) AS avg_daily_records,
          SUM(total_source_files) AS total_source_files,
          SUM(total_null_timestamps) AS total_null_timestamps,
          AVG(avg_daily_change) AS avg_daily_change,
          AVG(avg_7d_moving_avg) AS avg_7d_moving_avg,
          AVG(avg_30d_moving_avg) AS avg_30d_moving_avg,
          COALESCE(stddev_samp(total_records), 0.0) AS stddev_records,
          MIN(total_records) AS min_records,
          MAX(total_records) AS max_records
        FROM monthly_summary
        GROUP BY year
      )
      SELECT
        'monthly' AS granularity,
        year,
        month AS period,
        printf('%04d-%02d-01', year, month) AS period_start,
        total_records,
        avg_daily_records,
        total_source_files,
        CASE
          WHEN total_records > 0 THEN CAST(total_null_timestamps AS REAL) / total_records * 100
          ELSE 0.0
        END AS data_quality_percentage,
        avg_daily_change,
        avg_7d_moving_avg,
        avg_30d_moving_avg,
        stddev_records,
        min_records,
        max_records,
        ${processedAt} AS processed_at,
        ${runId} AS run_id
      FROM monthly_summary

      UNION ALL

      SELECT
        'quarterly' AS granularity,
        year,
        quarter AS period,
        printf('%04d-%02d-01', year, (quarter - 1) * 3 + 1) AS period_start,
        total_records,
        avg_daily_records,
        total_source_files,
        CASE
          WHEN total_records > 0 THEN CAST(total_null_timestamps AS REAL) / total_records * 100
          ELSE 0.0
        END AS data_quality_percentage,
        avg_daily_change,
        avg_7d_moving_avg,
        avg_30d_moving_avg,
        NULL AS stddev_records,
        NULL AS min_records,
        NULL AS max_records,
        ${processedAt} AS processed_at,
        ${runId} AS run_id
      FROM quarterly_summary

      UNION ALL

      SELECT
        'annual' AS granularity,
        year,
        year AS period,
        printf('%04d-01-01', year) AS period_start,
        total_records,
        avg_daily_records,
        total_source_files,
        CASE
          WHEN total_records > 0 THEN CAST(total_null_timestamps AS REAL) / total_records * 100
          ELSE 0.0
        END AS data_quality_percentage,
        avg_daily_change,
        avg_7d_moving_avg,
        avg_30d_moving_avg,
        stddev_records,
        min_records,
        max_records,
        ${processedAt} AS processed_at,
        ${runId} AS run_id
      FROM annual_summary

      ORDER BY granularity, year, period
    `;
  },
};
