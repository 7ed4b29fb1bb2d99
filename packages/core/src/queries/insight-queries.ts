import type Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@bizlake/shared';
import { z } from 'zod/v4';
import { readRelationKind } from '../warehouse/identifiers.ts';

export const DAILY_METRICS_RELATION = 'int_daily_metrics';
export const BUSINESS_INSIGHTS_RELATION = 'mart_business_insights';

export const GRANULARITIES = ['annual', 'monthly', 'quarterly'] as const;
export type Granularity = (typeof GRANULARITIES)[number];

export const DailyMetricRowSchema = z.object({
  date: z.iso.date(),
  year: z.number().int(),
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(31),
  dayOfWeek: z.number().int().min(1).max(7),
  totalRecords: z.number().int().nonnegative(),
  sourceFilesCount: z.number().int().nonnegative(),
  nullTimestampCount: z.number().int().nonnegative(),
  nullSourceFileCount: z.number().int().nonnegative(),
  earliestRecordTime: z.string(),
  latestRecordTime: z.string(),
  prevDayRecords: z.number().int().nonnegative().nullable(),
  nextDayRecords: z.number().int().nonnegative().nullable(),
  dailyChangePercentage: z.number().nullable(),
  movingAvg7d: z.number(),
  movingAvg30d: z.number(),
  processedAt: z.string(),
  runId: z.string(),
});

export type DailyMetricRow = z.infer<typeof DailyMetricRowSchema>;

export const BusinessInsightRowSchema = z.object({
  granularity: z.enum(GRANULARITIES),
  year: z.number().int(),
  period: z.number().int(),
  periodStart: z.iso.date(),
  totalRecords: z.number().int().nonnegative(),
  avgDailyRecords: z.number(),
  totalSourceFiles: z.number().int().nonnegative(),
  dataQualityPercentage: z.number(),
  avgDailyChange: z.number().nullable(),
  avg7dMovingAvg: z.number().nullable(),
  avg30dMovingAvg: z.number().nullable(),
  stddevRecords: z.number().nullable(),
  minRecords: z.number().nullable(),
  maxRecords: z.number().nullable(),
  processedAt: z.string(),
  runId: z.string(),
});

export type BusinessInsightRow = z.infer<typeof BusinessInsightRowSchema>;

export interface ListDailyMetricsInput {
  dateFrom?: string | null;
  dateTo?: string | null;
}

export interface ListBusinessInsightsInput {
  granularity?: Granularity | null;
  year?: number | null;
}

export interface InsightQueries {
  listDailyMetrics: (input?: ListDailyMetricsInput) => Result<DailyMetricRow[], AppError>;
  listBusinessInsights: (input?: ListBusinessInsightsInput) => Result<BusinessInsightRow[], AppError>;
}

function parseRows<T>(
  rows: readonly unknown[],
  schema: z.ZodType<T>,
  relation: string,
): Result<T[], AppError> {
  const parsedRows: T[] = [];
  for (let index = 0; index < rows.length; index += 1) {
    const parsed = schema.safeParse(rows[index]);
    if (!parsed.success) {
      return err(
        AppError.create(
          'QUERY_ROW_INVALID',
          'Wiersz modelu ma niepoprawny format.',
          'error',
          { relation, rowIndex: index, issues: parsed.error.issues },
        ),
      );
    }
    parsedRows.push(parsed.data);
  }
  return ok(parsedRows);
}

function ensureRelation(db: Database.Database, relation: string): Result<void, AppError> {
  if (readRelationKind(db, relation) === null) {
    return err(
      AppError.create(
        'QUERY_RELATION_MISSING',
        'Model nie został jeszcze zbudowany.',
        'error',
        { relation },
      ),
    );
  }
  return ok(undefined);
}

export function createInsightQueries(db: Database.Database): InsightQueries {
  return {
    listDailyMetrics: (input = {}) => {
      const relationResult = ensureRelation(db, DAILY_METRICS_RELATION);
      if (!relationResult.ok) {
        return relationResult;
      }

      try {
        const rows = db
          .prepare<{ dateFrom: string | null; dateTo: string | null }, unknown>(
            `
              SELECT
                date,
                year,
                month,
                day,
                day_of_week AS dayOfWeek,
                total_records AS totalRecords,
                source_files_count AS sourceFilesCount,
                null_timestamp_count AS nullTimestampCount,
                null_source_file_count AS nullSourceFileCount,
                earliest_record_time AS earliestRecordTime,
                latest_record_time AS latestRecordTime,
                prev_day_records AS prevDayRecords,
                next_day_records AS nextDayRecords,
                daily_change_percentage AS dailyChangePercentage,
                moving_avg_7d AS movingAvg7d,
                moving_avg_30d AS movingAvg30d,
                processed_at AS processedAt,
                run_id AS runId
              FROM int_daily_metrics
              WHERE (@dateFrom IS NULL OR date >= @dateFrom)
                AND (@dateTo IS NULL OR date <= @dateTo)
              ORDER BY date ASC
            `,
          )
          .all({ dateFrom: input.dateFrom ?? null, dateTo: input.dateTo ?? null });

        return parseRows(rows, DailyMetricRowSchema, DAILY_METRICS_RELATION);
      } catch (cause) {
        return err(
          AppError.fromCause(
            'QUERY_DAILY_METRICS_FAILED',
            'Nie udało się odczytać dziennych metryk.',
            { dateFrom: input.dateFrom ?? null, dateTo: input.dateTo ?? null },
            cause,
          ),
        );
      }
    },

    listBusinessInsights: (input = {}) => {
      const relationResult = ensureRelation(db, BUSINESS_INSIGHTS_RELATION);
      if (!relationResult.ok) {
        return relationResult;
      }

      try {
        const rows = db
          .prepare<{ granularity: string | null; year: number | null }, unknown>(
            `
              SELECT
                granularity,
                year,
                period,
                period_start AS periodStart,
                total_records AS totalRecords,
                avg_daily_records AS avgDailyRecords,
                total_source_files AS totalSourceFiles,
                data_quality_percentage AS dataQualityPercentage,
                avg_daily_change AS avgDailyChange,
                avg_7d_moving_avg AS avg7dMovingAvg,
                avg_30d_moving_avg AS avg30dMovingAvg,
                stddev_records AS stddevRecords,
                min_records AS minRecords,
                max_records AS maxRecords,
                processed_at AS processedAt,
                run_id AS runId
              FROM mart_business_insights
              WHERE (@granularity IS NULL OR granularity = @granularity)
                AND (@year IS NULL OR year = @year)
              ORDER BY granularity ASC, year ASC, period ASC
            `,
          )
          .all({ granularity: input.granularity ?? null, year: input.year ?? null });

        return parseRows(rows, BusinessInsightRowSchema, BUSINESS_INSIGHTS_RELATION);
      } catch (cause) {
        return err(
          AppError.fromCause(
            'QUERY_BUSINESS_INSIGHTS_FAILED',
            'Nie udało się odczytać podsumowań biznesowych.',
            { granularity: input.granularity ?? null, year: input.year ?? null },
            cause,
          ),
        );
      }
    },
  };
}
