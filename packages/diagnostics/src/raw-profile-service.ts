import {
  DEFAULT_RAW_TABLE,
  quoteIdentifier,
  readRelationColumns,
  readRelationKind,
  validateIdentifier,
  type DatabaseConnection,
} from '@bizlake/core';
import { AppError, createSilentLogger, err, ok, type Logger, type Result } from '@bizlake/shared';
import { compactUtcTimestamp, writeJsonReport } from './report-files.ts';

export interface RawSourceOverview {
  totalRecords: number;
  uniqueDates: number;
  earliestDate: string | null;
  latestDate: string | null;
  sourceFiles: number;
  durationDays: number | null;
}

export interface ColumnProfile {
  name: string;
  type: string;
  nullCount: number;
  nullPercentage: number;
  emptyCount: number;
  emptyPercentage: number;
  uniqueValues: number;
}

export interface MonthlyVolumePattern {
  month: number;
  days: number;
  avgDailyRecords: number;
}

export interface RawSourceProfile {
  timestamp: string;
  rawTable: string;
  overview: RawSourceOverview;
  columns: ColumnProfile[];
  monthlyPattern: MonthlyVolumePattern[];
}

export interface ProfileRawSourceInput {
  db: DatabaseConnection['db'];
  rawTable?: string;
  logger?: Logger;
  now?: () => Date;
}

export interface WriteRawProfileInput {
  profile: RawSourceProfile;
  reportsDir: string;
}

function toPercentage(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

function readOverview(db: DatabaseConnection['db'], table: string): RawSourceOverview {
  const row = db
    .prepare<[], RawSourceOverview>(
      `
        SELECT
          COUNT(*) AS totalRecords,
          COUNT(DISTINCT date(_partition_time)) AS uniqueDates,
          MIN(date(_partition_time)) AS earliestDate,
          MAX(date(_partition_time)) AS latestDate,
          COUNT(DISTINCT _file_name) AS sourceFiles,
          CAST(julianday(MAX(date(_partition_time))) - julianday(MIN(date(_partition_time))) AS INTEGER) AS durationDays
        FROM ${quoteIdentifier(table)}
      `,
    )
    .get();

  return {
    totalRecords: row?.totalRecords ?? 0,
    uniqueDates: row?.uniqueDates ?? 0,
    earliestDate: row?.earliestDate ?? null,
    latestDate: row?.latestDate ?? null,
    sourceFiles: row?.sourceFiles ?? 0,
    durationDays: row?.durationDays ?? null,
  };
}

function readColumnProfile(
  db: DatabaseConnection['db'],
  table: string,
  column: { name: string; type: string },
): ColumnProfile {
  const quoted = quoteIdentifier(column.name);
  const row = db
    .prepare<[], { total: number; nullCount: number; emptyCount: number | null; uniqueValues: number }>(
      `
        SELECT
          COUNT(*) AS total,
          COUNT(*) - COUNT(${quoted}) AS nullCount,
          SUM(CASE WHEN CAST(${quoted} AS TEXT) = '' THEN 1 ELSE 0 END) AS emptyCount,
          COUNT(DISTINCT ${quoted}) AS uniqueValues
        FROM ${quoteIdentifier(table)}
      `,
    )
    .get();

  const total = row?.total ?? 0;
  const nullCount = row?.nullCount ?? 0;
  const emptyCount = row?.emptyCount ?? 0;
  return {
    name: column.name,
    type: column.type,
    nullCount,
    nullPercentage: toPercentage(nullCount, total),
    emptyCount,
    emptyPercentage: toPercentage(emptyCount, total),
    uniqueValues: row?.uniqueValues ?? 0,
  };
}

function readMonthlyPattern(db: DatabaseConnection['db'], table: string): MonthlyVolumePattern[] {
  return db
    .prepare<[], MonthlyVolumePattern>(
      `
        SELECT
          CAST(strftime('%m', day) AS INTEGER) AS month,
          COUNT(*) AS days,
          AVG(daily_records) AS avgDailyRecords
        FROM (
          SELECT date(_partition_time) AS day, COUNT(*) AS daily_records
          FROM ${quoteIdentifier(table)}
          WHERE _partition_time IS NOT NULL
          GROUP BY day
        )
        GROUP BY month
        ORDER BY month ASC
      `,
    )
    .all();
}

/**
 * Exploratory profile of the raw table: date coverage, per-column null, empty and distinct counts,
 * and the average daily volume for each calendar month.
 */
export function profileRawSource(input: ProfileRawSourceInput): Result<RawSourceProfile, AppError> {
  const now = input.now ?? (() => new Date());
  const logger = input.logger ?? createSilentLogger();
  const rawTable = input.rawTable ?? DEFAULT_RAW_TABLE;

  const tableResult = validateIdentifier(rawTable);
  if (!tableResult.ok) {
    return tableResult;
  }

  try {
    if (readRelationKind(input.db, rawTable) === null) {
      return err(
        AppError.create('RAW_SOURCE_NOT_FOUND', 'Tabela surowych danych nie istnieje.', 'error', { table: rawTable }),
      );
    }

    const overview = readOverview(input.db, rawTable);
    const columns = readRelationColumns(input.db, rawTable).map((column) =>
      readColumnProfile(input.db, rawTable, column),
    );
    const monthlyPattern = readMonthlyPattern(input.db, rawTable);

    logger.info('Raw source profiled', {
      rawTable,
      totalRecords: overview.totalRecords,
      uniqueDates: overview.uniqueDates,
      columns: columns.length,
    });

    return ok({
      timestamp: now().toISOString(),
      rawTable,
      overview,
      columns,
      monthlyPattern,
    });
  } catch (cause) {
    return err(
      AppError.fromCause('QUALITY_PROFILE_FAILED', 'Nie udało się przeanalizować surowych danych.', { rawTable }, cause),
    );
  }
}

/** `raw_profile_YYYYMMDD_HHMMSS.json`, from the profile timestamp in UTC. */
export function buildRawProfileFileName(timestamp: string): string {
  return `raw_profile_${compactUtcTimestamp(timestamp)}.json`;
}

export function writeRawProfile(input: WriteRawProfileInput): Result<{ filePath: string }, AppError> {
  return writeJsonReport(input.reportsDir, buildRawProfileFileName(input.profile.timestamp), input.profile);
}
