import {
  countRelationRows,
  DEFAULT_RAW_TABLE,
  quoteIdentifier,
  readRelationKind,
  validateIdentifier,
  type DatabaseConnection,
} from '@bizlake/core';
import { PIPELINE_MODELS } from '@bizlake/data-pipeline';
import { AppError, createSilentLogger, err, ok, type Logger, type Result } from '@bizlake/shared';
import { compactUtcTimestamp, writeJsonReport } from './report-files.ts';

const HOUR_MS = 3_600_000;
const CONSISTENCY_WINDOW_DAYS = 30;

export const QUALITY_CHECK_NAMES = [
  'data_freshness',
  'data_completeness',
  'data_consistency',
  'pipeline_models',
] as const;
export type QualityCheckName = (typeof QUALITY_CHECK_NAMES)[number];

export type QualityCheckStatus = 'passed' | 'failed' | 'error';
export type QualityRating = 'excellent' | 'acceptable' | 'needs_attention';

export interface QualityThresholds {
  maxHoursSinceUpdate: number;
  minCompletenessPercentage: number;
  maxCoefficientOfVariation: number;
}

export const DEFAULT_QUALITY_THRESHOLDS: QualityThresholds = {
  maxHoursSinceUpdate: 24,
  minCompletenessPercentage: 95,
  maxCoefficientOfVariation: 50,
};

export interface QualityCheckResult {
  name: QualityCheckName;
  status: QualityCheckStatus;
  details: Record<string, unknown>;
  error: string | null;
  checkedAt: string;
}

export interface DataQualityReport {
  timestamp: string;
  warehousePath: string;
  rawTable: string;
  thresholds: QualityThresholds;
  checks: QualityCheckResult[];
  overallScore: number;
  summary: {
    totalChecks: number;
    passedChecks: number;
    failedChecks: number;
    erroredChecks: number;
    qualityScore: string;
  };
  rating: QualityRating;
}

export interface RunDataQualityChecksInput {
  db: DatabaseConnection['db'];
  warehousePath?: string;
  rawTable?: string;
  /** Relations that must hold at least one row; defaults to the pipeline models. */
  models?: readonly string[];
  thresholds?: Partial<QualityThresholds>;
  logger?: Logger;
  now?: () => Date;
}

export interface WriteQualityReportInput {
  report: DataQualityReport;
  reportsDir: string;
}

interface CheckOutcome {
  passed: boolean;
  details: Record<string, unknown>;
}

interface CheckContext {
  db: DatabaseConnection['db'];
  rawTable: string;
  models: readonly string[];
  thresholds: QualityThresholds;
  now: () => Date;
}

function createCheckError(name: QualityCheckName, cause: unknown): AppError {
  return AppError.fromCause('QUALITY_CHECK_FAILED', 'Nie udało się wykonać kontroli jakości.', { check: name }, cause);
}

function toPercentage(part: number, total: number): number | null {
  return total > 0 ? (part / total) * 100 : null;
}

function checkFreshness(context: CheckContext): Result<CheckOutcome, AppError> {
  try {
    const latestPartition = context.db
      .prepare<[], string | null>(
        `
          SELECT MAX(_partition_time)
          FROM ${quoteIdentifier(context.rawTable)}
          WHERE _partition_time IS NOT NULL
        `,
      )
      .pluck()
      .get();

    const latest = typeof latestPartition === 'string' ? latestPartition : null;
    const hoursSinceUpdate = latest === null ? null : (context.now().getTime() - Date.parse(latest)) / HOUR_MS;

    return ok({
      passed: hoursSinceUpdate !== null && hoursSinceUpdate < context.thresholds.maxHoursSinceUpdate,
      details: {
        latestPartition: latest,
        hoursSinceUpdate,
        maxHoursSinceUpdate: context.thresholds.maxHoursSinceUpdate,
      },
    });
  } catch (cause) {
    return err(createCheckError('data_freshness', cause));
  }
}

function checkCompleteness(context: CheckContext): Result<CheckOutcome, AppError> {
  try {
    const row = context.db
      .prepare<[], { total: number; validTimestamps: number; validFileNames: number; validLoadTimes: number }>(
        `
          SELECT
            COUNT(*) AS total,
            COUNT(_partition_time) AS validTimestamps,
            COUNT(_file_name) AS validFileNames,
            COUNT(_file_load_time) AS validLoadTimes
          FROM ${quoteIdentifier(context.rawTable)}
        `,
      )
      .get();

    const total = row?.total ?? 0;
    const timestampCompleteness = toPercentage(row?.validTimestamps ?? 0, total);
    const fileNameCompleteness = toPercentage(row?.validFileNames ?? 0, total);
    const minimum = context.thresholds.minCompletenessPercentage;

    return ok({
      passed:
        timestampCompleteness !== null
        && fileNameCompleteness !== null
        && timestampCompleteness > minimum
        && fileNameCompleteness > minimum,
      details: {
        totalRecords: total,
        timestampCompleteness,
        fileNameCompleteness,
        loadTimeCompleteness: toPercentage(row?.validLoadTimes ?? 0, total),
        minCompletenessPercentage: minimum,
      },
    });
  } catch (cause) {
    return err(createCheckError('data_completeness', cause));
  }
}

function checkConsistency(context: CheckContext): Result<CheckOutcome, AppError> {
  try {
    const row = context.db
      .prepare<{ windowDays: number }, { days: number; mean: number | null; stddev: number | null }>(
        `
          SELECT
            COUNT(*) AS days,
            AVG(daily_records) AS mean,
            stddev_samp(daily_records) AS stddev
          FROM (
            SELECT date(_partition_time) AS day, COUNT(*) AS daily_records
            FROM ${quoteIdentifier(context.rawTable)}
            WHERE _partition_time IS NOT NULL
            GROUP BY day
            ORDER BY day DESC
            LIMIT @windowDays
          )
        `,
      )
      .get({ windowDays: CONSISTENCY_WINDOW_DAYS });

    const mean = row?.mean ?? null;
    const stddev = row?.stddev ?? null;
    const coefficientOfVariation = mean !== null && stddev !== null && mean > 0 ? (stddev / mean) * 100 : null;

    return ok({
      passed:
        coefficientOfVariation !== null && coefficientOfVariation < context.thresholds.maxCoefficientOfVariation,
      details: {
        daysAnalyzed: row?.days ?? 0,
        meanDailyRecords: mean,
        stddevDailyRecords: stddev,
        coefficientOfVariation,
        maxCoefficientOfVariation: context.thresholds.maxCoefficientOfVariation,
      },
    });
  } catch (cause) {
    return err(createCheckError('data_consistency', cause));
  }
}

function checkPipelineModels(context: CheckContext): Result<CheckOutcome, AppError> {
  try {
    const modelCounts: Record<string, number> = {};
    const missingModels: string[] = [];
    for (const model of context.models) {
      if (readRelationKind(context.db, model) === null) {
        missingModels.push(model);
        modelCounts[model] = 0;
        continue;
      }
      modelCounts[model] = countRelationRows(context.db, model);
    }

    return ok({
      passed: Object.values(modelCounts).every((count) => count > 0),
      details: { modelCounts, missingModels },
    });
  } catch (cause) {
    return err(createCheckError('pipeline_models', cause));
  }
}

const CHECKS: ReadonlyArray<[QualityCheckName, (context: CheckContext) => Result<CheckOutcome, AppError>]> = [
  ['data_freshness', checkFreshness],
  ['data_completeness', checkCompleteness],
  ['data_consistency', checkConsistency],
  ['pipeline_models', checkPipelineModels],
];

export function resolveQualityRating(score: number): QualityRating {
  if (score >= 80) {
    return 'excellent';
  }
  if (score >= 60) {
    return 'acceptable';
  }
  return 'needs_attention';
}

/**
 * Runs freshness, completeness, consistency and model row-count checks against the raw table and
 * the built models. Individual check failures are part of the report, not an error result.
 */
export function runDataQualityChecks(input: RunDataQualityChecksInput): Result<DataQualityReport, AppError> {
  const now = input.now ?? (() => new Date());
  const logger = input.logger ?? createSilentLogger();
  const rawTable = input.rawTable ?? DEFAULT_RAW_TABLE;

  const rawTableResult = validateIdentifier(rawTable);
  if (!rawTableResult.ok) {
    return rawTableResult;
  }

  const thresholds: QualityThresholds = { ...DEFAULT_QUALITY_THRESHOLDS, ...input.thresholds };
  const context: CheckContext = {
    db: input.db,
    rawTable,
    models: input.models ?? PIPELINE_MODELS.map((model) => model.name),
    thresholds,
    now,
  };

  const checks: QualityCheckResult[] = [];
  for (const [name, check] of CHECKS) {
    const outcome = check(context);
    const checkedAt = now().toISOString();
    if (!outcome.ok) {
      logger.error('Quality check errored', { check: name, error: outcome.error.toString() });
      checks.push({ name, status: 'error', details: {}, error: outcome.error.toString(), checkedAt });
      continue;
    }

    const status: QualityCheckStatus = outcome.value.passed ? 'passed' : 'failed';
    if (outcome.value.passed) {
      logger.info('Quality check passed', { check: name, ...outcome.value.details });
    } else {
      logger.warning('Quality check failed', { check: name, ...outcome.value.details });
    }
    checks.push({ name, status, details: outcome.value.details, error: null, checkedAt });
  }

  const passedChecks = checks.filter((check) => check.status === 'passed').length;
  const erroredChecks = checks.filter((check) => check.status === 'error').length;
  const overallScore = (passedChecks / checks.length) * 100;
  const rating = resolveQualityRating(overallScore);

  logger.info('Quality checks finished', { overallScore, rating, passedChecks, totalChecks: checks.length });

  return ok({
    timestamp: now().toISOString(),
    warehousePath: input.warehousePath ?? ':memory:',
    rawTable,
    thresholds,
    checks,
    overallScore,
    summary: {
      totalChecks: checks.length,
      passedChecks,
      failedChecks: checks.length - passedChecks - erroredChecks,
      erroredChecks,
      qualityScore: `${overallScore.toFixed(1)}%`,
    },
    rating,
  });
}

/** `data_quality_report_YYYYMMDD_HHMMSS.json`, from the report timestamp in UTC. */
export function buildQualityReportFileName(timestamp: string): string {
  return `data_quality_report_${compactUtcTimestamp(timestamp)}.json`;
}

export function writeQualityReport(input: WriteQualityReportInput): Result<{ filePath: string }, AppError> {
  return writeJsonReport(input.reportsDir, buildQualityReportFileName(input.report.timestamp), input.report);
}
