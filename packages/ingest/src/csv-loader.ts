import { randomUUID } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream';
import { createGunzip } from 'node:zlib';
import {
  createRawRecordWriter,
  createRunRepository,
  DEFAULT_RAW_TABLE,
  describeRawSource,
  prepareRawSourceTable,
  runMigrations,
  validateIdentifier,
  type DatabaseConnection,
  type RawColumnDefinition,
  type RawRecordInput,
  type RawRecordWriter,
  type RawSourceSummary,
  type RawValue,
  type WriteDisposition,
} from '@bizlake/core';
import { AppError, createSilentLogger, err, ok, type Logger, type Result } from '@bizlake/shared';
import { parse } from 'csv-parse';
import { z } from 'zod/v4';
import { coerceValue, detectSchema } from './schema-detection.ts';

export const DEFAULT_MAX_BAD_RECORDS = 1000;
export const DEFAULT_BATCH_SIZE = 500;
export const DEFAULT_SAMPLE_SIZE = 100;

const LoadOptionsSchema = z.object({
  partitionDate: z.iso.date().nullable(),
  maxBadRecords: z.number().int().nonnegative(),
  batchSize: z.number().int().positive(),
  sampleSize: z.number().int().positive(),
});

type LoadOptions = z.infer<typeof LoadOptionsSchema>;

export interface LoadCsvInput {
  db: DatabaseConnection['db'];
  filePath: string;
  table?: string;
  disposition?: WriteDisposition;
  /** YYYY-MM-DD; defaults to the UTC day the load starts. */
  partitionDate?: string | null;
  maxBadRecords?: number;
  batchSize?: number;
  /** Leading data rows used for schema detection. */
  sampleSize?: number;
  logger?: Logger;
  now?: () => Date;
  createJobId?: () => string;
}

export interface LoadCsvResult {
  jobId: string;
  table: string;
  sourceUri: string;
  partitionTime: string;
  disposition: WriteDisposition;
  columns: RawColumnDefinition[];
  rowsRead: number;
  rowsLoaded: number;
  badRecords: number;
  summary: RawSourceSummary;
}

interface LoadProgress {
  rowsRead: number;
  rowsLoaded: number;
  badRecords: number;
}

interface RowSink {
  columns: RawColumnDefinition[];
  accept: (row: readonly string[]) => void;
  flushIfFull: () => Result<void, AppError>;
  flushAll: () => Result<void, AppError>;
}

interface StreamContext {
  db: DatabaseConnection['db'];
  filePath: string;
  table: string;
  disposition: WriteDisposition;
  options: LoadOptions;
  metadata: Omit<RawRecordInput, 'values'>;
  progress: LoadProgress;
  logger: Logger;
}

function createLoadError(code: string, message: string, context: Record<string, unknown>): AppError {
  return AppError.create(code, message, 'error', context);
}

function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((cell) => typeof cell === 'string');
}

export function isGzipPath(filePath: string): boolean {
  return filePath.toLowerCase().endsWith('.gz');
}

function openCsvRecords(filePath: string, logger: Logger, onSkip: () => void): AsyncIterable<unknown> {
  const parser = parse({
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
    skip_records_with_error: true,
  });
  parser.on('skip', onSkip);

  const source = fs.createReadStream(filePath);
  const streams = isGzipPath(filePath) ? [source, createGunzip(), parser] : [source, parser];

  // Errors destroy the parser as well and are rethrown by its iterator.
  pipeline(streams, (error) => {
    if (error) {
      logger.debug('CSV stream closed', { filePath, error: error.message });
    }
  });

  return parser;
}

function createRowSink(
  writer: RawRecordWriter,
  columns: RawColumnDefinition[],
  context: StreamContext,
): RowSink {
  let batch: RawRecordInput[] = [];

  const flushAll = (): Result<void, AppError> => {
    if (batch.length === 0) {
      return ok(undefined);
    }
    const insertResult = writer.insertBatch(batch);
    if (!insertResult.ok) {
      return insertResult;
    }
    context.progress.rowsLoaded += insertResult.value;
    context.logger.debug('Batch inserted', {
      batchSize: insertResult.value,
      rowsLoaded: context.progress.rowsLoaded,
    });
    batch = [];
    return ok(undefined);
  };

  return {
    columns,
    accept: (row) => {
      context.progress.rowsRead += 1;
      if (row.length !== columns.length) {
        context.progress.badRecords += 1;
        return;
      }

      const values: Record<string, RawValue> = {};
      for (const [index, column] of columns.entries()) {
        const coerced = coerceValue(row[index] ?? '', column.type);
        if (!coerced.valid) {
          context.progress.badRecords += 1;
          return;
        }
        values[column.name] = coerced.value;
      }
      batch.push({ ...context.metadata, values });
    },
    flushIfFull: () => (batch.length >= context.options.batchSize ? flushAll() : ok(undefined)),
    flushAll,
  };
}

function openRowSink(
  context: StreamContext,
  header: readonly string[],
  sample: readonly string[][],
): Result<RowSink, AppError> {
  const columns = detectSchema(header, sample);
  const prepareResult = prepareRawSourceTable(context.db, {
    table: context.table,
    columns,
    disposition: context.disposition,
  });
  if (!prepareResult.ok) {
    return prepareResult;
  }

  const writerResult = createRawRecordWriter(context.db, context.table, columns);
  if (!writerResult.ok) {
    return writerResult;
  }

  context.logger.info('Schema detected', {
    columns: columns.map((column) => `${column.name}:${column.type}`),
    tableCreated: prepareResult.value.created,
  });

  const sink = createRowSink(writerResult.value, columns, context);
  for (const row of sample) {
    sink.accept(row);
  }
  return ok(sink);
}

function checkBadRecords(context: StreamContext): Result<void, AppError> {
  if (context.progress.badRecords > context.options.maxBadRecords) {
    return err(
      createLoadError('LOAD_TOO_MANY_BAD_RECORDS', 'Przekroczono limit błędnych rekordów.', {
        filePath: context.filePath,
        badRecords: context.progress.badRecords,
        maxBadRecords: context.options.maxBadRecords,
      }),
    );
  }
  return ok(undefined);
}

async function streamIntoTable(context: StreamContext): Promise<Result<RawColumnDefinition[], AppError>> {
  let header: string[] | null = null;
  let sink: RowSink | null = null;
  const sample: string[][] = [];
  const onSkip = (): void => {
    context.progress.rowsRead += 1;
    context.progress.badRecords += 1;
  };

  try {
    for await (const record of openCsvRecords(context.filePath, context.logger, onSkip)) {
      if (!isStringRow(record)) {
        onSkip();
      } else if (header === null) {
        header = record;
        continue;
      } else if (sink === null) {
        sample.push(record);
        if (sample.length < context.options.sampleSize) {
          continue;
        }
        const sinkResult = openRowSink(context, header, sample);
        if (!sinkResult.ok) {
          return sinkResult;
        }
        sink = sinkResult.value;
      } else {
        sink.accept(record);
      }

      const badRecordsResult = checkBadRecords(context);
      if (!badRecordsResult.ok) {
        return badRecordsResult;
      }
      if (sink !== null) {
        const flushResult = sink.flushIfFull();
        if (!flushResult.ok) {
          return flushResult;
        }
      }
    }
  } catch (cause) {
    return err(
      AppError.fromCause(
        'LOAD_READ_FAILED',
        'Nie udało się odczytać pliku CSV.',
        { filePath: context.filePath, rowsRead: context.progress.rowsRead },
        cause,
      ),
    );
  }

  if (header === null) {
    return err(
      createLoadError('LOAD_SOURCE_EMPTY', 'Plik CSV nie zawiera nagłówka.', { filePath: context.filePath }),
    );
  }

  if (sink === null) {
    const sinkResult = openRowSink(context, header, sample);
    if (!sinkResult.ok) {
      return sinkResult;
    }
    sink = sinkResult.value;
  }

  const badRecordsResult = checkBadRecords(context);
  if (!badRecordsResult.ok) {
    return badRecordsResult;
  }
  const flushResult = sink.flushAll();
  if (!flushResult.ok) {
    return flushResult;
  }
  return ok(sink.columns);
}

/**
 * Streams a CSV or gzip-compressed CSV file with a header row into the raw source table and records
 * the load job. Rows whose field count differs from the header, or whose values do not fit the
 * detected column type, are counted as bad records.
 */
export async function loadCsvIntoWarehouse(input: LoadCsvInput): Promise<Result<LoadCsvResult, AppError>> {
  const now = input.now ?? (() => new Date());
  const logger = input.logger ?? createSilentLogger();
  const table = input.table ?? DEFAULT_RAW_TABLE;
  const disposition = input.disposition ?? 'truncate';

  const tableResult = validateIdentifier(table);
  if (!tableResult.ok) {
    return tableResult;
  }

  const optionsParsed = LoadOptionsSchema.safeParse({
    partitionDate: input.partitionDate ?? null,
    maxBadRecords: input.maxBadRecords ?? DEFAULT_MAX_BAD_RECORDS,
    batchSize: input.batchSize ?? DEFAULT_BATCH_SIZE,
    sampleSize: input.sampleSize ?? DEFAULT_SAMPLE_SIZE,
  });
  if (!optionsParsed.success) {
    return err(
      createLoadError('LOAD_OPTIONS_INVALID', 'Niepoprawne opcje ładowania.', {
        issues: optionsParsed.error.issues,
      }),
    );
  }
  const options = optionsParsed.data;

  if (!fs.existsSync(input.filePath)) {
    return err(
      createLoadError('LOAD_SOURCE_NOT_FOUND', 'Plik źródłowy nie istnieje.', { filePath: input.filePath }),
    );
  }

  const migrationResult = runMigrations(input.db, now);
  if (!migrationResult.ok) {
    return migrationResult;
  }
  const repository = createRunRepository(input.db);

  const startedAt = now().toISOString();
  const jobId = (input.createJobId ?? randomUUID)();
  const sourceUri = path.resolve(input.filePath);
  const partitionTime = `${options.partitionDate ?? startedAt.slice(0, 10)}T00:00:00.000Z`;
  const jobLogger = logger.withContext({ jobId, table });

  const startResult = repository.startLoadJob({
    jobId,
    sourceUri,
    targetTable: table,
    writeDisposition: disposition,
    partitionTime,
    startedAt,
  });
  if (!startResult.ok) {
    return startResult;
  }
  jobLogger.info('Load job started', { sourceUri, disposition, partitionTime });

  const progress: LoadProgress = { rowsRead: 0, rowsLoaded: 0, badRecords: 0 };
  const streamResult = await streamIntoTable({
    db: input.db,
    filePath: input.filePath,
    table,
    disposition,
    options,
    metadata: {
      partitionTime,
      fileName: path.basename(input.filePath),
      fileLoadTime: startedAt,
    },
    progress,
    logger: jobLogger,
  });

  if (!streamResult.ok) {
    jobLogger.error('Load job failed', {
      errorCode: streamResult.error.code,
      error: streamResult.error.toString(),
      ...progress,
    });
    const failResult = repository.finishLoadJob({
      jobId,
      status: 'failed',
      rowsLoaded: progress.rowsLoaded,
      badRecords: progress.badRecords,
      errorCode: streamResult.error.code,
      errorMessage: streamResult.error.toString(),
      finishedAt: now().toISOString(),
    });
    return failResult.ok ? err(streamResult.error.withContext({ jobId })) : failResult;
  }

  const finishedAt = now().toISOString();
  const finishResult = repository.finishLoadJob({
    jobId,
    status: 'done',
    rowsLoaded: progress.rowsLoaded,
    badRecords: progress.badRecords,
    errorCode: null,
    errorMessage: null,
    finishedAt,
  });
  if (!finishResult.ok) {
    return finishResult;
  }

  const lineageResult = repository.insertLineage({
    runId: jobId,
    pipelineStage: 'ingest',
    entityType: 'table',
    entityKey: table,
    sourceTable: sourceUri,
    sourceRecordCount: progress.rowsRead,
    metadataJson: JSON.stringify({ disposition, partitionTime, badRecords: progress.badRecords }),
    producedAt: finishedAt,
  });
  if (!lineageResult.ok) {
    return lineageResult;
  }

  const summaryResult = describeRawSource(input.db, table);
  if (!summaryResult.ok) {
    return summaryResult;
  }

  jobLogger.info('Load job finished', {
    ...progress,
    totalRows: summaryResult.value.totalRows,
    filesProcessed: summaryResult.value.filesProcessed,
  });

  return ok({
    jobId,
    table,
    sourceUri,
    partitionTime,
    disposition,
    columns: streamResult.value,
    rowsRead: progress.rowsRead,
    rowsLoaded: progress.rowsLoaded,
    badRecords: progress.badRecords,
    summary: summaryResult.value,
  });
}
