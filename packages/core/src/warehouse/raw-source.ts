import type Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@bizlake/shared';
import {
  quoteIdentifier,
  readRelationColumns,
  readRelationKind,
  validateIdentifier,
  type RelationColumn,
} from './identifiers.ts';

export const DEFAULT_RAW_TABLE = 'raw_transactions';

export const INGESTION_COLUMNS = ['_partition_time', '_file_name', '_file_load_time'] as const;

/** Names the staging view adds on top of the raw columns. */
export const STAGING_DERIVED_COLUMNS = [
  'record_id',
  'partition_time',
  'source_file',
  'file_load_time',
  'partition_date',
  'partition_year',
  'partition_month',
  'partition_day',
  'processed_at',
  'run_id',
] as const;

export const RAW_COLUMN_TYPES = ['INTEGER', 'REAL', 'TEXT'] as const;
export type RawColumnType = (typeof RAW_COLUMN_TYPES)[number];

export interface RawColumnDefinition {
  name: string;
  type: RawColumnType;
}

export type RawValue = string | number | null;

export interface RawRecordInput {
  partitionTime: string | null;
  fileName: string | null;
  fileLoadTime: string | null;
  values: Record<string, RawValue>;
}

export type WriteDisposition = 'truncate' | 'append';

export interface PrepareRawSourceTableInput {
  table: string;
  columns: readonly RawColumnDefinition[];
  disposition: WriteDisposition;
}

export interface PrepareRawSourceTableResult {
  created: boolean;
}

export interface RawRecordWriter {
  insertBatch: (records: readonly RawRecordInput[]) => Result<number, AppError>;
}

export interface RawSourceSummary {
  table: string;
  totalRows: number;
  filesProcessed: number;
  earliestLoad: string | null;
  latestLoad: string | null;
  earliestPartition: string | null;
  latestPartition: string | null;
  columns: RelationColumn[];
}

const RESERVED_NAMES: ReadonlySet<string> = new Set<string>([
  ...INGESTION_COLUMNS,
  ...STAGING_DERIVED_COLUMNS,
]);

export function isReservedRawColumnName(name: string): boolean {
  return RESERVED_NAMES.has(name);
}

function validateColumns(columns: readonly RawColumnDefinition[]): Result<void, AppError> {
  const seen = new Set<string>();
  for (const column of columns) {
    const identifierResult = validateIdentifier(column.name);
    if (!identifierResult.ok) {
      return identifierResult;
    }
    if (isReservedRawColumnName(column.name) || seen.has(column.name)) {
      return err(
        AppError.create(
          'RAW_SOURCE_COLUMN_INVALID',
          'Kolumna źródłowa koliduje z kolumną techniczną lub jest zduplikowana.',
          'error',
          { column: column.name },
        ),
      );
    }
    seen.add(column.name);
  }
  return ok(undefined);
}

function buildCreateTableSql(table: string, columns: readonly RawColumnDefinition[]): string {
  const businessColumns = columns.map((column) => `${quoteIdentifier(column.name)} ${column.type}`);
  return `
    CREATE TABLE ${quoteIdentifier(table)} (
      _partition_time TEXT,
      _file_name TEXT,
      _file_load_time TEXT${businessColumns.length > 0 ? `,\n      ${businessColumns.join(',\n      ')}` : ''}
    )
  `;
}

export function prepareRawSourceTable(
  db: Database.Database,
  input: PrepareRawSourceTableInput,
): Result<PrepareRawSourceTableResult, AppError> {
  const tableResult = validateIdentifier(input.table);
  if (!tableResult.ok) {
    return tableResult;
  }
  const columnsResult = validateColumns(input.columns);
  if (!columnsResult.ok) {
    return columnsResult;
  }

  try {
    const existingKind = readRelationKind(db, input.table);
    if (existingKind === 'view') {
      return err(
        AppError.create(
          'RAW_SOURCE_NOT_A_TABLE',
          'Docelowa relacja surowych danych jest widokiem.',
          'error',
          { table: input.table },
        ),
      );
    }

    if (input.disposition === 'append' && existingKind === 'table') {
      const existingColumns = new Set(readRelationColumns(db, input.table).map((column) => column.name));
      const missing = input.columns
        .map((column) => column.name)
        .filter((name) => !existingColumns.has(name));
      if (missing.length > 0) {
        return err(
          AppError.create(
            'RAW_SOURCE_SCHEMA_MISMATCH',
            'Schemat pliku nie zgadza się ze schematem tabeli surowych danych.',
            'error',
            { table: input.table, missingColumns: missing },
          ),
        );
      }
      return ok({ created: false });
    }

    const recreate = db.transaction(() => {
      db.exec(`DROP TABLE IF EXISTS ${quoteIdentifier(input.table)}`);
      db.exec(buildCreateTableSql(input.table, input.columns));
    });
    recreate();
    return ok({ created: true });
  } catch (cause) {
    return err(
      AppError.fromCause(
        'RAW_SOURCE_PREPARE_FAILED',
        'Nie udało się przygotować tabeli surowych danych.',
        { table: input.table, disposition: input.disposition },
        cause,
      ),
    );
  }
}

function prepareInsertStatement(
  db: Database.Database,
  table: string,
  columnNames: readonly string[],
): Result<Database.Statement<RawValue[]>, AppError> {
  try {
    return ok(
      db.prepare<RawValue[]>(
        `
          INSERT INTO ${quoteIdentifier(table)} (${columnNames.map(quoteIdentifier).join(', ')})
          VALUES (${columnNames.map(() => '?').join(', ')})
        `,
      ),
    );
  } catch (cause) {
    return err(
      AppError.fromCause(
        'RAW_SOURCE_WRITER_FAILED',
        'Nie udało się przygotować zapisu do tabeli surowych danych.',
        { table },
        cause,
      ),
    );
  }
}

export function createRawRecordWriter(
  db: Database.Database,
  table: string,
  columns: readonly RawColumnDefinition[],
): Result<RawRecordWriter, AppError> {
  const tableResult = validateIdentifier(table);
  if (!tableResult.ok) {
    return tableResult;
  }
  const columnsResult = validateColumns(columns);
  if (!columnsResult.ok) {
    return columnsResult;
  }

  const columnNames = [...INGESTION_COLUMNS, ...columns.map((column) => column.name)];
  const insertStmtResult = prepareInsertStatement(db, table, columnNames);
  if (!insertStmtResult.ok) {
    return insertStmtResult;
  }
  const insertStmt = insertStmtResult.value;

  const insertMany = db.transaction((records: readonly RawRecordInput[]) => {
    for (const record of records) {
      const row: RawValue[] = [record.partitionTime, record.fileName, record.fileLoadTime];
      for (const column of columns) {
        row.push(record.values[column.name] ?? null);
      }
      insertStmt.run(...row);
    }
  });

  return ok({
    insertBatch: (records) => {
      try {
        insertMany(records);
        return ok(records.length);
      } catch (cause) {
        return err(
          AppError.fromCause(
            'RAW_SOURCE_INSERT_FAILED',
            'Nie udało się zapisać rekordów do tabeli surowych danych.',
            { table, batchSize: records.length },
            cause,
          ),
        );
      }
    },
  });
}

export function describeRawSource(
  db: Database.Database,
  table: string = DEFAULT_RAW_TABLE,
): Result<RawSourceSummary, AppError> {
  const tableResult = validateIdentifier(table);
  if (!tableResult.ok) {
    return tableResult;
  }

  try {
    if (readRelationKind(db, table) === null) {
      return err(
        AppError.create(
          'RAW_SOURCE_NOT_FOUND',
          'Tabela surowych danych nie istnieje.',
          'error',
          { table },
        ),
      );
    }

    const row = db
      .prepare<[], {
        totalRows: number;
        filesProcessed: number;
        earliestLoad: string | null;
        latestLoad: string | null;
        earliestPartition: string | null;
        latestPartition: string | null;
      }>(
        `
          SELECT
            COUNT(*) AS totalRows,
            COUNT(DISTINCT _file_name) AS filesProcessed,
            MIN(_file_load_time) AS earliestLoad,
            MAX(_file_load_time) AS latestLoad,
            MIN(_partition_time) AS earliestPartition,
            MAX(_partition_time) AS latestPartition
          FROM ${quoteIdentifier(table)}
        `,
      )
      .get();

    return ok({
      table,
      totalRows: row?.totalRows ?? 0,
      filesProcessed: row?.filesProcessed ?? 0,
      earliestLoad: row?.earliestLoad ?? null,
      latestLoad: row?.latestLoad ?? null,
      earliestPartition: row?.earliestPartition ?? null,
      latestPartition: row?.latestPartition ?? null,
      columns: readRelationColumns(db, table),
    });
  } catch (cause) {
    return err(
      AppError.fromCause(
        'RAW_SOURCE_READ_FAILED',
        'Nie udało się odczytać podsumowania surowych danych.',
        { table },
        cause,
      ),
    );
  }
}
