import fs from 'node:fs';
import type Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@bizlake/shared';
import { z } from 'zod/v4';
import {
  createRawRecordWriter,
  DEFAULT_RAW_TABLE,
  prepareRawSourceTable,
  RAW_COLUMN_TYPES,
  type RawColumnDefinition,
  type RawRecordInput,
} from '../warehouse/raw-source.ts';

const RawValueSchema = z.union([z.string(), z.number(), z.null()]);

export const RawFixtureSchema = z.object({
  generatedAt: z.iso.datetime(),
  columns: z.array(
    z.object({
      name: z.string().min(1),
      type: z.enum(RAW_COLUMN_TYPES),
    }),
  ),
  records: z.array(
    z.object({
      partitionTime: z.iso.datetime().nullable(),
      fileName: z.string().nullable(),
      fileLoadTime: z.iso.datetime().nullable(),
      values: z.record(z.string(), RawValueSchema),
    }),
  ).min(1),
});

export type RawFixture = z.infer<typeof RawFixtureSchema>;

export interface SeedRawSourceResult {
  table: string;
  recordsInserted: number;
}

export interface DailyVolume {
  date: string;
  records: number;
  /** Number of distinct source files the day's records are spread over. Defaults to 1. */
  files?: number;
  /** Records at the end of the day written with a null file name. */
  recordsWithoutFile?: number;
}

export const SAMPLE_RAW_COLUMNS: readonly RawColumnDefinition[] = [
  { name: 'transaction_id', type: 'TEXT' },
  { name: 'product_line', type: 'TEXT' },
  { name: 'tons', type: 'REAL' },
  { name: 'amount_cents', type: 'INTEGER' },
];

const PRODUCT_LINES = ['rebar', 'wire_rod', 'merchant_bar', 'structural'] as const;

export function loadRawFixtureFromFile(filePath: string): Result<RawFixture, AppError> {
  try {
    const raw = fs.readFileSync(filePath, 'utf8');
    const parsed = RawFixtureSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      return err(
        AppError.create(
          'DB_FIXTURE_INVALID',
          'Plik fixture ma niepoprawny format.',
          'error',
          { filePath, issues: parsed.error.issues },
        ),
      );
    }
    return ok(parsed.data);
  } catch (cause) {
    return err(
      AppError.fromCause(
        'DB_FIXTURE_READ_FAILED',
        'Nie udało się odczytać pliku fixture.',
        { filePath },
        cause,
      ),
    );
  }
}

/**
 * Synthetic raw rows with exact per-day volumes, used by tests and the sample generator.
 */
export function createDailyRawRecords(volumes: readonly DailyVolume[]): RawRecordInput[] {
  const records: RawRecordInput[] = [];
  for (const volume of volumes) {
    const files = Math.max(1, volume.files ?? 1);
    const withoutFile = Math.min(volume.records, volume.recordsWithoutFile ?? 0);
    for (let index = 0; index < volume.records; index += 1) {
      const fileIndex = (index % files) + 1;
      const fileName = index >= volume.records - withoutFile
        ? null
        : `transactions_${volume.date.replaceAll('-', '')}_${String(fileIndex).padStart(3, '0')}.csv`;
      records.push({
        partitionTime: `${volume.date}T00:00:00.000Z`,
        fileName,
        fileLoadTime: `${volume.date}T06:00:00.000Z`,
        values: {
          transaction_id: `${volume.date}-${String(index + 1).padStart(6, '0')}`,
          product_line: PRODUCT_LINES[index % PRODUCT_LINES.length] ?? 'rebar',
          tons: Math.round(((index % 17) + 1) * 1.25 * 100) / 100,
          amount_cents: ((index % 17) + 1) * 125_000,
        },
      });
    }
  }
  return records;
}

export function seedRawSource(
  db: Database.Database,
  columns: readonly RawColumnDefinition[],
  records: readonly RawRecordInput[],
  table: string = DEFAULT_RAW_TABLE,
): Result<SeedRawSourceResult, AppError> {
  const prepareResult = prepareRawSourceTable(db, { table, columns, disposition: 'truncate' });
  if (!prepareResult.ok) {
    return prepareResult;
  }

  const writerResult = createRawRecordWriter(db, table, columns);
  if (!writerResult.ok) {
    return writerResult;
  }

  const insertResult = writerResult.value.insertBatch(records);
  if (!insertResult.ok) {
    return insertResult;
  }

  return ok({ table, recordsInserted: insertResult.value });
}

export function seedRawSourceFromFixture(
  db: Database.Database,
  fixture: RawFixture,
  table: string = DEFAULT_RAW_TABLE,
): Result<SeedRawSourceResult, AppError> {
  return seedRawSource(db, fixture.columns, fixture.records, table);
}
