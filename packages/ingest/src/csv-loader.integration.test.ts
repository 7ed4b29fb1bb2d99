import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { gzipSync } from 'node:zlib';
import {
  createDatabaseConnection,
  createRunRepository,
  type DatabaseConnection,
} from '@bizlake/core';
import { createLogger, type LogEntry } from '@bizlake/shared';
import { afterEach, describe, expect, it } from 'vitest';
import { loadCsvIntoWarehouse } from './csv-loader.ts';

const FIXED_NOW_ISO = '2026-02-12T12:00:00.000Z';
const fixedNow = (): Date => new Date(FIXED_NOW_ISO);

const TRANSACTIONS_CSV = [
  'transaction_id,Product Line,tons,amount_cents',
  't-1,rebar,1.5,1000',
  't-2,wire_rod,2,2000',
  't-3,rebar,,3000',
  't-4,structural,4.25',
  '',
].join('\n');

const sampleCsvPath = fileURLToPath(new URL('../../../fixtures/sample-transactions.csv', import.meta.url));

const tempDirs: string[] = [];

function writeSourceFile(name: string, content: string | Buffer): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bizlake-load-'));
  tempDirs.push(dir);
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, content);
  return filePath;
}

function openWarehouse(): DatabaseConnection {
  const connectionResult = createDatabaseConnection();
  if (!connectionResult.ok) {
    throw new Error(connectionResult.error.message);
  }
  return connectionResult.value;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('loadCsvIntoWarehouse', () => {
  it('detects the schema, loads valid rows and counts bad records', async () => {
    const connection = openWarehouse();
    const filePath = writeSourceFile('transactions.csv', TRANSACTIONS_CSV);

    const result = await loadCsvIntoWarehouse({
      db: connection.db,
      filePath,
      partitionDate: '2023-06-01',
      now: fixedNow,
      createJobId: () => 'job-1',
    });

    expect(result.ok).toBe(true);
    if (!result.ok) {
      expect(connection.close().ok).toBe(true);
      return;
    }
    expect(result.value.columns).toEqual([
      { name: 'transaction_id', type: 'TEXT' },
      { name: 'product_line', type: 'TEXT' },
      { name: 'tons', type: 'REAL' },
      { name: 'amount_cents', type: 'INTEGER' },
    ]);
    expect(result.value.partitionTime).toBe('2023-06-01T00:00:00.000Z');
    expect([result.value.rowsRead, result.value.rowsLoaded, result.value.badRecords]).toEqual([4, 3, 1]);
    expect(result.value.summary.totalRows).toBe(3);
    expect(result.value.summary.filesProcessed).toBe(1);
    expect(result.value.summary.earliestLoad).toBe(FIXED_NOW_ISO);

    const rows = connection.db
      .prepare<[], { fileName: string; partitionTime: string; tons: number | null; amountCents: number }>(
        `
          SELECT _file_name AS fileName, _partition_time AS partitionTime, tons, amount_cents AS amountCents
          FROM raw_transactions
          ORDER BY transaction_id ASC
        `,
      )
      .all();
    expect(rows).toEqual([
      { fileName: 'transactions.csv', partitionTime: '2023-06-01T00:00:00.000Z', tons: 1.5, amountCents: 1000 },
      { fileName: 'transactions.csv', partitionTime: '2023-06-01T00:00:00.000Z', tons: 2, amountCents: 2000 },
      { fileName: 'transactions.csv', partitionTime: '2023-06-01T00:00:00.000Z', tons: null, amountCents: 3000 },
    ]);

    const job = createRunRepository(connection.db).getLoadJob({ jobId: 'job-1' });
    expect(job.ok && job.value).toMatchObject({
      status: 'done',
      rowsLoaded: 3,
      badRecords: 1,
      writeDisposition: 'truncate',
      finishedAt: FIXED_NOW_ISO,
    });

    expect(connection.close().ok).toBe(true);
  });

  it('loads the sample transactions file', async () => {
    const connection = openWarehouse();

    const result = await loadCsvIntoWarehouse({
      db: connection.db,
      filePath: sampleCsvPath,
      partitionDate: '2023-03-30',
      now: fixedNow,
    });

    expect(result.ok && result.value.columns).toEqual([
      { name: 'transaction_id', type: 'TEXT' },
      { name: 'product_line', type: 'TEXT' },
      { name: 'tons', type: 'REAL' },
      { name: 'amount_cents', type: 'INTEGER' },
    ]);
    expect(result.ok && [result.value.rowsRead, result.value.rowsLoaded, result.value.badRecords]).toEqual([6, 5, 1]);
    expect(result.ok && result.value.sourceUri).toBe(sampleCsvPath);

    expect(connection.close().ok).toBe(true);
  });

  it('reads gzip-compressed files and defaults the partition to the load day', async () => {
    const connection = openWarehouse();
    const filePath = writeSourceFile('transactions.csv.gz', gzipSync(Buffer.from(TRANSACTIONS_CSV, 'utf8')));

    const result = await loadCsvIntoWarehouse({ db: connection.db, filePath, now: fixedNow });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.rowsLoaded).toBe(3);
      expect(result.value.partitionTime).toBe('2026-02-12T00:00:00.000Z');
      expect(result.value.summary.latestPartition).toBe('2026-02-12T00:00:00.000Z');
    }
    const fileName = connection.db.prepare<[], string>('SELECT DISTINCT _file_name FROM raw_transactions').pluck().get();
    expect(fileName).toBe('transactions.csv.gz');

    expect(connection.close().ok).toBe(true);
  });

  it('streams past the detection sample in batches', async () => {
    const connection = openWarehouse();
    const filePath = writeSourceFile('amounts.csv', 'id,amount\n1,10\n2,20\n3,n/a\n4,40\n5,50\n');
    const entries: LogEntry[] = [];

    const result = await loadCsvIntoWarehouse({
      db: connection.db,
      filePath,
      table: 'raw_amounts',
      sampleSize: 2,
      batchSize: 2,
      now: fixedNow,
      logger: createLogger({ writer: (entry) => entries.push(entry), now: () => FIXED_NOW_ISO }),
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.columns).toEqual([
        { name: 'id', type: 'INTEGER' },
        { name: 'amount', type: 'INTEGER' },
      ]);
      expect([result.value.rowsRead, result.value.rowsLoaded, result.value.badRecords]).toEqual([5, 4, 1]);
    }
    expect(entries.filter((entry) => entry.message === 'Batch inserted')).toHaveLength(2);
    const ids = connection.db.prepare<[], number>('SELECT id FROM raw_amounts ORDER BY id').pluck().all();
    expect(ids).toEqual([1, 2, 4, 5]);

    expect(connection.close().ok).toBe(true);
  });

  it('appends to a compatible table and rejects an incompatible one', async () => {
    const connection = openWarehouse();
    const first = writeSourceFile('day_1.csv', 'record_id,value\n1,a\n2,b\n');
    const second = writeSourceFile('day_2.csv', 'record_id,value\n3,c\n');
    const other = writeSourceFile('other.csv', 'customer,value\nx,1\n');

    const firstLoad = await loadCsvIntoWarehouse({ db: connection.db, filePath: first, now: fixedNow });
    expect(firstLoad.ok && firstLoad.value.columns.map((column) => column.name)).toEqual(['src_record_id', 'value']);

    const appended = await loadCsvIntoWarehouse({
      db: connection.db,
      filePath: second,
      disposition: 'append',
      now: fixedNow,
    });
    expect(appended.ok && [appended.value.summary.totalRows, appended.value.summary.filesProcessed]).toEqual([3, 2]);

    const rejected = await loadCsvIntoWarehouse({
      db: connection.db,
      filePath: other,
      disposition: 'append',
      now: fixedNow,
      createJobId: () => 'job-rejected',
    });
    expect(rejected.ok).toBe(false);
    if (!rejected.ok) {
      expect(rejected.error.code).toBe('RAW_SOURCE_SCHEMA_MISMATCH');
      expect(rejected.error.context.jobId).toBe('job-rejected');
    }
    const job = createRunRepository(connection.db).getLoadJob({ jobId: 'job-rejected' });
    expect(job.ok && [job.value?.status, job.value?.errorCode]).toEqual(['failed', 'RAW_SOURCE_SCHEMA_MISMATCH']);

    const truncated = await loadCsvIntoWarehouse({ db: connection.db, filePath: other, now: fixedNow });
    expect(truncated.ok && truncated.value.summary.totalRows).toBe(1);

    expect(connection.close().ok).toBe(true);
  });

  it('fails once bad records exceed the limit', async () => {
    const connection = openWarehouse();
    const filePath = writeSourceFile('transactions.csv', TRANSACTIONS_CSV);

    const result = await loadCsvIntoWarehouse({
      db: connection.db,
      filePath,
      maxBadRecords: 0,
      now: fixedNow,
      createJobId: () => 'job-strict',
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('LOAD_TOO_MANY_BAD_RECORDS');
      expect(result.error.context).toMatchObject({ badRecords: 1, maxBadRecords: 0 });
    }
    const job = createRunRepository(connection.db).getLoadJob({ jobId: 'job-strict' });
    expect(job.ok && [job.value?.status, job.value?.rowsLoaded, job.value?.badRecords]).toEqual(['failed', 0, 1]);

    expect(connection.close().ok).toBe(true);
  });

  it('rejects missing files, empty files and invalid options', async () => {
    const connection = openWarehouse();

    const missing = await loadCsvIntoWarehouse({
      db: connection.db,
      filePath: path.join(os.tmpdir(), 'bizlake-missing', 'nothing.csv'),
    });
    expect(!missing.ok && missing.error.code).toBe('LOAD_SOURCE_NOT_FOUND');

    const empty = await loadCsvIntoWarehouse({
      db: connection.db,
      filePath: writeSourceFile('empty.csv', ''),
      now: fixedNow,
    });
    expect(!empty.ok && empty.error.code).toBe('LOAD_SOURCE_EMPTY');

    const invalidDate = await loadCsvIntoWarehouse({
      db: connection.db,
      filePath: writeSourceFile('transactions.csv', TRANSACTIONS_CSV),
      partitionDate: '2023-13-01',
    });
    expect(!invalidDate.ok && invalidDate.error.code).toBe('LOAD_OPTIONS_INVALID');

    const invalidTable = await loadCsvIntoWarehouse({
      db: connection.db,
      filePath: writeSourceFile('transactions.csv', TRANSACTIONS_CSV),
      table: 'raw transactions',
    });
    expect(!invalidTable.ok && invalidTable.error.code).toBe('WAREHOUSE_IDENTIFIER_INVALID');

    expect(connection.close().ok).toBe(true);
  });
});
