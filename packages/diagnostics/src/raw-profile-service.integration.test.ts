import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  createDatabaseConnection,
  loadRawFixtureFromFile,
  seedRawSource,
  seedRawSourceFromFixture,
  type DatabaseConnection,
} from '@bizlake/core';
import { describe, expect, it } from 'vitest';
import { profileRawSource, writeRawProfile } from './raw-profile-service.ts';

const FIXED_NOW_ISO = '2023-04-01T09:30:00.000Z';
const fixedNow = (): Date => new Date(FIXED_NOW_ISO);
const fixturePath = fileURLToPath(new URL('../../../fixtures/raw-transactions.json', import.meta.url));

function openWarehouse(): DatabaseConnection {
  const connectionResult = createDatabaseConnection();
  if (!connectionResult.ok) {
    throw new Error(connectionResult.error.message);
  }
  return connectionResult.value;
}

describe('profileRawSource', () => {
  it('profiles coverage, columns and monthly volume of the raw table', () => {
    const fixture = loadRawFixtureFromFile(fixturePath);
    if (!fixture.ok) {
      expect(fixture.ok).toBe(true);
      return;
    }
    const connection = openWarehouse();
    expect(seedRawSourceFromFixture(connection.db, fixture.value).ok).toBe(true);

    const result = profileRawSource({ db: connection.db, now: fixedNow });

    expect(result.ok).toBe(true);
    if (!result.ok) {
      expect(connection.close().ok).toBe(true);
      return;
    }
    expect(result.value.overview).toEqual({
      totalRecords: 7,
      uniqueDates: 3,
      earliestDate: '2023-03-30',
      latestDate: '2023-04-01',
      sourceFiles: 5,
      durationDays: 2,
    });
    expect(result.value.columns.map((column) => [column.name, column.nullCount, column.uniqueValues])).toEqual([
      ['_partition_time', 1, 3],
      ['_file_name', 1, 5],
      ['_file_load_time', 0, 4],
      ['transaction_id', 0, 7],
      ['product_line', 0, 4],
      ['tons', 1, 6],
      ['amount_cents', 0, 7],
    ]);
    expect(result.value.columns[5]).toMatchObject({ type: 'REAL', emptyCount: 0, emptyPercentage: 0 });
    expect(result.value.columns[5]?.nullPercentage).toBeCloseTo(100 / 7, 10);
    expect(result.value.monthlyPattern).toEqual([
      { month: 3, days: 2, avgDailyRecords: 2.5 },
      { month: 4, days: 1, avgDailyRecords: 1 },
    ]);
    expect(result.value.timestamp).toBe(FIXED_NOW_ISO);

    expect(connection.close().ok).toBe(true);
  });

  it('counts empty strings separately from nulls', () => {
    const connection = openWarehouse();
    const partitionTime = '2023-01-01T00:00:00.000Z';
    expect(
      seedRawSource(connection.db, [{ name: 'note', type: 'TEXT' }], [
        { partitionTime, fileName: 'a.csv', fileLoadTime: null, values: { note: '' } },
        { partitionTime, fileName: 'a.csv', fileLoadTime: null, values: { note: 'x' } },
        { partitionTime, fileName: 'a.csv', fileLoadTime: null, values: { note: null } },
        { partitionTime, fileName: 'a.csv', fileLoadTime: null, values: { note: 'x' } },
      ]).ok,
    ).toBe(true);

    const result = profileRawSource({ db: connection.db, now: fixedNow });

    expect(result.ok && result.value.columns.find((column) => column.name === 'note')).toEqual({
      name: 'note',
      type: 'TEXT',
      nullCount: 1,
      nullPercentage: 25,
      emptyCount: 1,
      emptyPercentage: 25,
      uniqueValues: 2,
    });
    expect(result.ok && result.value.overview.durationDays).toBe(0);

    expect(connection.close().ok).toBe(true);
  });

  it('reports a missing raw table', () => {
    const connection = openWarehouse();

    const result = profileRawSource({ db: connection.db });

    expect(!result.ok && result.error.code).toBe('RAW_SOURCE_NOT_FOUND');
    expect(connection.close().ok).toBe(true);
  });
});

describe('writeRawProfile', () => {
  it('writes the profile under a timestamped name', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bizlake-profile-'));
    const profile = {
      timestamp: FIXED_NOW_ISO,
      rawTable: 'raw_transactions',
      overview: {
        totalRecords: 0,
        uniqueDates: 0,
        earliestDate: null,
        latestDate: null,
        sourceFiles: 0,
        durationDays: null,
      },
      columns: [],
      monthlyPattern: [],
    };

    const result = writeRawProfile({ profile, reportsDir: dir });
    const expectedPath = path.join(dir, 'raw_profile_20230401_093000.json');
    const written: unknown = result.ok ? JSON.parse(fs.readFileSync(result.value.filePath, 'utf8')) : null;
    fs.rmSync(dir, { recursive: true, force: true });

    expect(result.ok && result.value.filePath).toBe(expectedPath);
    expect(written).toEqual(profile);
  });
});
