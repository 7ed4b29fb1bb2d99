import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  createDailyRawRecords,
  createDatabaseConnection,
  SAMPLE_RAW_COLUMNS,
  seedRawSource,
} from '@bizlake/core';
import { afterEach, describe, expect, it } from 'vitest';
import { generateDocs } from './docs-generator.ts';
import { runModels } from './model-runner.ts';

const FIXED_NOW_ISO = '2026-02-12T12:00:00.000Z';
const tempDirs: string[] = [];

function createTargetDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bizlake-docs-'));
  tempDirs.push(dir);
  return path.join(dir, 'target');
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('generateDocs', () => {
  it('writes manifest, catalog and index and marks unbuilt models as missing', () => {
    const connectionResult = createDatabaseConnection();
    if (!connectionResult.ok) {
      throw new Error(connectionResult.error.message);
    }
    const connection = connectionResult.value;
    expect(
      seedRawSource(connection.db, SAMPLE_RAW_COLUMNS, createDailyRawRecords([{ date: '2023-01-01', records: 3 }])).ok,
    ).toBe(true);
    const targetDir = createTargetDir();

    const beforeBuild = generateDocs({ db: connection.db, targetDir, now: () => new Date(FIXED_NOW_ISO) });
    expect(beforeBuild.ok).toBe(true);
    if (beforeBuild.ok) {
      expect(beforeBuild.value.catalog.relations.map((relation) => [relation.name, relation.status])).toEqual([
        ['raw_transactions', 'built'],
        ['stg_transactions', 'missing'],
        ['int_daily_metrics', 'missing'],
        ['mart_business_insights', 'missing'],
      ]);
    }

    expect(runModels({ db: connection.db, now: () => new Date(FIXED_NOW_ISO) }).ok).toBe(true);
    const afterBuild = generateDocs({ db: connection.db, targetDir, now: () => new Date(FIXED_NOW_ISO) });
    expect(afterBuild.ok).toBe(true);
    if (!afterBuild.ok) {
      expect(connection.close().ok).toBe(true);
      return;
    }

    const manifest: unknown = JSON.parse(fs.readFileSync(path.join(targetDir, 'manifest.json'), 'utf8'));
    expect(manifest).toEqual(afterBuild.value.manifest);
    const intModel = afterBuild.value.manifest.models[1];
    expect(intModel?.name).toBe('int_daily_metrics');
    expect(intModel?.sources).toEqual(['stg_transactions']);
    expect(intModel?.columns[0]).toEqual({
      name: 'date',
      description: 'Partition date.',
      tests: ['not_null', 'unique', 'relationships(stg_transactions.partition_date)'],
    });
    expect(afterBuild.value.manifest.models[2]?.tests).toEqual(['unique_combination(granularity, year, period)']);

    const catalog = afterBuild.value.catalog.relations;
    expect(catalog.map((relation) => [relation.name, relation.kind, relation.rowCount])).toEqual([
      ['raw_transactions', 'table', 3],
      ['stg_transactions', 'view', 3],
      ['int_daily_metrics', 'table', 1],
      ['mart_business_insights', 'table', 3],
    ]);
    expect(catalog[3]?.columns.map((column) => column.name).slice(0, 4)).toEqual([
      'granularity',
      'year',
      'period',
      'period_start',
    ]);

    const indexLines = fs.readFileSync(path.join(targetDir, 'index.md'), 'utf8').split('\n');
    expect(indexLines[0]).toBe('# Pipeline documentation');
    expect(indexLines[2]).toBe(`Generated at ${FIXED_NOW_ISO}.`);
    expect(indexLines[6]).toBe('raw_transactions -> stg_transactions -> int_daily_metrics -> mart_business_insights');
    expect(indexLines).toContain('| int_daily_metrics | intermediate | table | stg_transactions | 1 |');

    expect(connection.close().ok).toBe(true);
  });
});
