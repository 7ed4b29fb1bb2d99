import fs from 'node:fs';
import path from 'node:path';
import {
  createDailyRawRecords,
  createDatabaseConnection,
  runMigrations,
  SAMPLE_RAW_COLUMNS,
  seedRawSource,
  type DailyVolume,
} from '../packages/core/src/index.ts';
import { buildModels, generateDocs } from '../packages/data-pipeline/src/index.ts';
import { runDataQualityChecks, writeQualityReport } from '../packages/diagnostics/src/index.ts';
import { createLogger } from '../packages/shared/src/index.ts';

const OUTPUT_DB_PATH = path.resolve(process.cwd(), 'fixtures', 'sample_warehouse.db');
const TARGET_DIR = path.resolve(process.cwd(), 'target');
const REPORTS_DIR = path.resolve(process.cwd(), 'reports');
const START_DATE = '2023-01-01';
const DAY_COUNT = 400;
const FIXED_NOW_ISO = '2024-02-05T10:00:00.000Z';
const FIXED_NOW = () => new Date(FIXED_NOW_ISO);

const WEEKDAY_FACTORS = [0.55, 1.05, 1.1, 1.12, 1.08, 1.02, 0.6] as const;
const MISSING_DAYS = new Set<number>([44, 45, 190]);
const SPIKES: Record<number, number> = { 88: 2.6, 241: 0.35, 330: 1.9 };

function isoDateFromOffset(dayOffset: number): string {
  const base = new Date(`${START_DATE}T00:00:00.000Z`);
  base.setUTCDate(base.getUTCDate() + dayOffset);
  return base.toISOString().slice(0, 10);
}

function deterministicNoise(day: number): number {
  return ((day * 17 + 31) % 23) - 11;
}

function createDailyVolumes(): DailyVolume[] {
  const volumes: DailyVolume[] = [];
  for (let day = 0; day < DAY_COUNT; day += 1) {
    if (MISSING_DAYS.has(day)) {
      continue;
    }

    const date = isoDateFromOffset(day);
    const weekday = new Date(`${date}T00:00:00.000Z`).getUTCDay();
    const seasonal = Math.sin((day / 365) * Math.PI * 2) * 18;
    let records = (120 + day * 0.15 + seasonal) * (WEEKDAY_FACTORS[weekday] ?? 1) + deterministicNoise(day);
    const spike = SPIKES[day];
    if (spike !== undefined) {
      records *= spike;
    }

    volumes.push({
      date,
      records: Math.max(1, Math.round(records)),
      files: 1 + (day % 3),
      recordsWithoutFile: day % 29 === 0 ? 2 : 0,
    });
  }
  return volumes;
}

function main(): void {
  fs.mkdirSync(path.dirname(OUTPUT_DB_PATH), { recursive: true });
  if (fs.existsSync(OUTPUT_DB_PATH)) {
    fs.unlinkSync(OUTPUT_DB_PATH);
  }

  const connectionResult = createDatabaseConnection({ filename: OUTPUT_DB_PATH });
  if (!connectionResult.ok) {
    throw new Error(connectionResult.error.message);
  }

  const connection = connectionResult.value;
  const logger = createLogger({ minLevel: 'warning' });
  let closeError: Error | null = null;
  try {
    const migrationResult = runMigrations(connection.db, FIXED_NOW);
    if (!migrationResult.ok) {
      throw new Error(migrationResult.error.message);
    }

    const seedResult = seedRawSource(connection.db, SAMPLE_RAW_COLUMNS, createDailyRawRecords(createDailyVolumes()));
    if (!seedResult.ok) {
      throw new Error(seedResult.error.message);
    }

    const buildResult = buildModels({ db: connection.db, logger, now: FIXED_NOW });
    if (!buildResult.ok) {
      throw new Error(buildResult.error.toString());
    }

    const docsResult = generateDocs({ db: connection.db, targetDir: TARGET_DIR, logger, now: FIXED_NOW });
    if (!docsResult.ok) {
      throw new Error(docsResult.error.message);
    }

    const reportResult = runDataQualityChecks({
      db: connection.db,
      warehousePath: OUTPUT_DB_PATH,
      logger,
      now: FIXED_NOW,
    });
    if (!reportResult.ok) {
      throw new Error(reportResult.error.message);
    }
    const writeResult = writeQualityReport({ report: reportResult.value, reportsDir: REPORTS_DIR });
    if (!writeResult.ok) {
      throw new Error(writeResult.error.message);
    }

    connection.db.pragma('optimize');
    connection.db.exec('VACUUM;');

    const summary = connection.db
      .prepare<[], { rawRows: number; days: number; insights: number }>(
        `
          SELECT
            (SELECT COUNT(*) FROM raw_transactions) AS rawRows,
            (SELECT COUNT(*) FROM int_daily_metrics) AS days,
            (SELECT COUNT(*) FROM mart_business_insights) AS insights
        `,
      )
      .get();

    console.log('Wygenerowano fixtures/sample_warehouse.db');
    console.log({ ...summary, qualityScore: reportResult.value.summary.qualityScore, report: writeResult.value.filePath });
  } finally {
    const closeResult = connection.close();
    if (!closeResult.ok) {
      closeError = new Error(closeResult.error.message);
    }
  }

  if (closeError) {
    throw closeError;
  }
}

main();
