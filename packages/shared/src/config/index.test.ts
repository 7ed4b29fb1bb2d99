import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { loadPipelineConfig } from './index.ts';

const tempDirs: string[] = [];

function createTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'bizlake-config-'));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('loadPipelineConfig', () => {
  it('applies defaults resolved against cwd', () => {
    const cwd = createTempDir();
    const result = loadPipelineConfig({ cwd, env: {}, envFiles: [] });

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value).toEqual({
      warehousePath: path.join(cwd, 'warehouse.db'),
      rawTable: 'raw_transactions',
      targetDir: path.join(cwd, 'target'),
      reportsDir: path.join(cwd, 'reports'),
      logLevel: 'info',
      freshnessMaxHours: 24,
      completenessMinPercentage: 95,
      consistencyMaxCoefficientOfVariation: 50,
    });
  });

  it('reads env files, with real environment taking precedence', () => {
    const cwd = createTempDir();
    fs.writeFileSync(path.join(cwd, '.env.local'), 'BIZLAKE_RAW_TABLE=local_table\n');
    fs.writeFileSync(
      path.join(cwd, '.env'),
      'BIZLAKE_RAW_TABLE=env_table\nBIZLAKE_LOG_LEVEL=debug\nBIZLAKE_FRESHNESS_MAX_HOURS=48\n',
    );

    const result = loadPipelineConfig({
      cwd,
      env: { BIZLAKE_LOG_LEVEL: 'error' },
    });

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value.rawTable).toBe('local_table');
    expect(result.value.logLevel).toBe('error');
    expect(result.value.freshnessMaxHours).toBe(48);
  });

  it('keeps the in-memory warehouse path as is', () => {
    const result = loadPipelineConfig({
      cwd: createTempDir(),
      env: { BIZLAKE_WAREHOUSE_PATH: ':memory:' },
      envFiles: [],
    });
    expect(result.ok && result.value.warehousePath).toBe(':memory:');
  });

  it('rejects invalid table names and numbers', () => {
    const badTable = loadPipelineConfig({
      cwd: createTempDir(),
      env: { BIZLAKE_RAW_TABLE: 'raw; DROP TABLE x' },
      envFiles: [],
    });
    expect(badTable.ok).toBe(false);
    if (!badTable.ok) {
      expect(badTable.error.code).toBe('CONFIG_INVALID');
    }

    const badNumber = loadPipelineConfig({
      cwd: createTempDir(),
      env: { BIZLAKE_CONSISTENCY_MAX_CV: 'lots' },
      envFiles: [],
    });
    expect(badNumber.ok).toBe(false);
  });

  it('rejects unknown log levels', () => {
    const result = loadPipelineConfig({
      cwd: createTempDir(),
      env: { BIZLAKE_LOG_LEVEL: 'verbose' },
      envFiles: [],
    });
    expect(result.ok).toBe(false);
  });
});
