import { AppError, err, ok } from '@bizlake/shared';
import { describe, expect, it } from 'vitest';
import {
  createDatabaseConnection,
  createRunRepository,
  runMigrations,
  type DatabaseConnection,
  type RunRepository,
} from './index.ts';

interface MigratedWarehouse {
  connection: DatabaseConnection;
  repository: RunRepository;
}

function openMigratedWarehouse(): MigratedWarehouse {
  const connectionResult = createDatabaseConnection();
  if (!connectionResult.ok) {
    throw new Error(connectionResult.error.message);
  }
  const migrationResult = runMigrations(connectionResult.value.db);
  expect(migrationResult.ok).toBe(true);
  return {
    connection: connectionResult.value,
    repository: createRunRepository(connectionResult.value.db),
  };
}

describe('Run repository integration', () => {
  it('records an invocation with its model runs and test results', () => {
    const { connection, repository } = openMigratedWarehouse();

    expect(
      repository.startInvocation({
        runId: 'run-1',
        command: 'build',
        selector: 'marts',
        startedAt: '2026-03-01T10:00:00.000Z',
      }).ok,
    ).toBe(true);

    expect(repository.getInvocation({ runId: 'run-1' })).toEqual({
      ok: true,
      value: {
        runId: 'run-1',
        command: 'build',
        selector: 'marts',
        status: 'running',
        startedAt: '2026-03-01T10:00:00.000Z',
        finishedAt: null,
      },
    });

    const modelRun = {
      runId: 'run-1',
      modelName: 'mart_business_insights',
      stage: 'marts',
      materialized: 'table',
      status: 'success',
      rowCount: 4,
      durationMs: 12,
      errorCode: null,
      errorMessage: null,
      startedAt: '2026-03-01T10:00:00.000Z',
      finishedAt: '2026-03-01T10:00:00.012Z',
    } as const;
    expect(repository.insertModelRun(modelRun).ok).toBe(true);
    expect(repository.listModelRuns({ runId: 'run-1' })).toEqual({ ok: true, value: [modelRun] });

    const testResult = {
      runId: 'run-1',
      modelName: 'mart_business_insights',
      testName: 'not_null',
      columnName: 'year',
      status: 'pass',
      failures: 0,
      errorMessage: null,
      executedAt: '2026-03-01T10:00:01.000Z',
    } as const;
    expect(repository.insertTestResult(testResult).ok).toBe(true);
    expect(repository.listTestResults({ runId: 'run-1' })).toEqual({ ok: true, value: [testResult] });

    expect(
      repository.finishInvocation({
        runId: 'run-1',
        status: 'success',
        finishedAt: '2026-03-01T10:00:02.000Z',
      }).ok,
    ).toBe(true);
    const finished = repository.getInvocation({ runId: 'run-1' });
    expect(finished.ok && finished.value?.status).toBe('success');

    expect(connection.close().ok).toBe(true);
  });

  it('rejects model runs for unknown invocations', () => {
    const { connection, repository } = openMigratedWarehouse();

    const result = repository.insertModelRun({
      runId: 'missing-run',
      modelName: 'stg_transactions',
      stage: 'staging',
      materialized: 'view',
      status: 'success',
      rowCount: 0,
      durationMs: 1,
      errorCode: null,
      errorMessage: null,
      startedAt: '2026-03-01T10:00:00.000Z',
      finishedAt: '2026-03-01T10:00:00.001Z',
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('DB_MODEL_RUN_INSERT_FAILED');
    }

    expect(connection.close().ok).toBe(true);
  });

  it('tracks load jobs from start to finish', () => {
    const { connection, repository } = openMigratedWarehouse();

    expect(
      repository.startLoadJob({
        jobId: 'job-1',
        sourceUri: '/data/transactions.csv',
        targetTable: 'raw_transactions',
        writeDisposition: 'truncate',
        partitionTime: '2026-03-01T00:00:00.000Z',
        startedAt: '2026-03-01T06:00:00.000Z',
      }).ok,
    ).toBe(true);

    expect(
      repository.finishLoadJob({
        jobId: 'job-1',
        status: 'done',
        rowsLoaded: 10,
        badRecords: 1,
        errorCode: null,
        errorMessage: null,
        finishedAt: '2026-03-01T06:00:05.000Z',
      }).ok,
    ).toBe(true);

    expect(repository.getLoadJob({ jobId: 'job-1' })).toEqual({
      ok: true,
      value: {
        jobId: 'job-1',
        sourceUri: '/data/transactions.csv',
        targetTable: 'raw_transactions',
        writeDisposition: 'truncate',
        partitionTime: '2026-03-01T00:00:00.000Z',
        status: 'done',
        rowsLoaded: 10,
        badRecords: 1,
        errorCode: null,
        errorMessage: null,
        startedAt: '2026-03-01T06:00:00.000Z',
        finishedAt: '2026-03-01T06:00:05.000Z',
      },
    });
    expect(repository.getLoadJob({ jobId: 'job-2' })).toEqual({ ok: true, value: null });

    expect(connection.close().ok).toBe(true);
  });

  it('rolls back every write when a transactional operation fails', () => {
    const { connection, repository } = openMigratedWarehouse();

    const result = repository.runInTransaction(() => {
      const started = repository.startInvocation({
        runId: 'run-rollback',
        command: 'run',
        selector: null,
        startedAt: '2026-03-01T10:00:00.000Z',
      });
      if (!started.ok) {
        return started;
      }
      return err(AppError.create('TEST_ABORT', 'Przerwano.', 'error', {}));
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('TEST_ABORT');
    }
    expect(repository.getInvocation({ runId: 'run-rollback' })).toEqual({ ok: true, value: null });

    const committed = repository.runInTransaction(() =>
      ok(
        repository.startInvocation({
          runId: 'run-commit',
          command: 'run',
          selector: null,
          startedAt: '2026-03-01T10:00:00.000Z',
        }).ok,
      ),
    );
    expect(committed).toEqual({ ok: true, value: true });

    expect(connection.close().ok).toBe(true);
  });
});
