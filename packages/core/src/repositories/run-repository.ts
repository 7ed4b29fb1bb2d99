import type Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@bizlake/shared';
import type {
  FinishInvocationInput,
  FinishLoadJobInput,
  InsertLineageInput,
  InsertModelRunInput,
  InsertTestResultInput,
  InvocationRecord,
  LoadJobRecord,
  ModelRunRecord,
  StartInvocationInput,
  StartLoadJobInput,
  TestResultRecord,
} from './run-types.ts';

export interface RunRepository {
  startInvocation: (input: StartInvocationInput) => Result<void, AppError>;
  finishInvocation: (input: FinishInvocationInput) => Result<void, AppError>;
  getInvocation: (input: { runId: string }) => Result<InvocationRecord | null, AppError>;
  insertModelRun: (input: InsertModelRunInput) => Result<void, AppError>;
  listModelRuns: (input: { runId: string }) => Result<ModelRunRecord[], AppError>;
  insertTestResult: (input: InsertTestResultInput) => Result<void, AppError>;
  listTestResults: (input: { runId: string }) => Result<TestResultRecord[], AppError>;
  insertLineage: (input: InsertLineageInput) => Result<void, AppError>;
  startLoadJob: (input: StartLoadJobInput) => Result<void, AppError>;
  finishLoadJob: (input: FinishLoadJobInput) => Result<void, AppError>;
  getLoadJob: (input: { jobId: string }) => Result<LoadJobRecord | null, AppError>;
  runInTransaction: <T>(operation: () => Result<T, AppError>) => Result<T, AppError>;
}

function createRepositoryError(
  code: string,
  message: string,
  context: Record<string, unknown>,
  cause: unknown,
): AppError {
  return AppError.fromCause(code, message, context, cause);
}

export function createRunRepository(db: Database.Database): RunRepository {
  const insertInvocationStmt = db.prepare<StartInvocationInput>(
    `
      INSERT INTO pipeline_invocations (run_id, command, selector, status, started_at)
      VALUES (@runId, @command, @selector, 'running', @startedAt)
    `,
  );

  const finishInvocationStmt = db.prepare<FinishInvocationInput>(
    `
      UPDATE pipeline_invocations
      SET status = @status,
          finished_at = @finishedAt
      WHERE run_id = @runId
    `,
  );

  const getInvocationStmt = db.prepare<{ runId: string }, InvocationRecord>(
    `
      SELECT
        run_id AS runId,
        command,
        selector,
        status,
        started_at AS startedAt,
        finished_at AS finishedAt
      FROM pipeline_invocations
      WHERE run_id = @runId
    `,
  );

  const insertModelRunStmt = db.prepare<InsertModelRunInput>(
    `
      INSERT INTO model_runs (
        run_id,
        model_name,
        stage,
        materialized,
        status,
        row_count,
        duration_ms,
        error_code,
        error_message,
        started_at,
        finished_at
      )
      VALUES (
        @runId,
        @modelName,
        @stage,
        @materialized,
        @status,
        @rowCount,
        @durationMs,
        @errorCode,
        @errorMessage,
        @startedAt,
        @finishedAt
      )
    `,
  );

  const listModelRunsStmt = db.prepare<{ runId: string }, ModelRunRecord>(
    `
      SELECT
        run_id AS runId,
        model_name AS modelName,
        stage,
        materialized,
        status,
        row_count AS rowCount,
        duration_ms AS durationMs,
        error_code AS errorCode,
        error_message AS errorMessage,
        started_at AS startedAt,
        finished_at AS finishedAt
      FROM model_runs
      WHERE run_id = @runId
      ORDER BY id ASC
    `,
  );

  const insertTestResultStmt = db.prepare<InsertTestResultInput>(
    `
      INSERT INTO test_results (
        run_id,
        model_name,
        test_name,
        column_name,
        status,
        failures,
        error_message,
        executed_at
      )
      VALUES (
        @runId,
        @modelName,
        @testName,
        @columnName,
        @status,
        @failures,
        @errorMessage,
        @executedAt
      )
    `,
  );

  const listTestResultsStmt = db.prepare<{ runId: string }, TestResultRecord>(
    `
      SELECT
        run_id AS runId,
        model_name AS modelName,
        test_name AS testName,
        column_name AS columnName,
        status,
        failures,
        error_message AS errorMessage,
        executed_at AS executedAt
      FROM test_results
      WHERE run_id = @runId
      ORDER BY id ASC
    `,
  );

  const insertLineageStmt = db.prepare<InsertLineageInput>(
    `
      INSERT INTO data_lineage (
        run_id,
        pipeline_stage,
        entity_type,
        entity_key,
        source_table,
        source_record_count,
        metadata_json,
        produced_at
      )
      VALUES (
        @runId,
        @pipelineStage,
        @entityType,
        @entityKey,
        @sourceTable,
        @sourceRecordCount,
        @metadataJson,
        @producedAt
      )
    `,
  );

  const insertLoadJobStmt = db.prepare<StartLoadJobInput>(
    `
      INSERT INTO load_jobs (
        job_id,
        source_uri,
        target_table,
        write_disposition,
        partition_time,
        status,
        started_at
      )
      VALUES (
        @jobId,
        @sourceUri,
        @targetTable,
        @writeDisposition,
        @partitionTime,
        'running',
        @startedAt
      )
    `,
  );

  const finishLoadJobStmt = db.prepare<FinishLoadJobInput>(
    `
      UPDATE load_jobs
      SET status = @status,
          rows_loaded = @rowsLoaded,
          bad_records = @badRecords,
          error_code = @errorCode,
          error_message = @errorMessage,
          finished_at = @finishedAt
      WHERE job_id = @jobId
    `,
  );

  const getLoadJobStmt = db.prepare<{ jobId: string }, LoadJobRecord>(
    `
      SELECT
        job_id AS jobId,
        source_uri AS sourceUri,
        target_table AS targetTable,
        write_disposition AS writeDisposition,
        partition_time AS partitionTime,
        status,
        rows_loaded AS rowsLoaded,
        bad_records AS badRecords,
        error_code AS errorCode,
        error_message AS errorMessage,
        started_at AS startedAt,
        finished_at AS finishedAt
      FROM load_jobs
      WHERE job_id = @jobId
    `,
  );

  return {
    startInvocation: (input) => {
      try {
        insertInvocationStmt.run(input);
        return ok(undefined);
      } catch (cause) {
        return err(
          createRepositoryError(
            'DB_INVOCATION_INSERT_FAILED',
            'Failed to save pipeline invocation.',
            { runId: input.runId, command: input.command },
            cause,
          ),
        );
      }
    },

    finishInvocation: (input) => {
      try {
        finishInvocationStmt.run(input);
        return ok(undefined);
      } catch (cause) {
        return err(
          createRepositoryError(
            'DB_INVOCATION_UPDATE_FAILED',
            'Failed to finish pipeline invocation.',
            { runId: input.runId, status: input.status },
            cause,
          ),
        );
      }
    },

    getInvocation: (input) => {
      try {
        return ok(getInvocationStmt.get(input) ?? null);
      } catch (cause) {
        return err(
          createRepositoryError(
            'DB_INVOCATION_READ_FAILED',
            'Failed to read pipeline invocation.',
            { runId: input.runId },
            cause,
          ),
        );
      }
    },

    insertModelRun: (input) => {
      try {
        insertModelRunStmt.run(input);
        return ok(undefined);
      } catch (cause) {
        return err(
          createRepositoryError(
            'DB_MODEL_RUN_INSERT_FAILED',
            'Failed to save model run.',
            { runId: input.runId, modelName: input.modelName },
            cause,
          ),
        );
      }
    },

    listModelRuns: (input) => {
      try {
        return ok(listModelRunsStmt.all(input));
      } catch (cause) {
        return err(
          createRepositoryError(
            'DB_MODEL_RUN_READ_FAILED',
            'Failed to read model runs.',
            { runId: input.runId },
            cause,
          ),
        );
      }
    },

    insertTestResult: (input) => {
      try {
        insertTestResultStmt.run(input);
        return ok(undefined);
      } catch (cause) {
        return err(
          createRepositoryError(
            'DB_TEST_RESULT_INSERT_FAILED',
            'Failed to save model test result.',
            { runId: input.runId, modelName: input.modelName, testName: input.testName },
            cause,
          ),
        );
      }
    },

    listTestResults: (input) => {
      try {
        return ok(listTestResultsStmt.all(input));
      } catch (cause) {
        return err(
          createRepositoryError(
            'DB_TEST_RESULT_READ_FAILED',
            'Failed to read model test results.',
            { runId: input.runId },
            cause,
          ),
        );
      }
    },

    insertLineage: (input) => {
      try {
        insertLineageStmt.run(input);
        return ok(undefined);
      } catch (cause) {
        return err(
          createRepositoryError(
            'DB_LINEAGE_INSERT_FAILED',
            'Failed to save pipeline lineage entry.',
            {
              pipelineStage: input.pipelineStage,
              entityType: input.entityType,
              entityKey: input.entityKey,
            },
            cause,
          ),
        );
      }
    },

    startLoadJob: (input) => {
      try {
        insertLoadJobStmt.run(input);
        return ok(undefined);
      } catch (cause) {
        return err(
          createRepositoryError(
            'DB_LOAD_JOB_INSERT_FAILED',
            'Failed to save load job.',
            { jobId: input.jobId, sourceUri: input.sourceUri },
            cause,
          ),
        );
      }
    },

    finishLoadJob: (input) => {
      try {
        finishLoadJobStmt.run(input);
        return ok(undefined);
      } catch (cause) {
        return err(
          createRepositoryError(
            'DB_LOAD_JOB_UPDATE_FAILED',
            'Failed to finish load job.',
            { jobId: input.jobId, status: input.status },
            cause,
          ),
        );
      }
    },

    getLoadJob: (input) => {
      try {
        return ok(getLoadJobStmt.get(input) ?? null);
      } catch (cause) {
        return err(
          createRepositoryError(
            'DB_LOAD_JOB_READ_FAILED',
            'Failed to read load job.',
            { jobId: input.jobId },
            cause,
          ),
        );
      }
    },

    runInTransaction: <T>(operation: () => Result<T, AppError>) => {
      const transactionErrorRef: { current: AppError | null } = { current: null };
      try {
        const transaction = db.transaction(() => {
          const result = operation();
          if (!result.ok) {
            transactionErrorRef.current = result.error;
            throw new Error(result.error.message);
          }
          return result.value;
        });
        return ok(transaction());
      } catch (cause) {
        if (transactionErrorRef.current !== null) {
          return err(transactionErrorRef.current);
        }
        return err(
          createRepositoryError(
            'DB_TRANSACTION_FAILED',
            'Failed to execute pipeline transaction.',
            {},
            cause,
          ),
        );
      }
    },
  };
}
