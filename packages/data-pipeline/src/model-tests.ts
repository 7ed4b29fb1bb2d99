import {
  quoteIdentifier,
  readRelationKind,
  sqlStringLiteral,
  type DatabaseConnection,
  type TestStatus,
} from '@bizlake/core';
import { AppError, createSilentLogger, err, ok, toError, type Logger, type Result } from '@bizlake/shared';
import { openInvocation } from './invocation.ts';
import { selectModels } from './model-graph.ts';
import { PIPELINE_MODELS, type ColumnTest, type ModelDefinition, type ModelTest } from './models/index.ts';

export interface RunModelTestsInput {
  db: DatabaseConnection['db'];
  models?: readonly ModelDefinition[];
  select?: string | null;
  runId?: string;
  logger?: Logger;
  now?: () => Date;
  createRunId?: () => string;
}

export interface ModelTestOutcome {
  modelName: string;
  testName: string;
  columnName: string | null;
  status: TestStatus;
  failures: number;
  errorMessage: string | null;
}

export interface RunModelTestsResult {
  runId: string;
  tests: ModelTestOutcome[];
  passed: number;
  failed: number;
  errored: number;
}

export interface CompiledModelTest {
  modelName: string;
  testName: string;
  columnName: string | null;
  /** Query returning a single `failures` count. */
  sql: string;
}

function compileColumnTest(modelName: string, columnName: string, test: ColumnTest): CompiledModelTest {
  const relation = quoteIdentifier(modelName);
  const column = quoteIdentifier(columnName);
  const base = { modelName, testName: test.type, columnName };

  switch (test.type) {
    case 'not_null':
      return { ...base, sql: `SELECT COUNT(*) AS failures FROM ${relation} WHERE ${column} IS NULL` };
    case 'unique':
      return {
        ...base,
        sql: `
          SELECT COUNT(*) AS failures FROM (
            SELECT ${column}
            FROM ${relation}
            WHERE ${column} IS NOT NULL
            GROUP BY ${column}
            HAVING COUNT(*) > 1
          )
        `,
      };
    case 'accepted_values':
      return {
        ...base,
        sql: `
          SELECT COUNT(*) AS failures
          FROM ${relation}
          WHERE ${column} IS NOT NULL
            AND ${column} NOT IN (${test.values.map(sqlStringLiteral).join(', ')})
        `,
      };
    case 'relationships':
      return {
        ...base,
        sql: `
          SELECT COUNT(*) AS failures
          FROM ${relation}
          WHERE ${column} IS NOT NULL
            AND ${column} NOT IN (
              SELECT ${quoteIdentifier(test.field)}
              FROM ${quoteIdentifier(test.toModel)}
              WHERE ${quoteIdentifier(test.field)} IS NOT NULL
            )
        `,
      };
  }
}

function compileModelTest(modelName: string, test: ModelTest): CompiledModelTest {
  const columns = test.columns.map(quoteIdentifier).join(', ');
  return {
    modelName,
    testName: test.type,
    columnName: test.columns.join(','),
    sql: `
      SELECT COUNT(*) AS failures FROM (
        SELECT ${columns}
        FROM ${quoteIdentifier(modelName)}
        GROUP BY ${columns}
        HAVING COUNT(*) > 1
      )
    `,
  };
}

export function compileModelTests(model: ModelDefinition): CompiledModelTest[] {
  const compiled: CompiledModelTest[] = [];
  for (const column of model.columns) {
    for (const test of column.tests) {
      compiled.push(compileColumnTest(model.name, column.name, test));
    }
  }
  for (const test of model.modelTests) {
    compiled.push(compileModelTest(model.name, test));
  }
  return compiled;
}

function executeCompiledTest(db: DatabaseConnection['db'], test: CompiledModelTest): ModelTestOutcome {
  const base = { modelName: test.modelName, testName: test.testName, columnName: test.columnName };

  if (readRelationKind(db, test.modelName) === null) {
    return { ...base, status: 'error', failures: 0, errorMessage: `Relation ${test.modelName} does not exist` };
  }

  try {
    const failures = db.prepare<[], number>(test.sql).pluck().get();
    const count = typeof failures === 'number' ? failures : 0;
    return { ...base, status: count === 0 ? 'pass' : 'fail', failures: count, errorMessage: null };
  } catch (cause) {
    return { ...base, status: 'error', failures: 0, errorMessage: toError(cause).message };
  }
}

/**
 * Evaluates declared column and model tests for the selected models. Results are persisted under the
 * invocation's run id; any failing or erroring test turns the result into `MODEL_TESTS_FAILED`.
 */
export function runModelTests(input: RunModelTestsInput): Result<RunModelTestsResult, AppError> {
  const now = input.now ?? (() => new Date());
  const logger = input.logger ?? createSilentLogger();
  const selector = input.select ?? null;

  const selectedResult = selectModels(input.models ?? PIPELINE_MODELS, selector);
  if (!selectedResult.ok) {
    return selectedResult;
  }

  const invocationResult = openInvocation({
    db: input.db,
    command: 'test',
    selector,
    runId: input.runId,
    now,
    createRunId: input.createRunId,
  });
  if (!invocationResult.ok) {
    return invocationResult;
  }
  const invocation = invocationResult.value;
  const testLogger = logger.withContext({ runId: invocation.runId });

  const outcomes: ModelTestOutcome[] = [];
  for (const model of selectedResult.value) {
    for (const test of compileModelTests(model)) {
      const outcome = executeCompiledTest(input.db, test);
      outcomes.push(outcome);

      const recordResult = invocation.repository.insertTestResult({
        runId: invocation.runId,
        modelName: outcome.modelName,
        testName: outcome.testName,
        columnName: outcome.columnName,
        status: outcome.status,
        failures: outcome.failures,
        errorMessage: outcome.errorMessage,
        executedAt: now().toISOString(),
      });
      if (!recordResult.ok) {
        return recordResult;
      }

      const logContext = {
        modelName: outcome.modelName,
        testName: outcome.testName,
        columnName: outcome.columnName,
        failures: outcome.failures,
      };
      if (outcome.status === 'pass') {
        testLogger.debug('Model test passed', logContext);
      } else if (outcome.status === 'fail') {
        testLogger.warning('Model test failed', logContext);
      } else {
        testLogger.error('Model test errored', { ...logContext, error: outcome.errorMessage });
      }
    }
  }

  const summary = {
    passed: outcomes.filter((outcome) => outcome.status === 'pass').length,
    failed: outcomes.filter((outcome) => outcome.status === 'fail').length,
    errored: outcomes.filter((outcome) => outcome.status === 'error').length,
  };
  const finishResult = invocation.finish(summary.failed + summary.errored > 0 ? 'error' : 'success');
  if (!finishResult.ok) {
    return finishResult;
  }

  testLogger.info('Model tests finished', summary);

  if (summary.failed + summary.errored > 0) {
    return err(
      AppError.create('MODEL_TESTS_FAILED', 'Testy modeli nie przeszły.', 'error', {
        runId: invocation.runId,
        ...summary,
      }),
    );
  }

  return ok({ runId: invocation.runId, tests: outcomes, ...summary });
}
