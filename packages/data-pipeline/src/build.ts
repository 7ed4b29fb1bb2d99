import type { DatabaseConnection } from '@bizlake/core';
import { createSilentLogger, ok, type AppError, type Logger, type Result } from '@bizlake/shared';
import { openInvocation } from './invocation.ts';
import { runModels, type RunModelsResult } from './model-runner.ts';
import { runModelTests, type RunModelTestsResult } from './model-tests.ts';
import type { ModelDefinition } from './models/index.ts';

export interface BuildModelsInput {
  db: DatabaseConnection['db'];
  models?: readonly ModelDefinition[];
  select?: string | null;
  rawTable?: string;
  logger?: Logger;
  now?: () => Date;
  createRunId?: () => string;
}

export interface BuildModelsResult {
  runId: string;
  run: RunModelsResult;
  tests: RunModelTestsResult;
}

/** `run` followed by `test` under a single invocation; tests are not attempted after a failed run. */
export function buildModels(input: BuildModelsInput): Result<BuildModelsResult, AppError> {
  const now = input.now ?? (() => new Date());
  const logger = input.logger ?? createSilentLogger();

  const invocationResult = openInvocation({
    db: input.db,
    command: 'build',
    selector: input.select ?? null,
    now,
    createRunId: input.createRunId,
  });
  if (!invocationResult.ok) {
    return invocationResult;
  }
  const invocation = invocationResult.value;

  const runResult = runModels({
    db: input.db,
    models: input.models,
    select: input.select,
    rawTable: input.rawTable,
    runId: invocation.runId,
    logger,
    now,
  });
  if (!runResult.ok) {
    const finishResult = invocation.finish('error');
    return finishResult.ok ? runResult : finishResult;
  }

  const testResult = runModelTests({
    db: input.db,
    models: input.models,
    select: input.select,
    runId: invocation.runId,
    logger,
    now,
  });
  const finishResult = invocation.finish(testResult.ok ? 'success' : 'error');
  if (!finishResult.ok) {
    return finishResult;
  }
  if (!testResult.ok) {
    return testResult;
  }

  return ok({ runId: invocation.runId, run: runResult.value, tests: testResult.value });
}
