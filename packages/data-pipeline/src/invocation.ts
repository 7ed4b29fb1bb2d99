import { randomUUID } from 'node:crypto';
import {
  createRunRepository,
  runMigrations,
  type DatabaseConnection,
  type InvocationStatus,
  type PipelineCommand,
  type RunRepository,
} from '@bizlake/core';
import { ok, type AppError, type Result } from '@bizlake/shared';

export interface InvocationOptions {
  db: DatabaseConnection['db'];
  command: PipelineCommand;
  selector: string | null;
  /** Joins an invocation the caller already opened; it is then left for the caller to finish. */
  runId?: string;
  now: () => Date;
  createRunId?: () => string;
}

export interface PipelineInvocation {
  runId: string;
  processedAt: string;
  repository: RunRepository;
  finish: (status: Exclude<InvocationStatus, 'running'>) => Result<void, AppError>;
}

export function openInvocation(options: InvocationOptions): Result<PipelineInvocation, AppError> {
  const migrationResult = runMigrations(options.db, options.now);
  if (!migrationResult.ok) {
    return migrationResult;
  }

  const repository = createRunRepository(options.db);
  const processedAt = options.now().toISOString();

  if (options.runId !== undefined) {
    return ok({
      runId: options.runId,
      processedAt,
      repository,
      finish: () => ok(undefined),
    });
  }

  const runId = (options.createRunId ?? randomUUID)();
  const startResult = repository.startInvocation({
    runId,
    command: options.command,
    selector: options.selector,
    startedAt: processedAt,
  });
  if (!startResult.ok) {
    return startResult;
  }

  return ok({
    runId,
    processedAt,
    repository,
    finish: (status) =>
      repository.finishInvocation({
        runId,
        status,
        finishedAt: options.now().toISOString(),
      }),
  });
}
