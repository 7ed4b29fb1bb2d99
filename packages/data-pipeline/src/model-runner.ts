import {
  countRelationRows,
  DEFAULT_RAW_TABLE,
  quoteIdentifier,
  readRelationKind,
  validateIdentifier,
  type DatabaseConnection,
  type Materialization,
  type ModelRunStatus,
  type ModelStage,
  type RunRepository,
} from '@bizlake/core';
import { AppError, createSilentLogger, err, ok, type Logger, type Result } from '@bizlake/shared';
import { openInvocation } from './invocation.ts';
import { selectModels } from './model-graph.ts';
import {
  PIPELINE_MODELS,
  resolveSourceRelations,
  type ModelDefinition,
  type ModelRenderContext,
} from './models/index.ts';

export interface RunModelsInput {
  db: DatabaseConnection['db'];
  models?: readonly ModelDefinition[];
  select?: string | null;
  rawTable?: string;
  runId?: string;
  logger?: Logger;
  now?: () => Date;
  createRunId?: () => string;
}

export interface ModelRunOutcome {
  modelName: string;
  stage: ModelStage;
  materialized: Materialization;
  status: ModelRunStatus;
  rowCount: number | null;
  durationMs: number;
  errorCode: string | null;
  errorMessage: string | null;
}

export interface RunModelsResult {
  runId: string;
  processedAt: string;
  models: ModelRunOutcome[];
}

interface MaterializedModel {
  rowCount: number;
  sourceRecordCount: number;
}

function materializeModel(
  db: DatabaseConnection['db'],
  model: ModelDefinition,
  context: ModelRenderContext,
): Result<MaterializedModel, AppError> {
  const sources = resolveSourceRelations(model, context.rawTable);
  try {
    let sourceRecordCount = 0;
    for (const source of sources) {
      sourceRecordCount += countRelationRows(db, source);
    }

    const existingKind = readRelationKind(db, model.name);
    if (existingKind === 'view') {
      db.exec(`DROP VIEW IF EXISTS ${quoteIdentifier(model.name)}`);
    } else if (existingKind === 'table') {
      db.exec(`DROP TABLE IF EXISTS ${quoteIdentifier(model.name)}`);
    }

    const keyword = model.materialized === 'view' ? 'VIEW' : 'TABLE';
    db.exec(`CREATE ${keyword} ${quoteIdentifier(model.name)} AS ${model.render(context)}`);

    return ok({
      rowCount: countRelationRows(db, model.name),
      sourceRecordCount,
    });
  } catch (cause) {
    return err(
      AppError.fromCause(
        'MODEL_BUILD_FAILED',
        'Nie udało się zbudować modelu.',
        { modelName: model.name, sources },
        cause,
      ),
    );
  }
}

function recordModelOutcome(
  repository: RunRepository,
  runId: string,
  outcome: ModelRunOutcome,
  startedAt: string,
  finishedAt: string,
): Result<void, AppError> {
  return repository.insertModelRun({
    runId,
    modelName: outcome.modelName,
    stage: outcome.stage,
    materialized: outcome.materialized,
    status: outcome.status,
    rowCount: outcome.rowCount,
    durationMs: outcome.durationMs,
    errorCode: outcome.errorCode,
    errorMessage: outcome.errorMessage,
    startedAt,
    finishedAt,
  });
}

/**
 * Materializes the selected models in dependency order. Each model is dropped and recreated in its
 * own transaction together with its model-run and lineage rows; models downstream of a failure are
 * recorded as skipped.
 */
export function runModels(input: RunModelsInput): Result<RunModelsResult, AppError> {
  const now = input.now ?? (() => new Date());
  const logger = input.logger ?? createSilentLogger();
  const rawTable = input.rawTable ?? DEFAULT_RAW_TABLE;
  const selector = input.select ?? null;

  const rawTableResult = validateIdentifier(rawTable);
  if (!rawTableResult.ok) {
    return rawTableResult;
  }

  const selectedResult = selectModels(input.models ?? PIPELINE_MODELS, selector);
  if (!selectedResult.ok) {
    return selectedResult;
  }

  const invocationResult = openInvocation({
    db: input.db,
    command: 'run',
    selector,
    runId: input.runId,
    now,
    createRunId: input.createRunId,
  });
  if (!invocationResult.ok) {
    return invocationResult;
  }
  const invocation = invocationResult.value;
  const runLogger = logger.withContext({ runId: invocation.runId });
  const context: ModelRenderContext = {
    runId: invocation.runId,
    processedAt: invocation.processedAt,
    rawTable,
  };

  runLogger.info('Model run started', {
    selector,
    models: selectedResult.value.map((model) => model.name),
  });

  const outcomes: ModelRunOutcome[] = [];
  const unavailable = new Set<string>();

  for (const model of selectedResult.value) {
    const started = now();
    const startedAt = started.toISOString();
    const blockedBy = model.dependsOn.filter((dependency) => unavailable.has(dependency));

    if (blockedBy.length > 0) {
      unavailable.add(model.name);
      const skipped: ModelRunOutcome = {
        modelName: model.name,
        stage: model.stage,
        materialized: model.materialized,
        status: 'skipped',
        rowCount: null,
        durationMs: 0,
        errorCode: null,
        errorMessage: `Upstream model failed: ${blockedBy.join(', ')}`,
      };
      outcomes.push(skipped);
      runLogger.warning('Model skipped', { modelName: model.name, blockedBy });
      const recordResult = recordModelOutcome(invocation.repository, invocation.runId, skipped, startedAt, startedAt);
      if (!recordResult.ok) {
        return recordResult;
      }
      continue;
    }

    const buildResult = invocation.repository.runInTransaction(() => {
      const materialized = materializeModel(input.db, model, context);
      if (!materialized.ok) {
        return materialized;
      }

      const finished = now();
      const outcome: ModelRunOutcome = {
        modelName: model.name,
        stage: model.stage,
        materialized: model.materialized,
        status: 'success',
        rowCount: materialized.value.rowCount,
        durationMs: Math.max(0, finished.getTime() - started.getTime()),
        errorCode: null,
        errorMessage: null,
      };

      const recordResult = recordModelOutcome(
        invocation.repository,
        invocation.runId,
        outcome,
        startedAt,
        finished.toISOString(),
      );
      if (!recordResult.ok) {
        return recordResult;
      }

      const lineageResult = invocation.repository.insertLineage({
        runId: invocation.runId,
        pipelineStage: model.stage,
        entityType: model.materialized,
        entityKey: model.name,
        sourceTable: resolveSourceRelations(model, rawTable).join(','),
        sourceRecordCount: materialized.value.sourceRecordCount,
        metadataJson: JSON.stringify({
          rowCount: materialized.value.rowCount,
          dependsOn: model.dependsOn,
          processedAt: invocation.processedAt,
        }),
        producedAt: finished.toISOString(),
      });
      if (!lineageResult.ok) {
        return lineageResult;
      }

      return ok(outcome);
    });

    if (buildResult.ok) {
      outcomes.push(buildResult.value);
      runLogger.info('Model built', {
        modelName: model.name,
        materialized: model.materialized,
        rowCount: buildResult.value.rowCount,
        durationMs: buildResult.value.durationMs,
      });
      continue;
    }

    unavailable.add(model.name);
    const finished = now();
    const failed: ModelRunOutcome = {
      modelName: model.name,
      stage: model.stage,
      materialized: model.materialized,
      status: 'error',
      rowCount: null,
      durationMs: Math.max(0, finished.getTime() - started.getTime()),
      errorCode: buildResult.error.code,
      errorMessage: buildResult.error.toString(),
    };
    outcomes.push(failed);
    runLogger.error('Model build failed', {
      modelName: model.name,
      errorCode: buildResult.error.code,
      error: buildResult.error.toString(),
    });
    const recordResult = recordModelOutcome(
      invocation.repository,
      invocation.runId,
      failed,
      startedAt,
      finished.toISOString(),
    );
    if (!recordResult.ok) {
      return recordResult;
    }
  }

  const failedModels = outcomes.filter((outcome) => outcome.status === 'error').map((outcome) => outcome.modelName);
  const finishResult = invocation.finish(failedModels.length > 0 ? 'error' : 'success');
  if (!finishResult.ok) {
    return finishResult;
  }

  runLogger.info('Model run finished', {
    succeeded: outcomes.filter((outcome) => outcome.status === 'success').length,
    failed: failedModels.length,
    skipped: outcomes.filter((outcome) => outcome.status === 'skipped').length,
  });

  if (failedModels.length > 0) {
    return err(
      AppError.create('MODEL_RUN_FAILED', 'Budowanie modeli zakończyło się błędem.', 'error', {
        runId: invocation.runId,
        failedModels,
        skippedModels: outcomes
          .filter((outcome) => outcome.status === 'skipped')
          .map((outcome) => outcome.modelName),
      }),
    );
  }

  return ok({
    runId: invocation.runId,
    processedAt: invocation.processedAt,
    models: outcomes,
  });
}
