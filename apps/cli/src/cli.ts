import fs from 'node:fs';
import path from 'node:path';
import { parseArgs } from 'node:util';
import {
  createDatabaseConnection,
  createInsightQueries,
  createRunRepository,
  GRANULARITIES,
  runMigrations,
  type DatabaseConnection,
} from '@bizlake/core';
import { buildModels, generateDocs, runModels, runModelTests } from '@bizlake/data-pipeline';
import { profileRawSource, runDataQualityChecks, writeQualityReport, writeRawProfile } from '@bizlake/diagnostics';
import { loadCsvIntoWarehouse } from '@bizlake/ingest';
import {
  AppError,
  createLogger,
  err,
  loadPipelineConfig,
  ok,
  toError,
  type Logger,
  type LogWriter,
  type PipelineConfig,
  type Result,
} from '@bizlake/shared';
import { z } from 'zod/v4';

export const CLI_COMMANDS = ['load', 'run', 'test', 'build', 'docs', 'quality', 'profile', 'show'] as const;
export type CliCommand = (typeof CLI_COMMANDS)[number];

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  usage: 2,
} as const;
export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export const USAGE_LINES = [
  'bizlake load <file> [--partition-date YYYY-MM-DD] [--append] [--max-bad-records N]',
  'bizlake run [--select <selector>]',
  'bizlake test [--select <selector>]',
  'bizlake build [--select <selector>]',
  'bizlake docs',
  'bizlake quality',
  'bizlake profile',
  'bizlake show daily [--from YYYY-MM-DD] [--to YYYY-MM-DD]',
  'bizlake show insights [--granularity monthly|quarterly|annual] [--year YYYY]',
] as const;

const SHOW_TARGETS = ['daily', 'insights'] as const;

const CliOptionsSchema = z.object({
  select: z.string().min(1).optional(),
  partitionDate: z.iso.date().optional(),
  append: z.boolean().default(false),
  maxBadRecords: z.string().regex(/^\d+$/).transform(Number).optional(),
  granularity: z.enum(GRANULARITIES).optional(),
  year: z.string().regex(/^\d{4}$/).transform(Number).optional(),
  from: z.iso.date().optional(),
  to: z.iso.date().optional(),
});

type CliOptions = z.infer<typeof CliOptionsSchema>;

interface ParsedCommandLine {
  command: CliCommand;
  args: string[];
  options: CliOptions;
  help: boolean;
}

export interface CliDependencies {
  env?: Record<string, string | undefined>;
  cwd?: string;
  envFiles?: readonly string[];
  writer?: LogWriter;
  now?: () => Date;
  createRunId?: () => string;
}

interface CommandContext {
  db: DatabaseConnection['db'];
  config: PipelineConfig;
  logger: Logger;
  cwd: string;
  now: () => Date;
  createRunId?: () => string;
  args: string[];
  options: CliOptions;
}

function createUsageError(message: string, context: Record<string, unknown> = {}): AppError {
  return AppError.create('CLI_USAGE_INVALID', message, 'error', context);
}

function isCliCommand(value: string): value is CliCommand {
  return CLI_COMMANDS.some((command) => command === value);
}

function isShowTarget(value: string): value is (typeof SHOW_TARGETS)[number] {
  return SHOW_TARGETS.some((target) => target === value);
}

export function parseCommandLine(argv: readonly string[]): Result<ParsedCommandLine | null, AppError> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (cause) {
    return err(createUsageError(toError(cause).message, { argv: [...argv] }));
  }

  const [commandName, ...args] = parsed.positionals;
  if (commandName === undefined) {
    return parsed.values.help === true ? ok(null) : err(createUsageError('Nie podano polecenia.'));
  }
  if (!isCliCommand(commandName)) {
    return err(createUsageError('Nieznane polecenie.', { command: commandName }));
  }

  const optionsParsed = CliOptionsSchema.safeParse({
    select: parsed.values.select,
    partitionDate: parsed.values['partition-date'],
    append: parsed.values.append,
    maxBadRecords: parsed.values['max-bad-records'],
    granularity: parsed.values.granularity,
    year: parsed.values.year,
    from: parsed.values.from,
    to: parsed.values.to,
  });
  if (!optionsParsed.success) {
    return err(createUsageError('Niepoprawne opcje polecenia.', { command: commandName, issues: optionsParsed.error.issues }));
  }

  return ok({ command: commandName, args, options: optionsParsed.data, help: parsed.values.help === true });
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      select: { type: 'string', short: 's' },
      'partition-date': { type: 'string' },
      append: { type: 'boolean' },
      'max-bad-records': { type: 'string' },
      granularity: { type: 'string' },
      year: { type: 'string' },
      from: { type: 'string' },
      to: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

function logFailure(logger: Logger, error: AppError): void {
  logger.error('Command failed', {
    code: error.code,
    error: error.toString(),
    details: error.context,
  });
}

function logModelRunDetails(context: CommandContext, error: AppError): void {
  const runId = error.context.runId;
  if (typeof runId !== 'string') {
    return;
  }
  const runsResult = createRunRepository(context.db).listModelRuns({ runId });
  if (!runsResult.ok) {
    context.logger.error('Model run details unavailable', { runId, error: runsResult.error.toString() });
    return;
  }
  for (const run of runsResult.value) {
    if (run.status !== 'success') {
      context.logger.error('Model run detail', {
        runId,
        modelName: run.modelName,
        status: run.status,
        errorCode: run.errorCode,
        errorMessage: run.errorMessage,
      });
    }
  }
}

async function loadCommand(context: CommandContext): Promise<Result<ExitCode, AppError>> {
  const [file, ...rest] = context.args;
  if (file === undefined || rest.length > 0) {
    return err(createUsageError('Polecenie load wymaga dokładnie jednej ścieżki pliku.', { args: context.args }));
  }

  const result = await loadCsvIntoWarehouse({
    db: context.db,
    filePath: path.resolve(context.cwd, file),
    table: context.config.rawTable,
    disposition: context.options.append ? 'append' : 'truncate',
    partitionDate: context.options.partitionDate ?? null,
    maxBadRecords: context.options.maxBadRecords,
    logger: context.logger,
    now: context.now,
  });
  if (!result.ok) {
    return result;
  }

  context.logger.info('Load summary', {
    jobId: result.value.jobId,
    table: result.value.table,
    partitionTime: result.value.partitionTime,
    rowsRead: result.value.rowsRead,
    rowsLoaded: result.value.rowsLoaded,
    badRecords: result.value.badRecords,
    totalRows: result.value.summary.totalRows,
    filesProcessed: result.value.summary.filesProcessed,
    columns: result.value.columns.map((column) => `${column.name}:${column.type}`),
  });
  return ok(EXIT_CODES.success);
}

function runCommand(context: CommandContext): Result<ExitCode, AppError> {
  const result = runModels({
    db: context.db,
    select: context.options.select ?? null,
    rawTable: context.config.rawTable,
    logger: context.logger,
    now: context.now,
    createRunId: context.createRunId,
  });
  return result.ok ? ok(EXIT_CODES.success) : result;
}

function testCommand(context: CommandContext): Result<ExitCode, AppError> {
  const result = runModelTests({
    db: context.db,
    select: context.options.select ?? null,
    logger: context.logger,
    now: context.now,
    createRunId: context.createRunId,
  });
  return result.ok ? ok(EXIT_CODES.success) : result;
}

function buildCommand(context: CommandContext): Result<ExitCode, AppError> {
  const result = buildModels({
    db: context.db,
    select: context.options.select ?? null,
    rawTable: context.config.rawTable,
    logger: context.logger,
    now: context.now,
    createRunId: context.createRunId,
  });
  return result.ok ? ok(EXIT_CODES.success) : result;
}

function docsCommand(context: CommandContext): Result<ExitCode, AppError> {
  const result = generateDocs({
    db: context.db,
    targetDir: context.config.targetDir,
    rawTable: context.config.rawTable,
    logger: context.logger,
    now: context.now,
  });
  return result.ok ? ok(EXIT_CODES.success) : result;
}

function qualityCommand(context: CommandContext): Result<ExitCode, AppError> {
  const reportResult = runDataQualityChecks({
    db: context.db,
    warehousePath: context.config.warehousePath,
    rawTable: context.config.rawTable,
    thresholds: {
      maxHoursSinceUpdate: context.config.freshnessMaxHours,
      minCompletenessPercentage: context.config.completenessMinPercentage,
      maxCoefficientOfVariation: context.config.consistencyMaxCoefficientOfVariation,
    },
    logger: context.logger,
    now: context.now,
  });
  if (!reportResult.ok) {
    return reportResult;
  }

  const writeResult = writeQualityReport({ report: reportResult.value, reportsDir: context.config.reportsDir });
  if (!writeResult.ok) {
    return writeResult;
  }

  context.logger.info('Quality report written', {
    filePath: writeResult.value.filePath,
    qualityScore: reportResult.value.summary.qualityScore,
    rating: reportResult.value.rating,
  });
  return ok(reportResult.value.rating === 'needs_attention' ? EXIT_CODES.failure : EXIT_CODES.success);
}

function profileCommand(context: CommandContext): Result<ExitCode, AppError> {
  const profileResult = profileRawSource({
    db: context.db,
    rawTable: context.config.rawTable,
    logger: context.logger,
    now: context.now,
  });
  if (!profileResult.ok) {
    return profileResult;
  }

  const writeResult = writeRawProfile({ profile: profileResult.value, reportsDir: context.config.reportsDir });
  if (!writeResult.ok) {
    return writeResult;
  }

  context.logger.info('Raw profile written', {
    filePath: writeResult.value.filePath,
    ...profileResult.value.overview,
  });
  return ok(EXIT_CODES.success);
}

function showCommand(context: CommandContext): Result<ExitCode, AppError> {
  const [target, ...rest] = context.args;
  if (target === undefined || rest.length > 0 || !isShowTarget(target)) {
    return err(createUsageError('Polecenie show wymaga celu daily albo insights.', { args: context.args }));
  }

  const queries = createInsightQueries(context.db);
  if (target === 'daily') {
    const rowsResult = queries.listDailyMetrics({
      dateFrom: context.options.from ?? null,
      dateTo: context.options.to ?? null,
    });
    if (!rowsResult.ok) {
      return rowsResult;
    }
    for (const row of rowsResult.value) {
      context.logger.info('Daily metric', { ...row });
    }
    return ok(EXIT_CODES.success);
  }

  const rowsResult = queries.listBusinessInsights({
    granularity: context.options.granularity ?? null,
    year: context.options.year ?? null,
  });
  if (!rowsResult.ok) {
    return rowsResult;
  }
  for (const row of rowsResult.value) {
    context.logger.info('Business insight', { ...row });
  }
  return ok(EXIT_CODES.success);
}

async function dispatch(command: CliCommand, context: CommandContext): Promise<Result<ExitCode, AppError>> {
  switch (command) {
    case 'load':
      return loadCommand(context);
    case 'run':
      return runCommand(context);
    case 'test':
      return testCommand(context);
    case 'build':
      return buildCommand(context);
    case 'docs':
      return docsCommand(context);
    case 'quality':
      return qualityCommand(context);
    case 'profile':
      return profileCommand(context);
    case 'show':
      return showCommand(context);
  }
}

async function executeCommand(command: CliCommand, context: CommandContext): Promise<ExitCode> {
  const result = await dispatch(command, context);
  if (result.ok) {
    return result.value;
  }

  logFailure(context.logger, result.error);
  if (result.error.code === 'MODEL_RUN_FAILED') {
    logModelRunDetails(context, result.error);
  }
  return result.error.code === 'CLI_USAGE_INVALID' ? EXIT_CODES.usage : EXIT_CODES.failure;
}

function openWarehouse(config: PipelineConfig, now: () => Date): Result<DatabaseConnection, AppError> {
  if (config.warehousePath !== ':memory:') {
    try {
      fs.mkdirSync(path.dirname(config.warehousePath), { recursive: true });
    } catch (cause) {
      return err(
        AppError.fromCause(
          'DB_OPEN_FAILED',
          'Nie udało się przygotować katalogu hurtowni.',
          { warehousePath: config.warehousePath },
          cause,
        ),
      );
    }
  }

  const connectionResult = createDatabaseConnection({ filename: config.warehousePath });
  if (!connectionResult.ok) {
    return connectionResult;
  }

  const migrationResult = runMigrations(connectionResult.value.db, now);
  if (!migrationResult.ok) {
    const closeResult = connectionResult.value.close();
    return closeResult.ok ? migrationResult : closeResult;
  }
  return connectionResult;
}

/**
 * Entry point shared by `main.ts` and the tests. Returns the process exit code; every result and
 * failure is written as a log entry.
 */
export async function runCli(argv: readonly string[], dependencies: CliDependencies = {}): Promise<ExitCode> {
  const now = dependencies.now ?? (() => new Date());
  const cwd = dependencies.cwd ?? process.cwd();
  const clock = (): string => now().toISOString();

  const configResult = loadPipelineConfig({ env: dependencies.env, cwd, envFiles: dependencies.envFiles });
  if (!configResult.ok) {
    createLogger({ writer: dependencies.writer, now: clock }).error('Configuration invalid', {
      code: configResult.error.code,
      error: configResult.error.toString(),
      details: configResult.error.context,
    });
    return EXIT_CODES.usage;
  }
  const config = configResult.value;
  const logger = createLogger({ writer: dependencies.writer, now: clock, minLevel: config.logLevel });

  const commandLineResult = parseCommandLine(argv);
  if (!commandLineResult.ok) {
    logger.error('Invalid usage', {
      code: commandLineResult.error.code,
      error: commandLineResult.error.toString(),
      details: commandLineResult.error.context,
      usage: [...USAGE_LINES],
    });
    return EXIT_CODES.usage;
  }
  const commandLine = commandLineResult.value;
  if (commandLine === null || commandLine.help) {
    logger.info('Usage', { usage: [...USAGE_LINES] });
    return EXIT_CODES.success;
  }

  const commandLogger = logger.withContext({ command: commandLine.command });
  const connectionResult = openWarehouse(config, now);
  if (!connectionResult.ok) {
    logFailure(commandLogger, connectionResult.error);
    return EXIT_CODES.failure;
  }
  const connection = connectionResult.value;

  const context: CommandContext = {
    db: connection.db,
    config,
    logger: commandLogger,
    cwd,
    now,
    createRunId: dependencies.createRunId,
    args: commandLine.args,
    options: commandLine.options,
  };

  try {
    return await executeCommand(commandLine.command, context);
  } finally {
    const closeResult = connection.close();
    if (!closeResult.ok) {
      logFailure(commandLogger, closeResult.error);
    }
  }
}
