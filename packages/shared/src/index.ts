// Types
export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
  isOk,
  isErr,
  unwrap,
} from './types/result.ts';

// Errors
export {
  AppError,
  AppErrorSchema,
  SEVERITY,
  toError,
  type Severity,
  type AppErrorDTO,
} from './errors/app-error.ts';

// Logger
export {
  createLogger,
  createSilentLogger,
  LOG_LEVELS,
  type Logger,
  type LogEntry,
  type LogLevel,
  type LogContext,
  type LogWriter,
  type Clock,
  type CreateLoggerOptions,
} from './logger/index.ts';

// Config
export {
  loadPipelineConfig,
  PipelineConfigSchema,
  type LoadPipelineConfigInput,
  type PipelineConfig,
} from './config/index.ts';
