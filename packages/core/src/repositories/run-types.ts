export type PipelineCommand = 'run' | 'test' | 'build';
export type InvocationStatus = 'running' | 'success' | 'error';
export type ModelStage = 'staging' | 'intermediate' | 'marts';
export type Materialization = 'view' | 'table';
export type ModelRunStatus = 'success' | 'error' | 'skipped';
export type TestStatus = 'pass' | 'fail' | 'error';
export type LoadJobStatus = 'running' | 'done' | 'failed';

export interface StartInvocationInput {
  runId: string;
  command: PipelineCommand;
  selector: string | null;
  startedAt: string;
}

export interface FinishInvocationInput {
  runId: string;
  status: Exclude<InvocationStatus, 'running'>;
  finishedAt: string;
}

export interface InvocationRecord {
  runId: string;
  command: PipelineCommand;
  selector: string | null;
  status: InvocationStatus;
  startedAt: string;
  finishedAt: string | null;
}

export interface InsertModelRunInput {
  runId: string;
  modelName: string;
  stage: ModelStage;
  materialized: Materialization;
  status: ModelRunStatus;
  rowCount: number | null;
  durationMs: number;
  errorCode: string | null;
  errorMessage: string | null;
  startedAt: string;
  finishedAt: string;
}

export type ModelRunRecord = InsertModelRunInput;

export interface InsertTestResultInput {
  runId: string;
  modelName: string;
  testName: string;
  columnName: string | null;
  status: TestStatus;
  failures: number;
  errorMessage: string | null;
  executedAt: string;
}

export type TestResultRecord = InsertTestResultInput;

export interface InsertLineageInput {
  runId: string;
  pipelineStage: string;
  entityType: string;
  entityKey: string;
  sourceTable: string;
  sourceRecordCount: number;
  metadataJson: string;
  producedAt: string;
}

export interface StartLoadJobInput {
  jobId: string;
  sourceUri: string;
  targetTable: string;
  writeDisposition: 'truncate' | 'append';
  partitionTime: string;
  startedAt: string;
}

export interface FinishLoadJobInput {
  jobId: string;
  status: Exclude<LoadJobStatus, 'running'>;
  rowsLoaded: number;
  badRecords: number;
  errorCode: string | null;
  errorMessage: string | null;
  finishedAt: string;
}

export interface LoadJobRecord {
  jobId: string;
  sourceUri: string;
  targetTable: string;
  writeDisposition: 'truncate' | 'append';
  partitionTime: string;
  status: LoadJobStatus;
  rowsLoaded: number;
  badRecords: number;
  errorCode: string | null;
  errorMessage: string | null;
  startedAt: string;
  finishedAt: string | null;
}
