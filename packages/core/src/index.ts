// Database
export {
  createDatabaseConnection,
  closeDatabaseConnection,
  type CreateDatabaseInput,
  type DatabaseConnection,
} from './database.ts';

// Migrations
export {
  MIGRATIONS,
  METADATA_TABLES,
  runMigrations,
  type MigrationDefinition,
  type RunMigrationsResult,
} from './migrations/index.ts';

// Warehouse relations
export {
  countRelationRows,
  isValidIdentifier,
  quoteIdentifier,
  readRelationColumns,
  readRelationKind,
  sqlStringLiteral,
  validateIdentifier,
  type RelationColumn,
  type RelationKind,
} from './warehouse/identifiers.ts';
export {
  createRawRecordWriter,
  DEFAULT_RAW_TABLE,
  describeRawSource,
  INGESTION_COLUMNS,
  isReservedRawColumnName,
  prepareRawSourceTable,
  RAW_COLUMN_TYPES,
  STAGING_DERIVED_COLUMNS,
  type PrepareRawSourceTableInput,
  type PrepareRawSourceTableResult,
  type RawColumnDefinition,
  type RawColumnType,
  type RawRecordInput,
  type RawRecordWriter,
  type RawSourceSummary,
  type RawValue,
  type WriteDisposition,
} from './warehouse/raw-source.ts';

// Repositories (mutation layer)
export {
  createRunRepository,
  type RunRepository,
} from './repositories/run-repository.ts';
export type {
  FinishInvocationInput,
  FinishLoadJobInput,
  InsertLineageInput,
  InsertModelRunInput,
  InsertTestResultInput,
  InvocationRecord,
  InvocationStatus,
  LoadJobRecord,
  LoadJobStatus,
  Materialization,
  ModelRunRecord,
  ModelRunStatus,
  ModelStage,
  PipelineCommand,
  StartInvocationInput,
  StartLoadJobInput,
  TestResultRecord,
  TestStatus,
} from './repositories/run-types.ts';

// Queries
export {
  BUSINESS_INSIGHTS_RELATION,
  BusinessInsightRowSchema,
  createInsightQueries,
  DAILY_METRICS_RELATION,
  DailyMetricRowSchema,
  GRANULARITIES,
  type BusinessInsightRow,
  type DailyMetricRow,
  type Granularity,
  type InsightQueries,
  type ListBusinessInsightsInput,
  type ListDailyMetricsInput,
} from './queries/insight-queries.ts';

// Fixtures
export {
  createDailyRawRecords,
  loadRawFixtureFromFile,
  RawFixtureSchema,
  SAMPLE_RAW_COLUMNS,
  seedRawSource,
  seedRawSourceFromFixture,
  type DailyVolume,
  type RawFixture,
  type SeedRawSourceResult,
} from './fixtures/index.ts';
