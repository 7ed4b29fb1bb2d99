import type { MigrationDefinition } from './types.ts';

export const pipelineRunSchemaMigration: MigrationDefinition = {
  id: 1,
  name: '001-pipeline-run-schema',
  tables: ['pipeline_invocations', 'model_runs', 'test_results'],
  up: (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS pipeline_invocations (
        run_id TEXT PRIMARY KEY,
        command TEXT NOT NULL CHECK (command IN ('run', 'test', 'build')),
        selector TEXT,
        status TEXT NOT NULL CHECK (status IN ('running', 'success', 'error')),
        started_at TEXT NOT NULL,
        finished_at TEXT
      );

      CREATE TABLE IF NOT EXISTS model_runs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id TEXT NOT NULL REFERENCES pipeline_invocations(run_id) ON DELETE CASCADE,
        model_name TEXT NOT NULL,
        stage TEXT NOT NULL CHECK (stage IN ('staging', 'intermediate', 'marts')),
        materialized TEXT NOT NULL CHECK (materialized IN ('view', 'table')),
        status TEXT NOT NULL CHECK (status IN ('success', 'error', 'skipped')),
        row_count INTEGER CHECK (row_count IS NULL OR row_count >= 0),
        duration_ms INTEGER NOT NULL DEFAULT 0 CHECK (duration_ms >= 0),
        error_code TEXT,
        error_message TEXT,
        started_at TEXT NOT NULL,
        finished_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS test_results (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id TEXT NOT NULL REFERENCES pipeline_invocations(run_id) ON DELETE CASCADE,
        model_name TEXT NOT NULL,
        test_name TEXT NOT NULL,
        column_name TEXT,
        status TEXT NOT NULL CHECK (status IN ('pass', 'fail', 'error')),
        failures INTEGER NOT NULL DEFAULT 0 CHECK (failures >= 0),
        error_message TEXT,
        executed_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_model_runs_run
        ON model_runs(run_id, id);

      CREATE INDEX IF NOT EXISTS idx_model_runs_model_time
        ON model_runs(model_name, started_at);

      CREATE INDEX IF NOT EXISTS idx_test_results_run
        ON test_results(run_id, model_name);
    `);
  },
};
