import type { MigrationDefinition } from './types.ts';

export const ingestLineageSchemaMigration: MigrationDefinition = {
  id: 2,
  name: '002-ingest-lineage-schema',
  tables: ['load_jobs', 'data_lineage'],
  up: (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS load_jobs (
        job_id TEXT PRIMARY KEY,
        source_uri TEXT NOT NULL,
        target_table TEXT NOT NULL,
        write_disposition TEXT NOT NULL CHECK (write_disposition IN ('truncate', 'append')),
        partition_time TEXT NOT NULL,
        status TEXT NOT NULL CHECK (status IN ('running', 'done', 'failed')),
        rows_loaded INTEGER NOT NULL DEFAULT 0 CHECK (rows_loaded >= 0),
        bad_records INTEGER NOT NULL DEFAULT 0 CHECK (bad_records >= 0),
        error_code TEXT,
        error_message TEXT,
        started_at TEXT NOT NULL,
        finished_at TEXT
      );

      CREATE TABLE IF NOT EXISTS data_lineage (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id TEXT NOT NULL,
        pipeline_stage TEXT NOT NULL,
        entity_type TEXT NOT NULL,
        entity_key TEXT NOT NULL,
        source_table TEXT NOT NULL,
        source_record_count INTEGER NOT NULL DEFAULT 0 CHECK (source_record_count >= 0),
        metadata_json TEXT NOT NULL,
        produced_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_load_jobs_table_time
        ON load_jobs(target_table, started_at);

      CREATE INDEX IF NOT EXISTS idx_data_lineage_entity_time
        ON data_lineage(entity_type, entity_key, produced_at);

      CREATE INDEX IF NOT EXISTS idx_data_lineage_stage_time
        ON data_lineage(pipeline_stage, produced_at);
    `);
  },
};
