import type Database from 'better-sqlite3';

export interface MigrationDefinition {
  id: number;
  name: string;
  /** Tables the migration creates; listed by the docs command as pipeline metadata. */
  tables: readonly string[];
  up: (db: Database.Database) => void;
}
