import type Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@bizlake/shared';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type RelationKind = 'table' | 'view';

export interface RelationColumn {
  name: string;
  type: string;
  notNull: boolean;
}

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name);
}

export function validateIdentifier(name: string): Result<string, AppError> {
  if (!isValidIdentifier(name)) {
    return err(
      AppError.create(
        'WAREHOUSE_IDENTIFIER_INVALID',
        'Niepoprawna nazwa obiektu hurtowni.',
        'error',
        { name },
      ),
    );
  }
  return ok(name);
}

export function quoteIdentifier(name: string): string {
  return `"${name.replaceAll('"', '""')}"`;
}

export function sqlStringLiteral(value: string): string {
  return `'${value.replaceAll("'", "''")}'`;
}

export function readRelationKind(db: Database.Database, name: string): RelationKind | null {
  const row = db
    .prepare<{ name: string }, { type: string }>(
      `
        SELECT type
        FROM sqlite_master
        WHERE name = @name
          AND type IN ('table', 'view')
        LIMIT 1
      `,
    )
    .get({ name });

  if (row?.type === 'table' || row?.type === 'view') {
    return row.type;
  }
  return null;
}

export function countRelationRows(db: Database.Database, name: string): number {
  const total = db
    .prepare<[], number>(`SELECT COUNT(*) AS total FROM ${quoteIdentifier(name)}`)
    .pluck()
    .get();
  return typeof total === 'number' ? total : 0;
}

export function readRelationColumns(db: Database.Database, name: string): RelationColumn[] {
  const rows = db
    .prepare<[], { name: string; type: string; notnull: number }>(
      `SELECT name, type, "notnull" FROM pragma_table_info(${sqlStringLiteral(name)}) ORDER BY cid ASC`,
    )
    .all();

  return rows.map((row) => ({
    name: row.name,
    type: row.type,
    notNull: row.notnull === 1,
  }));
}
