import Database from 'better-sqlite3';
import { AppError, err, ok, type Result } from '@bizlake/shared';

export interface CreateDatabaseInput {
  filename?: string;
  readonly?: boolean;
  fileMustExist?: boolean;
  timeoutMs?: number;
}

export interface DatabaseConnection {
  readonly db: Database.Database;
  close: () => Result<void, AppError>;
}

interface VarianceState {
  count: number;
  mean: number;
  m2: number;
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return null;
}

/**
 * `stddev_samp(x)`: sample standard deviation (n - 1), NULL below two non-null values.
 */
function registerStatisticalAggregates(db: Database.Database): void {
  db.aggregate<VarianceState>('stddev_samp', {
    deterministic: true,
    start: (): VarianceState => ({ count: 0, mean: 0, m2: 0 }),
    step: (state: VarianceState, value: unknown): VarianceState => {
      const numeric = toFiniteNumber(value);
      if (numeric === null) {
        return state;
      }
      const count = state.count + 1;
      const delta = numeric - state.mean;
      const mean = state.mean + delta / count;
      return {
        count,
        mean,
        m2: state.m2 + delta * (numeric - mean),
      };
    },
    result: (state: VarianceState): number | null => {
      if (state.count < 2) {
        return null;
      }
      return Math.sqrt(state.m2 / (state.count - 1));
    },
  });
}

export function createDatabaseConnection(input: CreateDatabaseInput = {}): Result<DatabaseConnection, AppError> {
  const filename = input.filename ?? ':memory:';
  const timeoutMs = input.timeoutMs ?? 5_000;

  try {
    const db = new Database(filename, {
      readonly: input.readonly ?? false,
      fileMustExist: input.fileMustExist ?? false,
      timeout: timeoutMs,
    });

    db.pragma('foreign_keys = ON');
    db.pragma(`busy_timeout = ${String(timeoutMs)}`);

    if (!db.memory && !db.readonly) {
      db.pragma('journal_mode = WAL');
    }

    registerStatisticalAggregates(db);

    return ok({
      db,
      close: () => closeDatabaseConnection(db),
    });
  } catch (cause) {
    return err(
      AppError.fromCause(
        'DB_OPEN_FAILED',
        'Nie udało się otworzyć hurtowni danych.',
        { filename, timeoutMs },
        cause,
      ),
    );
  }
}

export function closeDatabaseConnection(db: Database.Database): Result<void, AppError> {
  try {
    if (db.open) {
      db.close();
    }
    return ok(undefined);
  } catch (cause) {
    return err(
      AppError.fromCause(
        'DB_CLOSE_FAILED',
        'Nie udało się zamknąć hurtowni danych.',
        { databaseName: db.name },
        cause,
      ),
    );
  }
}
