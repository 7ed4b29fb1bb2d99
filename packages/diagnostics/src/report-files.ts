import fs from 'node:fs';
import path from 'node:path';
import { AppError, err, ok, type Result } from '@bizlake/shared';

/** `YYYYMMDD_HHMMSS` from an ISO timestamp, kept in UTC. */
export function compactUtcTimestamp(timestamp: string): string {
  return timestamp.slice(0, 19).replaceAll('-', '').replaceAll(':', '').replace('T', '_');
}

export function writeJsonReport(
  reportsDir: string,
  fileName: string,
  payload: unknown,
): Result<{ filePath: string }, AppError> {
  const filePath = path.join(reportsDir, fileName);
  try {
    fs.mkdirSync(reportsDir, { recursive: true });
    fs.writeFileSync(filePath, `${JSON.stringify(payload, null, 2)}\n`, 'utf8');
    return ok({ filePath });
  } catch (cause) {
    return err(
      AppError.fromCause(
        'QUALITY_REPORT_WRITE_FAILED',
        'Nie udało się zapisać raportu.',
        { reportsDir, fileName },
        cause,
      ),
    );
  }
}
