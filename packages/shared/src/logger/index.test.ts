import { describe, expect, it } from 'vitest';
import { createLogger, createSilentLogger, type LogEntry } from './index.ts';

describe('createLogger', () => {
  it('writes structured entry with level and merged context', () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({
      baseContext: { module: 'data-pipeline' },
      now: () => '2026-01-01T00:00:00.000Z',
      writer: (entry) => entries.push(entry),
    });

    logger.info('model built', { model: 'stg_transactions' });

    expect(entries).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        level: 'info',
        message: 'model built',
        context: {
          module: 'data-pipeline',
          model: 'stg_transactions',
        },
      },
    ]);
  });

  it('supports withContext for child loggers', () => {
    const entries: LogEntry[] = [];
    const root = createLogger({
      baseContext: { app: 'cli' },
      now: () => '2026-01-01T00:00:00.000Z',
      writer: (entry) => entries.push(entry),
    });

    const child = root.withContext({ runId: 'run-1' });
    child.warning('model skipped', { model: 'mart_business_insights' });

    expect(entries).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        level: 'warning',
        message: 'model skipped',
        context: {
          app: 'cli',
          runId: 'run-1',
          model: 'mart_business_insights',
        },
      },
    ]);
  });

  it('exposes all level helpers', () => {
    const levels: string[] = [];
    const logger = createLogger({
      now: () => '2026-01-01T00:00:00.000Z',
      writer: (entry) => levels.push(entry.level),
    });

    logger.debug('d');
    logger.info('i');
    logger.warning('w');
    logger.error('e');
    logger.fatal('f');

    expect(levels).toEqual(['debug', 'info', 'warning', 'error', 'fatal']);
  });

  it('drops entries below minLevel, also for child loggers', () => {
    const levels: string[] = [];
    const logger = createLogger({
      minLevel: 'warning',
      writer: (entry) => levels.push(entry.level),
    });

    logger.debug('d');
    logger.info('i');
    logger.warning('w');
    logger.withContext({ child: true }).info('child-i');
    logger.withContext({ child: true }).error('child-e');

    expect(levels).toEqual(['warning', 'error']);
  });

  it('silent logger never throws and writes nothing', () => {
    const logger = createSilentLogger();
    expect(() => {
      logger.fatal('nothing to see');
    }).not.toThrow();
  });
});
