import { describe, it, expect } from 'vitest';
import { AppError, toError } from './app-error.ts';

describe('AppError', () => {
  describe('create()', () => {
    it('creates an error with default severity', () => {
      const error = AppError.create('TEST_ERROR', 'Test message');
      expect(error.code).toBe('TEST_ERROR');
      expect(error.message).toBe('Test message');
      expect(error.severity).toBe('error');
      expect(error.context).toEqual({});
      expect(error.timestamp).toBeDefined();
    });

    it('creates an error with context', () => {
      const error = AppError.create('MODEL_BUILD_FAILED', 'Build failed', 'error', {
        model: 'int_daily_metrics',
        stage: 'intermediate',
      });
      expect(error.context).toEqual({ model: 'int_daily_metrics', stage: 'intermediate' });
    });

    it('preserves cause message', () => {
      const cause = new Error('no such table: stg_transactions');
      const error = AppError.create('WRAPPED', 'Wrapper', 'error', undefined, cause);
      expect(error.cause).toBe('no such table: stg_transactions');
    });
  });

  describe('fromCause()', () => {
    it('wraps non-Error thrown values', () => {
      const error = AppError.fromCause('LOAD_FAILED', 'Load failed', { file: 'a.csv' }, 'disk full');
      expect(error.severity).toBe('error');
      expect(error.cause).toBe('disk full');
      expect(error.context).toEqual({ file: 'a.csv' });
    });
  });

  describe('factory methods', () => {
    it('fatal() sets severity to fatal', () => {
      expect(AppError.fatal('CRASH', 'System crashed').severity).toBe('fatal');
    });

    it('warning() sets severity to warning', () => {
      expect(AppError.warning('SLOW_MODEL', 'Model took >10s').severity).toBe('warning');
    });

    it('info() sets severity to info', () => {
      expect(AppError.info('NOTHING_SELECTED', 'Selector matched nothing').severity).toBe('info');
    });
  });

  describe('withContext()', () => {
    it('merges context and keeps code, cause and timestamp', () => {
      const original = AppError.create('MODEL_BUILD_FAILED', 'Build failed', 'error', { stage: 'marts' }, new Error('boom'));
      const enriched = original.withContext({ model: 'mart_business_insights' });

      expect(enriched.code).toBe('MODEL_BUILD_FAILED');
      expect(enriched.cause).toBe('boom');
      expect(enriched.timestamp).toBe(original.timestamp);
      expect(enriched.context).toEqual({ stage: 'marts', model: 'mart_business_insights' });
      expect(original.context).toEqual({ stage: 'marts' });
    });
  });

  describe('serialization', () => {
    it('toDTO() and fromDTO() round-trip', () => {
      const original = AppError.create('ROUND_TRIP', 'Test round trip', 'warning', { key: 'value' }, new Error('inner'));
      const restored = AppError.fromDTO(original.toDTO());

      expect(restored.code).toBe(original.code);
      expect(restored.message).toBe(original.message);
      expect(restored.severity).toBe(original.severity);
      expect(restored.context).toEqual(original.context);
      expect(restored.cause).toBe('inner');
      expect(restored.timestamp).toBe(original.timestamp);
    });
  });

  describe('toString()', () => {
    it('formats error as string', () => {
      const error = AppError.create('MY_CODE', 'Something happened', 'error');
      expect(error.toString()).toBe('[ERROR] MY_CODE: Something happened');
    });

    it('appends the cause when present', () => {
      const error = AppError.create('MY_CODE', 'Something happened', 'error', {}, new Error('root'));
      expect(error.toString()).toBe('[ERROR] MY_CODE: Something happened (root)');
    });
  });
});

describe('toError', () => {
  it('returns Error instances unchanged', () => {
    const original = new Error('x');
    expect(toError(original)).toBe(original);
  });

  it('stringifies other values', () => {
    expect(toError(42).message).toBe('42');
  });
});
