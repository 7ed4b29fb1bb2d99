export {
  coerceValue,
  detectColumnType,
  detectSchema,
  normalizeColumnNames,
  RESERVED_COLUMN_PREFIX,
  type CoercedValue,
} from './schema-detection.ts';

export {
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_BAD_RECORDS,
  DEFAULT_SAMPLE_SIZE,
  isGzipPath,
  loadCsvIntoWarehouse,
  type LoadCsvInput,
  type LoadCsvResult,
} from './csv-loader.ts';
