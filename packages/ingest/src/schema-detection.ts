import {
  isReservedRawColumnName,
  type RawColumnDefinition,
  type RawColumnType,
  type RawValue,
} from '@bizlake/core';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const REAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export const RESERVED_COLUMN_PREFIX = 'src_';

export interface CoercedValue {
  valid: boolean;
  value: RawValue;
}

function toSnakeCase(name: string): string {
  return name
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Header cells to lower snake case identifiers. Names that collide with ingestion or staging columns
 * get the `src_` prefix; repeated names get a numeric suffix.
 */
export function normalizeColumnNames(header: readonly string[]): string[] {
  const used = new Set<string>();
  return header.map((cell, index) => {
    let name = toSnakeCase(cell);
    if (name.length === 0) {
      name = `column_${String(index + 1)}`;
    } else if (/^\d/.test(name)) {
      name = `col_${name}`;
    }
    if (isReservedRawColumnName(name)) {
      name = `${RESERVED_COLUMN_PREFIX}${name}`;
    }

    let candidate = name;
    let suffix = 2;
    while (used.has(candidate)) {
      candidate = `${name}_${String(suffix)}`;
      suffix += 1;
    }
    used.add(candidate);
    return candidate;
  });
}

function isIntegerLiteral(value: string): boolean {
  return INTEGER_PATTERN.test(value) && Number.isSafeInteger(Number(value));
}

function isRealLiteral(value: string): boolean {
  return REAL_PATTERN.test(value) && Number.isFinite(Number(value));
}

/** Narrowest type every non-empty sample value fits; columns with no values are TEXT. */
export function detectColumnType(values: readonly string[]): RawColumnType {
  const present = values.map((value) => value.trim()).filter((value) => value.length > 0);
  if (present.length === 0) {
    return 'TEXT';
  }
  if (present.every(isIntegerLiteral)) {
    return 'INTEGER';
  }
  if (present.every(isRealLiteral)) {
    return 'REAL';
  }
  return 'TEXT';
}

export function detectSchema(
  header: readonly string[],
  sampleRows: readonly (readonly string[])[],
): RawColumnDefinition[] {
  const names = normalizeColumnNames(header);
  return names.map((name, index) => ({
    name,
    type: detectColumnType(
      sampleRows
        .filter((row) => row.length === header.length)
        .map((row) => row[index] ?? ''),
    ),
  }));
}

/** Empty cells become NULL; a value that does not fit its column type is invalid. */
export function coerceValue(raw: string, type: RawColumnType): CoercedValue {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return { valid: true, value: null };
  }

  switch (type) {
    case 'INTEGER':
      return isIntegerLiteral(trimmed)
        ? { valid: true, value: Number(trimmed) }
        : { valid: false, value: null };
    case 'REAL':
      return isRealLiteral(trimmed)
        ? { valid: true, value: Number(trimmed) }
        : { valid: false, value: null };
    case 'TEXT':
      return { valid: true, value: raw };
  }
}
