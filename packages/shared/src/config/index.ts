import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod/v4';
import { AppError } from '../errors/app-error.ts';
import { LOG_LEVELS } from '../logger/index.ts';
import { err, ok, type Result } from '../types/result.ts';

const DEFAULT_ENV_FILES = ['.env.local', '.env'] as const;

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const PipelineConfigSchema = z.object({
  warehousePath: z.string().min(1),
  rawTable: z.string().regex(IDENTIFIER_PATTERN),
  targetDir: z.string().min(1),
  reportsDir: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
  freshnessMaxHours: z.number().positive(),
  completenessMinPercentage: z.number().min(0).max(100),
  consistencyMaxCoefficientOfVariation: z.number().positive(),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

const EnvSchema = z.object({
  BIZLAKE_WAREHOUSE_PATH: z.string().min(1).default('warehouse.db'),
  BIZLAKE_RAW_TABLE: z.string().default('raw_transactions'),
  BIZLAKE_TARGET_DIR: z.string().min(1).default('target'),
  BIZLAKE_REPORTS_DIR: z.string().min(1).default('reports'),
  BIZLAKE_LOG_LEVEL: z.string().default('info'),
  BIZLAKE_FRESHNESS_MAX_HOURS: z.coerce.number().default(24),
  BIZLAKE_COMPLETENESS_MIN_PERCENTAGE: z.coerce.number().default(95),
  BIZLAKE_CONSISTENCY_MAX_CV: z.coerce.number().default(50),
});

export interface LoadPipelineConfigInput {
  env?: Record<string, string | undefined>;
  cwd?: string;
  /** Files read with dotenv, relative to `cwd`; earlier files win, real env wins over all. */
  envFiles?: readonly string[];
}

function readEnvFiles(cwd: string, envFiles: readonly string[]): Result<Record<string, string>, AppError> {
  const merged: Record<string, string> = {};
  for (const file of envFiles) {
    const fullPath = path.join(cwd, file);
    if (!fs.existsSync(fullPath)) {
      continue;
    }
    try {
      const parsed = dotenv.parse(fs.readFileSync(fullPath));
      for (const [key, value] of Object.entries(parsed)) {
        if (!(key in merged)) {
          merged[key] = value;
        }
      }
    } catch (cause) {
      return err(AppError.fromCause('CONFIG_READ_FAILED', 'Nie udało się odczytać pliku konfiguracji.', { fullPath }, cause));
    }
  }
  return ok(merged);
}

function dropEmpty(values: Record<string, string | undefined>): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value.trim().length > 0) {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

export function loadPipelineConfig(input: LoadPipelineConfigInput = {}): Result<PipelineConfig, AppError> {
  const cwd = input.cwd ?? process.cwd();
  const fileValuesResult = readEnvFiles(cwd, input.envFiles ?? DEFAULT_ENV_FILES);
  if (!fileValuesResult.ok) {
    return fileValuesResult;
  }

  const envParsed = EnvSchema.safeParse({
    ...fileValuesResult.value,
    ...dropEmpty(input.env ?? process.env),
  });
  if (!envParsed.success) {
    return err(
      AppError.create('CONFIG_INVALID', 'Niepoprawna konfiguracja pipeline.', 'error', {
        issues: envParsed.error.issues,
      }),
    );
  }

  const env = envParsed.data;
  const configParsed = PipelineConfigSchema.safeParse({
    warehousePath: env.BIZLAKE_WAREHOUSE_PATH === ':memory:'
      ? env.BIZLAKE_WAREHOUSE_PATH
      : path.resolve(cwd, env.BIZLAKE_WAREHOUSE_PATH),
    rawTable: env.BIZLAKE_RAW_TABLE,
    targetDir: path.resolve(cwd, env.BIZLAKE_TARGET_DIR),
    reportsDir: path.resolve(cwd, env.BIZLAKE_REPORTS_DIR),
    logLevel: env.BIZLAKE_LOG_LEVEL,
    freshnessMaxHours: env.BIZLAKE_FRESHNESS_MAX_HOURS,
    completenessMinPercentage: env.BIZLAKE_COMPLETENESS_MIN_PERCENTAGE,
    consistencyMaxCoefficientOfVariation: env.BIZLAKE_CONSISTENCY_MAX_CV,
  });
  if (!configParsed.success) {
    return err(
      AppError.create('CONFIG_INVALID', 'Niepoprawna konfiguracja pipeline.', 'error', {
        issues: configParsed.error.issues,
      }),
    );
  }

  return ok(configParsed.data);
}
