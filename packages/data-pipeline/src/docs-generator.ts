import fs from 'node:fs';
import path from 'node:path';
import {
  countRelationRows,
  DEFAULT_RAW_TABLE,
  readRelationColumns,
  readRelationKind,
  type DatabaseConnection,
  type RelationColumn,
  type RelationKind,
} from '@bizlake/core';
import { AppError, createSilentLogger, err, ok, type Logger, type Result } from '@bizlake/shared';
import { orderModels } from './model-graph.ts';
import {
  PIPELINE_MODELS,
  resolveSourceRelations,
  type ColumnTest,
  type ModelDefinition,
} from './models/index.ts';

export interface GenerateDocsInput {
  db: DatabaseConnection['db'];
  targetDir: string;
  models?: readonly ModelDefinition[];
  rawTable?: string;
  logger?: Logger;
  now?: () => Date;
}

export interface ManifestModel {
  name: string;
  stage: ModelDefinition['stage'];
  materialized: ModelDefinition['materialized'];
  tags: string[];
  dependsOn: string[];
  sources: string[];
  description: string;
  columns: Array<{ name: string; description: string; tests: string[] }>;
  tests: string[];
}

export interface DocsManifest {
  generatedAt: string;
  rawTable: string;
  models: ManifestModel[];
}

export interface CatalogRelation {
  name: string;
  status: 'built' | 'missing';
  kind: RelationKind | null;
  rowCount: number | null;
  columns: RelationColumn[];
}

export interface DocsCatalog {
  generatedAt: string;
  relations: CatalogRelation[];
}

export interface GenerateDocsResult {
  manifestPath: string;
  catalogPath: string;
  indexPath: string;
  manifest: DocsManifest;
  catalog: DocsCatalog;
}

export function describeColumnTest(test: ColumnTest): string {
  switch (test.type) {
    case 'not_null':
    case 'unique':
      return test.type;
    case 'accepted_values':
      return `accepted_values(${test.values.join(', ')})`;
    case 'relationships':
      return `relationships(${test.toModel}.${test.field})`;
  }
}

function buildManifest(models: readonly ModelDefinition[], rawTable: string, generatedAt: string): DocsManifest {
  return {
    generatedAt,
    rawTable,
    models: models.map((model) => ({
      name: model.name,
      stage: model.stage,
      materialized: model.materialized,
      tags: [...model.tags],
      dependsOn: [...model.dependsOn],
      sources: resolveSourceRelations(model, rawTable),
      description: model.description,
      columns: model.columns.map((column) => ({
        name: column.name,
        description: column.description,
        tests: column.tests.map(describeColumnTest),
      })),
      tests: model.modelTests.map((test) => `${test.type}(${test.columns.join(', ')})`),
    })),
  };
}

function buildCatalog(
  db: DatabaseConnection['db'],
  relationNames: readonly string[],
  generatedAt: string,
): DocsCatalog {
  return {
    generatedAt,
    relations: relationNames.map((name): CatalogRelation => {
      const kind = readRelationKind(db, name);
      if (kind === null) {
        return { name, status: 'missing', kind: null, rowCount: null, columns: [] };
      }
      return {
        name,
        status: 'built',
        kind,
        rowCount: countRelationRows(db, name),
        columns: readRelationColumns(db, name),
      };
    }),
  };
}

function renderIndex(manifest: DocsManifest, catalog: DocsCatalog): string {
  const rowCounts = new Map(catalog.relations.map((relation) => [relation.name, relation.rowCount]));
  const lines = [
    '# Pipeline documentation',
    '',
    `Generated at ${manifest.generatedAt}.`,
    '',
    '## Lineage',
    '',
    [manifest.rawTable, ...manifest.models.map((model) => model.name)].join(' -> '),
    '',
    '## Models',
    '',
    '| Model | Stage | Materialized | Depends on | Rows |',
    '| --- | --- | --- | --- | --- |',
  ];

  for (const model of manifest.models) {
    const rowCount = rowCounts.get(model.name);
    lines.push(
      `| ${model.name} | ${model.stage} | ${model.materialized} | ${model.sources.join(', ')} | ${
        rowCount === null || rowCount === undefined ? 'not built' : String(rowCount)
      } |`,
    );
  }

  for (const model of manifest.models) {
    lines.push('', `### ${model.name}`, '', model.description, '');
    for (const column of model.columns) {
      const tests = column.tests.length > 0 ? ` [${column.tests.join(', ')}]` : '';
      lines.push(`- \`${column.name}\`: ${column.description}${tests}`);
    }
    for (const test of model.tests) {
      lines.push(`- model test: ${test}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Writes `manifest.json`, `catalog.json` and `index.md` into the target directory.
 */
export function generateDocs(input: GenerateDocsInput): Result<GenerateDocsResult, AppError> {
  const now = input.now ?? (() => new Date());
  const logger = input.logger ?? createSilentLogger();
  const rawTable = input.rawTable ?? DEFAULT_RAW_TABLE;

  const orderedResult = orderModels(input.models ?? PIPELINE_MODELS);
  if (!orderedResult.ok) {
    return orderedResult;
  }

  const generatedAt = now().toISOString();
  const manifest = buildManifest(orderedResult.value, rawTable, generatedAt);

  let catalog: DocsCatalog;
  try {
    catalog = buildCatalog(input.db, [rawTable, ...orderedResult.value.map((model) => model.name)], generatedAt);
  } catch (cause) {
    return err(
      AppError.fromCause('DOCS_CATALOG_FAILED', 'Nie udało się odczytać katalogu hurtowni.', { rawTable }, cause),
    );
  }

  const manifestPath = path.join(input.targetDir, 'manifest.json');
  const catalogPath = path.join(input.targetDir, 'catalog.json');
  const indexPath = path.join(input.targetDir, 'index.md');

  try {
    fs.mkdirSync(input.targetDir, { recursive: true });
    fs.writeFileSync(manifestPath, `${JSON.stringify(manifest, null, 2)}\n`, 'utf8');
    fs.writeFileSync(catalogPath, `${JSON.stringify(catalog, null, 2)}\n`, 'utf8');
    fs.writeFileSync(indexPath, renderIndex(manifest, catalog), 'utf8');
  } catch (cause) {
    return err(
      AppError.fromCause(
        'DOCS_WRITE_FAILED',
        'Nie udało się zapisać dokumentacji modeli.',
        { targetDir: input.targetDir },
        cause,
      ),
    );
  }

  logger.info('Docs generated', {
    targetDir: input.targetDir,
    models: manifest.models.length,
    missingRelations: catalog.relations
      .filter((relation) => relation.status === 'missing')
      .map((relation) => relation.name),
  });

  return ok({ manifestPath, catalogPath, indexPath, manifest, catalog });
}
