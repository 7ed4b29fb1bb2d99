import type { Materialization, ModelStage } from '@bizlake/core';

export type ColumnTest =
  | { type: 'not_null' }
  | { type: 'unique' }
  | { type: 'accepted_values'; values: readonly string[] }
  | { type: 'relationships'; toModel: string; field: string };

export interface UniqueCombinationTest {
  type: 'unique_combination';
  columns: readonly string[];
}

export type ModelTest = UniqueCombinationTest;

export interface ModelColumnDoc {
  name: string;
  description: string;
  tests: readonly ColumnTest[];
}

export interface ModelRenderContext {
  runId: string;
  processedAt: string;
  rawTable: string;
}

export interface ModelDefinition {
  name: string;
  stage: ModelStage;
  materialized: Materialization;
  tags: readonly string[];
  /** Upstream models, by name. */
  dependsOn: readonly string[];
  readsRawSource: boolean;
  description: string;
  columns: readonly ModelColumnDoc[];
  modelTests: readonly ModelTest[];
  /** SELECT statement the relation is materialized from; run metadata is inlined as literals. */
  render: (context: ModelRenderContext) => string;
}

export function resolveSourceRelations(model: ModelDefinition, rawTable: string): string[] {
  return model.readsRawSource ? [rawTable, ...model.dependsOn] : [...model.dependsOn];
}
