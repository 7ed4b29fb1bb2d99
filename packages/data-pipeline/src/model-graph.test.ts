import { describe, expect, it } from 'vitest';
import { orderModels, selectModels } from './model-graph.ts';
import {
  intDailyMetricsModel,
  martBusinessInsightsModel,
  PIPELINE_MODELS,
  stgTransactionsModel,
  type ModelDefinition,
} from './models/index.ts';

function selectNames(selector: string | null): string[] {
  const result = selectModels(PIPELINE_MODELS, selector);
  expect(result.ok).toBe(true);
  return result.ok ? result.value.map((model) => model.name) : [];
}

describe('model selection', () => {
  it('selects every model in dependency order without a selector', () => {
    expect(selectNames(null)).toEqual(['stg_transactions', 'int_daily_metrics', 'mart_business_insights']);
    expect(selectNames('   ')).toEqual(['stg_transactions', 'int_daily_metrics', 'mart_business_insights']);
  });

  it('selects by stage, tag and name', () => {
    expect(selectNames('marts')).toEqual(['mart_business_insights']);
    expect(selectNames('tag:daily')).toEqual(['int_daily_metrics']);
    expect(selectNames('stg_transactions')).toEqual(['stg_transactions']);
  });

  it('expands downstream and upstream graph operators', () => {
    expect(selectNames('int_daily_metrics+')).toEqual(['int_daily_metrics', 'mart_business_insights']);
    expect(selectNames('+int_daily_metrics')).toEqual(['stg_transactions', 'int_daily_metrics']);
    expect(selectNames('+mart_business_insights')).toEqual([
      'stg_transactions',
      'int_daily_metrics',
      'mart_business_insights',
    ]);
    expect(selectNames('+int_daily_metrics+')).toEqual([
      'stg_transactions',
      'int_daily_metrics',
      'mart_business_insights',
    ]);
    expect(selectNames('mart_business_insights+')).toEqual(['mart_business_insights']);
  });

  it('unions comma and whitespace separated terms in execution order', () => {
    expect(selectNames('mart_business_insights, stg_transactions')).toEqual([
      'stg_transactions',
      'mart_business_insights',
    ]);
    expect(selectNames('marts staging')).toEqual(['stg_transactions', 'mart_business_insights']);
  });

  it('rejects unknown selectors', () => {
    for (const selector of ['fct_orders', 'tag:unknown', '+', 'fct_orders+']) {
      const result = selectModels(PIPELINE_MODELS, selector);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('MODEL_SELECTOR_INVALID');
        expect(result.error.context).toEqual({ selector });
      }
    }
  });
});

describe('model ordering', () => {
  it('orders by dependencies regardless of declaration order', () => {
    const result = orderModels([martBusinessInsightsModel, intDailyMetricsModel, stgTransactionsModel]);
    expect(result.ok && result.value.map((model) => model.name)).toEqual([
      'stg_transactions',
      'int_daily_metrics',
      'mart_business_insights',
    ]);
  });

  it('keeps declaration order among independent models', () => {
    const sideModel: ModelDefinition = { ...stgTransactionsModel, name: 'stg_side' };
    const result = orderModels([intDailyMetricsModel, sideModel, stgTransactionsModel]);
    expect(result.ok && result.value.map((model) => model.name)).toEqual([
      'stg_side',
      'stg_transactions',
      'int_daily_metrics',
    ]);
  });

  it('reports dependency cycles', () => {
    const first: ModelDefinition = { ...intDailyMetricsModel, name: 'int_first', dependsOn: ['int_second'] };
    const second: ModelDefinition = { ...intDailyMetricsModel, name: 'int_second', dependsOn: ['int_first'] };
    const result = orderModels([stgTransactionsModel, first, second]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('MODEL_GRAPH_CYCLE');
      expect(result.error.context).toEqual({ unresolvedModels: ['int_first', 'int_second'] });
    }
  });

  it('reports undeclared dependencies and duplicates', () => {
    const missing = orderModels([intDailyMetricsModel]);
    expect(missing.ok).toBe(false);
    if (!missing.ok) {
      expect(missing.error.code).toBe('MODEL_GRAPH_INVALID');
      expect(missing.error.context).toEqual({
        modelName: 'int_daily_metrics',
        missingDependencies: ['stg_transactions'],
      });
    }

    const duplicate = orderModels([stgTransactionsModel, stgTransactionsModel]);
    expect(duplicate.ok).toBe(false);
    if (!duplicate.ok) {
      expect(duplicate.error.code).toBe('MODEL_GRAPH_INVALID');
    }
  });
});
