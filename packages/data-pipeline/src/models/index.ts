import { intDailyMetricsModel } from './intermediate.ts';
import { martBusinessInsightsModel } from './marts.ts';
import { stgTransactionsModel } from './staging.ts';
import type { ModelDefinition } from './types.ts';

export { intDailyMetricsModel } from './intermediate.ts';
export { martBusinessInsightsModel } from './marts.ts';
export { stgTransactionsModel } from './staging.ts';
export {
  resolveSourceRelations,
  type ColumnTest,
  type ModelColumnDoc,
  type ModelDefinition,
  type ModelRenderContext,
  type ModelTest,
  type UniqueCombinationTest,
} from './types.ts';

/** Registry order doubles as the tie-break for topological ordering. */
export const PIPELINE_MODELS: readonly ModelDefinition[] = [
  stgTransactionsModel,
  intDailyMetricsModel,
  martBusinessInsightsModel,
];
