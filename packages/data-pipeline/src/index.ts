export {
  intDailyMetricsModel,
  martBusinessInsightsModel,
  PIPELINE_MODELS,
  resolveSourceRelations,
  stgTransactionsModel,
  type ColumnTest,
  type ModelColumnDoc,
  type ModelDefinition,
  type ModelRenderContext,
  type ModelTest,
  type UniqueCombinationTest,
} from './models/index.ts';

export { orderModels, selectModels } from './model-graph.ts';

export {
  openInvocation,
  type InvocationOptions,
  type PipelineInvocation,
} from './invocation.ts';

export {
  runModels,
  type ModelRunOutcome,
  type RunModelsInput,
  type RunModelsResult,
} from './model-runner.ts';

export {
  compileModelTests,
  runModelTests,
  type CompiledModelTest,
  type ModelTestOutcome,
  type RunModelTestsInput,
  type RunModelTestsResult,
} from './model-tests.ts';

export {
  buildModels,
  type BuildModelsInput,
  type BuildModelsResult,
} from './build.ts';

export {
  describeColumnTest,
  generateDocs,
  type CatalogRelation,
  type DocsCatalog,
  type DocsManifest,
  type GenerateDocsInput,
  type GenerateDocsResult,
  type ManifestModel,
} from './docs-generator.ts';
