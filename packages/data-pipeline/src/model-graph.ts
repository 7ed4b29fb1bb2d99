import { AppError, err, ok, type Result } from '@bizlake/shared';
import type { ModelDefinition } from './models/index.ts';

const STAGE_SELECTORS: ReadonlySet<string> = new Set(['staging', 'intermediate', 'marts']);

function createGraphError(code: string, message: string, context: Record<string, unknown>): AppError {
  return AppError.create(code, message, 'error', context);
}

function validateGraph(models: readonly ModelDefinition[]): Result<Map<string, ModelDefinition>, AppError> {
  const byName = new Map<string, ModelDefinition>();
  for (const model of models) {
    if (byName.has(model.name)) {
      return err(
        createGraphError('MODEL_GRAPH_INVALID', 'Model jest zadeklarowany więcej niż raz.', {
          modelName: model.name,
        }),
      );
    }
    byName.set(model.name, model);
  }

  for (const model of models) {
    const missing = model.dependsOn.filter((dependency) => !byName.has(dependency));
    if (missing.length > 0) {
      return err(
        createGraphError('MODEL_GRAPH_INVALID', 'Model zależy od niezadeklarowanego modelu.', {
          modelName: model.name,
          missingDependencies: missing,
        }),
      );
    }
  }

  return ok(byName);
}

/**
 * Kahn ordering; among ready models the one declared first goes first.
 */
export function orderModels(models: readonly ModelDefinition[]): Result<ModelDefinition[], AppError> {
  const graphResult = validateGraph(models);
  if (!graphResult.ok) {
    return graphResult;
  }

  const remaining = new Map<string, number>();
  for (const model of models) {
    remaining.set(model.name, model.dependsOn.length);
  }

  const ordered: ModelDefinition[] = [];
  const emitted = new Set<string>();
  while (ordered.length < models.length) {
    const next = models.find((model) => !emitted.has(model.name) && remaining.get(model.name) === 0);
    if (!next) {
      return err(
        createGraphError('MODEL_GRAPH_CYCLE', 'Zależności modeli tworzą cykl.', {
          unresolvedModels: models.filter((model) => !emitted.has(model.name)).map((model) => model.name),
        }),
      );
    }
    ordered.push(next);
    emitted.add(next.name);
    for (const model of models) {
      if (model.dependsOn.includes(next.name)) {
        remaining.set(model.name, (remaining.get(model.name) ?? 0) - 1);
      }
    }
  }

  return ok(ordered);
}

function collectUpstream(byName: ReadonlyMap<string, ModelDefinition>, name: string, into: Set<string>): void {
  if (into.has(name)) {
    return;
  }
  into.add(name);
  for (const dependency of byName.get(name)?.dependsOn ?? []) {
    collectUpstream(byName, dependency, into);
  }
}

function collectDownstream(models: readonly ModelDefinition[], name: string, into: Set<string>): void {
  if (into.has(name)) {
    return;
  }
  into.add(name);
  for (const model of models) {
    if (model.dependsOn.includes(name)) {
      collectDownstream(models, model.name, into);
    }
  }
}

function resolveSelectorTerm(
  models: readonly ModelDefinition[],
  byName: ReadonlyMap<string, ModelDefinition>,
  term: string,
): Result<Set<string>, AppError> {
  const selected = new Set<string>();

  if (STAGE_SELECTORS.has(term)) {
    for (const model of models) {
      if (model.stage === term) {
        selected.add(model.name);
      }
    }
    return ok(selected);
  }

  if (term.startsWith('tag:')) {
    const tag = term.slice('tag:'.length);
    for (const model of models) {
      if (model.tags.includes(tag)) {
        selected.add(model.name);
      }
    }
    if (selected.size === 0) {
      return err(
        createGraphError('MODEL_SELECTOR_INVALID', 'Żaden model nie ma podanego tagu.', { selector: term }),
      );
    }
    return ok(selected);
  }

  const withUpstream = term.startsWith('+');
  const withDownstream = term.endsWith('+');
  const name = term.slice(withUpstream ? 1 : 0, withDownstream ? -1 : undefined);
  if (!byName.has(name)) {
    return err(
      createGraphError('MODEL_SELECTOR_INVALID', 'Nieznany selektor modeli.', { selector: term }),
    );
  }

  selected.add(name);
  if (withUpstream) {
    const upstream = new Set<string>();
    collectUpstream(byName, name, upstream);
    for (const model of upstream) {
      selected.add(model);
    }
  }
  if (withDownstream) {
    const downstream = new Set<string>();
    collectDownstream(models, name, downstream);
    for (const model of downstream) {
      selected.add(model);
    }
  }
  return ok(selected);
}

/**
 * Resolves a selector to models in execution order. Terms separated by commas or whitespace are
 * unioned; an empty selector selects every model.
 */
export function selectModels(
  models: readonly ModelDefinition[],
  selector?: string | null,
): Result<ModelDefinition[], AppError> {
  const orderedResult = orderModels(models);
  if (!orderedResult.ok) {
    return orderedResult;
  }

  const terms = (selector ?? '').split(/[\s,]+/).filter((term) => term.length > 0);
  if (terms.length === 0) {
    return orderedResult;
  }

  const byName = new Map(models.map((model) => [model.name, model]));
  const selected = new Set<string>();
  for (const term of terms) {
    const termResult = resolveSelectorTerm(models, byName, term);
    if (!termResult.ok) {
      return termResult;
    }
    for (const name of termResult.value) {
      selected.add(name);
    }
  }

  return ok(orderedResult.value.filter((model) => selected.has(model.name)));
}
