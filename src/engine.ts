// src/engine.ts — Survey engine: aggregation across models + relationship insights

import { DEFAULT_CONTEXTS, explainScores, interpretScores } from "./insights.js";
import type { InsightContext } from "./insights.js";
import type { SurveyModel } from "./survey-model.js";
import { CatalogError, ResponseCountError } from "./types.js";
import type { AggregatedScores, DimensionScores, Insights, InsightTrace, ResponsesByModel } from "./types.js";

export interface SurveyEngineOptions {
  /** Insight contexts to evaluate, in report order. Defaults to every built-in context. */
  contexts?: readonly InsightContext[];
}

export class SurveyEngine {
  readonly models: readonly SurveyModel[];
  readonly contexts: readonly InsightContext[];

  constructor(models: Iterable<SurveyModel>, options: SurveyEngineOptions = {}) {
    const list = [...models];
    const seen = new Set<string>();
    for (const model of list) {
      if (seen.has(model.name)) {
        throw new CatalogError(`Duplicate model name "${model.name}"`);
      }
      seen.add(model.name);
    }
    this.models = Object.freeze(list);
    this.contexts = Object.freeze([...(options.contexts ?? DEFAULT_CONTEXTS)]);
  }

  get contextNames(): string[] {
    return this.contexts.map((c) => c.name);
  }

  findModel(name: string): SurveyModel | undefined {
    return this.models.find((m) => m.name === name);
  }

  /**
   * Aggregate every configured model, in configured order.
   * Throws ResponseCountError on the first model whose response count differs
   * from its question count; ResponseRangeError propagates from normalization.
   */
  run(responsesByModel: ResponsesByModel): AggregatedScores {
    const results: [string, DimensionScores][] = [];
    for (const model of this.models) {
      const responses = Object.hasOwn(responsesByModel, model.name)
        ? responsesByModel[model.name]
        : [];
      if (responses.length !== model.questions.length) {
        throw new ResponseCountError(model.name, model.questions.length, responses.length);
      }
      results.push([model.name, model.aggregate(responses)]);
    }
    return Object.fromEntries(results);
  }

  interpretRelationshipDynamics(aggregatedScores: AggregatedScores): Insights {
    return interpretScores(aggregatedScores, this.contexts);
  }

  /** Like interpretRelationshipDynamics, with the id of the rule that produced each narrative. */
  explainRelationshipDynamics(aggregatedScores: AggregatedScores): InsightTrace[] {
    return explainScores(aggregatedScores, this.contexts);
  }
}
