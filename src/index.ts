// src/index.ts — Library API
// Build an engine from a catalog, run() raw responses, interpret the scores.

import { loadCatalog } from "./catalog.js";
import type { CatalogVariant } from "./catalog.js";
import { SurveyEngine } from "./engine.js";

export { LikertQuestion } from "./question.js";
export type { QuestionSpec } from "./question.js";
export { SurveyModel } from "./survey-model.js";
export type { SurveyModelSpec } from "./survey-model.js";
export { SurveyEngine } from "./engine.js";
export type { SurveyEngineOptions } from "./engine.js";

export {
  ATTACHMENT,
  BIG_FIVE,
  COLLABORATION,
  DEFAULT_CONTEXTS,
  FALLBACK_RULE_ID,
  FEEDBACK,
  createScoreLookup,
  evaluateContext,
  explainContext,
  explainScores,
  findContext,
  interpretScores,
} from "./insights.js";
export type { InsightContext, InsightRule, ScoreLookup } from "./insights.js";

export {
  CATALOG_VARIANTS,
  DEFAULT_CATALOG,
  filterModels,
  isCatalogVariant,
  loadCatalog,
  loadCatalogFile,
  parseCatalog,
  resolveCatalog,
} from "./catalog.js";
export type { Catalog, CatalogVariant } from "./catalog.js";

export { loadResponsesFile, parseResponses } from "./responses.js";
export { promptForResponses, likertLabel } from "./prompt.js";
export type { PromptIO } from "./prompt.js";
export {
  buildResultDocument,
  formatInsightTraces,
  formatInsights,
  formatModelListing,
  formatScores,
} from "./report.js";
export type { ResultDocument } from "./report.js";

export {
  CatalogError,
  ENGINE_VERSION,
  NEUTRAL_SCORE,
  ResponseCountError,
  ResponseFileError,
  ResponseRangeError,
  ValidationError,
} from "./types.js";
export type {
  AggregatedScores,
  DimensionScores,
  Insights,
  InsightTrace,
  ReportFormat,
  ResolvedConfig,
  ResponsesByModel,
  Warning,
} from "./types.js";

/** Engine over a built-in catalog variant, with that variant's insight contexts. */
export function createDefaultEngine(variant?: CatalogVariant): SurveyEngine {
  const catalog = loadCatalog(variant);
  return new SurveyEngine(catalog.models, { contexts: catalog.contexts });
}
