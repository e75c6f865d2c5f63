// src/report.ts — Text and JSON rendering of survey results

import type { SurveyModel } from "./survey-model.js";
import { ENGINE_VERSION } from "./types.js";
import type { AggregatedScores, Insights, InsightTrace } from "./types.js";

export interface ResultDocument {
  meta: {
    engineVersion: string;
    generatedAt: string;
    catalog: string;
  };
  aggregated_scores: AggregatedScores;
  relationship_insights: Insights;
}

export function formatModelListing(models: readonly SurveyModel[]): string {
  const lines: string[] = [];
  for (const model of models) {
    lines.push("", `=== ${model.name} ===`, model.description);
    model.questions.forEach((question, i) => {
      const note = question.reverseScored ? " (reverse scored)" : "";
      lines.push(`  ${i + 1}. ${question.prompt}${note}`);
    });
  }
  return lines.join("\n");
}

/**
 * One block per model; aliased dimensions render as `Alias (Dimension)`.
 * Models not found in `models` print their raw dimension names.
 */
export function formatScores(
  scores: AggregatedScores,
  models: readonly SurveyModel[],
  precision = 2,
): string {
  const lines: string[] = [];
  for (const [modelName, dimensions] of Object.entries(scores)) {
    const model = models.find((m) => m.name === modelName);
    lines.push(`${modelName}:`);
    for (const [dimension, score] of Object.entries(dimensions)) {
      const alias = model?.displayName(dimension) ?? dimension;
      const label = alias === dimension ? dimension : `${alias} (${dimension})`;
      lines.push(`  ${label}: ${score.toFixed(precision)}`);
    }
  }
  return lines.join("\n");
}

export function formatInsights(insights: Insights): string {
  return Object.entries(insights)
    .map(([context, narrative]) => `${context}: ${narrative}`)
    .join("\n");
}

export function formatInsightTraces(traces: readonly InsightTrace[]): string {
  return traces.map((t) => `${t.context} [${t.ruleId}]: ${t.narrative}`).join("\n");
}

export function buildResultDocument(
  scores: AggregatedScores,
  insights: Insights,
  catalog: string,
  now: Date = new Date(),
): ResultDocument {
  return {
    meta: {
      engineVersion: ENGINE_VERSION,
      generatedAt: now.toISOString(),
      catalog,
    },
    aggregated_scores: scores,
    relationship_insights: insights,
  };
}
