// src/survey-model.ts — One psychological framework expressed as an ordered question list

import type { LikertQuestion } from "./question.js";
import type { DimensionScores } from "./types.js";

export interface SurveyModelSpec {
  name: string;
  description: string;
  questions: readonly LikertQuestion[];
  /** Display-only aliases, never used for scoring. */
  dimensionAliases?: Readonly<Record<string, string>>;
}

export class SurveyModel {
  readonly name: string;
  readonly description: string;
  readonly questions: readonly LikertQuestion[];
  readonly dimensionAliases: Readonly<Record<string, string>>;

  constructor(spec: SurveyModelSpec) {
    this.name = spec.name;
    this.description = spec.description;
    this.questions = Object.freeze([...spec.questions]);
    this.dimensionAliases = Object.freeze({ ...spec.dimensionAliases });
    Object.freeze(this);
  }

  /** Distinct dimensions in order of first appearance. */
  get dimensions(): string[] {
    return [...new Set(this.questions.map((q) => q.dimension))];
  }

  displayName(dimension: string): string {
    return Object.hasOwn(this.dimensionAliases, dimension)
      ? this.dimensionAliases[dimension]
      : dimension;
  }

  /**
   * Average normalized responses per dimension.
   * responses[i] answers questions[i]; pairs past the shorter of the two
   * sequences are dropped. The engine enforces exact lengths before calling this.
   */
  aggregate(responses: readonly number[]): DimensionScores {
    const buckets = new Map<string, number[]>();
    const pairCount = Math.min(this.questions.length, responses.length);

    for (let i = 0; i < pairCount; i++) {
      const question = this.questions[i];
      const value = question.normalize(responses[i]);
      const bucket = buckets.get(question.dimension);
      if (bucket) {
        bucket.push(value);
      } else {
        buckets.set(question.dimension, [value]);
      }
    }

    return Object.fromEntries([...buckets].map(([dimension, values]) => [dimension, mean(values)]));
  }
}

function mean(values: number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total / values.length;
}
