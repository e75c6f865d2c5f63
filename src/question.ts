// src/question.ts — Likert-scale survey item

import { CatalogError, DEFAULT_SCALE_MAX, DEFAULT_SCALE_MIN, ResponseRangeError } from "./types.js";

export interface QuestionSpec {
  prompt: string;
  dimension: string;
  reverseScored?: boolean;
  scaleMin?: number;
  scaleMax?: number;
}

/**
 * A single survey item contributing to one dimension.
 * Instances are frozen and shared across every survey run.
 */
export class LikertQuestion {
  readonly prompt: string;
  readonly dimension: string;
  readonly reverseScored: boolean;
  readonly scaleMin: number;
  readonly scaleMax: number;

  constructor(spec: QuestionSpec) {
    const scaleMin = spec.scaleMin ?? DEFAULT_SCALE_MIN;
    const scaleMax = spec.scaleMax ?? DEFAULT_SCALE_MAX;
    if (!Number.isInteger(scaleMin) || !Number.isInteger(scaleMax)) {
      throw new CatalogError(`Scale bounds must be integers, got [${scaleMin}, ${scaleMax}]`);
    }
    if (scaleMin >= scaleMax) {
      throw new CatalogError(`scaleMin must be below scaleMax, got [${scaleMin}, ${scaleMax}]`);
    }

    this.prompt = spec.prompt;
    this.dimension = spec.dimension;
    this.reverseScored = spec.reverseScored ?? false;
    this.scaleMin = scaleMin;
    this.scaleMax = scaleMax;
    Object.freeze(this);
  }

  /**
   * Map a raw response linearly onto [0, 1], inverted for reverse-scored items.
   * Throws ResponseRangeError when the value is not an integer within the scale.
   */
  normalize(rawValue: number): number {
    if (!Number.isInteger(rawValue) || rawValue < this.scaleMin || rawValue > this.scaleMax) {
      throw new ResponseRangeError(rawValue, this.scaleMin, this.scaleMax);
    }
    const normalized = (rawValue - this.scaleMin) / (this.scaleMax - this.scaleMin);
    return this.reverseScored ? 1 - normalized : normalized;
  }
}
