// src/types.ts — Shared types for the survey scoring engine

// ─── Scores & insights ───────────────────────────────────────────────────────

/** Raw Likert responses keyed by model name, in question order. */
export type ResponsesByModel = Readonly<Record<string, readonly number[]>>;

/** Mean normalized value per dimension, each in [0, 1]. */
export type DimensionScores = Record<string, number>;

/** Dimension scores keyed by model name, in configured model order. */
export type AggregatedScores = Record<string, DimensionScores>;

/** Narrative text keyed by relationship context name. */
export type Insights = Record<string, string>;

export interface InsightTrace {
  context: string;
  /** Id of the matching rule row, or "fallback". */
  ruleId: string;
  narrative: string;
}

// ─── Config ──────────────────────────────────────────────────────────────────

export type ReportFormat = "text" | "json";

export interface ResolvedConfig {
  /** Built-in catalog variant name or path to a catalog JSON file. */
  catalog: string;
  /** Model name globs; empty means every model in the catalog. */
  models: string[];
  responsesFile?: string;
  output?: string;
  precision: number;
  format: ReportFormat;
  explain: boolean;
  quiet: boolean;
  verbose: boolean;
}

// ─── Warnings (collected by modules, printed by the CLI) ─────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class ResponseRangeError extends RangeError {
  constructor(
    public readonly value: number,
    public readonly min: number,
    public readonly max: number,
  ) {
    super(
      Number.isInteger(value)
        ? `Response ${value} is outside the allowed range [${min}, ${max}]`
        : `Response ${value} is not an integer in the allowed range [${min}, ${max}]`,
    );
    this.name = "ResponseRangeError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class ResponseCountError extends ValidationError {
  constructor(
    public readonly modelName: string,
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(`Expected ${expected} responses for ${modelName}, received ${received}`);
    this.name = "ResponseCountError";
  }
}

export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "CatalogError";
  }
}

export class ResponseFileError extends Error {
  constructor(
    message: string,
    public readonly filePath?: string,
    cause?: Error,
  ) {
    super(message);
    this.name = "ResponseFileError";
    if (cause) this.cause = cause;
  }
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const ENGINE_VERSION = "0.1.0";

/** Lookup value for a dimension the scores do not contain (scale midpoint). */
export const NEUTRAL_SCORE = 0.5;

export const DEFAULT_SCALE_MIN = 1;
export const DEFAULT_SCALE_MAX = 5;
