// src/catalog.ts — Model catalog loading and validation
// Built-in variants live in data/catalogs.json; custom catalogs use the same shape.

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import picomatch from "picomatch";
import { DEFAULT_CONTEXTS, findContext } from "./insights.js";
import type { InsightContext } from "./insights.js";
import { LikertQuestion } from "./question.js";
import { SurveyModel } from "./survey-model.js";
import { CatalogError } from "./types.js";

export type CatalogVariant = "classic" | "extended";

export const CATALOG_VARIANTS: readonly CatalogVariant[] = ["classic", "extended"];
export const DEFAULT_CATALOG: CatalogVariant = "extended";

const CATALOG_DATA_PATH = fileURLToPath(new URL("../data/catalogs.json", import.meta.url));

export interface Catalog {
  /** Variant name, or the absolute path of a custom catalog file. */
  name: string;
  models: readonly SurveyModel[];
  contexts: readonly InsightContext[];
}

const builtIn = new Map<CatalogVariant, Catalog>();

export function isCatalogVariant(value: string): value is CatalogVariant {
  return CATALOG_VARIANTS.some((v) => v === value);
}

/** Load a built-in catalog variant. Parsed once per process. */
export function loadCatalog(variant: CatalogVariant = DEFAULT_CATALOG): Catalog {
  const cached = builtIn.get(variant);
  if (cached) return cached;

  const document: unknown = JSON.parse(readFileSync(CATALOG_DATA_PATH, "utf-8"));
  if (!isRecord(document) || !Object.hasOwn(document, variant)) {
    throw new CatalogError(`Built-in catalog "${variant}" is missing from ${CATALOG_DATA_PATH}`);
  }
  const catalog = parseCatalog(document[variant], variant);
  builtIn.set(variant, catalog);
  return catalog;
}

export function loadCatalogFile(filePath: string): Catalog {
  const absPath = resolve(filePath);
  if (!existsSync(absPath)) {
    throw new CatalogError(`Catalog file not found: ${filePath}`);
  }
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(absPath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new CatalogError(`Failed to parse catalog file ${filePath}: ${msg}`);
  }
  return parseCatalog(document, absPath);
}

/** A variant name selects a built-in catalog; anything else is read as a file path. */
export function resolveCatalog(ref: string): Catalog {
  return isCatalogVariant(ref) ? loadCatalog(ref) : loadCatalogFile(ref);
}

/**
 * Keep models whose name matches any of the globs (case-insensitive).
 * No patterns keeps every model.
 */
export function filterModels(
  models: readonly SurveyModel[],
  patterns: readonly string[],
): SurveyModel[] {
  if (patterns.length === 0) return [...models];
  const isMatch = picomatch([...patterns], { nocase: true });
  return models.filter((m) => isMatch(m.name));
}

// ─── Validation ──────────────────────────────────────────────────────────────

/**
 * Validate a catalog document and build frozen models from it.
 * Errors name the offending location, e.g. `models[1].questions[3].dimension`.
 */
export function parseCatalog(raw: unknown, name: string): Catalog {
  if (!isRecord(raw)) {
    throw new CatalogError("Catalog must be a JSON object");
  }
  if (!Array.isArray(raw.models) || raw.models.length === 0) {
    throw new CatalogError("must be a non-empty array", "models");
  }

  const models: SurveyModel[] = [];
  const names = new Set<string>();
  raw.models.forEach((entry: unknown, index: number) => {
    const model = parseModel(entry, `models[${index}]`);
    if (names.has(model.name)) {
      throw new CatalogError(`duplicate model name "${model.name}"`, `models[${index}].name`);
    }
    names.add(model.name);
    models.push(model);
  });

  return {
    name,
    models: Object.freeze(models),
    contexts: parseContexts(raw.contexts),
  };
}

function parseModel(raw: unknown, path: string): SurveyModel {
  if (!isRecord(raw)) throw new CatalogError("must be an object", path);

  const name = requireString(raw.name, `${path}.name`);
  const description = raw.description === undefined ? "" : requireString(raw.description, `${path}.description`);

  if (!Array.isArray(raw.questions) || raw.questions.length === 0) {
    throw new CatalogError("must be a non-empty array", `${path}.questions`);
  }
  const questions = raw.questions.map((q: unknown, i: number) =>
    parseQuestion(q, `${path}.questions[${i}]`),
  );

  const aliases: [string, string][] = [];
  if (raw.dimensionAliases !== undefined) {
    if (!isRecord(raw.dimensionAliases)) {
      throw new CatalogError("must be an object", `${path}.dimensionAliases`);
    }
    for (const [dimension, alias] of Object.entries(raw.dimensionAliases)) {
      aliases.push([dimension, requireString(alias, `${path}.dimensionAliases.${dimension}`)]);
    }
  }

  return new SurveyModel({ name, description, questions, dimensionAliases: Object.fromEntries(aliases) });
}

function parseQuestion(raw: unknown, path: string): LikertQuestion {
  if (!isRecord(raw)) throw new CatalogError("must be an object", path);

  const prompt = requireString(raw.prompt, `${path}.prompt`);
  const dimension = requireString(raw.dimension, `${path}.dimension`);
  const reverseScored = optionalBoolean(raw.reverseScored, `${path}.reverseScored`);
  const scaleMin = optionalInteger(raw.scaleMin, `${path}.scaleMin`);
  const scaleMax = optionalInteger(raw.scaleMax, `${path}.scaleMax`);

  try {
    return new LikertQuestion({ prompt, dimension, reverseScored, scaleMin, scaleMax });
  } catch (err: unknown) {
    if (err instanceof CatalogError) throw new CatalogError(err.message, path);
    throw err;
  }
}

function parseContexts(raw: unknown): readonly InsightContext[] {
  if (raw === undefined) return DEFAULT_CONTEXTS;
  if (!Array.isArray(raw)) throw new CatalogError("must be an array of context names", "contexts");

  return Object.freeze(
    raw.map((entry: unknown, index: number) => {
      const name = requireString(entry, `contexts[${index}]`);
      const context = findContext(name);
      if (!context) {
        throw new CatalogError(`unknown insight context "${name}"`, `contexts[${index}]`);
      }
      return context;
    }),
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(value: unknown, path: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new CatalogError("must be a non-empty string", path);
  }
  return value;
}

function optionalBoolean(value: unknown, path: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw new CatalogError("must be a boolean", path);
  return value;
}

function optionalInteger(value: unknown, path: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new CatalogError("must be an integer", path);
  }
  return value;
}
