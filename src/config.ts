// src/config.ts — Config Resolver
// Precedence: defaults ← config file ← environment ← CLI args.

import { existsSync, readFileSync, statSync } from "node:fs";
import { join, resolve } from "node:path";
import { DEFAULT_CATALOG, isCatalogVariant } from "./catalog.js";
import type { ReportFormat, ResolvedConfig, Warning } from "./types.js";

export const CONFIG_FILENAME = "rapport.config.json";
const PACKAGE_JSON_KEY = "rapport";
const MAX_PRECISION = 6;

export interface ParsedArgs {
  command?: string;
  responsesFile?: string;
  output?: string;
  config?: string;
  catalog?: string;
  models: string[];
  precision?: number;
  json: boolean;
  explain: boolean;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
}

/** Shape accepted from rapport.config.json or the "rapport" key in package.json. */
export interface FileConfig {
  catalog?: string;
  models?: string[];
  precision?: number;
  format?: ReportFormat;
  explain?: boolean;
}

const DEFAULTS: ResolvedConfig = {
  catalog: DEFAULT_CATALOG,
  models: [],
  precision: 2,
  format: "text",
  explain: false,
  quiet: false,
  verbose: false,
};

export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  const fileConfig = loadConfigFile(args.config, cwd, warnings) ?? {};

  const catalog =
    nonEmpty(args.catalog) ?? nonEmpty(env.RAPPORT_CATALOG) ?? nonEmpty(fileConfig.catalog) ?? DEFAULTS.catalog;
  const catalogFile = isCatalogVariant(catalog) ? undefined : resolve(cwd, catalog);
  if (catalogFile !== undefined && !isFile(catalogFile)) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Catalog "${catalog}" is neither a built-in variant nor an existing file; using "${DEFAULT_CATALOG}".`,
    });
  }

  const config: ResolvedConfig = {
    catalog: catalogFile === undefined ? catalog : isFile(catalogFile) ? catalogFile : DEFAULT_CATALOG,
    models: args.models.length > 0 ? args.models : fileConfig.models ?? DEFAULTS.models,
    responsesFile: args.responsesFile ? resolve(cwd, args.responsesFile) : undefined,
    output: args.output ? resolve(cwd, args.output) : undefined,
    precision: args.precision ?? fileConfig.precision ?? DEFAULTS.precision,
    format: args.json ? "json" : fileConfig.format ?? DEFAULTS.format,
    explain: args.explain || (fileConfig.explain ?? DEFAULTS.explain),
    quiet: args.quiet,
    verbose: args.verbose,
  };

  if (!Number.isInteger(config.precision) || config.precision < 0 || config.precision > MAX_PRECISION) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Precision must be an integer between 0 and ${MAX_PRECISION}; using ${DEFAULTS.precision}.`,
    });
    config.precision = DEFAULTS.precision;
  }

  return config;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

function isFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

function loadConfigFile(
  configPath: string | undefined,
  cwd: string,
  warnings: Warning[],
): FileConfig | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgJson, "utf-8"));
      if (isRecord(pkg) && pkg[PACKAGE_JSON_KEY] !== undefined) {
        return toFileConfig(pkg[PACKAGE_JSON_KEY], pkgJson, warnings);
      }
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({ level: "warn", module: "config", message: `Could not read package.json: ${msg}`, file: pkgJson });
    }
  }

  return null;
}

function parseConfigFile(filePath: string, warnings: Warning[]): FileConfig | null {
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    return toFileConfig(parsed, filePath, warnings);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
      file: filePath,
    });
    return null;
  }
}

/** Keep the recognised, well-typed keys; warn about the rest. */
function toFileConfig(raw: unknown, filePath: string, warnings: Warning[]): FileConfig | null {
  if (!isRecord(raw)) {
    warnings.push({ level: "warn", module: "config", message: "Config must be a JSON object", file: filePath });
    return null;
  }

  const config: FileConfig = {};
  const invalid = (key: string, expected: string) =>
    warnings.push({ level: "warn", module: "config", message: `Ignoring "${key}": expected ${expected}`, file: filePath });

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case "catalog":
        if (typeof value === "string") config.catalog = value;
        else invalid(key, "a string");
        break;
      case "models":
        if (Array.isArray(value) && value.every((v) => typeof v === "string")) config.models = value;
        else invalid(key, "an array of strings");
        break;
      case "precision":
        if (typeof value === "number") config.precision = value;
        else invalid(key, "a number");
        break;
      case "format":
        if (value === "text" || value === "json") config.format = value;
        else invalid(key, `"text" or "json"`);
        break;
      case "explain":
        if (typeof value === "boolean") config.explain = value;
        else invalid(key, "a boolean");
        break;
      default:
        warnings.push({ level: "info", module: "config", message: `Unknown config key "${key}"`, file: filePath });
    }
  }
  return config;
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { r: "responses-file", o: "output", c: "config", m: "model", q: "quiet", v: "verbose", h: "help" },
    boolean: ["json", "explain", "quiet", "verbose", "help"],
    string: ["responses-file", "output", "config", "catalog", "model", "precision"],
  });

  const precision = optionalString(args.precision);
  return {
    command: args._.length > 0 ? String(args._[0]) : undefined,
    responsesFile: optionalString(args["responses-file"]),
    output: optionalString(args.output),
    config: optionalString(args.config),
    catalog: optionalString(args.catalog),
    models: toStringList(args.model),
    precision: precision === undefined ? undefined : Number(precision),
    json: args.json === true,
    explain: args.explain === true,
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    help: args.help === true,
  };
}

function optionalString(value: unknown): string | undefined {
  if (Array.isArray(value)) return optionalString(value[value.length - 1]);
  return typeof value === "string" && value !== "" ? value : undefined;
}

/** mri yields a string for one occurrence and an array for repeats. */
function toStringList(value: unknown): string[] {
  const list: unknown[] = Array.isArray(value) ? value : [value];
  return list.filter((v): v is string => typeof v === "string" && v !== "");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
