// src/bin/commands.ts — `models` and `run` command bodies
// The entry point owns process.exit; everything here reports through CliIO.

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { filterModels, resolveCatalog } from "../catalog.js";
import type { Catalog } from "../catalog.js";
import { resolveConfig } from "../config.js";
import type { ParsedArgs } from "../config.js";
import { SurveyEngine } from "../engine.js";
import { createTerminalIO, likertLabel, promptForResponses } from "../prompt.js";
import type { PromptIO } from "../prompt.js";
import {
  buildResultDocument,
  formatInsightTraces,
  formatInsights,
  formatModelListing,
  formatScores,
} from "../report.js";
import { loadResponsesFile } from "../responses.js";
import {
  CatalogError,
  ENGINE_VERSION,
  ResponseFileError,
  ResponseRangeError,
  ValidationError,
} from "../types.js";
import type { ResolvedConfig, ResponsesByModel, Warning } from "../types.js";

export const HELP_TEXT = `
rapport-survey v${ENGINE_VERSION}

Usage:
  rapport-survey models                  List survey models and their questions
  rapport-survey run                     Take the survey interactively or from a file

Options:
  --responses-file, -r   JSON file of pre-filled responses: { "<model>": [1, 5, ...] }
  --output, -o           Write aggregated scores and insights as JSON to this path
  --catalog              Built-in catalog (classic, extended) or path to a catalog JSON file
                         (default: extended, or RAPPORT_CATALOG)
  --model, -m            Only include models whose name matches this glob (repeatable)
  --precision            Decimal places for printed scores (default: 2)
  --json                 Print the result document as JSON instead of text
  --explain              Show which rule produced each insight
  --config, -c           Path to config file (default: rapport.config.json)
  --quiet, -q            Suppress warnings
  --verbose, -v          Print timing information
  --help, -h             Show this help text

Examples:
  rapport-survey models --catalog classic
  rapport-survey run --responses-file answers.json --output results.json
  rapport-survey run -m "Big Five*" -m "Feedback*"
`.trim();

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  cwd: string;
  env: NodeJS.ProcessEnv;
  now(): Date;
  /** Opens the prompt used when no responses file is given. */
  openPrompt(): PromptIO & { close(): void };
}

export const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  cwd: process.cwd(),
  env: process.env,
  now: () => new Date(),
  openPrompt: createTerminalIO,
};

/**
 * Run one CLI command and return its exit code.
 * Survey and catalog errors are reported on stderr and yield 1; anything
 * else propagates to the caller.
 */
export async function runCommand(args: ParsedArgs, io: CliIO = processIO): Promise<number> {
  if (args.help || !args.command) {
    io.stdout(HELP_TEXT + "\n");
    return args.help ? 0 : 1;
  }

  try {
    return await dispatch(args, io);
  } catch (err: unknown) {
    if (isUserError(err)) {
      io.stderr(`[error] ${err.name}: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}

async function dispatch(args: ParsedArgs, io: CliIO): Promise<number> {
  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings, io.cwd, io.env);
  const catalog = resolveCatalog(config.catalog);
  const models = filterModels(catalog.models, config.models);
  if (models.length === 0) {
    warnings.push({
      level: "error",
      module: "catalog",
      message: `No models in catalog "${catalog.name}" match ${config.models.map((p) => `"${p}"`).join(", ")}`,
    });
  }

  if (!config.quiet) {
    for (const w of warnings) {
      io.stderr(`[${w.level}] ${w.module}: ${w.message}\n`);
    }
  }
  if (models.length === 0) return 1;

  const engine = new SurveyEngine(models, { contexts: catalog.contexts });

  switch (args.command) {
    case "models":
      io.stdout(formatModelListing(engine.models).trimStart() + "\n");
      return 0;
    case "run":
      await runSurvey(engine, catalog, config, io);
      return 0;
    default:
      io.stderr(`[error] cli: Unknown command "${args.command}". Run with --help for usage.\n`);
      return 1;
  }
}

export async function runSurvey(
  engine: SurveyEngine,
  catalog: Catalog,
  config: ResolvedConfig,
  io: CliIO = processIO,
): Promise<void> {
  const responses = config.responsesFile
    ? loadResponsesFile(config.responsesFile)
    : await collectInteractively(engine, io.openPrompt());

  const start = performance.now();
  const scores = engine.run(responses);
  const insights = engine.interpretRelationshipDynamics(scores);
  if (config.verbose) {
    const ms = (performance.now() - start).toFixed(1);
    io.stderr(`[INFO] Scored ${engine.models.length} model(s) in ${ms}ms\n`);
  }

  const document = buildResultDocument(scores, insights, catalog.name, io.now());

  if (config.format === "json") {
    io.stdout(JSON.stringify(document, null, 2) + "\n");
  } else {
    io.stdout("\nSurvey summary:\n\n");
    io.stdout(formatScores(scores, engine.models, config.precision) + "\n");
    io.stdout("\nRelationship insights:\n\n");
    const text = config.explain
      ? formatInsightTraces(engine.explainRelationshipDynamics(scores))
      : formatInsights(insights);
    io.stdout(text + "\n");
  }

  if (config.output) {
    writeFileSafe(config.output, JSON.stringify(document, null, 2));
    if (!config.quiet) io.stderr(`Saved results to ${config.output}\n`);
  }
}

async function collectInteractively(
  engine: SurveyEngine,
  prompt: PromptIO & { close(): void },
): Promise<ResponsesByModel> {
  const responses = new Map<string, number[]>();
  try {
    prompt.say("\nStarting interactive survey.\n");
    for (const model of engine.models) {
      const first = model.questions[0];
      prompt.say(`\n-- ${model.name} --`);
      prompt.say(model.description);
      prompt.say(likertLabel(first.scaleMin, first.scaleMax));
      responses.set(model.name, await promptForResponses(model.questions, prompt));
    }
  } finally {
    prompt.close();
  }
  return Object.fromEntries(responses);
}

function writeFileSafe(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}

function isUserError(err: unknown): err is Error {
  return (
    err instanceof ResponseRangeError ||
    err instanceof ValidationError ||
    err instanceof ResponseFileError ||
    err instanceof CatalogError
  );
}
