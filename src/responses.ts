// src/responses.ts — Pre-filled response files
// Structural checks only; scale bounds and counts are enforced by the engine.

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ResponseFileError } from "./types.js";
import type { ResponsesByModel } from "./types.js";

/**
 * Validate a parsed JSON document of the form `{ "<model name>": [1, 5, 3, ...] }`.
 */
export function parseResponses(payload: unknown, filePath?: string): ResponsesByModel {
  if (typeof payload !== "object" || payload === null || Array.isArray(payload)) {
    throw new ResponseFileError("Response file must contain a JSON object.", filePath);
  }

  const responses: [string, number[]][] = [];
  for (const [modelName, values] of Object.entries(payload)) {
    if (!isIntegerArray(values)) {
      throw new ResponseFileError(
        `Every model entry must be an array of integers representing Likert scores (model "${modelName}").`,
        filePath,
      );
    }
    responses.push([modelName, values]);
  }
  return Object.fromEntries(responses);
}

export function loadResponsesFile(filePath: string): ResponsesByModel {
  const absPath = resolve(filePath);
  if (!existsSync(absPath)) {
    throw new ResponseFileError(`Response file not found: ${filePath}`, absPath);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(readFileSync(absPath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ResponseFileError(
      `Failed to parse response file ${filePath}: ${msg}`,
      absPath,
      err instanceof Error ? err : undefined,
    );
  }
  return parseResponses(payload, absPath);
}

function isIntegerArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === "number" && Number.isInteger(item));
}
