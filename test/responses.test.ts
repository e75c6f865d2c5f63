import { describe, it, expect, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { loadResponsesFile, parseResponses } from "../src/responses.js";
import { createDefaultEngine } from "../src/index.js";
import { ResponseFileError } from "../src/types.js";

const CLASSIC_RESPONSES = fileURLToPath(new URL("./fixtures/survey/classic-responses.json", import.meta.url));
const TMP = mkdtempSync(join(tmpdir(), "rapport-responses-"));

function writeTmp(name: string, content: string): string {
  const file = join(TMP, name);
  writeFileSync(file, content);
  return file;
}

describe("parseResponses", () => {
  it("accepts an object of integer arrays", () => {
    expect(parseResponses({ A: [1, 2], B: [] })).toEqual({ A: [1, 2], B: [] });
  });

  it("rejects non-object payloads", () => {
    for (const payload of [null, [1, 2], "text", 3]) {
      expect(() => parseResponses(payload)).toThrow("Response file must contain a JSON object.");
    }
  });

  it("rejects entries that are not integer arrays", () => {
    expect(() => parseResponses({ A: [1, 2.5] })).toThrow(
      'Every model entry must be an array of integers representing Likert scores (model "A").',
    );
    expect(() => parseResponses({ B: "1,2" })).toThrow(ResponseFileError);
    expect(() => parseResponses({ C: ["1"] })).toThrow(ResponseFileError);
  });

  it("keeps a __proto__ entry as data", () => {
    const parsed = parseResponses(JSON.parse('{"__proto__": [1, 5], "A": [2]}'));
    expect(Object.entries(parsed)).toEqual([
      ["__proto__", [1, 5]],
      ["A", [2]],
    ]);
    expect(Object.getPrototypeOf(parsed)).toBe(Object.prototype);
  });

  it("leaves range checks to the engine", () => {
    expect(parseResponses({ A: [0, 99] })).toEqual({ A: [0, 99] });
  });
});

describe("loadResponsesFile", () => {
  afterAll(() => rmSync(TMP, { recursive: true, force: true }));

  it("loads a response file that scores against the classic catalog", () => {
    const engine = createDefaultEngine("classic");
    const scores = engine.run(loadResponsesFile(CLASSIC_RESPONSES));
    expect(scores).toEqual({
      "Big Five Snapshot": {
        Extraversion: 1,
        Agreeableness: 1,
        Conscientiousness: 0.75,
        "Emotional Stability": 0.75,
        Openness: 0.875,
      },
      "Attachment & Trust": { "Trust Propensity": 0.75, "Boundary Clarity": 1 },
      "Collaboration Style": { "Support Orientation": 0.875, "Structure Preference": 0.75 },
    });
    expect(engine.explainRelationshipDynamics(scores).map((t) => t.ruleId)).toEqual([
      "warm",
      "structured",
      "dependable",
      "pairing",
      "organised",
      "catalyst",
    ]);
  });

  it("reports missing files", () => {
    expect(() => loadResponsesFile(join(TMP, "missing.json"))).toThrow("Response file not found");
  });

  it("wraps JSON syntax errors with their cause", () => {
    const file = writeTmp("broken.json", "{ \"A\": [1, ");
    try {
      loadResponsesFile(file);
      expect.unreachable("loadResponsesFile should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(ResponseFileError);
      if (err instanceof ResponseFileError) {
        expect(err.message).toMatch(/^Failed to parse response file /);
        expect(err.cause).toBeInstanceOf(SyntaxError);
        expect(err.filePath).toBe(file);
      }
    }
  });

  it("validates the parsed document", () => {
    const file = writeTmp("array.json", "[1, 2, 3]");
    expect(() => loadResponsesFile(file)).toThrow("Response file must contain a JSON object.");
  });
});
