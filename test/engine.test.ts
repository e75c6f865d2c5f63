import { describe, it, expect } from "vitest";
import { SurveyEngine } from "../src/engine.js";
import { loadCatalog } from "../src/catalog.js";
import { findContext } from "../src/insights.js";
import { createDefaultEngine } from "../src/index.js";
import { LikertQuestion } from "../src/question.js";
import { SurveyModel } from "../src/survey-model.js";
import { CatalogError, ResponseCountError, ResponseRangeError, ValidationError } from "../src/types.js";

/** Answers that push every dimension to `direction` (1 = top of scale, 0 = bottom). */
function uniformResponses(engine: SurveyEngine, direction: 0 | 1): Record<string, number[]> {
  const responses: Record<string, number[]> = {};
  for (const model of engine.models) {
    responses[model.name] = model.questions.map((q) =>
      (direction === 1) !== q.reverseScored ? q.scaleMax : q.scaleMin,
    );
  }
  return responses;
}

function smallModel(name: string, count: number): SurveyModel {
  return new SurveyModel({
    name,
    description: "",
    questions: Array.from({ length: count }, (_, i) => new LikertQuestion({ prompt: `Q${i}`, dimension: "D" })),
  });
}

describe("SurveyEngine.run", () => {
  const engine = createDefaultEngine();

  it("returns one entry per model in configured order", () => {
    const scores = engine.run(uniformResponses(engine, 1));
    expect(Object.keys(scores)).toEqual([
      "Big Five Snapshot",
      "Attachment & Trust",
      "Collaboration Style",
      "Feedback Culture",
    ]);
    expect(scores["Big Five Snapshot"]).toEqual({
      Extraversion: 1,
      Agreeableness: 1,
      Conscientiousness: 1,
      "Emotional Stability": 1,
      Openness: 1,
    });
    expect(scores["Feedback Culture"]).toEqual({ "Feedback Candour": 1, Receptiveness: 1 });
  });

  it("rejects a response count mismatch with the model name and counts", () => {
    const responses = uniformResponses(engine, 1);
    responses["Big Five Snapshot"] = responses["Big Five Snapshot"].slice(0, 19);
    expect(() => engine.run(responses)).toThrow("Expected 20 responses for Big Five Snapshot, received 19");

    try {
      engine.run(responses);
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toBeInstanceOf(ResponseCountError);
      if (err instanceof ResponseCountError) {
        expect(err.modelName).toBe("Big Five Snapshot");
        expect(err.expected).toBe(20);
        expect(err.received).toBe(19);
      }
    }
  });

  it("treats a missing model as zero responses", () => {
    const responses = uniformResponses(engine, 1);
    delete responses["Collaboration Style"];
    expect(() => engine.run(responses)).toThrow("Expected 6 responses for Collaboration Style, received 0");
  });

  it("fails on the first mismatching model", () => {
    const custom = new SurveyEngine([smallModel("First", 2), smallModel("Second", 1)]);
    expect(() => custom.run({})).toThrow("Expected 2 responses for First, received 0");
  });

  it("rejects too many responses as well", () => {
    const custom = new SurveyEngine([smallModel("Only", 1)]);
    expect(() => custom.run({ Only: [3, 3] })).toThrow(ResponseCountError);
  });

  it("ignores responses for models it does not own", () => {
    const custom = new SurveyEngine([smallModel("Only", 2)]);
    expect(custom.run({ Only: [1, 5], Other: [9] })).toEqual({ Only: { D: 0.5 } });
  });

  it("propagates out-of-range responses", () => {
    const custom = new SurveyEngine([smallModel("Only", 2)]);
    expect(() => custom.run({ Only: [1, 6] })).toThrow(ResponseRangeError);
  });

  it("rejects duplicate model names", () => {
    expect(() => new SurveyEngine([smallModel("Twin", 1), smallModel("Twin", 2)])).toThrow(CatalogError);
  });

  it("keeps a model named __proto__ as an own entry", () => {
    const custom = new SurveyEngine([smallModel("__proto__", 1)]);
    const scores = custom.run({ ["__proto__"]: [5] });
    expect(Object.entries(scores)).toEqual([["__proto__", { D: 1 }]]);
  });

  it("an engine without models returns an empty result", () => {
    expect(new SurveyEngine([]).run({ Anything: [1] })).toEqual({});
  });
});

describe("SurveyEngine.interpretRelationshipDynamics", () => {
  const engine = createDefaultEngine();

  it("never throws on empty scores and covers every context", () => {
    const insights = engine.interpretRelationshipDynamics({});
    expect(Object.keys(insights)).toEqual(engine.contextNames);
    for (const ctx of engine.contexts) {
      expect(insights[ctx.name]).toBe(ctx.fallback);
    }
  });

  it("reads top-of-scale answers as the most positive rows", () => {
    const traces = engine.explainRelationshipDynamics(engine.run(uniformResponses(engine, 1)));
    expect(traces.map((t) => [t.context, t.ruleId])).toEqual([
      ["General Liking", "warm"],
      ["Technical Collaboration", "structured"],
      ["Manager Relationship", "dependable"],
      ["Peer Relationship", "pairing"],
      ["Mentor/Lead Relationship", "organised"],
      ["Learning Community", "catalyst"],
      ["Code Review Dynamics", "constructive"],
    ]);
  });

  it("reads bottom-of-scale answers as the cautionary rows", () => {
    const scores = engine.run(uniformResponses(engine, 0));
    const insights = engine.interpretRelationshipDynamics(scores);
    expect(insights["General Liking"]).toBe("Your calm demeanour encourages trust even if you are more reserved.");
    expect(insights["Technical Collaboration"]).toBe(
      "Balance structure with curiosity to strengthen technical collaborations.",
    );
    expect(engine.explainRelationshipDynamics(scores).map((t) => t.ruleId)).toEqual([
      "calm",
      "fallback",
      "guarded",
      "distant",
      "ambiguous",
      "cautious",
      "defensive",
    ]);
  });

  it("degrades to neutral defaults for partial surveys", () => {
    const bigFiveOnly = new SurveyEngine([loadCatalog().models[0]]);
    const scores = bigFiveOnly.run({ "Big Five Snapshot": Array.from({ length: 20 }, () => 3) });
    expect(scores["Big Five Snapshot"].Openness).toBe(0.5);
    const insights = bigFiveOnly.interpretRelationshipDynamics(scores);
    expect(insights["Manager Relationship"]).toBe(
      "Share progress rhythms and decision logs to reinforce confidence upward.",
    );
  });

  it("uses the contexts it was built with", () => {
    const peer = findContext("Peer Relationship");
    if (!peer) throw new Error("missing context");
    const custom = new SurveyEngine([], { contexts: [peer] });
    expect(custom.interpretRelationshipDynamics({})).toEqual({
      "Peer Relationship": "Keep communication cadences steady to deepen peer rapport.",
    });
  });
});

describe("createDefaultEngine", () => {
  it("classic variant scores six contexts", () => {
    const classic = createDefaultEngine("classic");
    expect(classic.models.map((m) => m.questions.length)).toEqual([10, 4, 4]);
    expect(classic.contextNames).not.toContain("Code Review Dynamics");
    expect(Object.keys(classic.interpretRelationshipDynamics({}))).toHaveLength(6);
  });

  it("finds models by name", () => {
    expect(createDefaultEngine().findModel("Attachment & Trust")?.questions).toHaveLength(6);
    expect(createDefaultEngine().findModel("Missing")).toBeUndefined();
  });
});
