// src/insights.ts — Relationship insight decision tables
// Each context is an ordered list of threshold rules plus a fallback. First match wins.

import { NEUTRAL_SCORE } from "./types.js";
import type { AggregatedScores, Insights, InsightTrace } from "./types.js";

// ─── Model names the rules read from ─────────────────────────────────────────

export const BIG_FIVE = "Big Five Snapshot";
export const ATTACHMENT = "Attachment & Trust";
export const COLLABORATION = "Collaboration Style";
export const FEEDBACK = "Feedback Culture";

// ─── Rule types ──────────────────────────────────────────────────────────────

/** Returns the aggregated score, or NEUTRAL_SCORE when the model or dimension is absent. */
export type ScoreLookup = (model: string, dimension: string) => number;

export interface InsightRule {
  id: string;
  when: (score: ScoreLookup) => boolean;
  narrative: string;
}

export interface InsightContext {
  name: string;
  rules: readonly InsightRule[];
  fallback: string;
}

export const FALLBACK_RULE_ID = "fallback";

export function createScoreLookup(scores: AggregatedScores): ScoreLookup {
  return (model, dimension) => {
    if (!Object.hasOwn(scores, model)) return NEUTRAL_SCORE;
    const dimensions = scores[model];
    return Object.hasOwn(dimensions, dimension) ? dimensions[dimension] : NEUTRAL_SCORE;
  };
}

// ─── Default contexts ────────────────────────────────────────────────────────

const GENERAL_LIKING: InsightContext = {
  name: "General Liking",
  rules: [
    {
      id: "warm",
      when: (s) => s(BIG_FIVE, "Agreeableness") > 0.7 && s(BIG_FIVE, "Extraversion") > 0.6,
      narrative:
        "People are likely to perceive you as warm and approachable. " +
        "Expect positive first impressions in casual settings.",
    },
    {
      id: "calm",
      when: (s) => s(BIG_FIVE, "Emotional Stability") < 0.4,
      narrative: "Your calm demeanour encourages trust even if you are more reserved.",
    },
  ],
  fallback: "Mixed signals may arise; focus on active listening to reinforce rapport.",
};

const TECHNICAL_COLLABORATION: InsightContext = {
  name: "Technical Collaboration",
  rules: [
    {
      id: "structured",
      when: (s) =>
        s(BIG_FIVE, "Conscientiousness") > 0.7 && s(COLLABORATION, "Structure Preference") > 0.6,
      narrative:
        "As an engineer you project reliability and a preference for well-defined " +
        "processes. Teammates will appreciate clear plans and retrospectives.",
    },
    {
      id: "exploratory",
      when: (s) => s(BIG_FIVE, "Openness") > 0.6,
      narrative:
        "You thrive in exploratory technical discussions—lean into design spikes " +
        "and brainstorming sessions.",
    },
  ],
  fallback: "Balance structure with curiosity to strengthen technical collaborations.",
};

const MANAGER_RELATIONSHIP: InsightContext = {
  name: "Manager Relationship",
  rules: [
    {
      id: "dependable",
      when: (s) =>
        s(ATTACHMENT, "Trust Propensity") > 0.7 && s(COLLABORATION, "Support Orientation") > 0.6,
      narrative:
        "Managers are likely to see you as a dependable partner who escalates " +
        "risks early and seeks joint solutions.",
    },
    {
      id: "guarded",
      when: (s) => s(ATTACHMENT, "Trust Propensity") < 0.4,
      narrative: "Clarify expectations frequently to avoid misunderstandings with managers.",
    },
  ],
  fallback: "Share progress rhythms and decision logs to reinforce confidence upward.",
};

const PEER_RELATIONSHIP: InsightContext = {
  name: "Peer Relationship",
  rules: [
    {
      id: "pairing",
      when: (s) =>
        s(BIG_FIVE, "Agreeableness") > 0.7 && s(COLLABORATION, "Support Orientation") > 0.6,
      narrative: "Peers will value pairing sessions and shared ownership with you.",
    },
    {
      id: "distant",
      when: (s) => s(COLLABORATION, "Support Orientation") < 0.4,
      narrative: "Proactively offer feedback rounds to counter perceptions of distance.",
    },
  ],
  fallback: "Keep communication cadences steady to deepen peer rapport.",
};

const MENTOR_RELATIONSHIP: InsightContext = {
  name: "Mentor/Lead Relationship",
  rules: [
    {
      id: "organised",
      when: (s) => s(COLLABORATION, "Structure Preference") > 0.7 && s(BIG_FIVE, "Openness") > 0.5,
      narrative:
        "Direct reports will benefit from your organised onboarding and " +
        "willingness to adapt to their learning styles.",
    },
    {
      id: "ambiguous",
      when: (s) => s(COLLABORATION, "Structure Preference") < 0.4,
      narrative: "Define check-ins and role clarity to avoid ambiguity with mentees.",
    },
  ],
  fallback: "Blend documented guidance with exploratory growth conversations.",
};

const LEARNING_COMMUNITY: InsightContext = {
  name: "Learning Community",
  rules: [
    {
      id: "catalyst",
      when: (s) => s(BIG_FIVE, "Extraversion") > 0.6 && s(BIG_FIVE, "Openness") > 0.6,
      narrative: "In study groups you naturally catalyse discussion and share resources.",
    },
    {
      id: "cautious",
      when: (s) => s(ATTACHMENT, "Trust Propensity") < 0.4,
      narrative:
        "Start with asynchronous contributions to build familiarity before " +
        "facilitating live sessions.",
    },
  ],
  fallback: "Consistent summaries and question prompts will keep chatrooms engaged.",
};

const CODE_REVIEW_DYNAMICS: InsightContext = {
  name: "Code Review Dynamics",
  rules: [
    {
      id: "constructive",
      when: (s) => s(FEEDBACK, "Feedback Candour") > 0.7 && s(FEEDBACK, "Receptiveness") > 0.6,
      narrative:
        "Your reviews read as direct but collaborative, and authors are likely to " +
        "return the favour with equally candid feedback on your changes.",
    },
    {
      id: "defensive",
      when: (s) => s(FEEDBACK, "Receptiveness") < 0.4,
      narrative:
        "Review comments on your own changes may feel personal; ask reviewers for " +
        "the reasoning behind each request before responding.",
    },
    {
      id: "blunt",
      when: (s) => s(FEEDBACK, "Feedback Candour") > 0.7 && s(BIG_FIVE, "Agreeableness") < 0.4,
      narrative:
        "Your candour keeps quality high, but pair each blocking comment with a " +
        "suggested fix so authors do not read it as dismissal.",
    },
    {
      id: "reticent",
      when: (s) => s(FEEDBACK, "Feedback Candour") < 0.4,
      narrative:
        "You may approve changes with concerns left unspoken; note at least one " +
        "question or risk per review to make your expertise visible.",
    },
  ],
  fallback: "Agree on review checklists with your team so expectations stay explicit on both sides.",
};

/** Every built-in context, in report order. */
export const DEFAULT_CONTEXTS: readonly InsightContext[] = Object.freeze([
  GENERAL_LIKING,
  TECHNICAL_COLLABORATION,
  MANAGER_RELATIONSHIP,
  PEER_RELATIONSHIP,
  MENTOR_RELATIONSHIP,
  LEARNING_COMMUNITY,
  CODE_REVIEW_DYNAMICS,
]);

export function findContext(name: string): InsightContext | undefined {
  return DEFAULT_CONTEXTS.find((c) => c.name === name);
}

// ─── Evaluation ──────────────────────────────────────────────────────────────

export function explainContext(context: InsightContext, score: ScoreLookup): InsightTrace {
  for (const rule of context.rules) {
    if (rule.when(score)) {
      return { context: context.name, ruleId: rule.id, narrative: rule.narrative };
    }
  }
  return { context: context.name, ruleId: FALLBACK_RULE_ID, narrative: context.fallback };
}

export function evaluateContext(context: InsightContext, score: ScoreLookup): string {
  return explainContext(context, score).narrative;
}

/**
 * Narrative per context for the given scores. Never throws: missing models
 * and dimensions read as NEUTRAL_SCORE.
 */
export function interpretScores(
  scores: AggregatedScores,
  contexts: readonly InsightContext[] = DEFAULT_CONTEXTS,
): Insights {
  const score = createScoreLookup(scores);
  const insights: Insights = {};
  for (const context of contexts) {
    insights[context.name] = evaluateContext(context, score);
  }
  return insights;
}

export function explainScores(
  scores: AggregatedScores,
  contexts: readonly InsightContext[] = DEFAULT_CONTEXTS,
): InsightTrace[] {
  const score = createScoreLookup(scores);
  return contexts.map((context) => explainContext(context, score));
}
