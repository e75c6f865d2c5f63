// src/prompt.ts — Interactive Likert prompt loop

import { createInterface } from "node:readline/promises";
import type { LikertQuestion } from "./question.js";

export interface PromptIO {
  ask(text: string): Promise<string>;
  say(text: string): void;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Ask every question in order, re-asking until the answer is an integer
 * within that question's scale.
 */
export async function promptForResponses(
  questions: readonly LikertQuestion[],
  io: PromptIO,
): Promise<number[]> {
  const responses: number[] = [];
  for (const [index, question] of questions.entries()) {
    for (;;) {
      const answer = (await io.ask(`Q${index + 1}: ${question.prompt}\n> `)).trim();
      if (!INTEGER_PATTERN.test(answer)) {
        io.say("Please provide an integer response.");
        continue;
      }
      const value = Number.parseInt(answer, 10);
      if (value < question.scaleMin || value > question.scaleMax) {
        io.say(`Responses must be between ${question.scaleMin} and ${question.scaleMax}.`);
        continue;
      }
      responses.push(value);
      break;
    }
  }
  return responses;
}

export function likertLabel(min: number, max: number): string {
  return `Respond on a scale from ${min} (strongly disagree) to ${max} (strongly agree).`;
}

/** Terminal-backed PromptIO. Call close() when done. */
export function createTerminalIO(): PromptIO & { close(): void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return {
    ask: (text) => rl.question(text),
    say: (text) => {
      process.stdout.write(text + "\n");
    },
    close: () => rl.close(),
  };
}
