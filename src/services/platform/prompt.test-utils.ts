/**
 * Test utilities for Prompter.
 */
import { vi, type Mock } from "vitest";
import type { Prompter } from "./prompt.js";

export interface MockPrompter extends Prompter {
  confirm: Mock<(question: string, defaultAnswer: boolean) => Promise<boolean>>;
  close: Mock<() => void>;
  /** Questions asked, in order */
  readonly asked: readonly string[];
}

/**
 * Create a mock Prompter.
 *
 * @param answers - Answers returned in order; once used up, each question gets its default.
 *   Pass `interactive: false` to simulate a run without a terminal.
 */
export function createMockPrompter(
  answers: readonly boolean[] = [],
  options?: { interactive?: boolean }
): MockPrompter {
  const asked: string[] = [];
  const queue = [...answers];
  return {
    interactive: options?.interactive ?? true,
    asked,
    confirm: vi.fn(async (question: string, defaultAnswer: boolean) => {
      asked.push(question);
      const next = queue.shift();
      return next ?? defaultAnswer;
    }),
    close: vi.fn(),
  };
}
