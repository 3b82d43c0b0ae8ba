/**
 * Yes/no prompts for the installer wizard.
 */

import { createInterface } from "node:readline/promises";
import type { Logger } from "../logging/index.js";

/**
 * Asks the user yes/no questions.
 * Implementations without a terminal answer every question with its default.
 */
export interface Prompter {
  /** True when questions reach a person */
  readonly interactive: boolean;

  /**
   * Ask a yes/no question.
   *
   * @param question - Question text, including the `[Y/n]` hint
   * @param defaultAnswer - Answer used for an empty reply or without a terminal
   */
  confirm(question: string, defaultAnswer: boolean): Promise<boolean>;

  /** Release the terminal. */
  close(): void;
}

/**
 * Interpret a reply. Empty or unrecognized replies take the default.
 *
 * @example
 * parseYesNo("Y", false); // true
 * parseYesNo("", true); // true
 * parseYesNo("maybe", false); // false
 */
export function parseYesNo(reply: string, defaultAnswer: boolean): boolean {
  const normalized = reply.trim().toLowerCase();
  if (normalized === "y" || normalized === "yes") return true;
  if (normalized === "n" || normalized === "no") return false;
  return defaultAnswer;
}

/**
 * Prompter reading replies from a terminal with node:readline.
 */
export class ReadlinePrompter implements Prompter {
  readonly interactive = true;
  private readonly rl: ReturnType<typeof createInterface>;

  constructor(
    input: NodeJS.ReadableStream,
    output: NodeJS.WritableStream,
    private readonly logger: Logger
  ) {
    this.rl = createInterface({ input, output });
  }

  async confirm(question: string, defaultAnswer: boolean): Promise<boolean> {
    const reply = await this.rl.question(question);
    const answer = parseYesNo(reply, defaultAnswer);
    this.logger.debug("Answered", { question, reply, answer });
    return answer;
  }

  close(): void {
    this.rl.close();
  }
}

/**
 * Prompter for runs without a terminal (e.g. piped input).
 */
export class NonInteractivePrompter implements Prompter {
  readonly interactive = false;

  constructor(private readonly logger: Logger) {}

  async confirm(question: string, defaultAnswer: boolean): Promise<boolean> {
    this.logger.warn("Non-interactive mode: using default", { question, answer: defaultAnswer });
    return defaultAnswer;
  }

  close(): void {}
}

/**
 * Pick the prompter for the given standard input.
 */
export function createPrompter(
  input: NodeJS.ReadStream,
  output: NodeJS.WriteStream,
  logger: Logger
): Prompter {
  return input.isTTY ? new ReadlinePrompter(input, output, logger) : new NonInteractivePrompter(logger);
}
