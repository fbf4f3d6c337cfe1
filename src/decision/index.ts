/**
 * decision/index.ts - The decision port: every question the operator answers
 *
 * Tools and the runner never read the terminal themselves. They ask a
 * DecisionPort, which either prompts (@inquirer/prompts) or refuses because
 * the run is non-interactive. Values the operator passed as CLI options
 * never reach the port: tools only ask for what is still missing.
 *
 * Tests hand in a fake port built with vi.fn, so the planner and dispatcher
 * are exercised without simulating terminal input.
 */

import { confirm, input, select } from "@inquirer/prompts";
import { ParseError } from "../errors";
import { DISPATCH_MODES, type DispatchMode } from "../engine/types";

export interface Choice<T extends string> {
  value: T;
  name: string;
  description?: string;
}

export interface DecisionPort {
  /** Execute now, or write the minimal or full-force script */
  chooseMode(summary: string): Promise<DispatchMode>;
  /**
   * Free-text answer. An empty (trimmed) answer is returned as "" and the
   * caller decides whether that aborts the run.
   *
   * @param option - CLI option that supplies the same value non-interactively
   */
  ask(question: string, option: string, defaultValue?: string): Promise<string>;
  choose<T extends string>(
    question: string,
    option: string,
    choices: readonly Choice<T>[]
  ): Promise<T>;
  confirm(question: string, option: string, defaultValue?: boolean): Promise<boolean>;
}

export const MODE_CHOICES: readonly Choice<DispatchMode>[] = [
  {
    value: "execute",
    name: "Execute now",
    description: "Run the minimal plan against the live resources",
  },
  {
    value: "emit-minimal",
    name: "Write minimal script",
    description: "Only the changes needed right now",
  },
  {
    value: "emit-full",
    name: "Write full-force script",
    description: "Every tracked field, re-runnable from scratch",
  },
];

/**
 * Parses a --mode value.
 *
 * @throws ParseError listing the accepted modes
 */
export function parseMode(value: string): DispatchMode {
  const mode = DISPATCH_MODES.find((m) => m === value.trim().toLowerCase());
  if (!mode) {
    throw new ParseError(
      `Invalid mode "${value}". Expected one of: ${DISPATCH_MODES.join(", ")}`
    );
  }
  return mode;
}

/**
 * Prompts on the terminal.
 */
export function createInteractiveDecisions(): DecisionPort {
  return {
    chooseMode: (summary) =>
      select({
        message: `${summary}\nHow do you want to proceed?`,
        choices: MODE_CHOICES.map((choice) => ({ ...choice })),
      }),

    ask: async (question, _option, defaultValue) =>
      (await input({ message: question, default: defaultValue })).trim(),

    choose: (question, _option, choices) =>
      select({
        message: question,
        choices: choices.map((choice) => ({ ...choice })),
      }),

    confirm: (question, _option, defaultValue = false) =>
      confirm({ message: question, default: defaultValue }),
  };
}

/**
 * Fails every question with the option that would have answered it.
 * Used when stdin is not a terminal (CI jobs, pipes).
 */
export function createNonInteractiveDecisions(): DecisionPort {
  const refuse = (option: string): never => {
    throw new ParseError(`No terminal to prompt on; pass ${option}`);
  };
  return {
    chooseMode: async () => refuse("--mode"),
    ask: async (_question, option) => refuse(option),
    choose: async (_question, option) => refuse(option),
    confirm: async (_question, option) => refuse(option),
  };
}
