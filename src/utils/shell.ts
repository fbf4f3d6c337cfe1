/**
 * shell.ts - Renders structured commands as shell text
 *
 * Commands are executed as argument arrays (no shell involved), but the
 * emitted scripts and the plan report need them as text. shell-quote escapes
 * each argument so the script passes exactly the same argv to gcloud that
 * execute mode would.
 */

import { quote } from "shell-quote";
import type { Command } from "../engine/types";

/** `gcloud compute disks resize data-1 --size 200GB ...` */
export function renderCommand(command: Command): string {
  return quote([command.program, ...command.args]);
}

/**
 * Renders a command that only runs when its guard fails:
 * `guard >/dev/null 2>&1 || command`.
 */
export function renderGuarded(command: Command, guard?: Command): string {
  if (!guard) return renderCommand(command);
  return `${renderCommand(guard)} >/dev/null 2>&1 || ${renderCommand(command)}`;
}

/**
 * Quotes one word for embedding in a string that is quoted again as a
 * whole. Single quotes only: shell-quote's single-quoted form doubles
 * backslashes, so nested text must not contain any.
 */
function embedWord(word: string): string {
  return /^[\w@%+=:,./-]+$/.test(word) ? word : `'${word.replace(/'/g, `'"'"'`)}'`;
}

/**
 * A guard that compares one field of a `gcloud ... describe` against an
 * expected value, e.g. "machine type is already e2-standard-4".
 *
 * Produces `bash -c 'test "$(<describe>)" <operator> <expected>'`.
 */
export function valueGuard(
  describe: Command,
  operator: "=" | "-ge",
  expected: string
): Command {
  const probe = [describe.program, ...describe.args].map(embedWord).join(" ");
  return {
    program: "bash",
    args: ["-c", `test "$(${probe})" ${operator} ${embedWord(expected)}`],
  };
}
