/**
 * dispatcher.ts - Carries out a plan in one of three modes
 *
 * - execute: run plan.minimal in order, stop at the first failure
 * - emit-minimal: write plan.minimal as a script, run nothing
 * - emit-full: write plan.full as a guarded, re-runnable script, run nothing
 *
 * Execution never retries and never rolls back. When an action fails, the
 * result says exactly which ones completed, which one failed and which were
 * never attempted, so the operator can finish by hand or re-plan.
 */

import { chmodSync, mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { ActionExecutionError } from "../errors";
import { renderCommand } from "../utils/shell";
import { renderScript, scriptFileName } from "./script";
import type {
  ActionOutcome,
  CommandRunner,
  DispatchMode,
  Plan,
  PlanScope,
} from "./types";

export type DispatchStatus = "succeeded" | "failed" | "no-op";

/** no-op: the scope had no actions, so nothing ran or was written */
export interface DispatchResult {
  mode: DispatchMode;
  status: DispatchStatus;
  /** One entry per minimal action in execute mode; empty when emitting */
  outcomes: ActionOutcome[];
  succeeded: number;
  failed: number;
  notAttempted: number;
  /** Absolute path of the written script (emit modes) */
  scriptPath?: string;
  /** The failing action's error; later actions were not attempted */
  error?: ActionExecutionError;
}

export interface DispatchOptions {
  /** Runs one action in execute mode */
  run: CommandRunner;
  /** Directory emitted scripts are written to; created when missing */
  outputDir: string;
  /** Progress callback (default: console.log) */
  onProgress?: (message: string) => void;
}

// ---------------------------------------------------------------------------
// Execute
// ---------------------------------------------------------------------------

function executePlan(
  plan: Plan,
  options: DispatchOptions,
  onProgress: (message: string) => void
): DispatchResult {
  const actions = plan.minimal;

  if (actions.length === 0) {
    onProgress("Nothing to change.");
    return {
      mode: "execute",
      status: "no-op",
      outcomes: [],
      succeeded: 0,
      failed: 0,
      notAttempted: 0,
    };
  }

  const outcomes: ActionOutcome[] = [];

  for (let i = 0; i < actions.length; i++) {
    const action = actions[i];
    onProgress(`[${i + 1}/${actions.length}] ${action.description}`);
    onProgress(`  $ ${renderCommand(action.command)}`);

    const result = options.run(action.command);

    if (result.isError) {
      outcomes.push({ action, status: "failed", output: result.output });
      const remaining = actions.slice(i + 1);
      for (const skipped of remaining) {
        outcomes.push({ action: skipped, status: "not-attempted" });
      }
      return {
        mode: "execute",
        status: "failed",
        outcomes,
        succeeded: i,
        failed: 1,
        notAttempted: remaining.length,
        error: new ActionExecutionError(action.description, result.output, i, remaining.length),
      };
    }

    outcomes.push({ action, status: "succeeded", output: result.output });
  }

  return {
    mode: "execute",
    status: "succeeded",
    outcomes,
    succeeded: actions.length,
    failed: 0,
    notAttempted: 0,
  };
}

// ---------------------------------------------------------------------------
// Emit
// ---------------------------------------------------------------------------

function emitScript(
  plan: Plan,
  mode: "emit-minimal" | "emit-full",
  options: DispatchOptions,
  onProgress: (message: string) => void
): DispatchResult {
  const scope: PlanScope = mode === "emit-minimal" ? "minimal" : "full";
  const actions = scope === "minimal" ? plan.minimal : plan.full;

  mkdirSync(options.outputDir, { recursive: true });
  const scriptPath = join(options.outputDir, scriptFileName(plan.identity, scope));
  writeFileSync(scriptPath, renderScript(plan, scope), "utf-8");
  // writeFileSync's mode is masked by the umask; chmod is not
  chmodSync(scriptPath, 0o755);

  onProgress(`Wrote ${scriptPath} (${actions.length} action(s))`);

  return {
    mode,
    status: actions.length === 0 ? "no-op" : "succeeded",
    outcomes: [],
    succeeded: 0,
    failed: 0,
    notAttempted: 0,
    scriptPath,
  };
}

/**
 * Dispatches a plan.
 *
 * Never throws for a failed action: the failure is reported in the result
 * (status "failed", `error` set) so the caller can print the partial
 * progress. File system errors while emitting do propagate.
 */
export async function dispatch(
  plan: Plan,
  mode: DispatchMode,
  options: DispatchOptions
): Promise<DispatchResult> {
  const onProgress =
    options.onProgress ?? ((msg: string) => console.log(msg)); // eslint-disable-line no-console

  switch (mode) {
    case "execute":
      return executePlan(plan, options, onProgress);
    case "emit-minimal":
    case "emit-full":
      return emitScript(plan, mode, options, onProgress);
  }
}
