/**
 * runner.ts - Drives one tool invocation from input to outcome
 *
 * Every subcommand goes through the same phases:
 *
 *   PARSED → STATE_FETCHED → PLANNED → EXECUTED | SCRIPT_EMITTED → DONE
 *
 * FAILED is entered from any phase on a ReconcileError (parse, fetch,
 * validation or a failed action). ABORTED is entered when the operator
 * leaves a required value empty: nothing is executed or written, exit 0.
 *
 * Tools only describe their resource (ToolDefinition); the runner owns the
 * sequencing, the mode decision and the reporting.
 */

import { ReconcileError } from "../errors";
import type { DecisionPort } from "../decision";
import { formatDispatchResult, formatPlan } from "../report/format";
import type { StateProvider } from "../state/provider";
import { dispatch, type DispatchResult } from "./dispatcher";
import { describeIdentity } from "./identity";
import type { CommandRunner, DispatchMode, Plan, ResourceIdentity } from "./types";

export type RunPhase =
  | "PARSED"
  | "STATE_FETCHED"
  | "PLANNED"
  | "EXECUTED"
  | "SCRIPT_EMITTED"
  | "DONE"
  | "FAILED"
  | "ABORTED";

/** What a tool gets to work with besides its own input */
export interface ToolServices {
  state: StateProvider;
  decisions: DecisionPort;
  onProgress: (message: string) => void;
}

/**
 * One subcommand. Generic over the CLI input, the current-state snapshot
 * the tool fetches, and the desired state it resolves.
 */
export interface ToolDefinition<TInput, TSnapshot, TDesired> {
  readonly name: string;
  /**
   * Builds the identity from operator input. Runs before any external call.
   * @throws ParseError
   */
  locate(input: TInput): ResourceIdentity;
  /** @throws StateFetchError */
  fetch(input: TInput, identity: ResourceIdentity, services: ToolServices): TSnapshot;
  /** Lines shown to the operator before any question is asked */
  describe?(snapshot: TSnapshot): string[];
  /**
   * Desired state from CLI options, prompting for whatever is missing.
   * Resolves to undefined when the operator left a required value empty.
   */
  resolve(
    input: TInput,
    identity: ResourceIdentity,
    snapshot: TSnapshot,
    services: ToolServices
  ): Promise<TDesired | undefined>;
  /**
   * Builds the plan. The plan's identity may be more specific than the
   * located one (the clone target, the selected disk, the target project).
   * @throws ValidationError / InvalidResizeError / StateFetchError
   */
  plan(
    identity: ResourceIdentity,
    snapshot: TSnapshot,
    desired: TDesired,
    services: ToolServices
  ): Plan;
}

export interface RunOptions {
  state: StateProvider;
  decisions: DecisionPort;
  /** Runs actions in execute mode (lookups go through `state`) */
  execute: CommandRunner;
  outputDir: string;
  /** Preset mode; prompted for when omitted */
  mode?: DispatchMode;
  /** Stop after PLANNED */
  dryRun?: boolean;
  onProgress?: (message: string) => void;
}

/**
 * What one run of a tool ended with. `plan` is set once PLANNED was
 * reached, `result` once the plan was executed or emitted.
 */
export interface RunOutcome {
  /** Terminal phase: DONE, FAILED or ABORTED */
  phase: RunPhase;
  /** Every phase entered, in order */
  history: RunPhase[];
  exitCode: number;
  plan?: Plan;
  result?: DispatchResult;
  error?: ReconcileError;
}

/**
 * Runs a tool through the state machine.
 *
 * ReconcileErrors end the run in FAILED and are returned, not thrown; any
 * other error is a bug and propagates.
 */
export async function runTool<TInput, TSnapshot, TDesired>(
  tool: ToolDefinition<TInput, TSnapshot, TDesired>,
  input: TInput,
  options: RunOptions
): Promise<RunOutcome> {
  const onProgress =
    options.onProgress ?? ((msg: string) => console.log(msg)); // eslint-disable-line no-console
  const services: ToolServices = {
    state: options.state,
    decisions: options.decisions,
    onProgress,
  };
  const history: RunPhase[] = [];
  let plan: Plan | undefined;

  const finish = (phase: RunPhase, exitCode: number, extra: Partial<RunOutcome> = {}): RunOutcome => {
    history.push(phase);
    return { phase, history, exitCode, ...(plan ? { plan } : {}), ...extra };
  };

  try {
    const identity = tool.locate(input);
    history.push("PARSED");
    onProgress(`Resource: ${describeIdentity(identity)}`);

    const snapshot = tool.fetch(input, identity, services);
    history.push("STATE_FETCHED");
    for (const line of tool.describe?.(snapshot) ?? []) onProgress(line);

    const desired = await tool.resolve(input, identity, snapshot, services);
    if (desired === undefined) {
      onProgress("No value entered. Exiting without executing or writing anything.");
      return finish("ABORTED", 0);
    }

    plan = tool.plan(identity, snapshot, desired, services);
    history.push("PLANNED");
    onProgress(formatPlan(plan));

    if (options.dryRun) {
      onProgress("Dry run: nothing executed or written.");
      return finish("DONE", 0);
    }

    const mode =
      options.mode ??
      (await options.decisions.chooseMode(
        `${plan.minimal.length} change(s) needed, ${plan.full.length} action(s) in a full rebuild.`
      ));

    const result = await dispatch(plan, mode, {
      run: options.execute,
      outputDir: options.outputDir,
      onProgress,
    });
    history.push(mode === "execute" ? "EXECUTED" : "SCRIPT_EMITTED");
    onProgress(formatDispatchResult(result));

    if (result.error) {
      return finish("FAILED", result.error.exitCode, { result, error: result.error });
    }
    return finish("DONE", 0, { result });
  } catch (error) {
    if (error instanceof ReconcileError) {
      return finish("FAILED", error.exitCode, { error });
    }
    throw error;
  }
}
