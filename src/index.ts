#!/usr/bin/env node
/**
 * index.ts - CLI entry point for gcp-reconcile
 *
 * One subcommand per tool. Each one reads current state through gcloud or
 * kubectl, prints the plan, and then, depending on --mode (or the answer
 * to the mode prompt):
 *
 *   execute       run the minimal plan now, stopping at the first failure
 *   emit-minimal  write only the needed changes to <resource>-apply-minimal.sh
 *   emit-full     write every tracked field, guarded, to <resource>-apply-full.sh
 *
 * Every prompt has an option, so a run can be fully non-interactive:
 *   gcp-reconcile vm-machine-type <url> --machine-type e2-standard-4 --mode emit-full
 *
 * Exit codes: 0 for success, no-op, abort or script written; 1 for parse,
 * state fetch, validation or execution failures.
 */

// Tracing registers its provider at import time; it must load first
import "./tracing";

import { Command, type OptionValues } from "commander";
import type { z } from "zod";
import { loadConfig } from "./config";
import {
  createInteractiveDecisions,
  createNonInteractiveDecisions,
  parseMode,
} from "./decision";
import { runTool, type DispatchMode, type RunOutcome, type ToolDefinition } from "./engine";
import { ReconcileError } from "./errors";
import { CliStateProvider } from "./state/provider";
import {
  diskExpandDescription,
  diskExpandInputSchema,
  diskExpandTool,
  iamApplyDescription,
  iamApplyInputSchema,
  iamApplyTool,
  iamReplicateDescription,
  iamReplicateInputSchema,
  iamReplicateTool,
  nodePoolCloneDescription,
  nodePoolCloneInputSchema,
  nodePoolCloneTool,
  nodePoolUpdateDescription,
  nodePoolUpdateInputSchema,
  nodePoolUpdateTool,
  parseToolInput,
  vmMachineTypeDescription,
  vmMachineTypeInputSchema,
  vmMachineTypeTool,
  vmServiceAccountDescription,
  vmServiceAccountInputSchema,
  vmServiceAccountTool,
  workloadIdentityDescription,
  workloadIdentityInputSchema,
  workloadIdentityTool,
} from "./tools";
import { shutdownTracing } from "./tracing";
import { withCommandTracing } from "./tracing/command-tracing";
import { createCommandRunner } from "./utils/cli";

// ---------------------------------------------------------------------------
// Shared subcommand handling
// ---------------------------------------------------------------------------

/** What every subcommand hands to the runner, before validation */
interface SubcommandRequest {
  input: unknown;
  mode?: string;
  dryRun?: boolean;
  outputDir?: string;
}

/**
 * Validates the request, wires the real gcloud/kubectl runners and runs the
 * tool. Parse errors raised here (bad --mode, invalid options) end the run
 * the same way as errors inside the tool: FAILED, exit 1.
 */
async function runSubcommand<TInput, TSnapshot, TDesired>(
  tool: ToolDefinition<TInput, TSnapshot, TDesired>,
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>,
  request: SubcommandRequest
): Promise<RunOutcome> {
  const config = loadConfig();

  let input: TInput;
  let mode: DispatchMode | undefined;
  try {
    input = parseToolInput(schema, request.input);
    mode = request.mode === undefined ? undefined : parseMode(request.mode);
  } catch (error) {
    if (error instanceof ReconcileError) {
      return { phase: "FAILED", history: ["FAILED"], exitCode: error.exitCode, error };
    }
    throw error;
  }

  return runTool(tool, input, {
    state: new CliStateProvider(createCommandRunner(config, config.readTimeoutMs)),
    decisions: process.stdin.isTTY ? createInteractiveDecisions() : createNonInteractiveDecisions(),
    execute: createCommandRunner(config, config.actionTimeoutMs),
    outputDir: request.outputDir ?? config.outputDir,
    mode,
    dryRun: request.dryRun,
  });
}

/**
 * Registers a subcommand with the options every tool shares.
 *
 * @param toInput - maps positional arguments and options to the raw tool input
 */
function addToolCommand<TInput, TSnapshot, TDesired>(
  program: Command,
  usage: string,
  description: string,
  tool: ToolDefinition<TInput, TSnapshot, TDesired>,
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>,
  toInput: (args: string[], options: OptionValues) => unknown
): Command {
  const command = program.command(usage).description(description);

  const handler = withCommandTracing(tool.name, (request: SubcommandRequest) =>
    runSubcommand(tool, schema, request)
  );

  command
    .option("--mode <mode>", "execute, emit-minimal or emit-full (prompted for when omitted)")
    .option("--dry-run", "Print the plan and stop; nothing is executed or written")
    .option("--output-dir <dir>", "Directory for emitted scripts (default: GCP_RECONCILE_OUTPUT_DIR or cwd)")
    .action(async () => {
      const options = command.opts();
      const outcome = await handler({
        input: toInput(command.args, options),
        mode: options.mode,
        dryRun: options.dryRun,
        outputDir: options.outputDir,
      });

      if (outcome.error) {
        console.error(`Error: ${outcome.error.message}`);
      }
      process.exitCode = outcome.exitCode;
    });

  return command;
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

async function main() {
  const program = new Command();

  program
    .name("gcp-reconcile")
    .description(
      "Plan GCP lifecycle changes against current state, then execute them or write them as re-runnable scripts"
    )
    .version("0.1.0");

  addToolCommand(
    program,
    "nodepool-clone <url>",
    nodePoolCloneDescription,
    nodePoolCloneTool,
    nodePoolCloneInputSchema,
    ([url], options) => ({ url, name: options.name })
  ).option("--name <name>", "Name of the new node pool");

  addToolCommand(
    program,
    "nodepool-update <url>",
    nodePoolUpdateDescription,
    nodePoolUpdateTool,
    nodePoolUpdateInputSchema,
    ([url], options) => ({
      url,
      machineType: options.machineType,
      diskType: options.diskType,
      diskSize: options.diskSize,
      labels: options.labels,
      taints: options.taints,
      minNodes: options.minNodes,
      maxNodes: options.maxNodes,
    })
  )
    .option("--machine-type <type>", "New machine type")
    .option("--disk-type <type>", "New boot disk type")
    .option("--disk-size <gb>", "New boot disk size in GB (grow only)")
    .option("--labels <labels>", "Resource labels, key=value,... (replaces the current set)")
    .option("--taints <taints>", "Node taints, key=value:Effect,... (replaces the current set)")
    .option("--min-nodes <n>", "Autoscaling minimum")
    .option("--max-nodes <n>", "Autoscaling maximum");

  addToolCommand(
    program,
    "workload-identity <binding>",
    workloadIdentityDescription,
    workloadIdentityTool,
    workloadIdentityInputSchema,
    ([binding]) => ({ binding })
  );

  addToolCommand(
    program,
    "vm-machine-type <url>",
    vmMachineTypeDescription,
    vmMachineTypeTool,
    vmMachineTypeInputSchema,
    ([url], options) => ({ url, machineType: options.machineType })
  ).option("--machine-type <type>", "New machine type");

  addToolCommand(
    program,
    "vm-service-account <url>",
    vmServiceAccountDescription,
    vmServiceAccountTool,
    vmServiceAccountInputSchema,
    ([url], options) => ({ url, serviceAccount: options.serviceAccount, create: options.create })
  )
    .option("--service-account <email>", "Service account email")
    .option("--create", "Create the service account when it does not exist")
    .option("--no-create", "Fail instead of creating a missing service account");

  addToolCommand(
    program,
    "disk-expand <url>",
    diskExpandDescription,
    diskExpandTool,
    diskExpandInputSchema,
    ([url], options) => ({
      url,
      disk: options.disk,
      size: options.size,
      expandFilesystem: options.expandFilesystem,
    })
  )
    .option("--disk <name-or-index>", "Disk to grow, when the VM has several")
    .option("--size <gb>", "New size in GB")
    .option("--expand-filesystem", "Grow the partition and filesystem inside the VM")
    .option("--no-expand-filesystem", "Resize the disk only");

  addToolCommand(
    program,
    "iam-replicate <project> <principal>",
    iamReplicateDescription,
    iamReplicateTool,
    iamReplicateInputSchema,
    ([project, principal], options) => ({
      project,
      principal,
      targetPrincipal: options.targetPrincipal,
      targetProject: options.targetProject,
    })
  )
    .option("--target-principal <principal>", "Replicate to this principal in the same project")
    .option("--target-project <project>", "Replicate to the same principal in this project");

  addToolCommand(
    program,
    "iam-apply <member>",
    iamApplyDescription,
    iamApplyTool,
    iamApplyInputSchema,
    ([member], options) => ({ member, roles: options.roles, projects: options.projects })
  )
    .option("--roles <file>", "Roles list file", "roles.txt")
    .option("--projects <file>", "Projects list file", "projects.txt");

  await program.parseAsync(process.argv);
  await shutdownTracing();
}

main().catch((error: unknown) => {
  console.error("Error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
