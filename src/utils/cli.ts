/**
 * cli.ts - Executes gcloud and kubectl commands as subprocesses
 *
 * How it works:
 * 1. Takes a structured Command ({ program: "gcloud", args: [...] })
 * 2. Maps the logical program name to the configured executable
 * 3. Spawns it and returns the output, or the error output if it fails
 *
 * Arguments go to spawnSync as an array, never through /bin/sh; each element
 * reaches gcloud as exactly one argument. Calls are synchronous: lookups
 * and actions run one after another.
 *
 * OpenTelemetry instrumentation:
 * Each execution creates a CLIENT span named after the first two non-flag
 * arguments ("gcloud container node-pools", "kubectl get namespace") with
 * OTel semconv process.* attributes.
 */

import { spawnSync } from "child_process";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "../tracing";
import type { ReconcileConfig } from "../config";
import type { Command, CommandResult, CommandRunner } from "../engine/types";
import { renderCommand } from "./shell";

/**
 * Output patterns meaning "the thing you asked about does not exist".
 *
 * gcloud reports NOT_FOUND (HTTP 404) errors as "... was not found",
 * "NOT_FOUND: ..." or "code=404"; kubectl as "Error from server (NotFound): ...".
 * A bare "not found" is not enough: a missing binary or auth plugin says
 * the same thing.
 */
const NOT_FOUND_PATTERNS = [/NOT_FOUND/, /\bwas not found\b/, /\(NotFound\)/, /\bcode=404\b/];

/** IAM policies of large projects run well past spawnSync's 1 MiB default */
export const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Returns true when a failed lookup means absence rather than a real error.
 * Only failed results are considered; a successful empty output is not absence.
 */
export function isNotFound(result: CommandResult): boolean {
  return result.isError && NOT_FOUND_PATTERNS.some((p) => p.test(result.output));
}

/**
 * Builds a short span name from the command's leading positional words,
 * e.g. "gcloud compute instances" or "kubectl get sa".
 */
function spanName(command: Command): string {
  const words: string[] = [];
  for (const arg of command.args) {
    if (arg.startsWith("-") || words.length === 3) break;
    words.push(arg);
  }
  return [command.program, ...words].join(" ");
}

export interface ExecuteOptions {
  /** Kill the process after this many milliseconds; 0 or undefined for none */
  timeoutMs?: number;
  /** Executable paths for the logical program names */
  binaries?: Pick<ReconcileConfig, "gcloudBin" | "kubectlBin">;
}

function resolveBinary(program: string, options: ExecuteOptions): string {
  if (program === "gcloud") return options.binaries?.gcloudBin ?? "gcloud";
  if (program === "kubectl") return options.binaries?.kubectlBin ?? "kubectl";
  return program;
}

/**
 * Executes one command and returns a structured result.
 *
 * @returns output (stdout on success, stderr on failure) and isError from the exit code
 *
 * Example:
 *   executeCommand({ program: "gcloud", args: ["compute", "disks", "describe", "d1", "--format", "json"] })
 *   // Returns: { output: "{...}", isError: false }
 */
export function executeCommand(
  command: Command,
  options: ExecuteOptions = {}
): CommandResult {
  const tracer = getTracer();
  const display = renderCommand(command);
  const binary = resolveBinary(command.program, options);

  return tracer.startActiveSpan(
    spanName(command),
    { kind: SpanKind.CLIENT },
    (span) => {
      span.setAttribute("process.executable.name", command.program);
      span.setAttribute("process.command_args", [command.program, ...command.args]);

      try {
        const result = spawnSync(binary, [...command.args], {
          encoding: "utf-8",
          timeout: options.timeoutMs ? options.timeoutMs : undefined,
          maxBuffer: MAX_OUTPUT_BYTES,
        });

        // Spawn errors: executable missing, or killed by the timeout
        if (result.error) {
          span.setAttribute("process.exit.code", -1);
          span.setAttribute("error.type", result.error.name);
          span.recordException(result.error);
          span.setStatus({ code: SpanStatusCode.ERROR, message: result.error.message });
          return {
            output: `Error executing "${display}": ${result.error.message}`,
            isError: true,
          };
        }

        span.setAttribute("process.exit.code", result.status ?? -1);

        if (result.status !== 0) {
          const errorMessage =
            result.stderr ||
            (result.signal ? `terminated by ${result.signal}` : "Unknown error");
          span.setAttribute("error.type", "CommandError");
          span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage });
          return {
            output: `Error executing "${display}": ${errorMessage}`,
            isError: true,
          };
        }

        span.setStatus({ code: SpanStatusCode.OK });
        return { output: result.stdout, isError: false };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        span.setAttribute("process.exit.code", -1);
        span.recordException(error instanceof Error ? error : new Error(message));
        span.setStatus({ code: SpanStatusCode.ERROR, message });
        return { output: `Error executing "${display}": ${message}`, isError: true };
      } finally {
        span.end();
      }
    }
  );
}

/**
 * Binds executeCommand to a configuration, producing the CommandRunner the
 * state provider and dispatcher take.
 */
export function createCommandRunner(
  config: Pick<ReconcileConfig, "gcloudBin" | "kubectlBin">,
  timeoutMs: number
): CommandRunner {
  return (command) =>
    executeCommand(command, { timeoutMs, binaries: config });
}
