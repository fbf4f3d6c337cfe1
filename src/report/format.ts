/**
 * format.ts - Plain-text rendering of plans and dispatch results
 *
 * Pure functions returning strings; the caller decides where they go
 * (onProgress, stderr). No colours: output is meant to be pasted into
 * tickets and CI logs as-is.
 */

import { formatFieldValue } from "../engine/comparators";
import { describeIdentity } from "../engine/identity";
import type { DispatchResult } from "../engine/dispatcher";
import type { Action, FieldDelta, Plan } from "../engine/types";
import { renderCommand } from "../utils/shell";

/** "machineType: e2-medium -> e2-standard-4" */
export function formatDelta(delta: FieldDelta): string {
  return `${delta.field}: ${formatFieldValue(delta.current)} -> ${formatFieldValue(delta.desired)}`;
}

function formatAction(action: Action, index: number): string[] {
  return [`  ${index + 1}. ${action.description}`, `     $ ${renderCommand(action.command)}`];
}

/**
 * Summary of a plan: what differs, warnings, and the minimal actions.
 */
export function formatPlan(plan: Plan): string {
  const lines = [`Plan for ${describeIdentity(plan.identity)}`];

  const changed = plan.deltas.filter((delta) => delta.differs);
  if (changed.length === 0) {
    lines.push("  No differences.");
  } else {
    lines.push("Changes:");
    for (const delta of changed) lines.push(`  ${formatDelta(delta)}`);
  }

  for (const diagnostic of plan.diagnostics) {
    lines.push(`${diagnostic.severity === "warning" ? "Warning" : "Note"}: ${diagnostic.message}`);
  }

  if (plan.minimal.length > 0) {
    lines.push(`Minimal plan (${plan.minimal.length} action(s)):`);
    plan.minimal.forEach((action, i) => lines.push(...formatAction(action, i)));
  }
  lines.push(`Full plan: ${plan.full.length} action(s)`);

  return lines.join("\n");
}

/**
 * One-paragraph outcome of a dispatch.
 */
export function formatDispatchResult(result: DispatchResult): string {
  if (result.scriptPath) {
    return result.status === "no-op"
      ? `Script written with nothing to change: ${result.scriptPath}`
      : `Script written: ${result.scriptPath}\nReview it, then run: bash ${result.scriptPath}`;
  }

  switch (result.status) {
    case "no-op":
      return "Nothing to change; no action executed.";
    case "succeeded":
      return `Done: ${result.succeeded} action(s) succeeded.`;
    case "failed": {
      const lines = [
        `Failed: ${result.succeeded} succeeded, ${result.failed} failed, ${result.notAttempted} not attempted.`,
      ];
      for (const outcome of result.outcomes) {
        if (outcome.status === "not-attempted") {
          lines.push(`  not attempted: ${outcome.action.description}`);
        }
      }
      return lines.join("\n");
    }
  }
}
