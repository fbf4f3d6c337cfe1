/**
 * script.ts - Serializes a plan into a re-runnable bash script
 *
 * Layout:
 *   #!/usr/bin/env bash
 *   set -euo pipefail
 *   # header: resource, mode, action count
 *   # WARNING/NOTE lines for each diagnostic
 *   # <description>
 *   <command>            (minimal)
 *   <guard> || <command> (full: satisfied steps are skipped)
 */

import { describeIdentity } from "./identity";
import type { Action, Diagnostic, Plan, PlanScope, ResourceIdentity } from "./types";
import { renderCommand, renderGuarded } from "../utils/shell";

const SCOPE_NOTES: Record<PlanScope, string> = {
  minimal: "only the changes needed against the state read at generation time",
  full: "every tracked field; guarded steps are skipped when already satisfied",
};

/**
 * `pool-b-apply-minimal.sh`. Characters outside [A-Za-z0-9._-] (the ":" and
 * "@" of an IAM principal) become "-".
 */
export function scriptFileName(identity: ResourceIdentity, scope: PlanScope): string {
  const base = identity.name.replace(/[^A-Za-z0-9._-]+/g, "-");
  return `${base}-apply-${scope}.sh`;
}

function diagnosticLine(diagnostic: Diagnostic): string {
  const label = diagnostic.severity === "warning" ? "WARNING" : "NOTE";
  return `# ${label}: ${diagnostic.message.replace(/\n/g, " ")}`;
}

function actionLines(action: Action, scope: PlanScope): string[] {
  const command =
    scope === "full"
      ? renderGuarded(action.command, action.guard)
      : renderCommand(action.command);
  return [`# ${action.description}`, command];
}

/**
 * Renders the script text for one scope of a plan.
 */
export function renderScript(plan: Plan, scope: PlanScope): string {
  const actions = scope === "minimal" ? plan.minimal : plan.full;

  const lines = [
    "#!/usr/bin/env bash",
    "set -euo pipefail",
    "",
    `# gcp-reconcile: ${describeIdentity(plan.identity)}`,
    `# Mode: emit-${scope} (${SCOPE_NOTES[scope]})`,
    `# Actions: ${actions.length}`,
  ];

  if (plan.diagnostics.length > 0) {
    lines.push("#", ...plan.diagnostics.map(diagnosticLine));
  }

  if (actions.length === 0) {
    lines.push("", "# Nothing to change: current state already matches the desired state.");
  }

  for (const action of actions) {
    lines.push("", ...actionLines(action, scope));
  }

  return lines.join("\n") + "\n";
}
