/**
 * compute.ts - Compute Engine commands shared by the VM tools
 *
 * Changing a VM's machine type or service account requires it to be
 * stopped. Both tools declare the stop/start pair as their PlanSpec bracket
 * so the builder wraps it around the disruptive change.
 */

import type { ActionContext, ActionTemplate, Command, ResourceIdentity } from "../engine";
import type { ZonalRef } from "../state/commands";

export function zonalRef(identity: ResourceIdentity): ZonalRef {
  return { project: identity.project, zone: identity.location, name: identity.name };
}

/** `gcloud compute instances <verb> <vm> --zone <zone> --project <project> [...extra]` */
export function instanceCommand(
  verb: string,
  ref: ZonalRef,
  extra: readonly string[] = []
): Command {
  return {
    program: "gcloud",
    args: ["compute", "instances", verb, ref.name, "--zone", ref.zone, "--project", ref.project, ...extra],
  };
}

/**
 * Stop before, start after. The minimal plan skips the stop when the VM
 * was already TERMINATED at planning time; the full script always stops,
 * since it may run against a VM in any state.
 */
export function powerBracket<S>(status: (state: S | undefined) => string | undefined) {
  return {
    before: (context: ActionContext<S>): ActionTemplate[] => {
      if (context.scope === "minimal" && status(context.current) === "TERMINATED") return [];
      return [
        {
          description: `Stop VM ${context.identity.name}`,
          command: instanceCommand("stop", zonalRef(context.identity)),
        },
      ];
    },
    after: (context: ActionContext<S>): ActionTemplate[] => [
      {
        description: `Start VM ${context.identity.name}`,
        command: instanceCommand("start", zonalRef(context.identity)),
      },
    ],
  };
}
