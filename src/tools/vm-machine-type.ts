/**
 * vm-machine-type - Change a Compute Engine VM's machine type
 *
 * The VM must be stopped for set-machine-type, so the change is bracketed
 * by stop/start actions. Entering the current machine type yields an empty
 * minimal plan.
 */

import { z } from "zod";
import { buildPlan, type PlanSpec, type ToolDefinition } from "../engine";
import { parseInstanceUrl } from "../locator/console-url";
import { describeInstanceCommand } from "../state/commands";
import { lastSegment, type Instance } from "../state/schemas";
import { valueGuard } from "../utils/shell";
import { presetOrAsk, requireFound } from "./common";
import { instanceCommand, powerBracket, zonalRef } from "./compute";

export const vmMachineTypeInputSchema = z.object({
  url: z.string().min(1).describe("Cloud Console URL of the VM instance"),
  machineType: z
    .string()
    .optional()
    .describe("New machine type (e.g., e2-standard-4); prompted for when omitted"),
});

export type VmMachineTypeInput = z.infer<typeof vmMachineTypeInputSchema>;

export const vmMachineTypeDescription =
  "Change a VM's machine type (stop, set machine type, start)";

export interface VmMachineTypeDesired {
  machineType: string;
}

export const vmMachineTypeSpec: PlanSpec<Instance, VmMachineTypeDesired> = {
  fields: [
    {
      field: "machineType",
      comparator: "exact",
      current: (instance) => (instance ? lastSegment(instance.machineType) : undefined),
      desired: (desired) => desired.machineType,
      disruptive: true,
      action: (value, { identity }) => ({
        description: `Set machine type of ${identity.name} to ${value}`,
        command: instanceCommand("set-machine-type", zonalRef(identity), [
          "--machine-type",
          String(value),
        ]),
        guard: valueGuard(
          describeInstanceCommand(zonalRef(identity), "value(machineType.basename())"),
          "=",
          String(value)
        ),
      }),
    },
  ],
  bracket: powerBracket((instance: Instance | undefined) => instance?.status),
};

/**
 * `vm-machine-type <url>`: stop, set the machine type, start.
 *
 * The stop/start bracket wraps the change only when the type differs. The
 * minimal plan skips the stop for a VM that is already TERMINATED.
 */
export const vmMachineTypeTool: ToolDefinition<VmMachineTypeInput, Instance, VmMachineTypeDesired> = {
  name: "vm-machine-type",

  locate: (input) => parseInstanceUrl(input.url),

  fetch: (_input, identity, { state }) =>
    requireFound(
      state.describeInstance(zonalRef(identity)),
      `VM ${identity.name} not found in zone ${identity.location} of project ${identity.project}`
    ),

  describe: (instance) => [
    `  Status       : ${instance.status}`,
    `  Machine type : ${lastSegment(instance.machineType)}`,
  ],

  resolve: async (input, _identity, instance, services) => {
    const machineType = await presetOrAsk(
      services,
      input.machineType,
      `New machine type (current: ${lastSegment(instance.machineType)})`,
      "--machine-type"
    );
    return machineType === undefined ? undefined : { machineType };
  },

  plan: (identity, instance, desired) => buildPlan(identity, instance, desired, vmMachineTypeSpec),
};
