/**
 * nodepool-update - Update an existing GKE node pool in place
 *
 * Machine type, disk type, disk size, resource labels, taints and
 * autoscaling bounds. Each changed field becomes its own
 * `gcloud container node-pools update` call, since gcloud accepts only one
 * kind of change per update.
 */

import { z } from "zod";
import { ValidationError } from "../errors";
import {
  buildPlan,
  formatLabels,
  formatTaint,
  normalizeSet,
  normalizeTaintString,
  splitList,
  withoutReservedLabels,
  type ActionTemplate,
  type Command,
  type FieldValue,
  type PlanSpec,
  type ResourceIdentity,
  type ToolDefinition,
} from "../engine";
import { parseNodePoolUrl } from "../locator/console-url";
import { describeNodePoolCommand } from "../state/commands";
import type { NodePool } from "../state/schemas";
import { valueGuard } from "../utils/shell";
import { presetOrAsk, requireFound } from "./common";
import { nodePoolCommand, nodePoolRef, toList } from "./gke";

export const nodePoolUpdateInputSchema = z.object({
  url: z.string().min(1).describe("Cloud Console URL of the node pool"),
  machineType: z.string().optional().describe("New machine type"),
  diskType: z.string().optional().describe("New boot disk type (pd-standard, pd-balanced, pd-ssd)"),
  diskSize: z.string().optional().describe("New boot disk size in GB; must be larger than the current size"),
  labels: z.string().optional().describe("Resource labels as key=value,key=value; replaces the current set"),
  taints: z.string().optional().describe("Node taints as key=value:Effect,...; replaces the current set"),
  minNodes: z.string().optional().describe("Autoscaling minimum node count"),
  maxNodes: z.string().optional().describe("Autoscaling maximum node count"),
});

export type NodePoolUpdateInput = z.infer<typeof nodePoolUpdateInputSchema>;

export const nodePoolUpdateDescription =
  "Update a node pool's machine type, disk, labels, taints or autoscaling bounds";

/** Undefined fields keep their current value */
export interface NodePoolUpdateDesired {
  machineType?: string;
  diskType?: string;
  diskSizeGb?: string;
  labels?: string[];
  taints?: string[];
  /** "<min>..<max>" */
  autoscaling?: string;
}

function currentAutoscaling(pool: NodePool): string | undefined {
  const { autoscaling } = pool;
  if (!autoscaling?.enabled) return undefined;
  return `${autoscaling.minNodeCount ?? 0}..${autoscaling.maxNodeCount ?? 0}`;
}

function updateAction(
  identity: ResourceIdentity,
  description: string,
  flags: readonly string[],
  guard?: Command
): ActionTemplate {
  return {
    description,
    command: nodePoolCommand("update", nodePoolRef(identity), flags),
    ...(guard ? { guard } : {}),
  };
}

function describeField(identity: ResourceIdentity, projection: string): Command {
  return describeNodePoolCommand(nodePoolRef(identity), `value(${projection})`);
}

/** Update flags replace the whole set; an empty value clears it */
function replaceFlag(flag: string, value: FieldValue): string[] {
  return [flag, toList(value).join(",")];
}

function bounds(value: FieldValue | undefined): [number, number] | undefined {
  if (typeof value !== "string") return undefined;
  const [min, max] = value.split("..").map(Number);
  return [min, max];
}

/**
 * In-place updates of an existing pool. Each changed field is its own
 * `node-pools update` call; autoscaling bounds are checked before any
 * action is built.
 */
export const nodePoolUpdateSpec: PlanSpec<NodePool, NodePoolUpdateDesired> = {
  fields: [
    {
      field: "machineType",
      comparator: "exact",
      current: (pool) => pool?.config.machineType,
      desired: (d) => d.machineType,
      action: (value, { identity }) =>
        updateAction(
          identity,
          `Set machine type of ${identity.name} to ${value}`,
          ["--machine-type", String(value)],
          valueGuard(describeField(identity, "config.machineType"), "=", String(value))
        ),
    },
    {
      field: "diskType",
      comparator: "exact",
      current: (pool) => pool?.config.diskType,
      desired: (d) => d.diskType,
      action: (value, { identity }) =>
        updateAction(
          identity,
          `Set disk type of ${identity.name} to ${value}`,
          ["--disk-type", String(value)],
          valueGuard(describeField(identity, "config.diskType"), "=", String(value))
        ),
    },
    {
      field: "diskSizeGb",
      comparator: "grow",
      current: (pool) => pool?.config.diskSizeGb,
      desired: (d) => d.diskSizeGb,
      action: (value, { identity }) =>
        updateAction(
          identity,
          `Grow boot disk of ${identity.name} to ${value}GB`,
          ["--disk-size", `${value}GB`],
          valueGuard(describeField(identity, "config.diskSizeGb"), "-ge", String(value))
        ),
    },
    {
      field: "labels",
      comparator: "set",
      current: (pool) => (pool ? formatLabels(pool.config.resourceLabels ?? {}) : undefined),
      desired: (d) => d.labels,
      action: (value, { identity }) =>
        updateAction(identity, `Set resource labels of ${identity.name}`, replaceFlag("--labels", value)),
    },
    {
      field: "taints",
      comparator: "set",
      current: (pool) => (pool ? (pool.config.taints ?? []).map(formatTaint) : undefined),
      desired: (d) => d.taints,
      action: (value, { identity }) =>
        updateAction(identity, `Set node taints of ${identity.name}`, replaceFlag("--node-taints", value)),
    },
    {
      field: "autoscaling",
      comparator: "exact",
      current: (pool) => (pool ? currentAutoscaling(pool) : undefined),
      desired: (d) => d.autoscaling,
      action: (value, { identity }) => {
        const [min, max] = String(value).split("..");
        return updateAction(identity, `Set autoscaling of ${identity.name} to ${min}-${max} nodes`, [
          "--enable-autoscaling",
          "--min-nodes", min,
          "--max-nodes", max,
        ]);
      },
    },
  ],
  validate: (deltas) => {
    const autoscaling = deltas.find((delta) => delta.field === "autoscaling");
    const range = bounds(autoscaling?.desired);
    if (!range) return;
    const [min, max] = range;
    if (!Number.isInteger(min) || !Number.isInteger(max) || min < 0 || max < 1) {
      throw new ValidationError(`Invalid autoscaling bounds ${String(autoscaling?.desired)}: expected whole numbers`);
    }
    if (min > max) {
      throw new ValidationError(`Autoscaling minimum (${min}) is greater than the maximum (${max})`);
    }
  },
};

/**
 * Options to desired state. Labels and taints are normalized so that input
 * in either taint-effect style, or with reserved labels, compares equal to
 * the provider's form.
 */
export function updateDesiredFromInput(
  input: NodePoolUpdateInput,
  pool: NodePool
): NodePoolUpdateDesired {
  const desired: NodePoolUpdateDesired = {};
  if (input.machineType?.trim()) desired.machineType = input.machineType.trim();
  if (input.diskType?.trim()) desired.diskType = input.diskType.trim();
  if (input.diskSize?.trim()) desired.diskSizeGb = input.diskSize.trim();
  if (input.labels !== undefined) {
    desired.labels = normalizeSet(withoutReservedLabels(splitList(input.labels)));
  }
  if (input.taints !== undefined) {
    desired.taints = normalizeSet(splitList(input.taints).map(normalizeTaintString));
  }
  if (input.minNodes !== undefined || input.maxNodes !== undefined) {
    const min = input.minNodes?.trim() || String(pool.autoscaling?.minNodeCount ?? 0);
    const max = input.maxNodes?.trim() || String(pool.autoscaling?.maxNodeCount ?? 0);
    desired.autoscaling = `${min}..${max}`;
  }
  return desired;
}

/**
 * `nodepool-update <url>`: machine type, disk, labels, taints and
 * autoscaling of an existing node pool. With no option given, asks for the
 * machine type only.
 */
export const nodePoolUpdateTool: ToolDefinition<NodePoolUpdateInput, NodePool, NodePoolUpdateDesired> = {
  name: "nodepool-update",

  locate: (input) => parseNodePoolUrl(input.url),

  fetch: (_input, identity, { state }) =>
    requireFound(
      state.describeNodePool(nodePoolRef(identity)),
      `Node pool ${identity.name} not found in cluster ${identity.parent}`
    ),

  describe: (pool) => [
    `  Machine type : ${pool.config.machineType ?? "(default)"}`,
    `  Disk         : ${pool.config.diskSizeGb ?? "?"}GB ${pool.config.diskType ?? ""}`.trimEnd(),
    `  Labels       : ${formatLabels(pool.config.resourceLabels ?? {}).join(",") || "(none)"}`,
    `  Taints       : ${(pool.config.taints ?? []).map(formatTaint).join(",") || "(none)"}`,
    `  Autoscaling  : ${currentAutoscaling(pool) ?? "off"}`,
  ],

  resolve: async (input, _identity, pool, services) => {
    const desired = updateDesiredFromInput(input, pool);
    if (Object.keys(desired).length > 0) return desired;

    // No option given: the interactive path asks for the machine type
    const machineType = await presetOrAsk(
      services,
      undefined,
      `New machine type (current: ${pool.config.machineType ?? "default"})`,
      "--machine-type"
    );
    return machineType === undefined ? undefined : { machineType };
  },

  plan: (identity, pool, desired) => buildPlan(identity, pool, desired, nodePoolUpdateSpec),
};
