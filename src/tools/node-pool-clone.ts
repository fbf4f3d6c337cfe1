/**
 * nodepool-clone - Clone a GKE node pool under a new name
 *
 * Every cloneable attribute of the source pool goes into a single
 * `gcloud container node-pools create` command. The node version is the
 * cluster's current master version, not the source pool's; only when the
 * cluster cannot be read does it fall back to the pool's own version, with
 * a warning.
 */

import { z } from "zod";
import { ParseError, StateFetchError, ValidationError } from "../errors";
import {
  buildPlan,
  createIdentity,
  formatLabels,
  formatTaint,
  type Diagnostic,
  type FieldDescriptor,
  type PlanSpec,
  type ToolDefinition,
} from "../engine";
import { parseNodePoolUrl } from "../locator/console-url";
import { describeNodePoolCommand } from "../state/commands";
import type { NodePool } from "../state/schemas";
import { presetOrAsk, requireFound } from "./common";
import { listFlag, NODE_POOL_NAME, nodePoolCommand, nodePoolRef } from "./gke";

export const nodePoolCloneInputSchema = z.object({
  url: z.string().min(1).describe("Cloud Console URL of the source node pool"),
  name: z.string().optional().describe("Name of the new node pool; prompted for when omitted"),
});

export type NodePoolCloneInput = z.infer<typeof nodePoolCloneInputSchema>;

export const nodePoolCloneDescription =
  "Clone a GKE node pool under a new name, pinned to the cluster's version";

export interface NodePoolCloneSnapshot {
  pool: NodePool;
  /** The cluster's currentMasterVersion; undefined when it could not be read */
  clusterVersion?: string;
  /** Why the cluster version is missing */
  versionError?: string;
}

/** The attributes a clone carries, in the form the create flags take */
export interface CloneValues {
  machineType?: string;
  diskSizeGb?: number;
  diskType?: string;
  imageType?: string;
  version?: string;
  nodeCount?: number;
  maxPodsPerNode?: number;
  serviceAccount?: string;
  scopes: string[];
  labels: string[];
  taints: string[];
  podRange?: string;
  locations: string[];
  autoUpgrade: boolean;
  autoRepair: boolean;
  /** "off", or "<min>..<max>" */
  autoscaling: string;
  maxSurge: number;
  maxUnavailable: number;
  /** "true" when the legacy metadata endpoints are disabled */
  disableLegacyEndpoints?: string;
}

export interface NodePoolCloneDesired {
  name: string;
  values: CloneValues;
}

/** The fields a clone copies from `pool`, as flat comparable values */
export function cloneValues(pool: NodePool, version: string | undefined): CloneValues {
  const { config } = pool;
  const autoscaling = pool.autoscaling?.enabled
    ? `${pool.autoscaling.minNodeCount ?? ""}..${pool.autoscaling.maxNodeCount ?? ""}`
    : "off";

  return {
    machineType: config.machineType,
    diskSizeGb: config.diskSizeGb,
    diskType: config.diskType,
    imageType: config.imageType,
    version,
    nodeCount: pool.initialNodeCount,
    maxPodsPerNode: pool.maxPodsConstraint?.maxPodsPerNode,
    serviceAccount: config.serviceAccount,
    scopes: config.oauthScopes ?? [],
    labels: formatLabels(config.resourceLabels ?? config.labels ?? {}),
    taints: (config.taints ?? []).map(formatTaint),
    podRange: pool.networkConfig?.podRange,
    locations: pool.locations ?? [],
    autoUpgrade: pool.management?.autoUpgrade ?? false,
    autoRepair: pool.management?.autoRepair ?? false,
    autoscaling,
    maxSurge: pool.upgradeSettings?.maxSurge ?? 0,
    maxUnavailable: pool.upgradeSettings?.maxUnavailable ?? 0,
    disableLegacyEndpoints:
      config.metadata?.["disable-legacy-endpoints"] === "true" ? "true" : undefined,
  };
}

// ---------------------------------------------------------------------------
// Descriptor table
// ---------------------------------------------------------------------------

type CloneField = FieldDescriptor<CloneValues, CloneValues>;

function scalar(
  field: keyof CloneValues,
  flag: string,
  read: (values: CloneValues) => string | number | undefined
): CloneField {
  return {
    field,
    comparator: "exact",
    current: (values) => (values ? read(values) : undefined),
    desired: read,
    flags: (value) => [flag, String(value)],
  };
}

function list(field: keyof CloneValues, flag: string, read: (values: CloneValues) => string[]): CloneField {
  return {
    field,
    comparator: "set",
    current: (values) => (values ? read(values) : undefined),
    desired: read,
    flags: (value) => listFlag(flag, value),
  };
}

function toggle(field: keyof CloneValues, name: string, read: (values: CloneValues) => boolean): CloneField {
  return {
    field,
    comparator: "exact",
    current: (values) => (values ? read(values) : undefined),
    desired: read,
    flags: (value) => [value === true ? `--enable-${name}` : `--no-enable-${name}`],
  };
}

const CLONE_FIELDS: readonly CloneField[] = [
  scalar("machineType", "--machine-type", (v) => v.machineType),
  scalar("diskSizeGb", "--disk-size", (v) => v.diskSizeGb),
  scalar("diskType", "--disk-type", (v) => v.diskType),
  scalar("imageType", "--image-type", (v) => v.imageType),
  scalar("version", "--node-version", (v) => v.version),
  scalar("nodeCount", "--num-nodes", (v) => v.nodeCount),
  scalar("maxPodsPerNode", "--max-pods-per-node", (v) => v.maxPodsPerNode),
  scalar("serviceAccount", "--service-account", (v) => v.serviceAccount),
  list("scopes", "--scopes", (v) => v.scopes),
  list("labels", "--labels", (v) => v.labels),
  list("taints", "--node-taints", (v) => v.taints),
  scalar("podRange", "--pod-ipv4-range", (v) => v.podRange),
  list("locations", "--node-locations", (v) => v.locations),
  toggle("autoUpgrade", "autoupgrade", (v) => v.autoUpgrade),
  toggle("autoRepair", "autorepair", (v) => v.autoRepair),
  {
    field: "autoscaling",
    comparator: "exact",
    current: (values) => values?.autoscaling,
    desired: (values) => values.autoscaling,
    flags: (value) => {
      if (value === "off") return ["--no-enable-autoscaling"];
      const [min, max] = String(value).split("..");
      return [
        "--enable-autoscaling",
        ...(min ? ["--min-nodes", min] : []),
        ...(max ? ["--max-nodes", max] : []),
      ];
    },
  },
  scalar("maxSurge", "--max-surge-upgrade", (v) => v.maxSurge),
  scalar("maxUnavailable", "--max-unavailable-upgrade", (v) => v.maxUnavailable),
  {
    field: "disableLegacyEndpoints",
    comparator: "exact",
    current: (values) => values?.disableLegacyEndpoints,
    desired: (values) => values.disableLegacyEndpoints,
    flags: () => ["--metadata", "disable-legacy-endpoints=true"],
  },
];

function cloneDiagnostics(snapshot: NodePoolCloneSnapshot): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  const { pool } = snapshot;

  if (snapshot.clusterVersion === undefined) {
    diagnostics.push({
      severity: "warning",
      field: "version",
      message: `Could not read the cluster version (${snapshot.versionError ?? "unknown error"}); using the node pool's own version ${pool.version ?? "(none)"}`,
    });
  }

  const cidr = pool.networkConfig?.podIpv4CidrBlock;
  if (!pool.networkConfig?.podRange && cidr) {
    diagnostics.push({
      severity: "warning",
      field: "podRange",
      message: `Source pool uses pod CIDR ${cidr} without a named secondary range; the clone gets the cluster's default pod range`,
    });
  }

  return diagnostics;
}

/**
 * @param existingTarget - name of the target pool when it already exists;
 *   it must then match the source exactly
 */
export function nodePoolCloneSpec(
  snapshot: NodePoolCloneSnapshot,
  existingTarget?: string
): PlanSpec<CloneValues, CloneValues> {
  return {
    fields: CLONE_FIELDS,
    composite: {
      tier: "create",
      idempotency: "stateful",
      build: (flags, { identity }) => ({
        description: `Create node pool ${identity.name} in cluster ${identity.parent}`,
        command: nodePoolCommand("create", nodePoolRef(identity), flags),
        guard: describeNodePoolCommand(nodePoolRef(identity)),
      }),
    },
    validate: (deltas) => {
      if (existingTarget === undefined) return;
      const differing = deltas.filter((delta) => delta.differs).map((delta) => delta.field);
      if (differing.length > 0) {
        throw new ValidationError(
          `Node pool ${existingTarget} already exists with a configuration that differs from ${snapshot.pool.name} (${differing.join(", ")})`
        );
      }
    },
    diagnostics: cloneDiagnostics(snapshot),
  };
}

// ---------------------------------------------------------------------------
// Tool
// ---------------------------------------------------------------------------

/**
 * `nodepool-clone <url>`: creates a new node pool in the same cluster with
 * the source pool's machine type, disk, labels, taints, scopes and
 * autoscaling.
 *
 * The new pool takes the cluster's current version. When the cluster cannot
 * be read, the source pool's version is used and the plan carries a warning.
 * A pool that already exists under the new name is a no-op when it matches
 * the source and a ValidationError when it does not.
 */
export const nodePoolCloneTool: ToolDefinition<
  NodePoolCloneInput,
  NodePoolCloneSnapshot,
  NodePoolCloneDesired
> = {
  name: "nodepool-clone",

  locate: (input) => parseNodePoolUrl(input.url),

  fetch: (_input, identity, { state }) => {
    const pool = requireFound(
      state.describeNodePool(nodePoolRef(identity)),
      `Node pool ${identity.name} not found in cluster ${identity.parent}`
    );

    try {
      const version = state.getClusterVersion(identity.project, identity.location, identity.parent);
      return version.found
        ? { pool, clusterVersion: version.value }
        : { pool, versionError: `cluster ${identity.parent} not found` };
    } catch (error) {
      // A cluster read failure is not fatal for a clone
      if (error instanceof StateFetchError) return { pool, versionError: error.message };
      throw error;
    }
  },

  describe: ({ pool, clusterVersion }) => [
    `  Machine type    : ${pool.config.machineType ?? "(default)"}`,
    `  Disk            : ${pool.config.diskSizeGb ?? "?"}GB ${pool.config.diskType ?? ""}`.trimEnd(),
    `  Node count      : ${pool.initialNodeCount ?? "(default)"}`,
    `  Pool version    : ${pool.version ?? "(unknown)"}`,
    `  Cluster version : ${clusterVersion ?? "(unavailable)"}`,
  ],

  resolve: async (input, identity, snapshot, services) => {
    const name = await presetOrAsk(services, input.name, "New node pool name", "--name");
    if (name === undefined) return undefined;

    if (!NODE_POOL_NAME.test(name)) {
      throw new ParseError(
        `Invalid node pool name "${name}": use lowercase letters, digits and hyphens, starting with a letter (at most 40 characters)`
      );
    }
    if (name === identity.name) {
      throw new ValidationError(`The new node pool name must differ from the source (${identity.name})`);
    }

    const version = snapshot.clusterVersion ?? snapshot.pool.version;
    return { name, values: cloneValues(snapshot.pool, version) };
  },

  plan: (identity, snapshot, desired, { state }) => {
    const target = createIdentity("node-pool", {
      project: identity.project,
      location: identity.location,
      parent: identity.parent,
      name: desired.name,
    });
    const existing = state.describeNodePool(nodePoolRef(target));
    const current = existing.found ? cloneValues(existing.value, existing.value.version) : undefined;

    return buildPlan(
      target,
      current,
      desired.values,
      nodePoolCloneSpec(snapshot, existing.found ? target.name : undefined)
    );
  },
};
