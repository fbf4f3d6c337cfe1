/**
 * schemas.ts - Zod schemas for the CLI JSON this tool reads
 *
 * Only the fields the tools actually compare or clone are declared; zod
 * strips the rest. int64 fields arrive from the Google APIs as strings
 * ("maxPodsPerNode": "110", "sizeGb": "50"), so numbers are coerced.
 */

import { z } from "zod";

const count = z.coerce.number().int().nonnegative();

const taintSchema = z.object({
  key: z.string(),
  value: z.string().optional(),
  effect: z.string(),
});

const nodeConfigSchema = z.object({
  machineType: z.string().optional(),
  diskSizeGb: count.optional(),
  diskType: z.string().optional(),
  imageType: z.string().optional(),
  oauthScopes: z.array(z.string()).optional(),
  serviceAccount: z.string().optional(),
  taints: z.array(taintSchema).optional(),
  resourceLabels: z.record(z.string()).optional(),
  labels: z.record(z.string()).optional(),
  metadata: z.record(z.string()).optional(),
});

type NodeConfig = z.infer<typeof nodeConfigSchema>;

const EMPTY_NODE_CONFIG: NodeConfig = {};

/**
 * `gcloud container node-pools describe --format json`.
 * Older API versions call the node configuration `nodeConfig`; it is folded
 * into `config`.
 */
export const nodePoolSchema = z
  .object({
    name: z.string(),
    version: z.string().optional(),
    initialNodeCount: count.optional(),
    locations: z.array(z.string()).optional(),
    config: nodeConfigSchema.optional(),
    nodeConfig: nodeConfigSchema.optional(),
    maxPodsConstraint: z
      .object({ maxPodsPerNode: count.optional() })
      .optional(),
    autoscaling: z
      .object({
        enabled: z.boolean().optional(),
        minNodeCount: count.optional(),
        maxNodeCount: count.optional(),
      })
      .optional(),
    management: z
      .object({
        autoUpgrade: z.boolean().optional(),
        autoRepair: z.boolean().optional(),
      })
      .optional(),
    upgradeSettings: z
      .object({
        maxSurge: count.optional(),
        maxUnavailable: count.optional(),
      })
      .optional(),
    networkConfig: z
      .object({
        podRange: z.string().optional(),
        podIpv4CidrBlock: z.string().optional(),
      })
      .optional(),
  })
  .transform(({ nodeConfig, config, ...rest }) => ({
    ...rest,
    config: config ?? nodeConfig ?? EMPTY_NODE_CONFIG,
  }));

export type NodePool = z.infer<typeof nodePoolSchema>;

export const clusterSchema = z.object({
  name: z.string(),
  currentMasterVersion: z.string().min(1),
});

/** `gcloud compute instances describe --format json` */
export const instanceSchema = z.object({
  name: z.string(),
  status: z.string(),
  /** Full URL, e.g. .../zones/us-central1-a/machineTypes/e2-medium */
  machineType: z.string(),
  serviceAccounts: z
    .array(
      z.object({
        email: z.string(),
        scopes: z.array(z.string()).optional(),
      })
    )
    .optional(),
  disks: z
    .array(
      z.object({
        index: z.number().int().optional(),
        deviceName: z.string().optional(),
        /** Full URL of the disk resource */
        source: z.string(),
        boot: z.boolean().optional(),
      })
    )
    .optional(),
});

export type Instance = z.infer<typeof instanceSchema>;

/** `gcloud compute disks describe --format json` */
export const diskSchema = z.object({
  name: z.string(),
  sizeGb: count,
  type: z.string().optional(),
  /** Instance URLs the disk is attached to */
  users: z.array(z.string()).optional(),
});

export type Disk = z.infer<typeof diskSchema>;

/** `gcloud iam service-accounts describe --format json` */
export const serviceAccountSchema = z.object({
  email: z.string(),
  disabled: z.boolean().optional(),
});

export type ServiceAccount = z.infer<typeof serviceAccountSchema>;

/**
 * `gcloud projects get-iam-policy` / `gcloud iam service-accounts get-iam-policy`.
 * A policy with no bindings comes back as just `{ "etag": "..." }`.
 */
export const iamPolicySchema = z.object({
  bindings: z
    .array(
      z.object({
        role: z.string(),
        members: z.array(z.string()).default([]),
        condition: z
          .object({
            title: z.string().optional(),
            expression: z.string(),
          })
          .optional(),
      })
    )
    .default([]),
});

export type IamPolicy = z.infer<typeof iamPolicySchema>;

/** `kubectl get <kind> <name> -o json`, metadata only */
export const kubernetesObjectSchema = z.object({
  metadata: z.object({
    name: z.string(),
    namespace: z.string().optional(),
    annotations: z.record(z.string()).optional(),
  }),
});

export type KubernetesObject = z.infer<typeof kubernetesObjectSchema>;

/** Last path segment of a resource URL ("…/machineTypes/e2-medium" → "e2-medium"). */
export function lastSegment(url: string): string {
  const parts = url.split("/");
  return parts[parts.length - 1];
}
