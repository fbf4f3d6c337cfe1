/**
 * gke.ts - Node pool commands shared by nodepool-clone and nodepool-update
 */

import type { Command, FieldValue, ResourceIdentity } from "../engine";
import { splitList } from "../engine";
import type { NodePoolRef } from "../state/commands";

/** GKE node pool names: lowercase, digits and hyphens, at most 40 characters */
export const NODE_POOL_NAME = /^[a-z]([-a-z0-9]{0,38}[a-z0-9])?$/;

export function nodePoolRef(identity: ResourceIdentity): NodePoolRef {
  return {
    project: identity.project,
    location: identity.location,
    cluster: identity.parent,
    pool: identity.name,
  };
}

/** `gcloud container node-pools <verb> <pool> --cluster <c> --location <l> --project <p> [...extra]` */
export function nodePoolCommand(
  verb: string,
  ref: NodePoolRef,
  extra: readonly string[] = []
): Command {
  return {
    program: "gcloud",
    args: [
      "container", "node-pools", verb, ref.pool,
      "--cluster", ref.cluster,
      "--location", ref.location,
      "--project", ref.project,
      ...extra,
    ],
  };
}

/** A list-valued field as entries; scalars are treated as comma-separated */
export function toList(value: FieldValue): string[] {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return splitList(String(value));
  }
  return [...value];
}

/** `--flag a,b,c`, or nothing for an empty list */
export function listFlag(flag: string, value: FieldValue): string[] {
  const entries = toList(value);
  return entries.length > 0 ? [flag, entries.join(",")] : [];
}
