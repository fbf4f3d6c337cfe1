/**
 * commands.ts - Read-only gcloud/kubectl commands
 *
 * The state provider runs these to build snapshots; tools reuse them as
 * guards in emitted scripts ("skip when the describe succeeds"), so a lookup
 * and its guard can never drift apart.
 */

import type { Command } from "../engine/types";

export interface NodePoolRef {
  project: string;
  location: string;
  cluster: string;
  pool: string;
}

export interface ZonalRef {
  project: string;
  zone: string;
  name: string;
}

export function describeNodePoolCommand(ref: NodePoolRef, format = "json"): Command {
  return {
    program: "gcloud",
    args: [
      "container", "node-pools", "describe", ref.pool,
      "--cluster", ref.cluster,
      "--location", ref.location,
      "--project", ref.project,
      "--format", format,
    ],
  };
}

export function describeClusterCommand(
  project: string,
  location: string,
  cluster: string
): Command {
  return {
    program: "gcloud",
    args: [
      "container", "clusters", "describe", cluster,
      "--location", location,
      "--project", project,
      "--format", "json",
    ],
  };
}

/**
 * `format` defaults to json; guards pass a `value(...)` projection instead.
 */
export function describeInstanceCommand(ref: ZonalRef, format = "json"): Command {
  return {
    program: "gcloud",
    args: [
      "compute", "instances", "describe", ref.name,
      "--zone", ref.zone,
      "--project", ref.project,
      "--format", format,
    ],
  };
}

export function describeDiskCommand(ref: ZonalRef, format = "json"): Command {
  return {
    program: "gcloud",
    args: [
      "compute", "disks", "describe", ref.name,
      "--zone", ref.zone,
      "--project", ref.project,
      "--format", format,
    ],
  };
}

export function describeServiceAccountCommand(project: string, email: string): Command {
  return {
    program: "gcloud",
    args: [
      "iam", "service-accounts", "describe", email,
      "--project", project,
      "--format", "json",
    ],
  };
}

export function getProjectIamPolicyCommand(project: string): Command {
  return {
    program: "gcloud",
    args: ["projects", "get-iam-policy", project, "--format", "json"],
  };
}

export function getServiceAccountIamPolicyCommand(project: string, email: string): Command {
  return {
    program: "gcloud",
    args: [
      "iam", "service-accounts", "get-iam-policy", email,
      "--project", project,
      "--format", "json",
    ],
  };
}

/** `kubectl get <kind> <name> [-n <namespace>] -o json` */
export function kubectlGetCommand(kind: string, name: string, namespace?: string): Command {
  return {
    program: "kubectl",
    args: [
      "get", kind, name,
      ...(namespace ? ["-n", namespace] : []),
      "-o", "json",
    ],
  };
}
