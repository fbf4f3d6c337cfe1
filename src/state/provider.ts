/**
 * provider.ts - Read-only view of current cloud state
 *
 * Every lookup answers one of three ways:
 * - found: the CLI printed JSON that matches the schema
 * - not found: the CLI failed with an explicit NOT_FOUND / NotFound message
 * - StateFetchError: anything else (permission denied, timeout, bad JSON)
 *
 * Only the explicit not-found answer counts as absence. Treating a timeout
 * as "doesn't exist" would make the planner emit creation steps for things
 * that are already there.
 */

import type { z } from "zod";
import { StateFetchError } from "../errors";
import type { Command, CommandRunner } from "../engine/types";
import { isNotFound } from "../utils/cli";
import {
  describeClusterCommand,
  describeDiskCommand,
  describeInstanceCommand,
  describeNodePoolCommand,
  describeServiceAccountCommand,
  getProjectIamPolicyCommand,
  getServiceAccountIamPolicyCommand,
  kubectlGetCommand,
  type NodePoolRef,
  type ZonalRef,
} from "./commands";
import {
  clusterSchema,
  diskSchema,
  iamPolicySchema,
  instanceSchema,
  kubernetesObjectSchema,
  nodePoolSchema,
  serviceAccountSchema,
  type Disk,
  type IamPolicy,
  type Instance,
  type KubernetesObject,
  type NodePool,
  type ServiceAccount,
} from "./schemas";

export type Lookup<T> = { found: true; value: T } | { found: false };

export interface StateProvider {
  describeNodePool(ref: NodePoolRef): Lookup<NodePool>;
  /** The cluster's currentMasterVersion */
  getClusterVersion(project: string, location: string, cluster: string): Lookup<string>;
  describeInstance(ref: ZonalRef): Lookup<Instance>;
  describeDisk(ref: ZonalRef): Lookup<Disk>;
  describeServiceAccount(project: string, email: string): Lookup<ServiceAccount>;
  /** A project always has a policy; a missing project is a StateFetchError */
  getProjectIamPolicy(project: string): IamPolicy;
  getServiceAccountIamPolicy(project: string, email: string): Lookup<IamPolicy>;
  /** `kind` is a kubectl resource name: namespace, serviceaccount, ... */
  getKubernetesObject(kind: string, name: string, namespace?: string): Lookup<KubernetesObject>;
}

/**
 * StateProvider backed by the gcloud and kubectl CLIs.
 */
export class CliStateProvider implements StateProvider {
  constructor(private readonly run: CommandRunner) {}

  describeNodePool(ref: NodePoolRef): Lookup<NodePool> {
    return this.lookup(
      `Failed to describe node pool ${ref.pool} in cluster ${ref.cluster}`,
      describeNodePoolCommand(ref),
      nodePoolSchema
    );
  }

  getClusterVersion(project: string, location: string, cluster: string): Lookup<string> {
    const result = this.lookup(
      `Failed to describe cluster ${cluster}`,
      describeClusterCommand(project, location, cluster),
      clusterSchema
    );
    return result.found
      ? { found: true, value: result.value.currentMasterVersion }
      : result;
  }

  describeInstance(ref: ZonalRef): Lookup<Instance> {
    return this.lookup(
      `Failed to describe instance ${ref.name}`,
      describeInstanceCommand(ref),
      instanceSchema
    );
  }

  describeDisk(ref: ZonalRef): Lookup<Disk> {
    return this.lookup(
      `Failed to describe disk ${ref.name}`,
      describeDiskCommand(ref),
      diskSchema
    );
  }

  describeServiceAccount(project: string, email: string): Lookup<ServiceAccount> {
    return this.lookup(
      `Failed to describe service account ${email}`,
      describeServiceAccountCommand(project, email),
      serviceAccountSchema
    );
  }

  getProjectIamPolicy(project: string): IamPolicy {
    const what = `Failed to read IAM policy of project ${project}`;
    const result = this.lookup(what, getProjectIamPolicyCommand(project), iamPolicySchema);
    if (!result.found) {
      throw new StateFetchError(`${what}: project not found`);
    }
    return result.value;
  }

  getServiceAccountIamPolicy(project: string, email: string): Lookup<IamPolicy> {
    return this.lookup(
      `Failed to read IAM policy of service account ${email}`,
      getServiceAccountIamPolicyCommand(project, email),
      iamPolicySchema
    );
  }

  getKubernetesObject(kind: string, name: string, namespace?: string): Lookup<KubernetesObject> {
    return this.lookup(
      `Failed to get ${kind} ${name}`,
      kubectlGetCommand(kind, name, namespace),
      kubernetesObjectSchema
    );
  }

  /**
   * Runs a describe command and validates its JSON output.
   *
   * @param what - Error message prefix naming the lookup
   */
  private lookup<T>(
    what: string,
    command: Command,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Lookup<T> {
    const result = this.run(command);

    if (isNotFound(result)) return { found: false };
    if (result.isError) throw new StateFetchError(what, result.output);

    let raw: unknown;
    try {
      raw = JSON.parse(result.output);
    } catch {
      throw new StateFetchError(`${what}: output is not valid JSON`);
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new StateFetchError(`${what}: unexpected output (${issues})`);
    }

    return { found: true, value: parsed.data };
  }
}
