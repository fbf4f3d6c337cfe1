/**
 * workload-identity - Bind a Kubernetes service account to a GCP service account
 *
 * Five pieces, each reconciled on its own:
 *   namespace → Kubernetes SA → GCP SA → workloadIdentityUser binding → KSA annotation
 *
 * kubectl runs against the current context; point it at the cluster first
 * (`gcloud container clusters get-credentials`).
 */

import { z } from "zod";
import { buildPlan, type PlanSpec, type ResourceIdentity, type ToolDefinition } from "../engine";
import { parseWorkloadIdentityArg } from "../locator/console-url";
import { describeServiceAccountCommand, kubectlGetCommand } from "../state/commands";
import type { IamPolicy } from "../state/schemas";
import { serviceAccountEmail } from "./common";

export const WORKLOAD_IDENTITY_ROLE = "roles/iam.workloadIdentityUser";
export const GSA_ANNOTATION = "iam.gke.io/gcp-service-account";

export const workloadIdentityInputSchema = z.object({
  binding: z
    .string()
    .min(1)
    .describe("PROJECT,NAMESPACE,GSA or PROJECT,NAMESPACE,KSA,GSA"),
});

export type WorkloadIdentityInput = z.infer<typeof workloadIdentityInputSchema>;

export const workloadIdentityDescription =
  "Bind a Kubernetes service account to a GCP service account through Workload Identity";

export interface WorkloadIdentityState {
  namespaceExists: boolean;
  ksaExists: boolean;
  gsaExists: boolean;
  bindingExists: boolean;
  /** Current value of the KSA's GSA annotation */
  annotation?: string;
}

/** Names derived from the identity */
export interface WorkloadIdentityTarget {
  namespace: string;
  ksa: string;
  gsa: string;
  email: string;
  member: string;
}

/** Names and IAM member derived from a parsed `namespace/ksa:gsa` identity */
export function workloadIdentityTarget(identity: ResourceIdentity): WorkloadIdentityTarget {
  const namespace = identity.location;
  const ksa = identity.parent;
  return {
    namespace,
    ksa,
    gsa: identity.name,
    email: serviceAccountEmail(identity.name, identity.project),
    member: `serviceAccount:${identity.project}.svc.id.goog[${namespace}/${ksa}]`,
  };
}

/** Unconditional or not; conditions are not inspected */
export function hasBinding(policy: IamPolicy, role: string, member: string): boolean {
  return policy.bindings.some(
    (binding) => binding.role === role && binding.members.includes(member)
  );
}

/**
 * Five ordered resources: namespace, Kubernetes service account, GCP
 * service account, the `roles/iam.workloadIdentityUser` binding and the
 * KSA annotation. Each is created only when missing; the annotation is
 * overwritten when it names a different account.
 */
export function workloadIdentitySpec(
  project: string,
  target: WorkloadIdentityTarget
): PlanSpec<WorkloadIdentityState, WorkloadIdentityTarget> {
  const { namespace, ksa, gsa, email, member } = target;

  return {
    fields: [
      {
        field: "namespace",
        comparator: "presence",
        current: (state) => state?.namespaceExists,
        desired: () => true,
        tier: "create",
        idempotency: "stateful",
        action: () => ({
          description: `Create namespace ${namespace}`,
          command: { program: "kubectl", args: ["create", "namespace", namespace] },
          guard: kubectlGetCommand("namespace", namespace),
        }),
      },
      {
        field: "ksa",
        comparator: "presence",
        current: (state) => state?.ksaExists,
        desired: () => true,
        tier: "create",
        idempotency: "stateful",
        action: () => ({
          description: `Create Kubernetes service account ${namespace}/${ksa}`,
          command: { program: "kubectl", args: ["create", "serviceaccount", ksa, "-n", namespace] },
          guard: kubectlGetCommand("serviceaccount", ksa, namespace),
        }),
      },
      {
        field: "gsa",
        comparator: "presence",
        current: (state) => state?.gsaExists,
        desired: () => true,
        tier: "create",
        idempotency: "stateful",
        action: () => ({
          description: `Create GCP service account ${email}`,
          command: {
            program: "gcloud",
            args: [
              "iam", "service-accounts", "create", gsa,
              "--project", project,
              "--display-name", "GKE Workload Identity - GSA",
            ],
          },
          guard: describeServiceAccountCommand(project, email),
        }),
      },
      {
        field: "binding",
        comparator: "presence",
        current: (state) => state?.bindingExists,
        desired: () => true,
        tier: "bind",
        action: () => ({
          description: `Grant ${WORKLOAD_IDENTITY_ROLE} on ${email} to ${namespace}/${ksa}`,
          command: {
            program: "gcloud",
            args: [
              "iam", "service-accounts", "add-iam-policy-binding", email,
              "--project", project,
              "--role", WORKLOAD_IDENTITY_ROLE,
              "--member", member,
            ],
          },
        }),
      },
      {
        field: "annotation",
        comparator: "presence",
        current: (state) => state?.annotation === email,
        desired: () => true,
        tier: "annotate",
        action: () => ({
          description: `Annotate ${namespace}/${ksa} with ${GSA_ANNOTATION}=${email}`,
          command: {
            program: "kubectl",
            args: [
              "annotate", "serviceaccount", ksa, "-n", namespace,
              `${GSA_ANNOTATION}=${email}`,
              "--overwrite",
            ],
          },
        }),
      },
    ],
  };
}

/** `workload-identity <namespace/ksa:gsa@project>`: bind a KSA to a GSA end to end */
export const workloadIdentityTool: ToolDefinition<
  WorkloadIdentityInput,
  WorkloadIdentityState,
  WorkloadIdentityTarget
> = {
  name: "workload-identity",

  locate: (input) => parseWorkloadIdentityArg(input.binding),

  fetch: (_input, identity, { state }) => {
    const { namespace, ksa, email, member } = workloadIdentityTarget(identity);

    const namespaceLookup = state.getKubernetesObject("namespace", namespace);
    // A missing namespace means the KSA cannot exist either
    const ksaLookup = namespaceLookup.found
      ? state.getKubernetesObject("serviceaccount", ksa, namespace)
      : undefined;
    const gsaExists = state.describeServiceAccount(identity.project, email).found;
    const policy = gsaExists ? state.getServiceAccountIamPolicy(identity.project, email) : undefined;

    return {
      namespaceExists: namespaceLookup.found,
      ksaExists: ksaLookup?.found ?? false,
      gsaExists,
      bindingExists: policy?.found ? hasBinding(policy.value, WORKLOAD_IDENTITY_ROLE, member) : false,
      annotation: ksaLookup?.found ? ksaLookup.value.metadata.annotations?.[GSA_ANNOTATION] : undefined,
    };
  },

  describe: (current) => [
    `  Namespace        : ${current.namespaceExists ? "exists" : "missing"}`,
    `  Kubernetes SA    : ${current.ksaExists ? "exists" : "missing"}`,
    `  GCP SA           : ${current.gsaExists ? "exists" : "missing"}`,
    `  IAM binding      : ${current.bindingExists ? "present" : "missing"}`,
    `  KSA annotation   : ${current.annotation ?? "(none)"}`,
  ],

  // Nothing to ask: the argument names every piece
  resolve: async (_input, identity) => workloadIdentityTarget(identity),

  plan: (identity, current, target) =>
    buildPlan(identity, current, target, workloadIdentitySpec(identity.project, target)),
};
