/**
 * iam.ts - Project IAM bindings shared by iam-replicate and iam-apply
 *
 * Both tools reconcile a set of (project, role) bindings for one member.
 * Each binding is a presence field; `add-iam-policy-binding` is itself
 * idempotent, so no guard is needed for the full script.
 */

import {
  createIdentity,
  type Diagnostic,
  type FieldDescriptor,
  type PlanSpec,
  type ResourceIdentity,
} from "../engine";
import type { IamPolicy } from "../state/schemas";

export interface BindingTarget {
  project: string;
  role: string;
}

/** Project id → policy, as read before planning */
export type PolicySnapshot = ReadonlyMap<string, IamPolicy>;

/** Roles bound to `member` without a condition */
export function unconditionalRoles(policy: IamPolicy, member: string): string[] {
  return policy.bindings
    .filter((binding) => !binding.condition && binding.members.includes(member))
    .map((binding) => binding.role);
}

/** Roles bound to `member` only under a condition */
export function conditionalRoles(policy: IamPolicy, member: string): string[] {
  const plain = new Set(unconditionalRoles(policy, member));
  return policy.bindings
    .filter((binding) => binding.condition && binding.members.includes(member))
    .map((binding) => binding.role)
    .filter((role) => !plain.has(role));
}

export function projectIamIdentity(project: string, parent: string, member: string): ResourceIdentity {
  return createIdentity("project-iam", { project, location: "global", parent, name: member });
}

/**
 * @param fieldName - how a binding is named in deltas and reports
 */
export function projectBindingsSpec(
  member: string,
  targets: readonly BindingTarget[],
  fieldName: (target: BindingTarget) => string,
  diagnostics: readonly Diagnostic[] = []
): PlanSpec<PolicySnapshot, readonly BindingTarget[]> {
  return {
    fields: targets.map((target): FieldDescriptor<PolicySnapshot, readonly BindingTarget[]> => ({
      field: fieldName(target),
      comparator: "presence",
      current: (policies) => {
        const policy = policies?.get(target.project);
        return policy ? unconditionalRoles(policy, member).includes(target.role) : undefined;
      },
      desired: () => true,
      tier: "bind",
      action: () => ({
        description: `Grant ${target.role} to ${member} on project ${target.project}`,
        command: {
          program: "gcloud",
          args: [
            "projects", "add-iam-policy-binding", target.project,
            "--member", member,
            "--role", target.role,
            "--condition", "None",
            "--quiet",
          ],
        },
      }),
    })),
    diagnostics,
  };
}
