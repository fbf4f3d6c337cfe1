/**
 * iam-replicate - Copy a principal's project-level IAM roles
 *
 * Either to another principal in the same project, or to the same
 * principal in another project. Conditional bindings are not replicated.
 */

import { z } from "zod";
import { ValidationError } from "../errors";
import { buildPlan, type Diagnostic, type ToolDefinition, type ToolServices } from "../engine";
import { parsePrincipal } from "../locator/console-url";
import { presetOrAsk } from "./common";
import {
  conditionalRoles,
  projectBindingsSpec,
  projectIamIdentity,
  unconditionalRoles,
  type BindingTarget,
} from "./iam";

export const iamReplicateInputSchema = z.object({
  project: z.string().min(1).describe("Source project id"),
  principal: z.string().min(1).describe("Source principal (user:, group: or serviceAccount:)"),
  targetPrincipal: z
    .string()
    .optional()
    .describe("Replicate to this principal in the source project"),
  targetProject: z
    .string()
    .optional()
    .describe("Replicate to the source principal in this project"),
});

export type IamReplicateInput = z.infer<typeof iamReplicateInputSchema>;

export const iamReplicateDescription =
  "Replicate a principal's project IAM roles to another principal or another project";

export interface IamReplicateSnapshot {
  roles: string[];
  /** Roles held only under a condition; reported, not replicated */
  skipped: string[];
}

export interface IamReplicateDesired {
  project: string;
  principal: string;
  roles: string[];
}

type TargetKind = "principal" | "project";

async function resolveTarget(
  input: IamReplicateInput,
  source: { project: string; principal: string },
  services: ToolServices
): Promise<{ project: string; principal: string } | undefined> {
  if (input.targetPrincipal !== undefined || input.targetProject !== undefined) {
    return {
      project: input.targetProject?.trim() || source.project,
      principal: input.targetPrincipal ? parsePrincipal(input.targetPrincipal) : source.principal,
    };
  }

  const kind = await services.decisions.choose<TargetKind>("Replicate to", "--target-principal or --target-project", [
    { value: "principal", name: `Another principal in ${source.project}` },
    { value: "project", name: `${source.principal} in another project` },
  ]);

  if (kind === "principal") {
    const principal = await presetOrAsk(
      services,
      undefined,
      "Target principal (user:, group: or serviceAccount:)",
      "--target-principal"
    );
    return principal === undefined ? undefined : { project: source.project, principal: parsePrincipal(principal) };
  }

  const project = await presetOrAsk(services, undefined, "Target project id", "--target-project");
  return project === undefined ? undefined : { project, principal: source.principal };
}

/**
 * `iam-replicate`: copy a principal's unconditional project roles to another
 * principal or project.
 *
 * Conditional bindings are listed and skipped. Replicating onto the same
 * principal in the same project is a ValidationError.
 */
export const iamReplicateTool: ToolDefinition<IamReplicateInput, IamReplicateSnapshot, IamReplicateDesired> = {
  name: "iam-replicate",

  locate: (input) => {
    const principal = parsePrincipal(input.principal);
    return projectIamIdentity(input.project, input.project, principal);
  },

  fetch: (_input, identity, { state }) => {
    const policy = state.getProjectIamPolicy(identity.project);
    const roles = unconditionalRoles(policy, identity.name);
    const skipped = conditionalRoles(policy, identity.name);
    if (roles.length === 0) {
      throw new ValidationError(
        `No unconditional roles found for ${identity.name} in project ${identity.project}`
      );
    }
    return { roles, skipped };
  },

  describe: ({ roles, skipped }) => [
    `  Roles (${roles.length}):`,
    ...roles.map((role) => `    ${role}`),
    ...(skipped.length > 0 ? [`  Conditional, not replicated: ${skipped.join(", ")}`] : []),
  ],

  resolve: async (input, identity, snapshot, services) => {
    const target = await resolveTarget(
      input,
      { project: identity.project, principal: identity.name },
      services
    );
    if (target === undefined) return undefined;

    if (target.project === identity.project && target.principal === identity.name) {
      throw new ValidationError("The target is the same principal in the same project as the source");
    }
    return { ...target, roles: snapshot.roles };
  },

  plan: (_identity, snapshot, desired, { state }) => {
    const identity = projectIamIdentity(desired.project, desired.project, desired.principal);
    const policies = new Map([[desired.project, state.getProjectIamPolicy(desired.project)]]);
    const targets: BindingTarget[] = desired.roles.map((role) => ({ project: desired.project, role }));

    const diagnostics = snapshot.skipped.map((role): Diagnostic => ({
      severity: "warning",
      field: role,
      message: `Conditional binding of ${role} is not replicated`,
    }));

    return buildPlan(
      identity,
      policies,
      targets,
      projectBindingsSpec(desired.principal, targets, (target) => target.role, diagnostics)
    );
  },
};
