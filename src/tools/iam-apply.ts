/**
 * iam-apply - Grant every role in a list on every project in a list
 *
 * The projects list is the identity; the roles list is the desired state.
 * Bindings the member already holds are left out of the minimal plan.
 * Execution stops at the first failed binding.
 */

import { z } from "zod";
import { buildPlan, type ToolDefinition } from "../engine";
import { parsePrincipal } from "../locator/console-url";
import { readListFile } from "../locator/input-files";
import type { IamPolicy } from "../state/schemas";
import { projectBindingsSpec, projectIamIdentity, type BindingTarget, type PolicySnapshot } from "./iam";

const DEFAULT_ROLES_FILE = "roles.txt";
const DEFAULT_PROJECTS_FILE = "projects.txt";

export const iamApplyInputSchema = z.object({
  member: z.string().min(1).describe("Member to grant the roles to (user:, group: or serviceAccount:)"),
  roles: z.string().default(DEFAULT_ROLES_FILE).describe("File listing one role per line"),
  projects: z.string().default(DEFAULT_PROJECTS_FILE).describe("File listing one project id per line"),
});

export type IamApplyInput = z.infer<typeof iamApplyInputSchema>;

export const iamApplyDescription = "Grant a list of roles on a list of projects to one member";

/** Projects list joined with "," stands in for the project of a batch identity */
const PROJECT_SEPARATOR = ",";

/**
 * `iam-apply`: grant every role in the roles file on every project in the
 * projects file. Blank lines and `#` comments are ignored, duplicates are
 * dropped and bindings already present are no-ops.
 */
export const iamApplyTool: ToolDefinition<IamApplyInput, PolicySnapshot, BindingTarget[]> = {
  name: "iam-apply",

  locate: (input) => {
    const member = parsePrincipal(input.member);
    const projects = [...new Set(readListFile(input.projects, "projects"))];
    return projectIamIdentity(projects.join(PROJECT_SEPARATOR), "batch", member);
  },

  fetch: (_input, identity, { state }) => {
    const policies = new Map<string, IamPolicy>();
    for (const project of identity.project.split(PROJECT_SEPARATOR)) {
      policies.set(project, state.getProjectIamPolicy(project));
    }
    return policies;
  },

  describe: (policies) => [`  Projects (${policies.size}): ${[...policies.keys()].join(", ")}`],

  resolve: async (input, identity) => {
    const roles = [...new Set(readListFile(input.roles, "roles"))];
    return identity.project
      .split(PROJECT_SEPARATOR)
      .flatMap((project) => roles.map((role) => ({ project, role })));
  },

  plan: (identity, policies, targets) =>
    buildPlan(
      identity,
      policies,
      targets,
      projectBindingsSpec(identity.name, targets, (target) => `${target.project}/${target.role}`)
    ),
};
