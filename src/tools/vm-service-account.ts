/**
 * vm-service-account - Change the service account a VM runs as
 *
 * Sets the account with the cloud-platform scope (access is then governed
 * by IAM roles alone). When the account does not exist yet and is a
 * user-managed one (NAME@PROJECT.iam.gserviceaccount.com), it is created
 * first, before the VM goes down. A missing Google-managed account cannot
 * be created and fails validation.
 */

import { z } from "zod";
import { ValidationError } from "../errors";
import { buildPlan, type PlanSpec, type ToolDefinition } from "../engine";
import { parseInstanceUrl } from "../locator/console-url";
import { describeInstanceCommand, describeServiceAccountCommand } from "../state/commands";
import { lastSegment, type Instance } from "../state/schemas";
import { valueGuard } from "../utils/shell";
import { parseManagedAccount, presetOrAsk, requireFound } from "./common";
import { instanceCommand, powerBracket, zonalRef } from "./compute";

const VM_SCOPES = "cloud-platform";

export const vmServiceAccountInputSchema = z.object({
  url: z.string().min(1).describe("Cloud Console URL of the VM instance"),
  serviceAccount: z
    .string()
    .optional()
    .describe("Service account email; prompted for when omitted"),
  create: z
    .boolean()
    .optional()
    .describe("Create the service account when it does not exist"),
});

export type VmServiceAccountInput = z.infer<typeof vmServiceAccountInputSchema>;

export const vmServiceAccountDescription =
  "Change a VM's service account (stop, set account, start), creating the account when missing";

/** Current state as the plan builder sees it */
export interface VmServiceAccountState {
  instance: Instance;
  /** Whether the requested account exists */
  accountExists: boolean;
}

export interface VmServiceAccountDesired {
  email: string;
  /** Project the account lives in (for creation and lookups) */
  accountProject: string;
  /** Whether the account existed when it was looked up */
  accountFound: boolean;
}

/** The first attached account; Compute allows at most one */
export function currentServiceAccount(instance: Instance): string | undefined {
  return instance.serviceAccounts?.[0]?.email;
}

/**
 * Creates the account when it is missing, then swaps it on the VM inside a
 * stop/start bracket. Google-managed accounts (the Compute default and
 * service agents) are never created.
 */
export function vmServiceAccountSpec(
  desired: VmServiceAccountDesired
): PlanSpec<VmServiceAccountState, VmServiceAccountDesired> {
  const managed = parseManagedAccount(desired.email);

  return {
    fields: [
      {
        field: "accountExists",
        comparator: "presence",
        // Only user-managed accounts can be created; Google-managed ones are untracked
        current: (state) => (managed ? state?.accountExists : undefined),
        desired: () => (managed ? true : undefined),
        tier: "create",
        idempotency: "stateful",
        action: () => ({
          description: `Create service account ${desired.email}`,
          command: {
            program: "gcloud",
            args: [
              "iam", "service-accounts", "create", managed?.name ?? desired.email,
              "--project", desired.accountProject,
              "--display-name", managed?.name ?? desired.email,
              "--description", "Service account for VM (auto-created)",
            ],
          },
          guard: describeServiceAccountCommand(desired.accountProject, desired.email),
        }),
      },
      {
        field: "serviceAccount",
        comparator: "exact",
        current: (state) => (state ? currentServiceAccount(state.instance) : undefined),
        desired: (d) => d.email,
        disruptive: true,
        action: (value, { identity }) => ({
          description: `Set service account of ${identity.name} to ${value}`,
          command: instanceCommand("set-service-account", zonalRef(identity), [
            "--service-account", String(value),
            "--scopes", VM_SCOPES,
          ]),
          guard: valueGuard(
            describeInstanceCommand(zonalRef(identity), "value(serviceAccounts[0].email)"),
            "=",
            String(value)
          ),
        }),
      },
    ],
    bracket: powerBracket((state: VmServiceAccountState | undefined) => state?.instance.status),
  };
}

/**
 * `vm-service-account <url>`: attach a different service account to a VM.
 *
 * The account is looked up before planning. A missing user-managed account
 * is created after confirmation (`--create`); any other missing account is
 * a ValidationError.
 */
export const vmServiceAccountTool: ToolDefinition<
  VmServiceAccountInput,
  Instance,
  VmServiceAccountDesired
> = {
  name: "vm-service-account",

  locate: (input) => parseInstanceUrl(input.url),

  fetch: (_input, identity, { state }) =>
    requireFound(
      state.describeInstance(zonalRef(identity)),
      `VM ${identity.name} not found in zone ${identity.location} of project ${identity.project}`
    ),

  describe: (instance) => [
    `  Status          : ${instance.status}`,
    `  Machine type    : ${lastSegment(instance.machineType)}`,
    `  Service account : ${currentServiceAccount(instance) ?? "(none)"}`,
  ],

  resolve: async (input, identity, _instance, services) => {
    const email = await presetOrAsk(
      services,
      input.serviceAccount,
      "Service account email (NAME@PROJECT.iam.gserviceaccount.com)",
      "--service-account"
    );
    if (email === undefined) return undefined;

    const managed = parseManagedAccount(email);
    const accountProject = managed?.project ?? identity.project;

    if (services.state.describeServiceAccount(accountProject, email).found) {
      return { email, accountProject, accountFound: true };
    }

    if (!managed) {
      throw new ValidationError(
        `Service account ${email} does not exist and is not a user-managed account that can be created`
      );
    }

    const create =
      input.create ??
      (await services.decisions.confirm(
        `Service account ${email} does not exist. Create it?`,
        "--create"
      ));
    if (!create) {
      throw new ValidationError(`Service account ${email} does not exist; cannot proceed without it`);
    }
    return { email, accountProject, accountFound: false };
  },

  plan: (identity, instance, desired) =>
    buildPlan(
      identity,
      { instance, accountExists: desired.accountFound },
      desired,
      vmServiceAccountSpec(desired)
    ),
};
