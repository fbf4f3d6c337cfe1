/**
 * iam-replicate.test.ts - Unit tests for IAM role replication
 */

import { describe, it, expect, vi } from "vitest";
import { iamReplicateTool, type IamReplicateInput, type IamReplicateSnapshot } from "./iam-replicate";
import type { ToolServices } from "../engine";
import { ValidationError } from "../errors";
import type { DecisionPort } from "../decision";
import type { StateProvider } from "../state/provider";
import { iamPolicySchema, type IamPolicy } from "../state/schemas";

// ---------------------------------------------------------------------------
// Test fixture helpers
// ---------------------------------------------------------------------------

const ALICE = "user:alice@example.com";
const BOB = "user:bob@example.com";

const POLICIES: Record<string, IamPolicy> = {
  "my-project": iamPolicySchema.parse({
    bindings: [
      { role: "roles/viewer", members: [ALICE, BOB] },
      {
        role: "roles/storage.admin",
        members: [ALICE],
        condition: { title: "expires", expression: "request.time < timestamp('2030-01-01T00:00:00Z')" },
      },
      { role: "roles/logging.viewer", members: [ALICE] },
    ],
  }),
  "other-project": iamPolicySchema.parse({}),
};

interface DecisionOptions {
  /** Index of the choice the fake operator picks */
  pick?: number;
  answer?: string;
}

function createServices(options: DecisionOptions = {}) {
  const unexpected = (): never => {
    throw new Error("unexpected state lookup");
  };
  const state = {
    describeNodePool: unexpected,
    getClusterVersion: unexpected,
    describeInstance: unexpected,
    describeDisk: unexpected,
    describeServiceAccount: unexpected,
    getProjectIamPolicy: vi.fn((project: string) => POLICIES[project]),
    getServiceAccountIamPolicy: unexpected,
    getKubernetesObject: unexpected,
  } satisfies StateProvider;
  const decisions = {
    chooseMode: vi.fn(async () => "execute" as const),
    ask: vi.fn(async () => options.answer ?? ""),
    choose: async <T extends string>(_q: string, _o: string, choices: readonly { value: T }[]) =>
      choices[options.pick ?? 0].value,
    confirm: vi.fn(async () => false),
  } satisfies DecisionPort;
  return { state, decisions, onProgress: () => {} } satisfies ToolServices;
}

const INPUT: IamReplicateInput = { project: "my-project", principal: ALICE };

const SNAPSHOT: IamReplicateSnapshot = {
  roles: ["roles/viewer", "roles/logging.viewer"],
  skipped: ["roles/storage.admin"],
};

const identity = () => iamReplicateTool.locate(INPUT);

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("iamReplicateTool.fetch", () => {
  it("separates unconditional roles from conditional ones", () => {
    expect(iamReplicateTool.fetch(INPUT, identity(), createServices())).toEqual(SNAPSHOT);
  });

  it("fails when the principal holds no unconditional role", () => {
    const input = { project: "my-project", principal: "user:carol@example.com" };

    expect(() => iamReplicateTool.fetch(input, iamReplicateTool.locate(input), createServices())).toThrow(
      new ValidationError("No unconditional roles found for user:carol@example.com in project my-project")
    );
  });
});

describe("iamReplicateTool.describe", () => {
  it("lists the roles and the skipped conditional ones", () => {
    expect(iamReplicateTool.describe?.(SNAPSHOT)).toEqual([
      "  Roles (2):",
      "    roles/viewer",
      "    roles/logging.viewer",
      "  Conditional, not replicated: roles/storage.admin",
    ]);
  });
});

describe("iamReplicateTool.resolve", () => {
  it("replicates to another principal given as an option", async () => {
    const desired = await iamReplicateTool.resolve({ ...INPUT, targetPrincipal: BOB }, identity(), SNAPSHOT, createServices());

    expect(desired).toEqual({ project: "my-project", principal: BOB, roles: SNAPSHOT.roles });
  });

  it("replicates to another project given as an option", async () => {
    const desired = await iamReplicateTool.resolve(
      { ...INPUT, targetProject: "other-project" },
      identity(),
      SNAPSHOT,
      createServices()
    );

    expect(desired).toEqual({ project: "other-project", principal: ALICE, roles: SNAPSHOT.roles });
  });

  it("rejects the source itself as the target", async () => {
    await expect(
      iamReplicateTool.resolve({ ...INPUT, targetProject: "my-project" }, identity(), SNAPSHOT, createServices())
    ).rejects.toThrow(ValidationError);
  });

  it("asks which kind of target, then for the principal", async () => {
    const services = createServices({ pick: 0, answer: BOB });
    const choose = vi.spyOn(services.decisions, "choose");

    const desired = await iamReplicateTool.resolve(INPUT, identity(), SNAPSHOT, services);

    expect(desired?.principal).toBe(BOB);
    expect(choose).toHaveBeenCalledWith("Replicate to", "--target-principal or --target-project", [
      { value: "principal", name: "Another principal in my-project" },
      { value: "project", name: `${ALICE} in another project` },
    ]);
    expect(services.decisions.ask).toHaveBeenCalledWith(
      "Target principal (user:, group: or serviceAccount:)",
      "--target-principal",
      undefined
    );
  });

  it("asks for the project when another project is picked", async () => {
    const services = createServices({ pick: 1, answer: "other-project" });

    const desired = await iamReplicateTool.resolve(INPUT, identity(), SNAPSHOT, services);

    expect(desired).toEqual({ project: "other-project", principal: ALICE, roles: SNAPSHOT.roles });
  });

  it("resolves to nothing when the answer is empty", async () => {
    expect(await iamReplicateTool.resolve(INPUT, identity(), SNAPSHOT, createServices())).toBeUndefined();
  });
});

describe("iamReplicateTool.plan", () => {
  it("grants only the roles the target is missing", () => {
    const plan = iamReplicateTool.plan(
      identity(),
      SNAPSHOT,
      { project: "my-project", principal: BOB, roles: SNAPSHOT.roles },
      createServices()
    );

    expect(plan.identity).toMatchObject({ project: "my-project", name: BOB });
    expect(plan.minimal.map((a) => a.fields)).toEqual([["roles/logging.viewer"]]);
    expect(plan.minimal[0].command.args).toEqual([
      "projects", "add-iam-policy-binding", "my-project",
      "--member", BOB,
      "--role", "roles/logging.viewer",
      "--condition", "None",
      "--quiet",
    ]);
    expect(plan.full.map((a) => a.fields[0])).toEqual(["roles/viewer", "roles/logging.viewer"]);
  });

  it("grants every role in a project where the principal has none", () => {
    const plan = iamReplicateTool.plan(
      identity(),
      SNAPSHOT,
      { project: "other-project", principal: ALICE, roles: SNAPSHOT.roles },
      createServices()
    );

    expect(plan.minimal.map((a) => a.description)).toEqual([
      `Grant roles/viewer to ${ALICE} on project other-project`,
      `Grant roles/logging.viewer to ${ALICE} on project other-project`,
    ]);
  });

  it("reports skipped conditional roles as warnings", () => {
    const plan = iamReplicateTool.plan(
      identity(),
      SNAPSHOT,
      { project: "other-project", principal: ALICE, roles: SNAPSHOT.roles },
      createServices()
    );

    expect(plan.diagnostics).toEqual([
      {
        severity: "warning",
        field: "roles/storage.admin",
        message: "Conditional binding of roles/storage.admin is not replicated",
      },
    ]);
  });
});
