/**
 * vm-machine-type.test.ts - Unit tests for the VM machine type tool
 *
 * State lookups and decisions are fakes; execute mode records commands
 * instead of running them.
 */

import { describe, it, expect, vi } from "vitest";
import { vmMachineTypeTool } from "./vm-machine-type";
import { runTool, type CommandRunner, type ToolServices } from "../engine";
import { ParseError, StateFetchError } from "../errors";
import type { DecisionPort } from "../decision";
import type { StateProvider } from "../state/provider";
import type { Instance } from "../state/schemas";

// ---------------------------------------------------------------------------
// Test fixture helpers
// ---------------------------------------------------------------------------

const URL =
  "https://console.cloud.google.com/compute/instancesDetail/zones/us-central1-a/instances/vm-1?project=my-project";

function makeInstance(overrides: Partial<Instance> = {}): Instance {
  return {
    name: "vm-1",
    status: "RUNNING",
    machineType: "https://www.googleapis.com/compute/v1/projects/my-project/zones/us-central1-a/machineTypes/e2-medium",
    ...overrides,
  };
}

function createMockState(instance: Instance | undefined): StateProvider {
  const unexpected = (): never => {
    throw new Error("unexpected state lookup");
  };
  return {
    describeNodePool: unexpected,
    getClusterVersion: unexpected,
    describeInstance: vi.fn(() => (instance ? { found: true as const, value: instance } : { found: false as const })),
    describeDisk: unexpected,
    describeServiceAccount: unexpected,
    getProjectIamPolicy: unexpected,
    getServiceAccountIamPolicy: unexpected,
    getKubernetesObject: unexpected,
  };
}

function createMockDecisions(answer = "") {
  return {
    chooseMode: vi.fn(async () => "execute" as const),
    ask: vi.fn(async (_question: string, _option: string) => answer),
    choose: async <T extends string>(_q: string, _o: string, choices: readonly { value: T }[]) => choices[0].value,
    confirm: vi.fn(async () => false),
  } satisfies DecisionPort;
}

function createServices(instance: Instance | undefined, answer = ""): ToolServices {
  return { state: createMockState(instance), decisions: createMockDecisions(answer), onProgress: () => {} };
}

const identity = () => vmMachineTypeTool.locate({ url: URL });

const stop = ["compute", "instances", "stop", "vm-1", "--zone", "us-central1-a", "--project", "my-project"];
const start = ["compute", "instances", "start", "vm-1", "--zone", "us-central1-a", "--project", "my-project"];
const setMachineType = [
  "compute", "instances", "set-machine-type", "vm-1",
  "--zone", "us-central1-a", "--project", "my-project",
  "--machine-type", "e2-standard-4",
];

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("vmMachineTypeTool.locate", () => {
  it("builds an instance identity from a console URL", () => {
    expect(identity()).toEqual({
      kind: "instance",
      project: "my-project",
      location: "us-central1-a",
      parent: "vm-1",
      name: "vm-1",
    });
  });

  it("rejects a disk URL", () => {
    expect(() =>
      vmMachineTypeTool.locate({
        url: "https://console.cloud.google.com/compute/disksDetail/zones/us-central1-a/disks/data-1?project=my-project",
      })
    ).toThrow(ParseError);
  });
});

describe("vmMachineTypeTool.fetch", () => {
  it("fails when the VM does not exist", () => {
    expect(() => vmMachineTypeTool.fetch({ url: URL }, identity(), createServices(undefined))).toThrow(
      new StateFetchError("VM vm-1 not found in zone us-central1-a of project my-project")
    );
  });
});

describe("vmMachineTypeTool.resolve", () => {
  it("asks for the machine type, showing the current one", async () => {
    const services = createServices(makeInstance(), "e2-standard-4");

    const desired = await vmMachineTypeTool.resolve({ url: URL }, identity(), makeInstance(), services);

    expect(desired).toEqual({ machineType: "e2-standard-4" });
    expect(services.decisions.ask).toHaveBeenCalledWith(
      "New machine type (current: e2-medium)",
      "--machine-type",
      undefined
    );
  });

  it("resolves to nothing on an empty answer", async () => {
    expect(
      await vmMachineTypeTool.resolve({ url: URL }, identity(), makeInstance(), createServices(makeInstance(), "  "))
    ).toBeUndefined();
  });
});

describe("vmMachineTypeTool.plan", () => {
  const plan = (instance: Instance, machineType: string) =>
    vmMachineTypeTool.plan(identity(), instance, { machineType }, createServices(instance));

  it("stops, resizes and starts a running VM", () => {
    const result = plan(makeInstance(), "e2-standard-4");

    expect(result.minimal.map((a) => a.command.args)).toEqual([stop, setMachineType, start]);
    expect(result.minimal.map((a) => a.description)).toEqual([
      "Stop VM vm-1",
      "Set machine type of vm-1 to e2-standard-4",
      "Start VM vm-1",
    ]);
  });

  it("skips the stop for a VM that is already stopped, but not in the full plan", () => {
    const result = plan(makeInstance({ status: "TERMINATED" }), "e2-standard-4");

    expect(result.minimal.map((a) => a.command.args)).toEqual([setMachineType, start]);
    expect(result.full.map((a) => a.command.args)).toEqual([stop, setMachineType, start]);
  });

  it("has nothing to do when the machine type is unchanged", () => {
    const result = plan(makeInstance(), "e2-medium");

    expect(result.minimal).toEqual([]);
    expect(result.full).toHaveLength(3);
  });

  it("guards the full-plan change with the current machine type", () => {
    const result = plan(makeInstance(), "e2-standard-4");

    expect(result.full[1].guard).toEqual({
      program: "bash",
      args: [
        "-c",
        `test "$(gcloud compute instances describe vm-1 --zone us-central1-a --project my-project --format 'value(machineType.basename())')" = e2-standard-4`,
      ],
    });
  });
});

describe("vm-machine-type end to end", () => {
  it("executes stop, set-machine-type and start in order", async () => {
    const execute = vi.fn<CommandRunner>(() => ({ output: "", isError: false }));

    const outcome = await runTool(
      vmMachineTypeTool,
      { url: URL, machineType: "e2-standard-4" },
      {
        state: createMockState(makeInstance()),
        decisions: createMockDecisions(),
        execute,
        outputDir: "unused",
        mode: "execute",
        onProgress: () => {},
      }
    );

    expect(outcome.phase).toBe("DONE");
    expect(execute.mock.calls.map(([command]) => command.args[2])).toEqual(["stop", "set-machine-type", "start"]);
  });
});
