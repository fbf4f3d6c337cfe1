/**
 * dispatcher.test.ts - Unit tests for execute and emit dispatch
 *
 * Execute mode gets a fake CommandRunner; emit modes write into a fresh
 * temporary directory per test.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, statSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { dispatch } from "./dispatcher";
import { createIdentity } from "./identity";
import { renderScript } from "./script";
import { ActionExecutionError } from "../errors";
import type { Action, CommandRunner, Plan } from "./types";

// ---------------------------------------------------------------------------
// Test fixture helpers
// ---------------------------------------------------------------------------

function makeAction(name: string, overrides: Partial<Action> = {}): Action {
  return {
    description: `Step ${name}`,
    fields: [name],
    command: { program: "gcloud", args: ["step", name] },
    classification: "required",
    idempotency: "safe-repeat",
    tier: "configure",
    ...overrides,
  };
}

function makePlan(minimal: Action[], full: Action[] = minimal): Plan {
  return {
    identity: createIdentity("instance", {
      project: "my-project",
      location: "us-central1-a",
      parent: "vm-1",
      name: "vm-1",
    }),
    deltas: [],
    minimal,
    full,
    diagnostics: [],
  };
}

const ok: CommandRunner = () => ({ output: "", isError: false });

// ---------------------------------------------------------------------------
// Execute
// ---------------------------------------------------------------------------

describe("dispatch (execute)", () => {
  it("runs every minimal action in order", async () => {
    const run = vi.fn<CommandRunner>(() => ({ output: "done", isError: false }));
    const plan = makePlan([makeAction("a"), makeAction("b")]);

    const result = await dispatch(plan, "execute", { run, outputDir: "unused", onProgress: () => {} });

    expect(run.mock.calls.map(([command]) => command.args[1])).toEqual(["a", "b"]);
    expect(result).toMatchObject({ status: "succeeded", succeeded: 2, failed: 0, notAttempted: 0 });
    expect(result.outcomes.map((o) => o.status)).toEqual(["succeeded", "succeeded"]);
  });

  it("stops at the first failure and accounts for every action", async () => {
    const run = vi.fn<CommandRunner>((command) =>
      command.args[1] === "b" ? { output: "PERMISSION_DENIED\n", isError: true } : { output: "", isError: false }
    );
    const plan = makePlan([makeAction("a"), makeAction("b"), makeAction("c")]);

    const result = await dispatch(plan, "execute", { run, outputDir: "unused", onProgress: () => {} });

    expect(run).toHaveBeenCalledTimes(2);
    expect(result).toMatchObject({ status: "failed", succeeded: 1, failed: 1, notAttempted: 1 });
    expect(result.outcomes.map((o) => [o.action.description, o.status])).toEqual([
      ["Step a", "succeeded"],
      ["Step b", "failed"],
      ["Step c", "not-attempted"],
    ]);
    expect(result.error).toBeInstanceOf(ActionExecutionError);
    expect(result.error?.message).toBe(
      "Action failed: Step b (1 succeeded before it, 1 not attempted)\nPERMISSION_DENIED"
    );
  });

  it("reports progress with the rendered command", async () => {
    const progress: string[] = [];
    const plan = makePlan([makeAction("a", { command: { program: "gcloud", args: ["label", "env=prod"] } })]);

    await dispatch(plan, "execute", { run: ok, outputDir: "unused", onProgress: (m) => progress.push(m) });

    expect(progress).toEqual(["[1/1] Step a", String.raw`  $ gcloud label env\=prod`]);
  });

  it("is a no-op for an empty minimal plan", async () => {
    const run = vi.fn<CommandRunner>(ok);
    const progress: string[] = [];

    const result = await dispatch(makePlan([], [makeAction("a")]), "execute", {
      run,
      outputDir: "unused",
      onProgress: (m) => progress.push(m),
    });

    expect(run).not.toHaveBeenCalled();
    expect(result.status).toBe("no-op");
    expect(progress).toEqual(["Nothing to change."]);
  });
});

// ---------------------------------------------------------------------------
// Emit
// ---------------------------------------------------------------------------

describe("dispatch (emit)", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "gcp-reconcile-dispatch-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes the full plan as an executable script and runs nothing", async () => {
    const run = vi.fn<CommandRunner>(ok);
    const plan = makePlan([makeAction("a")], [makeAction("a"), makeAction("b")]);

    const result = await dispatch(plan, "emit-full", { run, outputDir: dir, onProgress: () => {} });

    const path = join(dir, "vm-1-apply-full.sh");
    expect(result).toMatchObject({ mode: "emit-full", status: "succeeded", scriptPath: path });
    expect(readFileSync(path, "utf-8")).toBe(renderScript(plan, "full"));
    expect(statSync(path).mode & 0o777).toBe(0o755);
    expect(run).not.toHaveBeenCalled();
  });

  it("writes the minimal plan under its own name, creating the directory", async () => {
    const outputDir = join(dir, "nested", "scripts");
    const progress: string[] = [];

    const result = await dispatch(makePlan([makeAction("a")]), "emit-minimal", {
      run: ok,
      outputDir,
      onProgress: (m) => progress.push(m),
    });

    const path = join(outputDir, "vm-1-apply-minimal.sh");
    expect(result.scriptPath).toBe(path);
    expect(progress).toEqual([`Wrote ${path} (1 action(s))`]);
  });

  it("still writes a script when there is nothing to change", async () => {
    const result = await dispatch(makePlan([]), "emit-minimal", { run: ok, outputDir: dir, onProgress: () => {} });

    expect(result.status).toBe("no-op");
    expect(readFileSync(join(dir, "vm-1-apply-minimal.sh"), "utf-8")).toContain("# Actions: 0\n");
  });
});
