/**
 * identity.test.ts - Unit tests for identity construction
 */

import { describe, it, expect } from "vitest";
import { createIdentity, describeIdentity } from "./identity";
import { MissingIdentityFieldError, ParseError } from "../errors";

describe("createIdentity", () => {
  it("trims every field and freezes the result", () => {
    const identity = createIdentity("node-pool", {
      project: " my-project ",
      location: "us-central1",
      parent: "prod-cluster",
      name: "pool-a\n",
    });

    expect(identity).toEqual({
      kind: "node-pool",
      project: "my-project",
      location: "us-central1",
      parent: "prod-cluster",
      name: "pool-a",
    });
    expect(Object.isFrozen(identity)).toBe(true);
  });

  it("lists every empty field at once", () => {
    const build = () =>
      createIdentity(
        "node-pool",
        { project: "my-project", location: "  ", parent: "prod-cluster" },
        "Expected a node pool console URL"
      );

    expect(build).toThrow(MissingIdentityFieldError);
    expect(build).toThrow(ParseError);
    expect(build).toThrow(
      "Missing required identity field(s): location, name. Expected a node pool console URL"
    );
  });

  it("reports the missing fields on the error", () => {
    try {
      createIdentity("disk", {});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingIdentityFieldError);
      if (error instanceof MissingIdentityFieldError) {
        expect(error.missing).toEqual(["project", "location", "parent", "name"]);
      }
    }
  });
});

describe("describeIdentity", () => {
  it("names the owner when it differs from the resource", () => {
    const identity = createIdentity("node-pool", {
      project: "my-project",
      location: "us-central1",
      parent: "prod-cluster",
      name: "pool-a",
    });

    expect(describeIdentity(identity)).toBe(
      "node-pool pool-a (prod-cluster, us-central1, project my-project)"
    );
  });

  it("omits the owner for resources that are their own parent", () => {
    const identity = createIdentity("instance", {
      project: "my-project",
      location: "us-central1-a",
      parent: "vm-1",
      name: "vm-1",
    });

    expect(describeIdentity(identity)).toBe("instance vm-1 (us-central1-a, project my-project)");
  });
});
