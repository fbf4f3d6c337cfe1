/**
 * comparators.test.ts - Unit tests for field comparison and normalization
 */

import { describe, it, expect } from "vitest";
import {
  fieldDiffers,
  formatFieldValue,
  formatLabels,
  formatTaint,
  normalizeSet,
  normalizeTaintEffect,
  normalizeTaintString,
  parseWholeNumber,
  splitList,
  withoutReservedLabels,
} from "./comparators";
import { InvalidResizeError } from "../errors";

describe("normalizeTaintEffect", () => {
  it("maps the API enum to the kubectl form", () => {
    expect(normalizeTaintEffect("NO_SCHEDULE")).toBe("NoSchedule");
    expect(normalizeTaintEffect("NO_EXECUTE")).toBe("NoExecute");
    expect(normalizeTaintEffect("PREFER_NO_SCHEDULE")).toBe("PreferNoSchedule");
  });

  it("is stable when applied twice", () => {
    for (const effect of ["NO_SCHEDULE", "NO_EXECUTE", "PREFER_NO_SCHEDULE"]) {
      const once = normalizeTaintEffect(effect);
      expect(normalizeTaintEffect(once)).toBe(once);
    }
  });

  it("passes unknown effects through", () => {
    expect(normalizeTaintEffect("Custom")).toBe("Custom");
  });
});

describe("taint formatting", () => {
  it("formats a provider taint as key=value:Effect", () => {
    expect(formatTaint({ key: "dedicated", value: "gpu", effect: "NO_SCHEDULE" })).toBe(
      "dedicated=gpu:NoSchedule"
    );
  });

  it("keeps the = when the taint has no value", () => {
    expect(formatTaint({ key: "spot", effect: "PREFER_NO_SCHEDULE" })).toBe("spot=:PreferNoSchedule");
  });

  it("normalizes operator input in enum style", () => {
    expect(normalizeTaintString("dedicated=gpu:NO_EXECUTE")).toBe("dedicated=gpu:NoExecute");
    expect(normalizeTaintString("dedicated=gpu:NoExecute")).toBe("dedicated=gpu:NoExecute");
  });
});

describe("labels", () => {
  it("drops reserved goog-gke labels and sorts the rest", () => {
    expect(
      formatLabels({ team: "infra", "goog-gke-node-pool-provisioning-model": "on-demand", env: "prod" })
    ).toEqual(["env=prod", "team=infra"]);
  });

  it("drops reserved labels from operator input", () => {
    expect(withoutReservedLabels(["env=prod", "goog-gke-x=1"])).toEqual(["env=prod"]);
  });
});

describe("list helpers", () => {
  it("splits a comma-separated option, trimming blanks", () => {
    expect(splitList(" a, b ,,c ")).toEqual(["a", "b", "c"]);
  });

  it("de-duplicates and sorts a set", () => {
    expect(normalizeSet(["b", "a", "b", " "])).toEqual(["a", "b"]);
  });
});

describe("parseWholeNumber", () => {
  it.each([
    [100, 100],
    ["200", 200],
    [" 50 ", 50],
    ["50GB", undefined],
    ["1.5", undefined],
    [1.5, undefined],
    [-1, undefined],
    ["", undefined],
  ])("parses %j as %j", (input, expected) => {
    expect(parseWholeNumber(input)).toBe(expected);
  });
});

describe("fieldDiffers", () => {
  it("never differs when the desired value is kept", () => {
    expect(fieldDiffers("exact", "machineType", "e2-medium", undefined)).toBe(false);
    expect(fieldDiffers("grow", "sizeGb", 100, undefined)).toBe(false);
  });

  describe("exact", () => {
    it("compares strings", () => {
      expect(fieldDiffers("exact", "machineType", "e2-medium", "e2-medium")).toBe(false);
      expect(fieldDiffers("exact", "machineType", "e2-medium", "e2-standard-4")).toBe(true);
    });

    it("treats an absent current value as different", () => {
      expect(fieldDiffers("exact", "machineType", undefined, "e2-medium")).toBe(true);
    });

    it("compares numbers and strings by their text", () => {
      expect(fieldDiffers("exact", "nodeCount", 3, "3")).toBe(false);
    });
  });

  describe("set", () => {
    it("ignores order and duplicates", () => {
      expect(fieldDiffers("set", "labels", ["b=2", "a=1"], ["a=1", "b=2", "a=1"])).toBe(false);
    });

    it("treats an absent current value as the empty set", () => {
      expect(fieldDiffers("set", "labels", undefined, [])).toBe(false);
      expect(fieldDiffers("set", "labels", undefined, ["a=1"])).toBe(true);
    });

    it("detects a removed entry", () => {
      expect(fieldDiffers("set", "taints", ["a=1:NoSchedule", "b=2:NoSchedule"], ["a=1:NoSchedule"])).toBe(true);
    });
  });

  describe("grow", () => {
    it("differs when the desired size is larger", () => {
      expect(fieldDiffers("grow", "sizeGb", 100, "200")).toBe(true);
    });

    it("rejects an equal size", () => {
      expect(() => fieldDiffers("grow", "sizeGb", 100, "100")).toThrow(InvalidResizeError);
    });

    it("rejects a smaller size", () => {
      expect(() => fieldDiffers("grow", "sizeGb", 100, 50)).toThrow(InvalidResizeError);
    });

    it("rejects non-numeric input", () => {
      expect(() => fieldDiffers("grow", "sizeGb", 100, "200GB")).toThrow(InvalidResizeError);
      expect(() => fieldDiffers("grow", "sizeGb", 100, "0")).toThrow(InvalidResizeError);
    });
  });

  describe("presence", () => {
    it("differs only while the current side is absent", () => {
      expect(fieldDiffers("presence", "binding", undefined, true)).toBe(true);
      expect(fieldDiffers("presence", "binding", false, true)).toBe(true);
      expect(fieldDiffers("presence", "binding", true, true)).toBe(false);
    });
  });
});

describe("formatFieldValue", () => {
  it("renders absent and empty values", () => {
    expect(formatFieldValue(undefined)).toBe("(none)");
    expect(formatFieldValue([])).toBe("(empty)");
    expect(formatFieldValue(["a", "b"])).toBe("a,b");
    expect(formatFieldValue(true)).toBe("true");
  });
});
