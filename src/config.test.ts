/**
 * config.test.ts - Unit tests for environment configuration
 */

import { describe, it, expect } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({}, "/work")).toEqual({
      gcloudBin: "gcloud",
      kubectlBin: "kubectl",
      readTimeoutMs: 60_000,
      actionTimeoutMs: 0,
      outputDir: "/work",
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig(
      {
        GCLOUD_BIN: "/opt/google-cloud-sdk/bin/gcloud",
        KUBECTL_BIN: "kubectl-1.30",
        GCP_RECONCILE_READ_TIMEOUT_MS: "5000",
        GCP_RECONCILE_ACTION_TIMEOUT_MS: "900000",
        GCP_RECONCILE_OUTPUT_DIR: "/tmp/scripts",
      },
      "/work"
    );

    expect(config).toEqual({
      gcloudBin: "/opt/google-cloud-sdk/bin/gcloud",
      kubectlBin: "kubectl-1.30",
      readTimeoutMs: 5000,
      actionTimeoutMs: 900_000,
      outputDir: "/tmp/scripts",
    });
  });

  it("ignores unrelated variables", () => {
    expect(loadConfig({ PATH: "/usr/bin", HOME: "/root" }, "/work").gcloudBin).toBe("gcloud");
  });

  it("names the variable holding a malformed timeout", () => {
    expect(() => loadConfig({ GCP_RECONCILE_READ_TIMEOUT_MS: "60s" }, "/work")).toThrow(
      "Invalid configuration: GCP_RECONCILE_READ_TIMEOUT_MS: must be a whole number of milliseconds"
    );
  });
});
