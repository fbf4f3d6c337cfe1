/**
 * config.ts - Environment configuration for gcp-reconcile
 *
 * All settings come from environment variables so the same binary works on
 * an operator laptop and in a CI job. CLI options override them per run
 * (--output-dir). Tracing has its own OTEL_* variables, read in tracing/.
 *
 * | Variable                          | Default  | Meaning                                |
 * |-----------------------------------|----------|----------------------------------------|
 * | GCLOUD_BIN                        | gcloud   | gcloud executable                      |
 * | KUBECTL_BIN                       | kubectl  | kubectl executable                     |
 * | GCP_RECONCILE_READ_TIMEOUT_MS     | 60000    | timeout for state lookups              |
 * | GCP_RECONCILE_ACTION_TIMEOUT_MS   | 0        | timeout for executed actions (0 = none)|
 * | GCP_RECONCILE_OUTPUT_DIR          | cwd      | where emitted scripts are written      |
 */

import { z } from "zod";

const timeoutSchema = (fallback: number) =>
  z
    .string()
    .regex(/^\d+$/, "must be a whole number of milliseconds")
    .transform((value) => Number.parseInt(value, 10))
    .optional()
    .transform((value) => value ?? fallback);

const envSchema = z.object({
  GCLOUD_BIN: z.string().min(1).default("gcloud"),
  KUBECTL_BIN: z.string().min(1).default("kubectl"),
  GCP_RECONCILE_READ_TIMEOUT_MS: timeoutSchema(60_000),
  GCP_RECONCILE_ACTION_TIMEOUT_MS: timeoutSchema(0),
  GCP_RECONCILE_OUTPUT_DIR: z.string().min(1).optional(),
});

export interface ReconcileConfig {
  /** Executable substituted for the logical "gcloud" program */
  gcloudBin: string;
  /** Executable substituted for the logical "kubectl" program */
  kubectlBin: string;
  /** Timeout for read-only state lookups; 0 disables it */
  readTimeoutMs: number;
  /** Timeout for each executed action; 0 disables it */
  actionTimeoutMs: number;
  /** Directory for emitted scripts */
  outputDir: string;
}

/**
 * Reads and validates configuration from the environment.
 *
 * @throws Error naming the offending variable when a value is malformed
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ReconcileConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return {
    gcloudBin: parsed.data.GCLOUD_BIN,
    kubectlBin: parsed.data.KUBECTL_BIN,
    readTimeoutMs: parsed.data.GCP_RECONCILE_READ_TIMEOUT_MS,
    actionTimeoutMs: parsed.data.GCP_RECONCILE_ACTION_TIMEOUT_MS,
    outputDir: parsed.data.GCP_RECONCILE_OUTPUT_DIR ?? cwd,
  };
}
