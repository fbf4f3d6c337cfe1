/**
 * tracing/index.ts - OpenTelemetry setup for gcp-reconcile
 *
 * A trace covers one invocation: the subcommand span (command-tracing.ts)
 * with one child span per gcloud/kubectl call (utils/cli.ts).
 *
 * Environment:
 *   OTEL_TRACING_ENABLED=true       turn tracing on (off by default)
 *   OTEL_EXPORTER_TYPE=console|otlp console is the default
 *   OTEL_EXPORTER_OTLP_ENDPOINT     collector base URL, required for otlp
 *
 * The SDK packages are optional peers (see optional-deps.ts). Without them,
 * or with tracing off, getTracer() hands out the API's no-op tracer.
 *
 * Initialization runs at import time, so index.ts imports this module first.
 */

import { trace, type Tracer } from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import { loadExporterOtlpProto, loadSdkTraceNode } from "./optional-deps";

const SERVICE_NAME = "gcp-reconcile";
const TRACES_PATH = "/v1/traces";

const sdkTraceNode = loadSdkTraceNode();
const exporterOtlpProto = loadExporterOtlpProto();

/** `http://host:4318/` and `http://host:4318/v1/traces` both become the traces URL */
function tracesUrl(endpoint: string): { base: string; url: string } {
  const base = endpoint.replace(/\/+$/, "");
  return { base, url: base.endsWith(TRACES_PATH) ? base : `${base}${TRACES_PATH}` };
}

function otlpExporter(): SpanExporter {
  if (!exporterOtlpProto) {
    throw new Error(
      "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto. " +
        "Install it: npm install @opentelemetry/exporter-trace-otlp-proto"
    );
  }
  const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT;
  if (!endpoint) {
    throw new Error(
      "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp " +
        "(e.g., http://localhost:4318)."
    );
  }
  const { base, url } = tracesUrl(endpoint);
  console.log(`[OTel] Using OTLP exporter → ${base}`); // eslint-disable-line no-console
  return new exporterOtlpProto.OTLPTraceExporter({ url });
}

/** @throws Error for an unknown OTEL_EXPORTER_TYPE or a missing package */
function spanExporter(sdk: typeof import("@opentelemetry/sdk-trace-node")): SpanExporter {
  const type = process.env.OTEL_EXPORTER_TYPE || "console";
  switch (type) {
    case "otlp":
      return otlpExporter();
    case "console":
      console.log("[OTel] Using console exporter"); // eslint-disable-line no-console
      return new sdk.ConsoleSpanExporter();
    default:
      throw new Error(`Unsupported OTEL_EXPORTER_TYPE: "${type}". Valid options: "console", "otlp".`);
  }
}

/**
 * Registers a global provider. Spans go out through a SimpleSpanProcessor:
 * a run lasts seconds, and nothing may be left in a batch at exit.
 *
 * @returns the provider's shutdown, or null when tracing stays off
 */
function initTracing(): (() => Promise<void>) | null {
  if (process.env.OTEL_TRACING_ENABLED !== "true") return null;

  if (!sdkTraceNode) {
    console.warn(
      "[OTel] OTEL_TRACING_ENABLED=true but @opentelemetry/sdk-trace-node is not installed. " +
        "Tracing will be no-op."
    );
    return null;
  }

  console.log("[OTel] Initializing OpenTelemetry tracing..."); // eslint-disable-line no-console
  const provider = new sdkTraceNode.NodeTracerProvider({
    spanProcessors: [new sdkTraceNode.SimpleSpanProcessor(spanExporter(sdkTraceNode))],
  });
  provider.register();
  console.log(`[OTel] Tracing enabled for ${SERVICE_NAME}`); // eslint-disable-line no-console

  return () => provider.shutdown();
}

const shutdownProvider = initTracing();

export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

/**
 * Flushes pending spans before the CLI exits. A failed flush is reported,
 * not thrown: the run's own exit code stands.
 */
export async function shutdownTracing(): Promise<void> {
  if (!shutdownProvider) return;
  try {
    await shutdownProvider();
  } catch (error) {
    console.error("[OTel] Error shutting down tracing:", error);
  }
}
