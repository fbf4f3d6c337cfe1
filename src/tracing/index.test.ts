/**
 * index.test.ts - Unit tests for tracing setup
 *
 * Setup happens at import time, so every test resets the module registry and
 * imports the module again under its own environment. The optional SDK
 * packages are replaced by mocking optional-deps.ts.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";

// ---------------------------------------------------------------------------
// Hoisted SDK fakes
// ---------------------------------------------------------------------------

const sdk = vi.hoisted(() => {
  const register = vi.fn();
  const shutdown = vi.fn(async () => {});
  return {
    installed: { traceNode: true, otlp: true },
    register,
    shutdown,
    // Plain functions: these are called with `new`
    NodeTracerProvider: vi.fn(function () {
      return { register, shutdown };
    }),
    SimpleSpanProcessor: vi.fn(function () {}),
    ConsoleSpanExporter: vi.fn(function () {}),
    OTLPTraceExporter: vi.fn(function () {}),
  };
});

vi.mock("./optional-deps", () => ({
  loadSdkTraceNode: () =>
    sdk.installed.traceNode
      ? {
          NodeTracerProvider: sdk.NodeTracerProvider,
          SimpleSpanProcessor: sdk.SimpleSpanProcessor,
          ConsoleSpanExporter: sdk.ConsoleSpanExporter,
        }
      : null,
  loadExporterOtlpProto: () => (sdk.installed.otlp ? { OTLPTraceExporter: sdk.OTLPTraceExporter } : null),
}));

// ---------------------------------------------------------------------------
// Test fixture helpers
// ---------------------------------------------------------------------------

const ORIGINAL_ENV = { ...process.env };
const OTEL_VARS = ["OTEL_TRACING_ENABLED", "OTEL_EXPORTER_TYPE", "OTEL_EXPORTER_OTLP_ENDPOINT"];

function loadTracing(env: Record<string, string> = {}) {
  Object.assign(process.env, env);
  return import("./index");
}

let log: MockInstance<typeof console.log>;

beforeEach(() => {
  vi.resetModules();
  vi.clearAllMocks();
  for (const name of OTEL_VARS) delete process.env[name];
  sdk.installed.traceNode = true;
  sdk.installed.otlp = true;
  log = vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  process.env = { ...ORIGINAL_ENV };
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("tracing off", () => {
  it("registers nothing and stays quiet", async () => {
    await loadTracing();

    expect(sdk.NodeTracerProvider).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
  });

  it("still hands out a usable tracer", async () => {
    const { getTracer } = await loadTracing();

    expect(getTracer().startSpan).toBeTypeOf("function");
  });

  it("has nothing to shut down", async () => {
    const { shutdownTracing } = await loadTracing();

    await expect(shutdownTracing()).resolves.toBeUndefined();
    expect(sdk.shutdown).not.toHaveBeenCalled();
  });
});

describe("tracing on without the SDK", () => {
  it("warns and falls back to the no-op tracer", async () => {
    sdk.installed.traceNode = false;
    sdk.installed.otlp = false;
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const { getTracer } = await loadTracing({ OTEL_TRACING_ENABLED: "true" });

    expect(warn).toHaveBeenCalledWith(expect.stringContaining("@opentelemetry/sdk-trace-node is not installed"));
    expect(getTracer().startSpan).toBeTypeOf("function");
  });
});

describe("tracing on", () => {
  it("registers one provider with a simple span processor over the console exporter", async () => {
    await loadTracing({ OTEL_TRACING_ENABLED: "true" });

    expect(sdk.ConsoleSpanExporter).toHaveBeenCalledOnce();
    expect(sdk.SimpleSpanProcessor).toHaveBeenCalledOnce();
    expect(sdk.NodeTracerProvider).toHaveBeenCalledWith({ spanProcessors: [expect.any(Object)] });
    expect(sdk.register).toHaveBeenCalledOnce();
    expect(log.mock.calls.flat()).toEqual([
      "[OTel] Initializing OpenTelemetry tracing...",
      "[OTel] Using console exporter",
      "[OTel] Tracing enabled for gcp-reconcile",
    ]);
  });

  it("shuts the provider down", async () => {
    const { shutdownTracing } = await loadTracing({ OTEL_TRACING_ENABLED: "true" });

    await shutdownTracing();

    expect(sdk.shutdown).toHaveBeenCalledOnce();
  });

  it("logs a failed shutdown instead of throwing", async () => {
    const failure = new Error("collector unreachable");
    sdk.shutdown.mockRejectedValueOnce(failure);
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const { shutdownTracing } = await loadTracing({ OTEL_TRACING_ENABLED: "true" });

    await expect(shutdownTracing()).resolves.toBeUndefined();
    expect(error).toHaveBeenCalledWith("[OTel] Error shutting down tracing:", failure);
  });
});

describe("exporter selection", () => {
  const otlp = (endpoint?: string) => ({
    OTEL_TRACING_ENABLED: "true",
    OTEL_EXPORTER_TYPE: "otlp",
    ...(endpoint === undefined ? {} : { OTEL_EXPORTER_OTLP_ENDPOINT: endpoint }),
  });

  it.each([
    ["http://localhost:4318", "http://localhost:4318/v1/traces"],
    ["http://localhost:4318/", "http://localhost:4318/v1/traces"],
    ["http://localhost:4318/v1/traces", "http://localhost:4318/v1/traces"],
  ])("sends spans from endpoint %s to %s", async (endpoint, url) => {
    await loadTracing(otlp(endpoint));

    expect(sdk.OTLPTraceExporter).toHaveBeenCalledWith({ url });
    expect(sdk.ConsoleSpanExporter).not.toHaveBeenCalled();
  });

  it("requires the OTLP package for the otlp type", async () => {
    sdk.installed.otlp = false;

    await expect(loadTracing(otlp("http://localhost:4318"))).rejects.toThrow(
      "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto"
    );
  });

  it("requires an endpoint for the otlp type", async () => {
    await expect(loadTracing(otlp())).rejects.toThrow("OTEL_EXPORTER_OTLP_ENDPOINT is required");
  });

  it("rejects an unknown type", async () => {
    await expect(loadTracing({ OTEL_TRACING_ENABLED: "true", OTEL_EXPORTER_TYPE: "zipkin" })).rejects.toThrow(
      'Unsupported OTEL_EXPORTER_TYPE: "zipkin"'
    );
  });
});
