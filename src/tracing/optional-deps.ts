/**
 * optional-deps.ts - Loaders for the optional OTel SDK packages
 *
 * The SDK and the OTLP exporter are optional peer dependencies; each loader
 * returns null when its package is not installed. Tests replace this module
 * with vi.mock("./optional-deps") to simulate either case.
 */

function isModuleNotFound(error: unknown, packageName: string): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error as NodeJS.ErrnoException).code === "MODULE_NOT_FOUND" &&
    error.message.includes(packageName)
  );
}

/**
 * Runs `load`, mapping a missing package to null. Any other failure (a
 * broken install, a missing transitive dependency) is rethrown.
 */
function loadOptional<T>(packageName: string, load: () => T): T | null {
  try {
    return load();
  } catch (error) {
    if (isModuleNotFound(error, packageName)) return null;
    throw error;
  }
}

/** NodeTracerProvider, SimpleSpanProcessor and ConsoleSpanExporter */
export function loadSdkTraceNode(): typeof import("@opentelemetry/sdk-trace-node") | null {
  return loadOptional("@opentelemetry/sdk-trace-node", () => require("@opentelemetry/sdk-trace-node"));
}

/** OTLPTraceExporter, for OTEL_EXPORTER_TYPE=otlp */
export function loadExporterOtlpProto(): typeof import("@opentelemetry/exporter-trace-otlp-proto") | null {
  return loadOptional("@opentelemetry/exporter-trace-otlp-proto", () =>
    require("@opentelemetry/exporter-trace-otlp-proto")
  );
}
