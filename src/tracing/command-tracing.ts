/**
 * command-tracing.ts - OpenTelemetry instrumentation for CLI subcommands
 *
 * Provides a wrapper that adds a root span to a subcommand handler. Every
 * gcloud/kubectl span created while the handler runs is parented under it,
 * so one trace shows one invocation: lookups, plan, and executed actions.
 */

import { randomUUID } from "crypto";
import { SpanKind, SpanStatusCode, context, trace } from "@opentelemetry/api";
import { getTracer } from "./index";

/** Anything with an exit code can report it on the span. */
interface ResultWithExitCode {
  exitCode?: number;
}

/**
 * Wraps a subcommand handler with OpenTelemetry tracing.
 *
 * Span: "gcp-reconcile {commandName}", kind INTERNAL, attributes:
 * | Attribute                  | Description                              |
 * |----------------------------|------------------------------------------|
 * | cli.command.name           | Subcommand (e.g., nodepool-clone)        |
 * | cli.invocation.id          | Unique UUID per invocation               |
 * | cli.command.arguments      | JSON of the positional input and options |
 * | cli.exit_code              | Exit code the handler returned           |
 *
 * Error handling:
 * - Thrown errors: recorded with span.recordException(), status ERROR, rethrown
 * - Non-zero exit codes: status ERROR without an exception
 */
export function withCommandTracing<TInput, TResult extends ResultWithExitCode>(
  commandName: string,
  handler: (input: TInput) => Promise<TResult>
): (input: TInput) => Promise<TResult> {
  return async (input: TInput): Promise<TResult> => {
    const tracer = getTracer();

    // startSpan + context.with keeps the span active across the handler's awaits
    const span = tracer.startSpan(`gcp-reconcile ${commandName}`, {
      kind: SpanKind.INTERNAL,
    });

    span.setAttribute("cli.command.name", commandName);
    span.setAttribute("cli.invocation.id", randomUUID());
    span.setAttribute("cli.command.arguments", JSON.stringify(input));

    const activeContext = trace.setSpan(context.active(), span);

    return context.with(activeContext, async () => {
      try {
        const result = await handler(input);

        const exitCode = result.exitCode ?? 0;
        span.setAttribute("cli.exit_code", exitCode);
        span.setStatus(
          exitCode === 0
            ? { code: SpanStatusCode.OK }
            : { code: SpanStatusCode.ERROR, message: `exit code ${exitCode}` }
        );

        return result;
      } catch (error) {
        if (error instanceof Error) {
          span.recordException(error);
          span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
        } else {
          span.recordException(new Error(String(error)));
          span.setStatus({ code: SpanStatusCode.ERROR, message: String(error) });
        }

        throw error;
      } finally {
        span.end();
      }
    });
  };
}
