/**
 * tool-tracing.ts - OpenTelemetry instrumentation for MCP tool calls
 *
 * What this file does:
 * Wraps an MCP tool handler so every call gets a span named
 * "execute_tool <name>" with the GenAI tool attributes.
 *
 * Attributes captured:
 * | Attribute             | Description                              |
 * |-----------------------|------------------------------------------|
 * | gen_ai.operation.name | Always "execute_tool"                    |
 * | gen_ai.tool.name      | Tool name (e.g., find_similar_reports)   |
 * | gen_ai.tool.type      | Always "function"                        |
 * | gen_ai.tool.call.id   | Unique UUID per invocation               |
 * | tool.argument_keys    | Names of the arguments given, not values |
 *
 * Error handling:
 * - Thrown errors: recorded on the span, status ERROR, rethrown
 * - Tool failures (isError: true): status ERROR with the tool's message;
 *   the handler itself completed, so nothing is rethrown
 */

import { randomUUID } from "crypto";
import { SpanKind, SpanStatusCode, context, trace } from "@opentelemetry/api";
import { getTracer } from "./index";

interface ResultWithError {
  isError?: boolean;
}

export function withToolTracing<TInput extends object, TResult extends ResultWithError>(
  toolName: string,
  handler: (input: TInput) => Promise<TResult>
): (input: TInput) => Promise<TResult> {
  return async (input: TInput): Promise<TResult> => {
    const span = getTracer().startSpan(`execute_tool ${toolName}`, {
      kind: SpanKind.INTERNAL,
      attributes: {
        "gen_ai.operation.name": "execute_tool",
        "gen_ai.tool.name": toolName,
        "gen_ai.tool.type": "function",
        "gen_ai.tool.call.id": randomUUID(),
        "tool.argument_keys": Object.keys(input).sort().join(","),
      },
    });
    const activeContext = trace.setSpan(context.active(), span);

    return context.with(activeContext, async () => {
      try {
        const result = await handler(input);
        span.setStatus(
          result.isError
            ? { code: SpanStatusCode.ERROR, message: `${toolName} returned an error` }
            : { code: SpanStatusCode.OK }
        );
        return result;
      } catch (error) {
        const exception = error instanceof Error ? error : new Error(String(error));
        span.recordException(exception);
        span.setStatus({ code: SpanStatusCode.ERROR, message: exception.message });
        throw error;
      } finally {
        span.end();
      }
    });
  };
}
