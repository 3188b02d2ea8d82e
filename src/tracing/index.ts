/**
 * tracing/index.ts - OpenTelemetry setup and span helpers
 *
 * What this file does:
 * Registers a TracerProvider when tracing is enabled and gives the rest of
 * the code one helper, withSpan(), for wrapping async work in a span.
 *
 * Opt-in:
 * Nothing is registered unless OTEL_TRACING_ENABLED=true. Without a
 * registered provider the OTel API hands out a no-op tracer, so withSpan()
 * is always safe to call.
 *
 * Exporter options:
 * - console (default): prints spans to stdout, for development
 * - otlp: sends spans over HTTP/protobuf to a collector (Jaeger, an agent, etc.)
 *
 * What never goes on a span:
 * Query vectors and composed entity text. Spans carry ids, kinds, counts,
 * limits and filter names only.
 */

import {
  SpanKind,
  SpanStatusCode,
  context,
  trace,
  type Attributes,
  type Span,
  type Tracer,
} from "@opentelemetry/api";
import {
  ConsoleSpanExporter,
  NodeTracerProvider,
  SimpleSpanProcessor,
  type SpanExporter,
} from "@opentelemetry/sdk-trace-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-proto";
import { ConfigurationError } from "../errors";

const SERVICE_NAME = "report-similarity";

export interface TracingOptions {
  enabled: boolean;
  exporterType: "console" | "otlp";
  otlpEndpoint?: string;
  onProgress?: (message: string) => void;
}

/**
 * Handle returned by initTracing(). `shutdown` flushes pending spans.
 */
export interface TracingHandle {
  enabled: boolean;
  shutdown(): Promise<void>;
}

/**
 * Builds the span exporter for the configured type.
 *
 * The OTLP endpoint is normalized so both `http://host:4318` and
 * `http://host:4318/v1/traces/` resolve to the traces path.
 */
export function createSpanExporter(
  options: Pick<TracingOptions, "exporterType" | "otlpEndpoint">
): SpanExporter {
  if (options.exporterType === "otlp") {
    if (!options.otlpEndpoint) {
      throw new ConfigurationError(
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp. " +
          "Set it to your collector URL (e.g., http://localhost:4318)."
      );
    }
    const base = options.otlpEndpoint.replace(/\/+$/, "");
    const url = base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
    return new OTLPTraceExporter({ url });
  }
  return new ConsoleSpanExporter();
}

/**
 * Registers the global TracerProvider when tracing is enabled.
 *
 * Spans are exported as soon as they end (SimpleSpanProcessor); the CLI is
 * short-lived and batching would drop spans on exit.
 */
export function initTracing(options: TracingOptions): TracingHandle {
  if (!options.enabled) {
    return { enabled: false, shutdown: async () => undefined };
  }

  const onProgress = options.onProgress ?? console.log; // eslint-disable-line no-console
  const exporter = createSpanExporter(options);

  const provider = new NodeTracerProvider();
  provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
  provider.register();

  onProgress(`[OTel] Tracing enabled for ${SERVICE_NAME} (${options.exporterType} exporter)`);

  return {
    enabled: true,
    shutdown: () => provider.shutdown(),
  };
}

export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

/**
 * Runs `fn` inside a span named `name`.
 *
 * The span is made active with context.with() so spans started inside `fn`
 * (across awaits) become its children. A thrown error is recorded on the
 * span, the status set to ERROR, and the error rethrown unchanged.
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const span = getTracer().startSpan(name, {
    kind: SpanKind.INTERNAL,
    attributes,
  });
  const activeContext = trace.setSpan(context.active(), span);

  return context.with(activeContext, async () => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
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
}
