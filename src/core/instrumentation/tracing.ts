/**
 * @fileoverview OpenTelemetry span helpers
 * @module core/instrumentation/tracing
 *
 * Only the API package is used: spans are no-ops unless the host process
 * registers an SDK.
 */

import { SpanStatusCode, trace, type Span, type Tracer } from '@opentelemetry/api';

/**
 * Get tracer instance for a component
 */
export function getTracer(name: string = 'dockside', version: string = '0.1.0'): Tracer {
  return trace.getTracer(name, version);
}

/**
 * Execute function with tracing
 *
 * @param tracer - Tracer instance
 * @param spanName - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 * @returns Function result
 */
export async function withTracing<T>(
  tracer: Tracer,
  spanName: string,
  fn: (span: Span) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const span = tracer.startSpan(spanName);
  if (attributes) {
    span.setAttributes(attributes);
  }

  try {
    const result = await fn(span);
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    span.recordException(err);
    span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
    throw error;
  } finally {
    span.end();
  }
}
