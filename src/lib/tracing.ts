import { trace, SpanStatusCode, type Span } from "@opentelemetry/api";

type SpanAttributes = Record<string, string | number | boolean>;

/**
 * Get the tracer for the thumbnail cache.
 * Uses lazy initialization so a provider registered after import is picked up.
 */
function getTracer() {
  return trace.getTracer("thumbcache");
}

function recordFailure(span: Span, error: unknown): void {
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: error instanceof Error ? error.message : String(error),
  });
  span.recordException(error instanceof Error ? error : new Error(String(error)));
}

/**
 * Wraps an async function with an OpenTelemetry span.
 * Automatically records errors and sets span status.
 *
 * @param name - The span name (e.g., "thumbnails.make")
 * @param fn - The async function to trace
 * @param attributes - Optional attributes to add to the span
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  attributes?: SpanAttributes
): Promise<T> {
  return getTracer().startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        span.setAttributes(attributes);
      }
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      recordFailure(span, error);
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Wraps a sync function with an OpenTelemetry span.
 * Useful for CPU-bound operations such as crop geometry.
 */
export function withSpanSync<T>(
  name: string,
  fn: (span: Span) => T,
  attributes?: SpanAttributes
): T {
  const span = getTracer().startSpan(name);
  try {
    if (attributes) {
      span.setAttributes(attributes);
    }
    const result = fn(span);
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    recordFailure(span, error);
    throw error;
  } finally {
    span.end();
  }
}

/**
 * Add an event to the current active span.
 * Useful for marking milestones (cache hit, miss, transcode) within a request.
 */
export function addSpanEvent(name: string, attributes?: SpanAttributes): void {
  const currentSpan = trace.getActiveSpan();
  if (currentSpan) {
    currentSpan.addEvent(name, attributes);
  }
}
