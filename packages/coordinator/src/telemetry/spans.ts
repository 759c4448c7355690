/**
 * Span helper utilities for manual instrumentation.
 *
 * Without a registered SDK the API hands out no-op spans, so these helpers
 * cost nothing when telemetry is disabled.
 */

import { trace, SpanStatusCode, type Span } from "@opentelemetry/api";
import { TELEMETRY_CONFIG } from "../config/telemetry.js";

const tracer = trace.getTracer(TELEMETRY_CONFIG.serviceName);

type Attributes = Record<string, string | number | boolean>;

/**
 * Wrap a synchronous function with a span.
 *
 * @example
 * ```ts
 * const receipt = withSpanSync("fleet.invoke", (span) => {
 *   span.setAttribute("fleet.targets", ids.length);
 *   return dispatch(ids);
 * }, { "fleet.action": "capture" });
 * ```
 */
export function withSpanSync<T>(
  name: string,
  fn: (span: Span) => T,
  attributes?: Attributes
): T {
  const span = tracer.startSpan(name);

  try {
    if (attributes) span.setAttributes(attributes);
    const result = fn(span);
    span.setStatus({ code: SpanStatusCode.OK });
    return result;
  } catch (error) {
    recordError(span, error);
    throw error;
  } finally {
    span.end();
  }
}

/**
 * Record an error on a span with standardized attributes.
 */
export function recordError(span: Span, error: unknown): void {
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: error instanceof Error ? error.message : String(error),
  });

  if (error instanceof Error) {
    span.recordException(error);
    span.setAttribute("error.type", error.name);
    span.setAttribute("error.message", error.message);
  } else {
    span.setAttribute("error.message", String(error));
  }
}

/**
 * Add fleet-shape attributes to a span.
 */
export function addFleetAttributes(
  span: Span,
  fleet: { size: number; selected: number; inFlight: number }
): void {
  span.setAttribute("fleet.size", fleet.size);
  span.setAttribute("fleet.selected", fleet.selected);
  span.setAttribute("fleet.in_flight", fleet.inFlight);
}
