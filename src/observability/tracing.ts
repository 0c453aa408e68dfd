/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Spans for HTTP page requests, scrape runs and exports. The API package is a
 * no-op until the host process registers a tracer provider.
 *
 * Enable via environment variables:
 * - OTEL_ENABLED=1
 */

import { trace, context, SpanStatusCode, SpanKind } from '@opentelemetry/api';
import type { Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'ad-library-scraper';

/**
 * Check if OpenTelemetry is enabled
 */
export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

/**
 * Get the global tracer instance
 */
export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Generate a unique correlation ID for a scrape run
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 * @returns Result of fn
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  // If tracing disabled, execute without span
  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);

      span.setStatus({ code: SpanStatusCode.OK });

      return result;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      span.recordException(error instanceof Error ? error : message);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message,
      });

      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Create a span for HTTP requests
 */
export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    'http.method': method,
    'http.url': url,
    'span.kind': SpanKind.CLIENT,
  });
}

/**
 * Create a span for a whole scrape run
 */
export async function withScrapeSpan<T>(
  runId: string,
  query: string,
  region: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan('Scrape run', fn, {
    'scrape.run_id': runId,
    'scrape.query': query,
    'scrape.region': region,
  });
}

/**
 * Create a span for an export
 */
export async function withExportSpan<T>(
  format: string,
  destination: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Export ${format}`, fn, {
    'export.format': format,
    'export.destination': destination,
  });
}

/**
 * Get current span from context
 */
export function getCurrentSpan(): Span | undefined {
  if (!isOTelEnabled()) {
    return undefined;
  }
  return trace.getSpan(context.active());
}

/**
 * Add event to current span
 *
 * @param name - Event name
 * @param attributes - Event attributes
 */
export function addSpanEvent(name: string, attributes?: Record<string, string | number | boolean>): void {
  const span = getCurrentSpan();
  if (span) {
    span.addEvent(name, attributes);
  }
}
