/**
 * OpenTelemetry Integration
 *
 * Span helpers for framework operations. Tracing is opt-in through
 * OTEL_ENABLED=true; the host application registers an SDK (a
 * NodeTracerProvider or similar) with the global API. When tracing is off
 * the callbacks still run, against a non-recording span.
 *
 * @module
 */

import {
  trace,
  context,
  INVALID_SPAN_CONTEXT,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Context,
  type Attributes,
} from '@opentelemetry/api';

export function isOTELEnabled(): boolean {
  return process.env.OTEL_ENABLED === 'true';
}

let _tracer: Tracer | null = null;

export function getOTELTracer(name = 'trellis', version = '0.1.0'): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(name, version);
  }
  return _tracer;
}

export interface CreateSpanOptions {
  /** Span kind (default: INTERNAL) */
  kind?: SpanKind;
  attributes?: Attributes;
  /** Parent context (uses the active context if not provided) */
  parentContext?: Context;
}

/**
 * Mark a span as failed with the given error
 */
export function recordSpanError(span: Span, error: unknown): void {
  const err = error instanceof Error ? error : new Error(String(error));
  span.recordException(err);
  span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
}

/**
 * Run a function inside a new active span. The span is ended when the
 * function settles; a rejection is recorded on the span and rethrown.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {},
): Promise<T> {
  if (!isOTELEnabled()) {
    return await fn(trace.wrapSpanContext(INVALID_SPAN_CONTEXT));
  }

  return getOTELTracer().startActiveSpan(
    name,
    { kind: options.kind ?? SpanKind.INTERNAL, attributes: options.attributes },
    options.parentContext ?? context.active(),
    async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        recordSpanError(span, error);
        throw error;
      } finally {
        span.end();
      }
    },
  );
}

/**
 * Server span for one request. The route template and response status are
 * added once known.
 */
export async function withRequestSpan(
  method: string,
  path: string,
  route: string | null,
  fn: () => Promise<Response>,
): Promise<Response> {
  return withSpan(route ? `${method} ${route}` : method, async (span) => {
    const response = await fn();
    if (route) {
      span.setAttribute('http.route', route);
    }
    span.setAttribute('http.response.status_code', response.status);
    if (response.status >= 500) {
      span.setStatus({ code: SpanStatusCode.ERROR });
    }
    return response;
  }, {
    kind: SpanKind.SERVER,
    attributes: {
      'http.request.method': method,
      'url.path': path,
    },
  });
}

/**
 * Key/value store operation span. Only the key's first segment is recorded:
 * later segments can be credentials such as session keys.
 *
 * @param operation - Store operation name (e.g., 'get', 'set', 'delete')
 * @param system - Backend identifier ('memory', 'redis')
 */
export async function withDbSpan<T>(
  operation: string,
  key: readonly string[],
  system: string,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return withSpan(`db.${operation}`, fn, {
    kind: SpanKind.CLIENT,
    attributes: {
      'db.system': system,
      'db.operation': operation,
      'db.collection.name': key[0] ?? '',
    },
  });
}

export async function withMiddlewareSpan<T>(
  middleware: string,
  phase: 'request' | 'response',
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return withSpan(`middleware.${phase}`, fn, {
    attributes: {
      'middleware.name': middleware,
      'middleware.phase': phase,
    },
  });
}
