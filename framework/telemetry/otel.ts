/**
 * OpenTelemetry Integration
 *
 * Thin helpers over `@opentelemetry/api`. Nothing is exported unless the
 * host process registers an SDK and sets OTEL_ENABLED=true; otherwise every
 * helper runs its callback against a no-op span.
 *
 * @module
 */

import {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Context,
  type Attributes,
} from '@opentelemetry/api';

const DEFAULT_SERVICE_NAME = 'library-catalog';

/**
 * Check if OpenTelemetry is enabled via the OTEL_ENABLED environment variable
 */
export function isOTELEnabled(): boolean {
  return process.env.OTEL_ENABLED === 'true';
}

/**
 * Get the currently active span, if any
 */
export function getActiveSpan(): Span | undefined {
  if (!isOTELEnabled()) return undefined;
  return trace.getActiveSpan();
}

/**
 * Annotate the active span with the matched route pattern
 */
export function setRouteAttribute(routePattern: string, method: string): void {
  const span = getActiveSpan();
  if (span) {
    span.setAttribute('http.route', routePattern);
    span.updateName(`${method} ${routePattern}`);
  }
}

/**
 * Record an exception on the active span and set error status
 */
export function recordSpanException(error: Error, message?: string): void {
  const span = getActiveSpan();
  if (span) {
    span.recordException(error);
    span.setStatus({
      code: SpanStatusCode.ERROR,
      message: message ?? error.message,
    });
  }
}

let _tracer: Tracer | undefined;

export function getOTELTracer(name = process.env.OTEL_SERVICE_NAME ?? DEFAULT_SERVICE_NAME, version = '0.1.0'): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(name, version);
  }
  return _tracer;
}

/**
 * Options for creating a new span
 */
export interface CreateSpanOptions {
  kind?: SpanKind;
  attributes?: Attributes;
  parentContext?: Context;
}

/**
 * Run a function inside a new active span. The span ends when the
 * function settles and carries its error, if any.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {},
): Promise<T> {
  if (!isOTELEnabled()) {
    const noopSpan = trace.getTracer('noop').startSpan('noop');
    try {
      return await fn(noopSpan);
    } finally {
      noopSpan.end();
    }
  }

  const tracer = getOTELTracer();
  const parentCtx = options.parentContext ?? context.active();

  return tracer.startActiveSpan(
    name,
    {
      kind: options.kind ?? SpanKind.INTERNAL,
      attributes: options.attributes,
    },
    parentCtx,
    async (span) => {
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
    },
  );
}

/**
 * Create a database operation span
 *
 * @param operation - SQL verb or repository operation (e.g. 'select', 'insert')
 * @param table - Table the operation touches
 */
export async function withDbSpan<T>(
  operation: string,
  table: string,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return withSpan(`db.${operation}`, fn, {
    kind: SpanKind.CLIENT,
    attributes: {
      'db.system': 'sqlite',
      'db.operation': operation,
      'db.sql.table': table,
    },
  });
}

export { SpanKind, SpanStatusCode, type Span, type Attributes };
