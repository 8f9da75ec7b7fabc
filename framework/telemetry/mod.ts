/**
 * Telemetry & Observability
 *
 * Structured logging and OpenTelemetry span helpers.
 */

export {
  Logger,
  getLogger,
  setLogger,
  createLogger,
  createRequestLogger,
  serializeError,
  type LogLevel,
  type LogFormat,
  type LogEntry,
  type SerializedError,
  type LoggerOptions,
  type RequestLogContext,
} from './logger.ts';

export {
  isOTELEnabled,
  getActiveSpan,
  setRouteAttribute,
  recordSpanException,
  getOTELTracer,
  withSpan,
  withDbSpan,
  SpanKind,
  SpanStatusCode,
  type CreateSpanOptions,
  type Span as OTELSpan,
  type Attributes as OTELAttributes,
} from './otel.ts';
