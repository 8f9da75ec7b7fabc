/**
 * Middleware Layer
 *
 * Cross-cutting concerns that wrap every request/response cycle.
 */

export { MiddlewarePipeline } from './pipeline.ts';
export { loggingMiddleware, type LoggingOptions } from './logging.ts';
