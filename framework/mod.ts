/**
 * Web Framework
 *
 * Layered server-side framework for Node.js: HTTP bridge, middleware,
 * routing, controllers, SQLite persistence, templates, configuration and
 * telemetry.
 *
 * @module framework
 */

// Application
export { Application, type ApplicationOptions, type ListenOptions } from './app.ts';

// Layer 0: Runtime
export { Lifecycle, type LifecycleHook, type LifecycleOptions } from './runtime/mod.ts';

// Layer 1: HTTP/Server
export {
  Server,
  WebRequest,
  WebResponse,
  type Context,
  type Handler,
  type Middleware,
  type Next,
  type RouteHandler,
  type ServerOptions,
  type ListenAddress,
} from './http/mod.ts';

// Layer 2: Middleware
export { MiddlewarePipeline, loggingMiddleware, type LoggingOptions } from './middleware/mod.ts';

// Layer 3: Router
export { Router, type RouteDefinition, type RouteMatch } from './router/mod.ts';

// Layer 4: Controller
export { Controller, action } from './controller/mod.ts';

// Layer 5: ORM/Data
export {
  SqliteDatabase,
  ConstraintError,
  ValidationError,
  MEMORY_DATABASE,
  validators,
  validate,
  parseIsoDate,
  type DatabaseOptions,
  type ConstraintKind,
  type Validator,
} from './orm/mod.ts';

// Layer 8: View/Template
export {
  TemplateEngine,
  TemplateError,
  SafeHtml,
  html,
  escape,
  raw,
  type TemplateContext,
  type TemplateOptions,
} from './view/mod.ts';

// Layer 14: Config
export { Config, loadConfig, DEFAULT_CONFIG_PATH, type ConfigOptions } from './config/mod.ts';

// Layer 18: Telemetry
export {
  Logger,
  getLogger,
  setLogger,
  createLogger,
  withDbSpan,
  withSpan,
  isOTELEnabled,
  type LogLevel,
  type LogEntry,
} from './telemetry/mod.ts';
