/**
 * Application Class
 *
 * Ties the router, middleware pipeline, configuration and server together.
 * `handle()` is the whole request path and can be driven in-process;
 * `listen()` puts it behind the HTTP server.
 */

import { randomUUID } from 'node:crypto';
import { Server, type ListenAddress } from './http/server.ts';
import { Router } from './router/router.ts';
import { MiddlewarePipeline } from './middleware/pipeline.ts';
import { Config, type ConfigOptions } from './config/config.ts';
import { createRequestLogger, getLogger, type Logger } from './telemetry/logger.ts';
import { recordSpanException, setRouteAttribute } from './telemetry/otel.ts';
import { Lifecycle } from './runtime/lifecycle.ts';
import type { Context, Handler, Middleware, RouteHandler } from './http/types.ts';
import { WebRequest } from './http/request.ts';
import { WebResponse } from './http/response.ts';

export interface ApplicationOptions {
  config?: Config | ConfigOptions;
  logger?: Logger;
  lifecycle?: Lifecycle;
  /** Response for paths no route matches (default: plain-text 404) */
  notFound?: (request: Request) => Response | Promise<Response>;
}

export interface ListenOptions {
  port?: number;
  hostname?: string;
  onListen?: (addr: ListenAddress) => void | Promise<void>;
}

/**
 * Main Application class
 */
export class Application {
  private server: Server | null = null;
  private router: Router;
  private middleware: MiddlewarePipeline;
  private config: Config;
  private logger: Logger;
  private _lifecycle: Lifecycle | null;
  private notFound: (request: Request) => Response | Promise<Response>;

  constructor(options: ApplicationOptions = {}) {
    this.config = options.config instanceof Config ? options.config : new Config(options.config);
    this.router = new Router();
    this.middleware = new MiddlewarePipeline();
    this.logger = options.logger ?? getLogger();
    this._lifecycle = options.lifecycle ?? null;
    this.notFound = options.notFound ?? (() => new WebResponse().notFound());
  }

  /**
   * Add global middleware
   */
  use(middleware: Middleware): this {
    this.middleware.use(middleware);
    return this;
  }

  /**
   * Wrap a context-based RouteHandler into a request/response Handler
   */
  private wrapHandler(handler: RouteHandler): Handler {
    return async (req: WebRequest): Promise<Response> => {
      return await handler(toContext(req.raw, req.params, req.state));
    };
  }

  get(path: string, handler: RouteHandler): this {
    this.router.get(path, this.wrapHandler(handler));
    return this;
  }

  post(path: string, handler: RouteHandler): this {
    this.router.post(path, this.wrapHandler(handler));
    return this;
  }

  /**
   * Register routes from a router
   */
  routes(router: Router): this {
    this.router.merge(router);
    return this;
  }

  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Lifecycle manager, created on first use so in-process callers of
   * `handle()` never install signal handlers
   */
  get lifecycle(): Lifecycle {
    if (!this._lifecycle) {
      this._lifecycle = new Lifecycle({ logger: this.logger });
    }
    return this._lifecycle;
  }

  /**
   * Handle one request: middleware, routing, controller. Never throws;
   * unexpected errors are logged and answered with 500.
   */
  async handle(request: Request): Promise<Response> {
    const url = new URL(request.url);
    const requestId = randomUUID();
    const logger = createRequestLogger(this.logger, {
      requestId,
      method: request.method,
      path: url.pathname,
      userAgent: request.headers.get('user-agent') ?? undefined,
    });

    const state = new Map<string, unknown>([
      ['requestId', requestId],
      ['logger', logger],
    ]);
    const context = toContext(request, {}, state);

    const dispatch: Middleware = async (ctx) => {
      try {
        return await this.route(ctx);
      } catch (error) {
        return this.fail(error, logger);
      }
    };

    try {
      return await this.middleware.execute(context, dispatch);
    } catch (error) {
      return this.fail(error, logger);
    }
  }

  private async route(ctx: Context): Promise<Response> {
    const match = this.router.match(ctx.method, ctx.url.pathname);

    if (!match) {
      const allowed = this.router.allowedMethods(ctx.url.pathname);
      if (allowed.length > 0) {
        return new WebResponse({ headers: { Allow: allowed.join(', ') } })
          .status(405)
          .text('Method Not Allowed');
      }
      return await this.notFound(ctx.request);
    }

    setRouteAttribute(match.route.pattern.pathname, ctx.method);

    ctx.params = match.params;
    const req = new WebRequest(ctx.request, { params: match.params, state: ctx.state });
    const res = new WebResponse();

    const result = await match.handler(req, res);
    return result instanceof Response ? result : res.build();
  }

  private fail(error: unknown, logger: Logger): Response {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error('Request error', err);
    recordSpanException(err);
    return new WebResponse().serverError();
  }

  /**
   * Start the server. Resolves once it has shut down.
   */
  async listen(options: ListenOptions = {}): Promise<void> {
    const port = options.port ?? this.config.number('port', 5002);
    const hostname = options.hostname ?? this.config.string('host', '127.0.0.1');

    this.server = new Server(
      {
        port,
        hostname,
        handler: (request) => this.handle(request),
        logger: this.logger,
        onListen: (addr) => {
          this.logger.info(`Server listening on http://${addr.hostname}:${addr.port}`);
          if (options.onListen) {
            Promise.resolve(options.onListen(addr)).catch((error: unknown) => {
              this.logger.error('onListen hook failed', error instanceof Error ? error : new Error(String(error)));
            });
          }
        },
      },
      this.lifecycle
    );

    this.lifecycle.onShutdown(() => this.stop());

    await this.server.serve();
  }

  /**
   * Stop the server
   */
  stop(): void {
    if (this.server) {
      this.server.close();
      this.server = null;
      this.logger.info('Application stopped');
    }
  }
}

function toContext(request: Request, params: Record<string, string>, state: Map<string, unknown>): Context {
  const url = new URL(request.url);
  return {
    request,
    url,
    params,
    query: url.searchParams,
    state,
    header: (name: string) => request.headers.get(name),
    method: request.method,
  };
}
