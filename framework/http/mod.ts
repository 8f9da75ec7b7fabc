/**
 * HTTP/Server Layer
 *
 * Bridges node:http to fetch-style Request/Response objects and wraps
 * them into richer request/response helpers.
 */

export { Server, type ServerOptions, type ListenAddress } from './server.ts';
export { WebRequest, type RequestContext } from './request.ts';
export { WebResponse, type ResponseOptions } from './response.ts';
export type {
  Handler,
  Context,
  Middleware,
  Next,
  RouteHandler,
  HttpMethod,
} from './types.ts';
