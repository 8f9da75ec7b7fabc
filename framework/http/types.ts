/**
 * HTTP Type Definitions
 */

import type { WebRequest } from './request.ts';
import type { WebResponse } from './response.ts';

/**
 * Request context for middleware and context-style handlers
 */
export interface Context {
  request: Request;
  url: URL;
  params: Record<string, string>;
  query: URLSearchParams;
  state: Map<string, unknown>;
  header(name: string): string | null;
  method: string;
}

/**
 * Middleware next function
 */
export type Next = () => Promise<Response>;

/**
 * Request handler working on the wrapped request/response pair
 */
export type Handler = (
  req: WebRequest,
  res: WebResponse
) => Promise<Response | void> | Response | void;

/**
 * Route handler using context
 */
export type RouteHandler = (ctx: Context) => Promise<Response> | Response;

/**
 * Middleware function signature (onion model)
 */
export type Middleware = (
  ctx: Context,
  next: Next
) => Promise<Response> | Response;

/**
 * HTTP methods understood by the router
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';
