/**
 * URL Router
 *
 * Matches method + path against URLPattern route definitions.
 */

import { URLPattern } from 'urlpattern-polyfill';
import type { Handler, HttpMethod } from '../http/types.ts';

export interface RouteDefinition {
  method: HttpMethod | HttpMethod[] | '*';
  pattern: URLPattern;
  handler: Handler;
}

export interface RouteMatch {
  route: RouteDefinition;
  params: Record<string, string>;
  handler: Handler;
}

/**
 * URL Router
 */
export class Router {
  private routes: RouteDefinition[] = [];
  private prefix: string;

  constructor(prefix: string = '') {
    this.prefix = prefix;
  }

  get(path: string, handler: Handler): this {
    return this.addRoute('GET', path, handler);
  }

  post(path: string, handler: Handler): this {
    return this.addRoute('POST', path, handler);
  }

  /**
   * Register a route for all methods
   */
  all(path: string, handler: Handler): this {
    return this.addRoute('*', path, handler);
  }

  /**
   * Add a route with explicit method(s)
   */
  addRoute(
    method: HttpMethod | HttpMethod[] | '*',
    path: string,
    handler: Handler
  ): this {
    this.routes.push({
      method,
      pattern: new URLPattern({ pathname: this.prefix + path }),
      handler,
    });
    return this;
  }

  /**
   * Copy the routes of another router into this one
   */
  merge(router: Router): this {
    this.routes.push(...router.getRoutes());
    return this;
  }

  /**
   * Match a request to a route. HEAD requests fall back to GET routes.
   */
  match(method: string, path: string): RouteMatch | null {
    const url = new URL(path, 'http://localhost');
    const wanted = method.toUpperCase();

    for (const route of this.routes) {
      if (!methodMatches(route.method, wanted)) {
        continue;
      }

      const result = route.pattern.exec(url.href);
      if (result) {
        const params: Record<string, string> = {};
        for (const [key, value] of Object.entries(result.pathname.groups)) {
          if (value !== undefined) {
            params[key] = value;
          }
        }
        return { route, params, handler: route.handler };
      }
    }

    return null;
  }

  /**
   * Methods registered for a path, used to tell 404 from 405
   */
  allowedMethods(path: string): HttpMethod[] {
    const url = new URL(path, 'http://localhost');
    const methods = new Set<HttpMethod>();

    for (const route of this.routes) {
      if (!route.pattern.test(url.href)) continue;
      if (route.method === '*') return ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];
      for (const m of Array.isArray(route.method) ? route.method : [route.method]) {
        methods.add(m);
      }
    }

    return [...methods];
  }

  getRoutes(): RouteDefinition[] {
    return [...this.routes];
  }
}

function methodMatches(method: RouteDefinition['method'], wanted: string): boolean {
  if (method === '*') return true;
  const methods: string[] = Array.isArray(method) ? method : [method];
  return methods.includes(wanted) || (wanted === 'HEAD' && methods.includes('GET'));
}
