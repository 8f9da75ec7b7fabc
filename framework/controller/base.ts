/**
 * Base Controller
 *
 * Provides common functionality for request handling.
 */

import type { WebRequest } from '../http/request.ts';
import type { WebResponse } from '../http/response.ts';
import type { Handler } from '../http/types.ts';
import type { TemplateContext, TemplateEngine } from '../view/template.ts';
import { ValidationError } from '../orm/validators.ts';

/**
 * Base controller class. A fresh instance serves each request.
 */
export abstract class Controller {
  private _request: WebRequest | null = null;
  private _response: WebResponse | null = null;

  constructor(protected readonly views: TemplateEngine) {}

  /**
   * Set the request/response context
   */
  setContext(req: WebRequest, res: WebResponse): this {
    this._request = req;
    this._response = res;
    return this;
  }

  protected get request(): WebRequest {
    if (!this._request) {
      throw new Error('Controller has no request context; call setContext() first');
    }
    return this._request;
  }

  protected get response(): WebResponse {
    if (!this._response) {
      throw new Error('Controller has no response context; call setContext() first');
    }
    return this._response;
  }

  /**
   * Route parameters
   */
  get params(): Record<string, string> {
    return this.request.params;
  }

  get query(): URLSearchParams {
    return this.request.query;
  }

  /**
   * Get a single query parameter
   */
  queryParam(name: string, defaultValue = ''): string {
    return this.request.query.get(name) ?? defaultValue;
  }

  /**
   * Get a required route parameter (throws ValidationError if missing)
   */
  requireParam(name: string): string {
    const value = this.params[name];
    if (!value) {
      throw new ValidationError([`Required parameter '${name}' is missing`]);
    }
    return value;
  }

  /**
   * Render a view to an HTML response
   */
  async render(view: string, context: TemplateContext = {}, status = 200): Promise<Response> {
    const body = await this.views.render(view, context);
    return this.html(body, status);
  }

  html(content: string, status = 200): Response {
    return this.response.status(status).html(content);
  }

  text(content: string, status = 200): Response {
    return this.response.status(status).text(content);
  }

  redirect(url: string, status: 301 | 302 | 303 | 307 | 308 = 302): Response {
    return this.response.redirect(url, status);
  }

  notFound(message = 'Not Found'): Response {
    return this.response.notFound(message);
  }
}

/**
 * Create a route handler from a controller action. `factory` builds the
 * controller for each request; a ValidationError thrown by the action
 * answers 400.
 *
 * @example
 * router.get('/home', action(() => new CatalogController(views, service), (c) => c.home()));
 */
export function action<T extends Controller>(
  factory: () => T,
  run: (controller: T) => Promise<Response>
): Handler {
  return async (req: WebRequest, res: WebResponse): Promise<Response> => {
    const controller = factory().setContext(req, res);
    try {
      return await run(controller);
    } catch (error) {
      if (error instanceof ValidationError) {
        return res.status(400).text(error.errors.join('\n'));
      }
      throw error;
    }
  };
}
