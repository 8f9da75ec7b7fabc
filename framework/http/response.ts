/**
 * Response Builder
 *
 * Fluent interface for building HTTP responses: HTML, text, redirects
 * and static files.
 */

import { readFile, stat } from 'node:fs/promises';
import { extname } from 'node:path';

export interface ResponseOptions {
  status?: number;
  headers?: Headers | Record<string, string>;
}

/**
 * Response builder
 */
export class WebResponse {
  private _status: number = 200;
  private _headers: Headers = new Headers();
  private _body: string | Blob | null = null;

  constructor(options?: ResponseOptions) {
    if (options?.status) {
      this._status = options.status;
    }
    if (options?.headers) {
      new Headers(options.headers).forEach((value, key) => {
        this._headers.set(key, value);
      });
    }
  }

  /**
   * Set the response status code
   */
  status(code: number): this {
    this._status = code;
    return this;
  }

  get statusCode(): number {
    return this._status;
  }

  header(name: string, value: string): this {
    this._headers.set(name, value);
    return this;
  }

  /**
   * Set the Content-Type header
   */
  type(contentType: string): this {
    this._headers.set('Content-Type', contentType);
    return this;
  }

  /**
   * Send an HTML response
   */
  html(content: string): Response {
    this._headers.set('Content-Type', 'text/html; charset=utf-8');
    this._body = content;
    return this.build();
  }

  /**
   * Send a plain text response
   */
  text(content: string): Response {
    this._headers.set('Content-Type', 'text/plain; charset=utf-8');
    this._body = content;
    return this.build();
  }

  /**
   * Send a redirect response
   */
  redirect(url: string, status: 301 | 302 | 303 | 307 | 308 = 302): Response {
    this._status = status;
    this._headers.set('Location', url);
    this._body = null;
    return this.build();
  }

  /**
   * Send a file from disk. Missing files and directories answer 404.
   */
  async file(path: string): Promise<Response> {
    const info = await stat(path).catch(() => null);
    if (!info || !info.isFile()) {
      return this.notFound();
    }

    const ext = extname(path).slice(1).toLowerCase();
    this._headers.set('Content-Type', MIME_TYPES[ext] ?? 'application/octet-stream');
    this._headers.set('Content-Length', info.size.toString());
    this._body = new Blob([await readFile(path)]);
    return this.build();
  }

  /**
   * Send a 404 Not Found response
   */
  notFound(message = 'Not Found'): Response {
    this._status = 404;
    return this.text(message);
  }

  /**
   * Send a 500 Internal Server Error response
   */
  serverError(message = 'Internal Server Error'): Response {
    this._status = 500;
    return this.text(message);
  }

  /**
   * Build the final Response object
   */
  build(): Response {
    return new Response(this._body, {
      status: this._status,
      headers: new Headers(this._headers),
    });
  }
}

const MIME_TYPES: Record<string, string> = {
  html: 'text/html; charset=utf-8',
  css: 'text/css; charset=utf-8',
  js: 'application/javascript; charset=utf-8',
  json: 'application/json; charset=utf-8',
  txt: 'text/plain; charset=utf-8',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  svg: 'image/svg+xml',
  webp: 'image/webp',
  ico: 'image/x-icon',
  woff: 'font/woff',
  woff2: 'font/woff2',
};
