/**
 * Enhanced Request Object
 *
 * Wraps the fetch-style Request with route parameters, per-request state
 * and cached body parsing.
 */

export interface RequestContext {
  params: Record<string, string>;
  query: URLSearchParams;
  state: Map<string, unknown>;
  startTime: number;
}

const FORM_CONTENT_TYPE = /^\s*(application\/x-www-form-urlencoded|multipart\/form-data)\b/i;

/**
 * Request wrapper handed to controllers
 */
export class WebRequest {
  private _request: Request;
  private _url: URL;
  private _context: RequestContext;
  private _form: Promise<FormData> | null = null;

  constructor(request: Request, context?: Partial<RequestContext>) {
    this._request = request;
    this._url = new URL(request.url);
    this._context = {
      params: context?.params ?? {},
      query: this._url.searchParams,
      state: context?.state ?? new Map(),
      startTime: context?.startTime ?? performance.now(),
    };
  }

  /**
   * The underlying Request
   */
  get raw(): Request {
    return this._request;
  }

  get method(): string {
    return this._request.method;
  }

  get url(): string {
    return this._request.url;
  }

  /**
   * URL path (without query string)
   */
  get path(): string {
    return this._url.pathname;
  }

  get query(): URLSearchParams {
    return this._context.query;
  }

  /**
   * Route parameters extracted from path
   */
  get params(): Record<string, string> {
    return this._context.params;
  }

  get headers(): Headers {
    return this._request.headers;
  }

  header(name: string): string | null {
    return this._request.headers.get(name);
  }

  /**
   * Request state for passing data between middleware and handlers
   */
  get state(): Map<string, unknown> {
    return this._context.state;
  }

  get startTime(): number {
    return this._context.startTime;
  }

  get contentType(): string | null {
    return this.header('Content-Type');
  }

  /**
   * Parse the body as FormData (urlencoded or multipart). The body is read
   * once; later calls reuse the parsed value.
   */
  formData(): Promise<FormData> {
    if (!this._form) {
      this._form = this._request.formData();
    }
    return this._form;
  }

  /**
   * Text fields of a submitted form. Files and repeated keys are ignored
   * (the first text value wins). A missing body, or one that is not form
   * encoded, yields no fields.
   */
  async form(): Promise<Record<string, string>> {
    if (!FORM_CONTENT_TYPE.test(this.contentType ?? '')) {
      return {};
    }

    let data: FormData;
    try {
      data = await this.formData();
    } catch (error) {
      // undici rejects unparseable bodies with TypeError
      if (error instanceof TypeError) return {};
      throw error;
    }

    const fields: Record<string, string> = {};
    for (const [name, value] of data.entries()) {
      if (typeof value === 'string' && !(name in fields)) {
        fields[name] = value;
      }
    }
    return fields;
  }

  /**
   * Set route parameters (used by the application after matching)
   */
  setParams(params: Record<string, string>): void {
    this._context.params = params;
  }
}
