/**
 * HTTP Server
 *
 * Wraps node:http with fetch-style Request/Response objects so handlers
 * stay independent of the Node socket API.
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server as NodeServer } from 'node:http';
import { Lifecycle } from '../runtime/lifecycle.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';

export interface ListenAddress {
  hostname: string;
  port: number;
}

export type FetchHandler = (request: Request) => Promise<Response> | Response;

export interface ServerOptions {
  port?: number;
  hostname?: string;
  onListen?: (addr: ListenAddress) => void;
  onError?: (error: Error) => Response;
  handler: FetchHandler;
  logger?: Logger;
}

/**
 * HTTP Server for applications built on this framework
 */
export class Server {
  private handler: FetchHandler;
  private lifecycle: Lifecycle;
  private options: ServerOptions;
  private logger: Logger;
  private server?: NodeServer;

  constructor(options: ServerOptions, lifecycle?: Lifecycle) {
    this.handler = options.handler;
    this.options = {
      ...options,
      port: options.port ?? 8000,
      hostname: options.hostname ?? '127.0.0.1',
    };
    this.logger = options.logger ?? getLogger();
    this.lifecycle = lifecycle ?? new Lifecycle();
  }

  /**
   * Start the server. Resolves once the server has closed.
   */
  async serve(): Promise<void> {

    await this.lifecycle.emitStart();

    const server = createServer((req, res) => {
      this.dispatch(req, res).catch((error: unknown) => {
        this.logger.error('Failed to write response', toError(error));
        res.destroy();
      });
    });
    this.server = server;

    const closed = new Promise<void>((resolve) => {
      server.once('close', () => resolve());
    });

    this.lifecycle.signal.addEventListener('abort', () => this.close(), { once: true });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.hostname, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const address = server.address();
    if (address !== null && typeof address === 'object') {
      this.options.onListen?.({ hostname: address.address, port: address.port });
    }
    await this.lifecycle.emitReady();

    await closed;
  }

  /**
   * Translate a node:http exchange into a Request, run the handler and
   * stream the Response back.
   */
  private async dispatch(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const request = await toRequest(req, this.options.hostname ?? '127.0.0.1', this.options.port ?? 8000);
    const response = await this.handleRequest(request);

    const headers: Record<string, string | string[]> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });
    const cookies = response.headers.getSetCookie();
    if (cookies.length > 0) {
      headers['set-cookie'] = cookies;
    }

    res.writeHead(response.status, headers);
    if (req.method === 'HEAD' || response.body === null) {
      res.end();
      return;
    }
    res.end(Buffer.from(await response.arrayBuffer()));
  }

  private async handleRequest(request: Request): Promise<Response> {
    try {
      return await this.handler(request);
    } catch (error) {
      const err = toError(error);
      this.logger.error('Request error', err, { method: request.method, url: request.url });
      if (this.options.onError) {
        return this.options.onError(err);
      }
      return new Response('Internal Server Error', { status: 500 });
    }
  }

  /**
   * Stop accepting connections and let in-flight requests finish
   */
  close(): void {
    this.server?.close();
    this.server?.closeIdleConnections();
  }
}

async function toRequest(req: IncomingMessage, hostname: string, port: number): Promise<Request> {
  const host = req.headers.host ?? `${hostname}:${port}`;
  const url = new URL(req.url ?? '/', `http://${host}`);

  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const v of value) headers.append(name, v);
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  }

  const method = req.method ?? 'GET';
  if (method === 'GET' || method === 'HEAD') {
    return new Request(url, { method, headers });
  }

  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return new Request(url, { method, headers, body: chunks.length > 0 ? new Blob(chunks) : null });
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
