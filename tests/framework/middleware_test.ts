/**
 * Middleware Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { MiddlewarePipeline } from '../../framework/middleware/pipeline.ts';
import { loggingMiddleware } from '../../framework/middleware/logging.ts';
import { Logger, type LogEntry } from '../../framework/telemetry/logger.ts';
import type { Context, Middleware, Next } from '../../framework/http/types.ts';

function createTestContext(path = '/test'): Context {
  const request = new Request(`http://localhost${path}`);
  const url = new URL(request.url);
  return {
    request,
    url,
    params: {},
    query: url.searchParams,
    state: new Map(),
    header: (name: string) => request.headers.get(name),
    method: request.method,
  };
}

function capture(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { logger: new Logger({ level: 'debug', output: (e) => entries.push(e) }), entries };
}

test('MiddlewarePipeline - wraps the final handler', async () => {
  const pipeline = new MiddlewarePipeline();

  pipeline.use(async (_ctx: Context, next: Next) => {
    const response = await next();
    return new Response('Modified', { status: response.status });
  });

  const handler: Middleware = async () => new Response('Original', { status: 201 });

  const response = await pipeline.execute(createTestContext(), handler);
  assert.equal(response.status, 201);
  assert.equal(await response.text(), 'Modified');
});

test('MiddlewarePipeline - runs middleware in onion order', async () => {
  const pipeline = new MiddlewarePipeline();
  const order: string[] = [];

  pipeline.use(async (_ctx, next) => {
    order.push('a:before');
    const response = await next();
    order.push('a:after');
    return response;
  });
  pipeline.use(async (_ctx, next) => {
    order.push('b:before');
    const response = await next();
    order.push('b:after');
    return response;
  });

  await pipeline.execute(createTestContext(), async () => {
    order.push('handler');
    return new Response('OK');
  });

  assert.deepEqual(order, ['a:before', 'b:before', 'handler', 'b:after', 'a:after']);
});

test('MiddlewarePipeline - short-circuits without calling next', async () => {
  const pipeline = new MiddlewarePipeline();
  let reached = false;

  pipeline.use(async () => new Response('Blocked', { status: 403 }));

  const response = await pipeline.execute(createTestContext(), async () => {
    reached = true;
    return new Response('OK');
  });

  assert.equal(response.status, 403);
  assert.equal(reached, false);
});

test('MiddlewarePipeline - state is shared through the chain', async () => {
  const pipeline = new MiddlewarePipeline();

  pipeline.use(async (ctx, next) => {
    ctx.state.set('user', 'reader');
    return await next();
  });

  const response = await pipeline.execute(createTestContext(), async (ctx) => {
    return new Response(String(ctx.state.get('user')));
  });

  assert.equal(await response.text(), 'reader');
});

test('MiddlewarePipeline - remove and length', () => {
  const pipeline = new MiddlewarePipeline();
  const mw: Middleware = async (_ctx, next) => await next();

  pipeline.use(mw);
  assert.equal(pipeline.length, 1);
  pipeline.remove(mw);
  assert.equal(pipeline.length, 0);
});

test('loggingMiddleware - logs method, path, status and duration', async () => {
  const { logger, entries } = capture();
  const pipeline = new MiddlewarePipeline().use(loggingMiddleware({ logger }));

  await pipeline.execute(createTestContext('/home?search=x'), async () => new Response('OK'));

  assert.equal(entries.length, 1);
  assert.equal(entries[0].level, 'info');
  assert.equal(entries[0].message, 'GET /home 200');
  assert.equal(entries[0].context?.path, '/home');
  assert.equal(entries[0].context?.status, 200);
  assert.equal(typeof entries[0].context?.duration, 'number');
});

test('loggingMiddleware - level follows status class', async () => {
  const { logger, entries } = capture();
  const pipeline = new MiddlewarePipeline().use(loggingMiddleware({ logger }));

  await pipeline.execute(createTestContext(), async () => new Response('', { status: 404 }));
  await pipeline.execute(createTestContext(), async () => new Response('', { status: 500 }));

  assert.deepEqual(
    entries.map((e) => e.level),
    ['warn', 'error']
  );
});

test('loggingMiddleware - excluded paths are not logged', async () => {
  const { logger, entries } = capture();
  const pipeline = new MiddlewarePipeline().use(loggingMiddleware({ logger, excludePaths: ['/_static'] }));

  await pipeline.execute(createTestContext('/_static/style.css'), async () => new Response('body{}'));

  assert.equal(entries.length, 0);
});
