/**
 * Controller Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Controller, action } from '../../framework/controller/base.ts';
import { WebRequest } from '../../framework/http/request.ts';
import { WebResponse } from '../../framework/http/response.ts';
import { TemplateEngine } from '../../framework/view/template.ts';

class GreetingController extends Controller {
  async show(): Promise<Response> {
    return await this.render('greeting', { name: this.queryParam('name', 'stranger') }, 201);
  }

  async item(): Promise<Response> {
    return this.text(`item ${this.requireParam('id')}`);
  }

  async away(): Promise<Response> {
    return this.redirect('/home', 303);
  }

  async broken(): Promise<Response> {
    throw new Error('boom');
  }
}

function request(path: string, params: Record<string, string> = {}): WebRequest {
  return new WebRequest(new Request(`http://localhost${path}`), { params });
}

test('Controller - render uses the template engine and status', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'controller-'));
  try {
    await writeFile(join(dir, 'greeting.html'), 'Hello {{ name }}');
    const views = new TemplateEngine({ viewsPath: dir });
    const handler = action(() => new GreetingController(views), (c) => c.show());

    const named = await handler(request('/greet?name=<Ann>'), new WebResponse());
    assert.ok(named instanceof Response);
    assert.equal(named.status, 201);
    assert.equal(named.headers.get('content-type'), 'text/html; charset=utf-8');
    assert.equal(await named.text(), 'Hello &lt;Ann&gt;');

    const anonymous = await handler(request('/greet'), new WebResponse());
    assert.ok(anonymous instanceof Response);
    assert.equal(await anonymous.text(), 'Hello stranger');
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('Controller - route params and redirects', async () => {
  const views = new TemplateEngine();

  const item = await action(() => new GreetingController(views), (c) => c.item())(
    request('/items/5', { id: '5' }),
    new WebResponse()
  );
  assert.ok(item instanceof Response);
  assert.equal(await item.text(), 'item 5');

  const away = await action(() => new GreetingController(views), (c) => c.away())(request('/'), new WebResponse());
  assert.ok(away instanceof Response);
  assert.equal(away.status, 303);
  assert.equal(away.headers.get('location'), '/home');
});

test('action - missing required param answers 400', async () => {
  const handler = action(() => new GreetingController(new TemplateEngine()), (c) => c.item());

  const res = await handler(request('/items'), new WebResponse());
  assert.ok(res instanceof Response);
  assert.equal(res.status, 400);
  assert.equal(await res.text(), "Required parameter 'id' is missing");
});

test('action - other errors propagate', async () => {
  const handler = action(() => new GreetingController(new TemplateEngine()), (c) => c.broken());

  await assert.rejects(async () => await handler(request('/'), new WebResponse()), /boom/);
});

test('Controller - using a controller without context throws', () => {
  const controller = new GreetingController(new TemplateEngine());
  assert.throws(() => controller.params, /no request context/);
});
