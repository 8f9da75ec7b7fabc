/**
 * Router Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Router } from '../../framework/router/router.ts';

const ok = () => new Response('OK');

test('Router - basic route registration', () => {
  const router = new Router();

  router.get('/test', ok);

  const match = router.match('GET', '/test');
  assert.ok(match);
  assert.deepEqual(match.params, {});
});

test('Router - route with params', () => {
  const router = new Router();

  router.get('/users/:id', ok);

  assert.equal(router.match('GET', '/users/123')?.params.id, '123');
});

test('Router - multiple params', () => {
  const router = new Router();

  router.get('/users/:userId/posts/:postId', ok);

  const match = router.match('GET', '/users/123/posts/456');
  assert.deepEqual(match?.params, { userId: '123', postId: '456' });
});

test('Router - regex-constrained param only matches digits', () => {
  const router = new Router();

  router.get('/book/:id(\\d+)/delete', ok);

  assert.equal(router.match('GET', '/book/42/delete')?.params.id, '42');
  assert.equal(router.match('GET', '/book/abc/delete'), null);
  assert.equal(router.match('GET', '/book/-1/delete'), null);
});

test('Router - no match returns null', () => {
  const router = new Router();

  router.get('/test', ok);

  assert.equal(router.match('GET', '/nonexistent'), null);
});

test('Router - method must match', () => {
  const router = new Router();

  router.get('/test', ok);

  assert.equal(router.match('POST', '/test'), null);
});

test('Router - HEAD falls back to GET routes', () => {
  const router = new Router();

  router.get('/test', ok);

  assert.ok(router.match('HEAD', '/test'));
});

test('Router - query string is ignored when matching', () => {
  const router = new Router();

  router.get('/home', ok);

  assert.ok(router.match('GET', '/home?search=dune&sort=year'));
});

test('Router - prefix applies to every route', () => {
  const router = new Router('/_static');

  router.get('/:file', ok);

  assert.equal(router.match('GET', '/_static/style.css')?.params.file, 'style.css');
  assert.equal(router.match('GET', '/style.css'), null);
});

test('Router - allowedMethods lists methods registered for a path', () => {
  const router = new Router();

  router.get('/add_book', ok);
  router.post('/add_book', ok);

  assert.deepEqual(router.allowedMethods('/add_book').sort(), ['GET', 'POST']);
  assert.deepEqual(router.allowedMethods('/missing'), []);
});

test('Router - merge copies routes from another router', () => {
  const router = new Router();
  const other = new Router();

  other.get('/a', ok);
  other.post('/b', ok);
  router.merge(other);

  assert.equal(router.getRoutes().length, 2);
  assert.ok(router.match('POST', '/b'));
});

test('Router - first registered route wins', () => {
  const router = new Router();
  const first = () => new Response('first');
  const second = () => new Response('second');

  router.get('/same', first);
  router.get('/same', second);

  assert.equal(router.match('GET', '/same')?.handler, first);
});
