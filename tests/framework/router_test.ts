/**
 * Router Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Router, compilePath } from '../../framework/router/router.ts';
import type { RouteHandler } from '../../framework/http/types.ts';

const ok: RouteHandler = () => new Response('ok');

test('Router - matches exact paths', () => {
  const router = new Router().get('/about', ok);

  const match = router.match('GET', '/about');
  assert.equal(match.kind, 'found');
  assert.equal(router.match('GET', '/about/').kind, 'found');
  assert.equal(router.match('GET', '/about/team').kind, 'not-found');
});

test('Router - extracts and decodes path parameters', () => {
  const router = new Router().get('/posts/:id/comments/:slug', ok);

  const match = router.match('GET', '/posts/42/comments/hello%20world');
  assert.equal(match.kind, 'found');
  if (match.kind === 'found') {
    assert.deepEqual(match.params, { id: '42', slug: 'hello world' });
  }
});

test('Router - reports the allowed methods for a known path', () => {
  const router = new Router()
    .get('/items', ok)
    .add('/items', ok, { methods: ['PUT', 'DELETE'] });

  assert.deepEqual(router.match('POST', '/items'), {
    kind: 'method-not-allowed',
    allowed: ['GET', 'PUT', 'DELETE'],
  });
});

test('Router - HEAD is served by GET routes', () => {
  const router = new Router().get('/', ok);
  assert.equal(router.match('HEAD', '/').kind, 'found');
});

test('Router - route options carry the CSRF exemption', () => {
  const router = new Router().post('/hook', ok, { csrfExempt: true }).post('/form', ok);
  const [hook, form] = router.getRoutes();

  assert.equal(hook.csrfExempt, true);
  assert.equal(form.csrfExempt, false);
});

test('Router - builds URLs for named routes', () => {
  const router = new Router().get('/users/:id', ok, { name: 'user' });

  assert.equal(router.url('user', { id: 'a b' }), '/users/a%20b');
  assert.equal(router.url('missing'), null);
});

test('compilePath - escapes literal characters', () => {
  const { pattern, paramNames } = compilePath('/files/report.v1/:name');

  assert.deepEqual(paramNames, ['name']);
  assert.equal(pattern.test('/files/report.v1/x'), true);
  assert.equal(pattern.test('/files/reportXv1/x'), false);
});
