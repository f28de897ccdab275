/**
 * HTTP Layer Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { TrellisRequest, parseCookieHeader } from '../../framework/http/request.ts';
import { TrellisResponse, serializeCookie, withHeaders } from '../../framework/http/response.ts';
import { html } from '../../framework/view/html.ts';

test('TrellisRequest - exposes method, path and query', () => {
  const req = new TrellisRequest(new Request('http://localhost/search?q=kv&page=2', { method: 'post' }));

  assert.equal(req.method, 'POST');
  assert.equal(req.path, '/search');
  assert.equal(req.query.get('q'), 'kv');
  assert.equal(req.host, 'localhost');
});

test('TrellisRequest - parses cookies', () => {
  const req = new TrellisRequest(
    new Request('http://localhost/', { headers: { Cookie: 'swsession=abc123; theme=dark%20mode; broken' } })
  );

  assert.equal(req.cookie('swsession'), 'abc123');
  assert.equal(req.cookie('theme'), 'dark mode');
  assert.equal(req.cookie('broken'), undefined);
});

test('parseCookieHeader - keeps the first value and tolerates bad encoding', () => {
  const cookies = parseCookieHeader('a=1; a=2; b=%E0%A4%A; c=x=y');

  assert.equal(cookies.get('a'), '1');
  assert.equal(cookies.get('b'), '%E0%A4%A');
  assert.equal(cookies.get('c'), 'x=y');
  assert.equal(parseCookieHeader(null).size, 0);
});

test('TrellisRequest - client ip prefers forwarding headers', () => {
  const forwarded = new TrellisRequest(
    new Request('http://localhost/', { headers: { 'X-Forwarded-For': '203.0.113.9, 10.0.0.1' } }),
    { clientAddress: '127.0.0.1' }
  );
  assert.equal(forwarded.ip, '203.0.113.9');

  const direct = new TrellisRequest(new Request('http://localhost/'), { clientAddress: '127.0.0.1' });
  assert.equal(direct.ip, '127.0.0.1');

  assert.equal(new TrellisRequest(new Request('http://localhost/')).ip, 'unknown');
});

test('TrellisRequest - form body can be read more than once', async () => {
  const req = new TrellisRequest(
    new Request('http://localhost/', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'name=bob&csrf_token=abc',
    })
  );

  assert.equal(await req.field('csrf_token'), 'abc');
  assert.deepEqual(await req.form(), { name: 'bob', csrf_token: 'abc' });
  assert.equal(await req.text(), 'name=bob&csrf_token=abc');
  assert.equal(await req.field('missing'), null);
});

test('TrellisRequest - multipart fields skip file parts', async () => {
  const body = new FormData();
  body.append('title', 'hello');
  body.append('upload', new Blob(['file contents']), 'notes.txt');

  const req = new TrellisRequest(new Request('http://localhost/', { method: 'POST', body }));

  assert.deepEqual(await req.form(), { title: 'hello' });
});

test('TrellisRequest - JSON fields are read from object bodies', async () => {
  const req = new TrellisRequest(
    new Request('http://localhost/', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ csrf_token: 'abc', count: 2 }),
    })
  );

  assert.equal(await req.field('csrf_token'), 'abc');
  assert.equal(await req.field('count'), null);
  assert.deepEqual(await req.json(), { csrf_token: 'abc', count: 2 });
});

test('TrellisRequest - invalid JSON yields no field', async () => {
  const req = new TrellisRequest(
    new Request('http://localhost/', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{not json',
    })
  );

  assert.equal(await req.field('csrf_token'), null);
});

test('serializeCookie - renders attributes in order', () => {
  assert.equal(
    serializeCookie('sid', 'a b', {
      maxAge: 60,
      expires: new Date(Date.UTC(2030, 0, 1)),
      path: '/',
      domain: 'example.test',
      secure: true,
      httpOnly: true,
      sameSite: 'Strict',
    }),
    'sid=a%20b; Max-Age=60; Expires=Tue, 01 Jan 2030 00:00:00 GMT; Path=/; Domain=example.test; Secure; HttpOnly; SameSite=Strict'
  );
  assert.equal(serializeCookie('sid', 'x'), 'sid=x');
});

test('TrellisResponse - builds typed responses', async () => {
  const json = new TrellisResponse().status(201).json({ ok: true });
  assert.equal(json.status, 201);
  assert.equal(json.headers.get('Content-Type'), 'application/json; charset=utf-8');
  assert.deepEqual(await json.json(), { ok: true });

  const page = new TrellisResponse().html(html`<p>${'<b>'}</p>`);
  assert.equal(await page.text(), '<p>&lt;b&gt;</p>');

  const redirect = new TrellisResponse().redirect('/done', 303);
  assert.equal(redirect.status, 303);
  assert.equal(redirect.headers.get('Location'), '/done');

  assert.equal(new TrellisResponse().noContent().status, 204);
  assert.equal(new TrellisResponse().forbidden().status, 403);
});

test('TrellisResponse - appends one Set-Cookie per cookie', () => {
  const response = new TrellisResponse()
    .cookie('a', '1')
    .clearCookie('b', { path: '/' })
    .text('ok');

  assert.deepEqual(response.headers.getSetCookie(), [
    'a=1',
    'b=; Max-Age=0; Expires=Thu, 01 Jan 1970 00:00:00 GMT; Path=/',
  ]);
});

test('withHeaders - copies status, body and existing cookies', async () => {
  const original = new TrellisResponse().status(202).cookie('a', '1').text('body');

  const copy = withHeaders(original, (headers) => headers.append('Set-Cookie', 'b=2'));

  assert.equal(copy.status, 202);
  assert.equal(await copy.text(), 'body');
  assert.deepEqual(copy.headers.getSetCookie(), ['a=1', 'b=2']);
});
