/**
 * Configuration Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  Config,
  DEFAULT_CSRF_EXPIRY,
  DEFAULT_SESSION_MAX_AGE,
  envOverrides,
  loadConfig,
  mergeOptions,
  parseConfig,
} from '../../framework/config/config.ts';
import { ConfigError } from '../../framework/errors.ts';

function issuePaths(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error.issues.map((issue) => issue.path);
    throw error;
  }
  return [];
}

test('Config - applies defaults', () => {
  const config = new Config();

  assert.equal(config.get('port'), 8000);
  assert.deepEqual(config.get('middleware'), []);
  assert.equal(config.get('session').cookieName, 'swsession');
  assert.equal(config.get('session').maxAge, DEFAULT_SESSION_MAX_AGE);
  assert.equal(config.get('session').cookieSameSite, 'Lax');
  assert.equal(config.get('csrf').expiry, DEFAULT_CSRF_EXPIRY);
  assert.equal(config.get('csrf').headerName, 'X-CSRF-Token');
  assert.equal(config.get('csrf').fieldName, 'csrf_token');
  assert.equal(config.get('store').driver, 'memory');
  assert.equal(config.get('secretKey'), undefined);
});

test('Config - all() returns a copy', () => {
  const config = new Config({ middleware: ['sessions'] });
  const copy = config.all();
  copy.middleware.push('csrf');

  assert.deepEqual(config.get('middleware'), ['sessions']);
});

test('parseConfig - reports every invalid path', () => {
  assert.deepEqual(
    issuePaths(() => parseConfig({ port: 70000, session: { maxAge: -1 }, secretKey: 'short' })),
    ['port', 'secretKey', 'session.maxAge']
  );
});

test('parseConfig - redis store needs a url', () => {
  assert.deepEqual(issuePaths(() => parseConfig({ store: { driver: 'redis' } })), ['store.url']);
  assert.equal(parseConfig({ store: { driver: 'redis', url: 'redis://localhost:6379' } }).store.driver, 'redis');
});

test('parseConfig - non-object input is a root issue', () => {
  assert.deepEqual(issuePaths(() => parseConfig('nope')), ['(root)']);
});

test('mergeOptions - merges nested objects and replaces arrays', () => {
  const merged = mergeOptions(
    { port: 1, session: { cookieName: 'a', maxAge: 10 }, middleware: ['sessions'] },
    { session: { maxAge: 20 }, middleware: ['csrf'], host: undefined }
  );

  assert.deepEqual(merged, {
    port: 1,
    session: { cookieName: 'a', maxAge: 20 },
    middleware: ['csrf'],
  });
});

test('envOverrides - maps environment variables', () => {
  assert.deepEqual(
    envOverrides({
      PORT: '9000',
      LOG_LEVEL: 'debug',
      TRELLIS_SECRET_KEY: 'test-secret-from-env',
      REDIS_URL: 'redis://localhost:6379',
    }),
    {
      port: 9000,
      logLevel: 'debug',
      secretKey: 'test-secret-from-env',
      store: { driver: 'redis', url: 'redis://localhost:6379' },
    }
  );
});

test('loadConfig - reads the file and applies the environment on top', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'trellis-config-'));
  try {
    const path = join(dir, 'app.json');
    await writeFile(path, JSON.stringify({ port: 3000, middleware: ['sessions', 'csrf'] }));

    const config = await loadConfig(path, { PORT: '4000' });

    assert.equal(config.get('port'), 4000);
    assert.deepEqual(config.get('middleware'), ['sessions', 'csrf']);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('loadConfig - a missing file falls back to defaults', async () => {
  const config = await loadConfig(join(tmpdir(), 'trellis-missing', 'app.json'), {});
  assert.equal(config.get('port'), 8000);
});

test('loadConfig - a file without a JSON object is rejected', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'trellis-config-'));
  try {
    const path = join(dir, 'app.json');
    await writeFile(path, '[1, 2]');

    await assert.rejects(loadConfig(path, {}), ConfigError);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
