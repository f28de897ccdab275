/**
 * Shared test helpers
 */

import { Application, type ApplicationOptions } from '../framework/app.ts';
import { TrellisRequest } from '../framework/http/request.ts';
import { createMemoryLogger, type LogEntry } from '../framework/telemetry/logger.ts';
import type { Context } from '../framework/http/types.ts';
import type { RedisCommands } from '../framework/orm/kv.ts';

export const TEST_SECRET = 'test-secret-key-0123456789';

/**
 * Application wired to an in-memory logger and a fixed secret
 */
export function createTestApp(options: ApplicationOptions = {}): { app: Application; logs: LogEntry[] } {
  const { logger, entries } = createMemoryLogger();
  const app = new Application({
    ...options,
    logger: options.logger ?? logger,
    config: { secretKey: TEST_SECRET, ...options.config },
  });
  return { app, logs: entries };
}

export function createTestContext(path = '/test', init: RequestInit = {}): Context {
  const request = new TrellisRequest(new Request(`http://localhost${path}`, init));
  return {
    request,
    url: request.url,
    params: {},
    route: null,
    state: new Map(),
    phase: 'pending',
    session: null,
    csrf: null,
    requestId: 'test-request',
  };
}

export function get(path: string, headers: Record<string, string> = {}): Request {
  return new Request(`http://localhost${path}`, { headers });
}

export function formPost(
  path: string,
  fields: Record<string, string>,
  headers: Record<string, string> = {}
): Request {
  return new Request(`http://localhost${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded', ...headers },
    body: new URLSearchParams(fields).toString(),
  });
}

export function jsonPost(path: string, body: unknown, headers: Record<string, string> = {}): Request {
  return new Request(`http://localhost${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

/**
 * Value of a cookie set by the response, or null
 */
export function cookieFrom(response: Response, name = 'swsession'): string | null {
  for (const header of response.headers.getSetCookie()) {
    const [pair] = header.split(';');
    const index = pair.indexOf('=');
    if (index !== -1 && pair.slice(0, index) === name) {
      return decodeURIComponent(pair.slice(index + 1));
    }
  }
  return null;
}

/**
 * Token embedded in a rendered csrf_token hidden input
 */
export function tokenFrom(body: string): string {
  const match = /name="csrf_token" value="([^"]+)"/.exec(body);
  if (!match) {
    throw new Error(`No CSRF token in: ${body}`);
  }
  return match[1];
}

export function errorMessages(logs: LogEntry[]): string[] {
  return logs.filter((entry) => entry.level === 'error').map((entry) => entry.message);
}

/**
 * In-process stand-in for the Redis commands the backend uses
 */
export class FakeRedis implements RedisCommands {
  readonly data = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  closed = false;

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    this.data.set(key, value);
    if (ttlMs) this.ttls.set(key, ttlMs);
  }

  async del(key: string): Promise<void> {
    this.data.delete(key);
  }

  async scan(_cursor: string, pattern: string): Promise<[cursor: string, keys: string[]]> {
    const prefix = pattern.endsWith('*') ? pattern.slice(0, -1) : pattern;
    return ['0', [...this.data.keys()].filter((key) => key.startsWith(prefix))];
  }

  async mget(keys: string[]): Promise<(string | null)[]> {
    return keys.map((key) => this.data.get(key) ?? null);
  }

  async quit(): Promise<void> {
    this.closed = true;
  }
}
