/**
 * KV Store
 *
 * High-level key/value interface over a pluggable backend: an in-process
 * map for development and tests, or Redis through ioredis.
 */

import Redis from 'ioredis';
import { z } from 'zod';
import { withDbSpan } from '../telemetry/otel.ts';
import { getLogger } from '../telemetry/logger.ts';
import type { StoreConfig } from '../config/config.ts';

export type KVKey = readonly string[];

/**
 * JSON-compatible value stored in the KV store
 */
export type KVValue =
  | string
  | number
  | boolean
  | null
  | KVValue[]
  | { [key: string]: KVValue };

export const KVValueSchema: z.ZodType<KVValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(KVValueSchema), z.record(KVValueSchema)])
);

export interface KVSetOptions {
  /** Expire the entry after this many milliseconds */
  expireIn?: number;
}

/**
 * Storage backend contract. Backends receive fully-qualified string keys.
 */
export interface KVBackend {
  readonly system: string;
  get(key: string): Promise<KVValue | null>;
  set(key: string, value: KVValue, options?: KVSetOptions): Promise<void>;
  delete(key: string): Promise<void>;
  list(prefix: string): Promise<{ key: string; value: KVValue }[]>;
  close(): Promise<void>;
}

/**
 * In-process backend. Values are cloned on the way in and out so callers
 * never share a mutable object.
 */
export class MemoryKVBackend implements KVBackend {
  readonly system = 'memory';
  private entries = new Map<string, { value: KVValue; expiresAt: number | null }>();

  async get(key: string): Promise<KVValue | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return structuredClone(entry.value);
  }

  async set(key: string, value: KVValue, options?: KVSetOptions): Promise<void> {
    this.entries.set(key, {
      value: structuredClone(value),
      expiresAt: options?.expireIn ? Date.now() + options.expireIn : null,
    });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async list(prefix: string): Promise<{ key: string; value: KVValue }[]> {
    const results: { key: string; value: KVValue }[] = [];
    for (const key of [...this.entries.keys()].sort()) {
      if (!key.startsWith(prefix)) continue;
      const value = await this.get(key);
      if (value !== null) {
        results.push({ key, value });
      }
    }
    return results;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}

/**
 * Redis commands the backend relies on. Kept narrow so tests can supply an
 * in-process stand-in.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs?: number): Promise<void>;
  del(key: string): Promise<void>;
  scan(cursor: string, pattern: string): Promise<[cursor: string, keys: string[]]>;
  mget(keys: string[]): Promise<(string | null)[]>;
  quit(): Promise<void>;
}

/**
 * Adapt an ioredis client to RedisCommands
 */
export function fromIORedis(client: Redis): RedisCommands {
  return {
    get: (key) => client.get(key),
    set: async (key, value, ttlMs) => {
      if (ttlMs) {
        await client.set(key, value, 'PX', ttlMs);
      } else {
        await client.set(key, value);
      }
    },
    del: async (key) => {
      await client.del(key);
    },
    scan: (cursor, pattern) => client.scan(cursor, 'MATCH', pattern, 'COUNT', 100),
    mget: (keys) => client.mget(...keys),
    quit: async () => {
      await client.quit();
    },
  };
}

/**
 * Redis backend. Values are stored as JSON strings.
 */
export class RedisKVBackend implements KVBackend {
  readonly system = 'redis';

  constructor(private readonly client: RedisCommands) {}

  /**
   * Connect to Redis by URL
   */
  static connect(url: string): RedisKVBackend {
    const client = new Redis(url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times: number) {
        if (times > 5) {
          getLogger().error('Redis max retries reached, giving up');
          return null;
        }
        return Math.min(times * 200, 2000);
      },
    });
    client.on('error', (error: Error) => {
      getLogger().warn('Redis connection error', { error: error.message });
    });
    return new RedisKVBackend(fromIORedis(client));
  }

  async get(key: string): Promise<KVValue | null> {
    const raw = await this.client.get(key);
    return raw === null ? null : parseValue(raw);
  }

  async set(key: string, value: KVValue, options?: KVSetOptions): Promise<void> {
    await this.client.set(key, JSON.stringify(value), options?.expireIn);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async list(prefix: string): Promise<{ key: string; value: KVValue }[]> {
    const keys: string[] = [];
    let cursor = '0';
    do {
      const [next, batch] = await this.client.scan(cursor, `${prefix}*`);
      keys.push(...batch);
      cursor = next;
    } while (cursor !== '0');

    if (keys.length === 0) return [];

    keys.sort();
    const values = await this.client.mget(keys);
    const results: { key: string; value: KVValue }[] = [];
    keys.forEach((key, index) => {
      const raw = values[index];
      if (raw !== null && raw !== undefined) {
        results.push({ key, value: parseValue(raw) });
      }
    });
    return results;
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

function parseValue(raw: string): KVValue {
  const parsed: KVValue = JSON.parse(raw);
  return parsed;
}

export interface KVStoreOptions {
  backend?: KVBackend;
  /** Namespace prepended to every key */
  prefix?: string;
}

/**
 * KV Store wrapper
 */
export class KVStore {
  private readonly backend: KVBackend;
  private readonly prefix: string;

  constructor(options: KVStoreOptions = {}) {
    this.backend = options.backend ?? new MemoryKVBackend();
    this.prefix = options.prefix ?? 'trellis';
  }

  /**
   * Backend identifier ('memory', 'redis')
   */
  get system(): string {
    return this.backend.system;
  }

  private buildKey(key: KVKey): string {
    return [this.prefix, ...key].join(':');
  }

  async get(key: KVKey): Promise<KVValue | null> {
    return await withDbSpan('get', key, this.system, () => this.backend.get(this.buildKey(key)));
  }

  async set(key: KVKey, value: KVValue, options?: KVSetOptions): Promise<void> {
    await withDbSpan('set', key, this.system, async (span) => {
      if (options?.expireIn) {
        span.setAttribute('db.kv.ttl', options.expireIn);
      }
      await this.backend.set(this.buildKey(key), value, options);
    });
  }

  async delete(key: KVKey): Promise<void> {
    await withDbSpan('delete', key, this.system, () => this.backend.delete(this.buildKey(key)));
  }

  /**
   * List values under a key prefix
   */
  async list(prefix: KVKey): Promise<{ key: string[]; value: KVValue }[]> {
    return await withDbSpan('list', prefix, this.system, async (span) => {
      const base = this.buildKey(prefix) + ':';
      const entries = await this.backend.list(base);
      span.setAttribute('db.result.count', entries.length);
      return entries.map((entry) => ({
        key: [...prefix, ...entry.key.slice(base.length).split(':')],
        value: entry.value,
      }));
    });
  }

  /**
   * Close the KV store
   */
  async close(): Promise<void> {
    await this.backend.close();
  }
}

/**
 * Build the store selected by configuration
 */
export function createKVStore(config: StoreConfig): KVStore {
  if (config.driver === 'redis') {
    if (!config.url) {
      throw new Error('store.url is required when store.driver is "redis"');
    }
    return new KVStore({ backend: RedisKVBackend.connect(config.url), prefix: config.prefix });
  }
  return new KVStore({ prefix: config.prefix });
}
