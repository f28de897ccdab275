/**
 * Configuration Management
 *
 * Loads and validates application configuration from defaults, a JSON file
 * and environment variables.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from '../errors.ts';

export const DEFAULT_SESSION_MAX_AGE = 60 * 60 * 24 * 14; // 14 days
export const DEFAULT_CSRF_EXPIRY = 60 * 60; // 1 hour

const SessionConfigSchema = z.object({
  cookieName: z.string().min(1).default('swsession'),
  maxAge: z.number().int().positive().default(DEFAULT_SESSION_MAX_AGE),
  cookiePath: z.string().default('/'),
  cookieDomain: z.string().optional(),
  cookieSecure: z.boolean().default(false),
  cookieHttpOnly: z.boolean().default(true),
  cookieSameSite: z.enum(['Strict', 'Lax', 'None']).default('Lax'),
  bindUserAgent: z.boolean().default(false),
  bindIpAddress: z.boolean().default(false),
});

const CsrfConfigSchema = z.object({
  expiry: z.number().int().default(DEFAULT_CSRF_EXPIRY),
  trustedOrigins: z.array(z.string()).default([]),
  headerName: z.string().min(1).default('X-CSRF-Token'),
  fieldName: z.string().min(1).default('csrf_token'),
});

const CorsConfigSchema = z.object({
  origins: z.array(z.string()).default(['*']),
  credentials: z.boolean().default(false),
});

const StoreConfigSchema = z.object({
  driver: z.enum(['memory', 'redis']).default('memory'),
  url: z.string().optional(),
  prefix: z.string().default('trellis'),
});

export const AppConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8000),
  host: z.string().default('0.0.0.0'),
  env: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  secretKey: z.string().min(16).optional(),
  middleware: z.array(z.string()).default([]),
  session: SessionConfigSchema.default({}),
  csrf: CsrfConfigSchema.default({}),
  cors: CorsConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
}).refine((config) => config.store.driver !== 'redis' || config.store.url !== undefined, {
  message: 'store.url is required when store.driver is "redis"',
  path: ['store', 'url'],
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ConfigOptions = z.input<typeof AppConfigSchema>;
export type SessionConfig = AppConfig['session'];
export type CsrfConfig = AppConfig['csrf'];
export type CorsConfig = AppConfig['cors'];
export type StoreConfig = AppConfig['store'];

/**
 * Validate raw options into a complete configuration
 */
export function parseConfig(options: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => ({
        path: issue.path.join('.') || '(root)',
        message: issue.message,
      }))
    );
  }
  return result.data;
}

/**
 * Configuration manager
 */
export class Config {
  private config: AppConfig;

  constructor(options: ConfigOptions | Record<string, unknown> = {}) {
    this.config = parseConfig(options);
  }

  /**
   * Get a top-level configuration section
   */
  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.config[key];
  }

  /**
   * Get all configuration
   */
  all(): AppConfig {
    return structuredClone(this.config);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge plain objects; arrays and scalars in the override replace the base
 */
export function mergeOptions(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isRecord(value) && isRecord(current) ? mergeOptions(current, value) : value;
  }

  return result;
}

/**
 * Read configuration overrides from the environment
 */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  if (env.PORT) overrides.port = Number.parseInt(env.PORT, 10);
  if (env.HOST) overrides.host = env.HOST;
  if (env.NODE_ENV) overrides.env = env.NODE_ENV;
  if (env.LOG_LEVEL) overrides.logLevel = env.LOG_LEVEL;
  if (env.TRELLIS_SECRET_KEY) overrides.secretKey = env.TRELLIS_SECRET_KEY;
  if (env.REDIS_URL) overrides.store = { driver: 'redis', url: env.REDIS_URL };

  return overrides;
}

/**
 * Load configuration from a JSON file and the environment
 */
export async function loadConfig(
  configPath = './config/app.json',
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  let fileConfig: Record<string, unknown> = {};

  try {
    const content = await readFile(configPath, 'utf8');
    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
      throw new ConfigError([{ path: '(root)', message: `${configPath} must contain a JSON object` }]);
    }
    fileConfig = parsed;
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    if (!missing) {
      throw error;
    }
  }

  const config = new Config(mergeOptions(fileConfig, envOverrides(env)));
  return config;
}
