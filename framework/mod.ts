/**
 * Trellis Framework
 *
 * A small web framework for Node.js built around a middleware pipeline,
 * persisted cookie sessions and stateless CSRF protection.
 *
 * @module trellis
 */

// Application
export {
  Application,
  type ApplicationOptions,
  type ListenOptions,
  type MiddlewareRef,
} from './app.ts';

// HTTP
export { Server, type ServerOptions, type GatewayHandler } from './http/server.ts';
export { TrellisRequest, parseCookieHeader, type FormFields } from './http/request.ts';
export { TrellisResponse, serializeCookie, withHeaders } from './http/response.ts';
export type {
  Context,
  CookieOptions,
  GatewayInfo,
  HttpMethod,
  PipelineState,
  RouteHandler,
} from './http/types.ts';

// Middleware
export * from './middleware/mod.ts';

// Router
export {
  Router,
  compilePath,
  type RouteDefinition,
  type RouteMatch,
  type RouteOptions,
} from './router/router.ts';

// Sessions
export { Session, SessionMiddleware } from './auth/session.ts';
export {
  SessionStore,
  isExpired,
  type SessionData,
  type SessionFingerprint,
  type SessionRecord,
  type SessionValue,
} from './auth/session_store.ts';

// Storage
export {
  KVStore,
  MemoryKVBackend,
  RedisKVBackend,
  createKVStore,
  fromIORedis,
  type KVBackend,
  type KVKey,
  type KVValue,
  type RedisCommands,
} from './orm/kv.ts';

// Security
export { TokenCipher, generateKey, generateSecret, safeEqual, type Plaintext } from './security/token.ts';

// Configuration
export {
  Config,
  loadConfig,
  parseConfig,
  type AppConfig,
  type ConfigOptions,
} from './config/config.ts';

// Views
export { SafeHtml, escape, html, raw, hiddenInput } from './view/html.ts';

// Telemetry
export {
  Logger,
  createLogger,
  createMemoryLogger,
  getLogger,
  setLogger,
  type LogEntry,
  type LogLevel,
  type LogSink,
} from './telemetry/logger.ts';
export { isOTELEnabled, withSpan } from './telemetry/otel.ts';

// Errors
export {
  ConfigError,
  DecryptionError,
  MiddlewareRuntimeError,
  StartupConfigurationError,
  StartupErrorCode,
  StartupErrors,
} from './errors.ts';
