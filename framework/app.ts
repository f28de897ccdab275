/**
 * Application Class
 *
 * The main entry point for building Trellis applications. Resolves the
 * configured middleware, validates the chain once at construction and
 * serves requests through the pipeline.
 */

import { randomUUID } from 'node:crypto';
import { Server } from './http/server.ts';
import { TrellisRequest } from './http/request.ts';
import { TrellisResponse } from './http/response.ts';
import { Router, type RouteMatch, type RouteOptions } from './router/router.ts';
import { MiddlewarePipeline } from './middleware/pipeline.ts';
import { createDefaultRegistry, type MiddlewareRegistry } from './middleware/registry.ts';
import {
  runStartupChecks,
  type Middleware,
  type MiddlewareClass,
  type MiddlewareHost,
} from './middleware/middleware.ts';
import { parseConfig, type AppConfig, type ConfigOptions } from './config/config.ts';
import { createKVStore, type KVStore } from './orm/kv.ts';
import { SessionStore } from './auth/session_store.ts';
import { TokenCipher, generateSecret, type Plaintext } from './security/token.ts';
import { createLogger, type Logger } from './telemetry/logger.ts';
import { withRequestSpan } from './telemetry/otel.ts';
import {
  StartupConfigurationError,
  StartupErrorCode,
  StartupErrors,
  toError,
} from './errors.ts';
import type { Context, GatewayInfo, RouteHandler } from './http/types.ts';

/**
 * A middleware given by registry identifier or by class
 */
export type MiddlewareRef = string | MiddlewareClass;

export interface ApplicationOptions {
  config?: ConfigOptions;
  /** Overrides config.middleware */
  middleware?: MiddlewareRef[];
  registry?: MiddlewareRegistry;
  /** Owned by the application: closed by stop() and by a failed startup */
  store?: KVStore;
  logger?: Logger;
}

export interface ListenOptions {
  port?: number;
  hostname?: string;
}

/**
 * Main Application class
 */
export class Application implements MiddlewareHost {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly sessions: SessionStore;
  readonly tokens: TokenCipher;
  private readonly store: KVStore;
  private readonly router = new Router();
  private readonly pipeline: MiddlewarePipeline;
  private server: Server | null = null;

  constructor(options: ApplicationOptions = {}) {
    this.config = parseConfig(options.config ?? {});
    this.logger = options.logger ?? createLogger(this.config);

    let secret = this.config.secretKey;
    if (!secret) {
      secret = generateSecret();
      this.logger.warn('No secretKey configured; generated a random one. Tokens will not survive a restart.');
    }
    this.tokens = new TokenCipher(secret);

    // Validate the chain before any store connection is opened.
    const { chain, errors } = this.resolveMiddleware(
      options.middleware ?? this.config.middleware,
      options.registry ?? createDefaultRegistry()
    );
    errors.push(...runStartupChecks(chain, this));
    if (errors.length > 0) {
      options.store?.close().catch((error: unknown) => {
        this.logger.error('Failed to close store after startup error', toError(error));
      });
      throw new StartupErrors(errors);
    }

    this.store = options.store ?? createKVStore(this.config.store);
    this.sessions = new SessionStore(this.store);
    this.logger.debug('Session store ready', { system: this.store.system });

    this.pipeline = new MiddlewarePipeline(chain, this.logger);
  }

  /**
   * Middleware still in the chain, in configured order
   */
  get middleware(): Middleware[] {
    return this.pipeline.middleware;
  }

  /**
   * Session lifetime in seconds
   */
  get sessionMaxAge(): number {
    return this.config.session.maxAge;
  }

  /**
   * Find a live middleware instance by class
   */
  findMiddleware<T extends Middleware>(type: abstract new (...args: never[]) => T): T | undefined {
    for (const middleware of this.pipeline.middleware) {
      if (middleware instanceof type) return middleware;
    }
    return undefined;
  }

  /**
   * Register a route; methods default to GET
   */
  route(path: string, handler: RouteHandler, options: RouteOptions = {}): this {
    this.router.add(path, handler, options);
    return this;
  }

  /**
   * Register a GET route
   */
  get(path: string, handler: RouteHandler, options: Omit<RouteOptions, 'methods'> = {}): this {
    this.router.get(path, handler, options);
    return this;
  }

  /**
   * Register a POST route
   */
  post(path: string, handler: RouteHandler, options: Omit<RouteOptions, 'methods'> = {}): this {
    this.router.post(path, handler, options);
    return this;
  }

  /**
   * Generate a URL for a named route
   */
  url(name: string, params: Record<string, string> = {}): string | null {
    return this.router.url(name, params);
  }

  encrypt(plaintext: Plaintext): string {
    return this.tokens.encrypt(plaintext);
  }

  /**
   * @throws DecryptionError
   */
  decrypt(token: string): string {
    return this.tokens.decrypt(token);
  }

  /**
   * Handle a request from the gateway
   */
  async handle(request: Request, info: GatewayInfo = {}): Promise<Response> {
    const req = new TrellisRequest(request, { clientAddress: info.clientAddress });
    const match = this.router.match(req.method, req.path);
    const params = match.kind === 'found' ? match.params : {};
    req.setParams(params);

    const ctx: Context = {
      request: req,
      url: req.url,
      params,
      route: match.kind === 'found' ? match.route : null,
      state: new Map(),
      phase: 'pending',
      session: null,
      csrf: null,
      requestId: randomUUID(),
    };

    return await withRequestSpan(req.method, req.path, ctx.route?.path ?? null, async () => {
      try {
        return await this.pipeline.execute(ctx, (c) => this.dispatch(c, match));
      } catch (error) {
        this.logger.error('Request failed', toError(error), { requestId: ctx.requestId });
        return new TrellisResponse().serverError();
      }
    });
  }

  /**
   * Start the HTTP server
   */
  async listen(options: ListenOptions = {}): Promise<Server> {
    if (this.server) {
      throw new Error('Application is already listening');
    }

    const server = new Server({
      port: options.port ?? this.config.port,
      hostname: options.hostname ?? this.config.host,
      handler: (request, info) => this.handle(request, info),
      logger: this.logger,
      onListen: ({ address, port }) => {
        this.logger.info(`Server listening on http://${address}:${port}`);
      },
    });
    await server.serve();
    this.server = server;
    return server;
  }

  /**
   * Stop the server and close the store
   */
  async stop(): Promise<void> {
    if (this.server) {
      await this.server.close();
      this.server = null;
    }
    await this.store.close();
    this.logger.info('Application stopped');
  }

  private async dispatch(ctx: Context, match: RouteMatch): Promise<Response> {
    if (match.kind === 'not-found') {
      return new TrellisResponse().notFound();
    }
    if (match.kind === 'method-not-allowed') {
      return new TrellisResponse()
        .status(405)
        .header('Allow', match.allowed.join(', '))
        .text('Method Not Allowed');
    }

    try {
      return await match.route.handler(ctx);
    } catch (error) {
      this.logger.error('Unhandled error in view', toError(error), {
        requestId: ctx.requestId,
        method: ctx.request.method,
        path: ctx.request.path,
      });
      return new TrellisResponse().serverError();
    }
  }

  private resolveMiddleware(
    refs: readonly MiddlewareRef[],
    registry: MiddlewareRegistry
  ): { chain: Middleware[]; errors: StartupConfigurationError[] } {
    const chain: Middleware[] = [];
    const errors: StartupConfigurationError[] = [];

    for (const ref of refs) {
      const MiddlewareType = typeof ref === 'string' ? registry.resolve(ref) : ref;
      if (!MiddlewareType) {
        errors.push(
          new StartupConfigurationError(
            StartupErrorCode.UNKNOWN_MIDDLEWARE,
            `Unknown middleware "${ref}". Registered: ${registry.ids().join(', ')}`
          )
        );
        continue;
      }
      chain.push(new MiddlewareType(this));
    }

    return { chain, errors };
  }
}
