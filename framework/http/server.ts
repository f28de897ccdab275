/**
 * HTTP Server
 *
 * Binds a fetch-style handler to a Node HTTP server through
 * @hono/node-server. Only transport concerns live here; the application
 * owns routing and the middleware pipeline.
 */

import { serve, type ServerType } from '@hono/node-server';
import type { EventEmitter } from 'node:events';
import type { AddressInfo } from 'node:net';
import type { GatewayInfo } from './types.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';

export type GatewayHandler = (request: Request, info: GatewayInfo) => Promise<Response>;

export interface ServerOptions {
  port?: number;
  hostname?: string;
  handler: GatewayHandler;
  onListen?: (addr: AddressInfo) => void;
  logger?: Logger;
}

/**
 * HTTP Server for Trellis applications
 */
export class Server {
  private options: ServerOptions;
  private logger: Logger;
  private server: ServerType | null = null;
  private bound: AddressInfo | null = null;

  constructor(options: ServerOptions) {
    this.options = {
      ...options,
      port: options.port ?? 8000,
      hostname: options.hostname ?? '0.0.0.0',
    };
    this.logger = options.logger ?? getLogger();
  }

  get listening(): boolean {
    return this.server !== null;
  }

  /**
   * Bound address once listening; port 0 resolves to the assigned port
   */
  get address(): AddressInfo | null {
    return this.bound;
  }

  /**
   * Start the server; resolves once the socket is listening and rejects when
   * it cannot bind (EADDRINUSE, EACCES)
   */
  serve(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = serve(
        {
          port: this.options.port,
          hostname: this.options.hostname,
          fetch: (request, env) =>
            this.handleRequest(request, { clientAddress: env.incoming.socket.remoteAddress }),
        },
        (addr) => {
          events.off('error', reject);
          this.server = server;
          this.bound = addr;
          this.options.onListen?.(addr);
          resolve();
        }
      );
      const events: EventEmitter = server;
      events.once('error', reject);
    });
  }

  /**
   * Handle an incoming request
   */
  private async handleRequest(request: Request, info: GatewayInfo): Promise<Response> {
    try {
      return await this.options.handler(request, info);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error('Request error', err);
      return new Response('Internal Server Error', { status: 500 });
    }
  }

  /**
   * Stop accepting connections
   */
  close(): Promise<void> {
    const server = this.server;
    this.server = null;
    this.bound = null;
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close((error?: Error) => (error ? reject(error) : resolve()));
    });
  }
}
