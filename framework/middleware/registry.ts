/**
 * Middleware Registry
 *
 * Maps the identifiers used in configuration to middleware classes.
 */

import { SessionMiddleware } from '../auth/session.ts';
import { CSRFMiddleware } from './csrf.ts';
import { CorsMiddleware } from './cors.ts';
import { LoggingMiddleware } from './logging.ts';
import type { MiddlewareClass } from './middleware.ts';

export class MiddlewareRegistry {
  private readonly classes = new Map<string, MiddlewareClass>();

  register(id: string, middleware: MiddlewareClass): this {
    this.classes.set(id, middleware);
    return this;
  }

  resolve(id: string): MiddlewareClass | undefined {
    return this.classes.get(id);
  }

  has(id: string): boolean {
    return this.classes.has(id);
  }

  ids(): string[] {
    return [...this.classes.keys()];
  }
}

/**
 * Registry with the built-in middleware
 */
export function createDefaultRegistry(): MiddlewareRegistry {
  return new MiddlewareRegistry()
    .register('sessions', SessionMiddleware)
    .register('csrf', CSRFMiddleware)
    .register('cors', CorsMiddleware)
    .register('logging', LoggingMiddleware);
}
