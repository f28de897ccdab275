/**
 * URL Router
 *
 * Route table with exact segments and `:name` parameters. A path that
 * matches a route but not its methods resolves to method-not-allowed.
 */

import type { HttpMethod, RouteHandler } from '../http/types.ts';

export interface RouteOptions {
  methods?: HttpMethod[];
  name?: string;
  /** Skip CSRF validation for this route */
  csrfExempt?: boolean;
}

export interface RouteDefinition {
  path: string;
  methods: HttpMethod[];
  pattern: RegExp;
  paramNames: string[];
  handler: RouteHandler;
  csrfExempt: boolean;
  name?: string;
}

export type RouteMatch =
  | { kind: 'found'; route: RouteDefinition; params: Record<string, string> }
  | { kind: 'method-not-allowed'; allowed: HttpMethod[] }
  | { kind: 'not-found' };

/**
 * Compile a path such as /posts/:id into a matcher
 */
export function compilePath(path: string): { pattern: RegExp; paramNames: string[] } {
  const paramNames: string[] = [];
  const segments = path
    .split('/')
    .filter(Boolean)
    .map((segment) => {
      if (segment.startsWith(':')) {
        paramNames.push(segment.slice(1));
        return '([^/]+)';
      }
      return segment.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    });

  return { pattern: new RegExp(`^/${segments.join('/')}/?$`), paramNames };
}

/**
 * URL Router
 */
export class Router {
  private routes: RouteDefinition[] = [];
  private namedRoutes = new Map<string, RouteDefinition>();

  /**
   * Register a GET route
   */
  get(path: string, handler: RouteHandler, options: Omit<RouteOptions, 'methods'> = {}): this {
    return this.add(path, handler, { ...options, methods: ['GET'] });
  }

  /**
   * Register a POST route
   */
  post(path: string, handler: RouteHandler, options: Omit<RouteOptions, 'methods'> = {}): this {
    return this.add(path, handler, { ...options, methods: ['POST'] });
  }

  /**
   * Add a route; methods default to GET
   */
  add(path: string, handler: RouteHandler, options: RouteOptions = {}): this {
    const { pattern, paramNames } = compilePath(path);
    const route: RouteDefinition = {
      path,
      methods: options.methods ?? ['GET'],
      pattern,
      paramNames,
      handler,
      csrfExempt: options.csrfExempt ?? false,
      name: options.name,
    };

    this.routes.push(route);

    if (options.name) {
      this.namedRoutes.set(options.name, route);
    }

    return this;
  }

  /**
   * Match a request to a route
   */
  match(method: string, path: string): RouteMatch {
    const allowed = new Set<HttpMethod>();

    for (const route of this.routes) {
      const result = route.pattern.exec(path);
      if (!result) continue;

      if (!this.allows(route, method)) {
        route.methods.forEach((m) => allowed.add(m));
        continue;
      }

      const params: Record<string, string> = {};
      route.paramNames.forEach((name, index) => {
        params[name] = decodeSegment(result[index + 1]);
      });
      return { kind: 'found', route, params };
    }

    return allowed.size > 0
      ? { kind: 'method-not-allowed', allowed: [...allowed] }
      : { kind: 'not-found' };
  }

  /**
   * Generate a URL for a named route
   */
  url(name: string, params: Record<string, string> = {}): string | null {
    const route = this.namedRoutes.get(name);
    if (!route) return null;

    let path = route.path;
    for (const [key, value] of Object.entries(params)) {
      path = path.replace(`:${key}`, encodeURIComponent(value));
    }
    return path;
  }

  /**
   * Get all registered routes
   */
  getRoutes(): RouteDefinition[] {
    return [...this.routes];
  }

  private allows(route: RouteDefinition, method: string): boolean {
    return route.methods.some((m) => m === method || (m === 'GET' && method === 'HEAD'));
  }
}

function decodeSegment(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
