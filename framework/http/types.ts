/**
 * HTTP Type Definitions
 */

import type { TrellisRequest } from './request.ts';
import type { Session } from '../auth/session.ts';
import type { CsrfHandle } from '../middleware/csrf.ts';
import type { RouteDefinition } from '../router/router.ts';

/**
 * Lifecycle of a request through the middleware pipeline
 */
export type PipelineState = 'pending' | 'request' | 'dispatch' | 'response' | 'done';

/**
 * Request context for middleware and handlers
 */
export interface Context {
  request: TrellisRequest;
  url: URL;
  params: Record<string, string>;
  /** Resolved route, or null when no route matched */
  route: RouteDefinition | null;
  state: Map<string, unknown>;
  phase: PipelineState;
  /** Populated by the session middleware */
  session: Session | null;
  /** Populated by the CSRF middleware for requests carrying a session */
  csrf: CsrfHandle | null;
  requestId: string;
}

/**
 * Route handler (view) using context
 */
export type RouteHandler = (ctx: Context) => Promise<Response> | Response;

/**
 * HTTP methods supported by the router
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';

export const HTTP_METHODS: readonly HttpMethod[] = [
  'GET',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
  'OPTIONS',
  'HEAD',
];

/**
 * Cookie options
 */
export interface CookieOptions {
  maxAge?: number;
  expires?: Date;
  path?: string;
  domain?: string;
  secure?: boolean;
  httpOnly?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
}

/**
 * Connection details the gateway knows but the Request does not carry
 */
export interface GatewayInfo {
  clientAddress?: string;
}
