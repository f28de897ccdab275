/**
 * Middleware Contract
 *
 * Middleware are class instances with two optional hooks. processRequest
 * runs in declared order before the view and may short-circuit by returning
 * a Response; processResponse runs in reverse order afterwards and may
 * replace the Response.
 */

import type { Context } from '../http/types.ts';
import type { AppConfig } from '../config/config.ts';
import type { SessionStore } from '../auth/session_store.ts';
import type { TokenCipher } from '../security/token.ts';
import type { Logger } from '../telemetry/logger.ts';
import type { MiddlewareRuntimeError, StartupConfigurationError } from '../errors.ts';

export type HookResult = Response | void;

/**
 * What the pipeline does when a hook throws:
 * - 'evict': log and remove the middleware for all later requests
 * - 'fail-closed': answer the current request with failureResponse() and keep it
 */
export type FailurePolicy = 'evict' | 'fail-closed';

/**
 * Services a middleware can reach on the application
 */
export interface MiddlewareHost {
  readonly config: AppConfig;
  readonly sessions: SessionStore;
  readonly tokens: TokenCipher;
  readonly logger: Logger;
}

/**
 * A configuration check run once before the application accepts requests
 */
export abstract class StartupCheck {
  constructor(
    protected readonly chain: readonly Middleware[],
    protected readonly host: MiddlewareHost
  ) {}

  abstract check(): StartupConfigurationError | null;
}

export type StartupCheckClass = new (
  chain: readonly Middleware[],
  host: MiddlewareHost
) => StartupCheck;

export interface Middleware {
  readonly name: string;
  readonly failurePolicy: FailurePolicy;
  readonly checks: readonly StartupCheckClass[];
  processRequest(ctx: Context): Promise<HookResult> | HookResult;
  processResponse(ctx: Context, response: Response): Promise<HookResult> | HookResult;
  /** Response sent when a fail-closed hook throws; null falls back to a 500 */
  failureResponse(ctx: Context, error: MiddlewareRuntimeError): Response | null;
}

export type MiddlewareClass = new (host: MiddlewareHost) => Middleware;

/**
 * Base class with no-op hooks
 */
export abstract class BaseMiddleware implements Middleware {
  abstract readonly name: string;
  readonly failurePolicy: FailurePolicy = 'evict';
  readonly checks: readonly StartupCheckClass[] = [];

  constructor(protected readonly host: MiddlewareHost) {}

  processRequest(_ctx: Context): Promise<HookResult> | HookResult {
    return undefined;
  }

  processResponse(_ctx: Context, _response: Response): Promise<HookResult> | HookResult {
    return undefined;
  }

  failureResponse(_ctx: Context, _error: MiddlewareRuntimeError): Response | null {
    return null;
  }
}

/**
 * Run every declared startup check against the resolved chain
 */
export function runStartupChecks(
  chain: readonly Middleware[],
  host: MiddlewareHost
): StartupConfigurationError[] {
  const errors: StartupConfigurationError[] = [];
  for (const middleware of chain) {
    for (const Check of middleware.checks) {
      const error = new Check(chain, host).check();
      if (error) errors.push(error);
    }
  }
  return errors;
}
