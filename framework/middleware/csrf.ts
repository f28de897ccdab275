/**
 * CSRF Middleware
 *
 * Cross-Site Request Forgery protection with stateless, session-bound
 * tokens. A token is the encrypted triple nonce::sessionKey::issuedAt and is
 * accepted when it decrypts, names the current session and is younger than
 * csrfExpiry seconds. Unsafe requests must carry the same token in the form
 * field and in the header.
 */

import { BaseMiddleware, StartupCheck, type HookResult } from './middleware.ts';
import { SessionMiddleware } from '../auth/session.ts';
import { DecryptionError, StartupConfigurationError, StartupErrorCode } from '../errors.ts';
import { generateKey, safeEqual } from '../security/token.ts';
import { hiddenInput, type SafeHtml } from '../view/html.ts';
import type { Context, RouteHandler } from '../http/types.ts';

const UNSAFE_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);
const TOKEN_SEPARATOR = '::';

export const CSRF_FAILURE_BODY = '<h1>403 Forbidden</h1><p>CSRF token is invalid</p>';

/**
 * View helpers bound to the current request
 */
export interface CsrfHandle {
  readonly fieldName: string;
  readonly headerName: string;
  /** Mint a fresh token for the current session */
  token(): string;
  /** Hidden form input carrying a fresh token */
  field(): SafeHtml;
}

export type CsrfFailureReason =
  | 'no-session'
  | 'missing-token'
  | 'token-mismatch'
  | 'undecryptable'
  | 'malformed'
  | 'session-mismatch'
  | 'expired';

export type CsrfVerdict =
  | { valid: true; reason: 'exempt' | 'safe-method' | 'trusted-origin' | 'token' }
  | { valid: false; reason: CsrfFailureReason };

const exemptHandlers = new WeakSet<RouteHandler>();

/**
 * Mark a view as exempt from CSRF validation
 */
export function csrfExempt<T extends RouteHandler>(handler: T): T {
  exemptHandlers.add(handler);
  return handler;
}

export function isCsrfExempt(handler: RouteHandler): boolean {
  return exemptHandlers.has(handler);
}

/**
 * Standard rejection response
 */
export function csrfFailureResponse(): Response {
  return new Response(CSRF_FAILURE_BODY, {
    status: 403,
    headers: { 'Content-Type': 'text/html; charset=utf-8' },
  });
}

function hostOf(value: string): string {
  if (!value.includes('://')) return value;
  try {
    return new URL(value).host;
  } catch {
    return '';
  }
}

/**
 * Match an origin against trusted entries: exact, bare host, or *.domain
 */
export function matchesTrustedOrigin(origin: string, trusted: readonly string[]): boolean {
  const candidate = origin.toLowerCase();
  const host = hostOf(candidate);

  return trusted.some((entry) => {
    const pattern = entry.toLowerCase();
    if (pattern === candidate) return true;
    if (!host || pattern.includes('://')) return false;
    if (pattern.startsWith('*.')) {
      const suffix = pattern.slice(1);
      return host.endsWith(suffix) && host.length > suffix.length;
    }
    return host === pattern;
  });
}

export class CheckForSessionMiddleware extends StartupCheck {
  static readonly SESSION_MIDDLEWARE_NOT_FOUND =
    'Session middleware is not present. Please add "sessions" to the middleware list before "csrf".';

  check(): StartupConfigurationError | null {
    if (this.chain.some((m) => m instanceof SessionMiddleware)) return null;
    return new StartupConfigurationError(
      StartupErrorCode.SESSION_MIDDLEWARE_NOT_FOUND,
      CheckForSessionMiddleware.SESSION_MIDDLEWARE_NOT_FOUND
    );
  }
}

export class VerifyCorrectMiddlewarePlacement extends StartupCheck {
  static readonly SESSION_MIDDLEWARE_BELOW_CSRF =
    'SessionMiddleware is listed after CSRFMiddleware. It must come before CSRFMiddleware.';

  check(): StartupConfigurationError | null {
    const session = this.chain.findIndex((m) => m instanceof SessionMiddleware);
    const csrf = this.chain.findIndex((m) => m instanceof CSRFMiddleware);
    if (session === -1 || csrf === -1 || session < csrf) return null;
    return new StartupConfigurationError(
      StartupErrorCode.SESSION_MIDDLEWARE_BELOW_CSRF,
      VerifyCorrectMiddlewarePlacement.SESSION_MIDDLEWARE_BELOW_CSRF
    );
  }
}

export class VerifyTrustedOriginsFormat extends StartupCheck {
  static readonly INVALID_TRUSTED_ORIGIN = 'Trusted origins must be non-empty and contain no whitespace';

  check(): StartupConfigurationError | null {
    const invalid = this.host.config.csrf.trustedOrigins.filter(
      (origin) => origin.length === 0 || /\s/.test(origin)
    );
    if (invalid.length === 0) return null;
    return new StartupConfigurationError(
      StartupErrorCode.INVALID_TRUSTED_ORIGIN,
      `${VerifyTrustedOriginsFormat.INVALID_TRUSTED_ORIGIN}: ${invalid.map((o) => JSON.stringify(o)).join(', ')}`
    );
  }
}

export class CSRFMiddleware extends BaseMiddleware {
  readonly name = 'CSRFMiddleware';
  override readonly failurePolicy = 'fail-closed';
  override readonly checks = [
    CheckForSessionMiddleware,
    VerifyCorrectMiddlewarePlacement,
    VerifyTrustedOriginsFormat,
  ];

  /** Token lifetime in seconds */
  csrfExpiry: number = this.host.config.csrf.expiry;

  override async processRequest(ctx: Context): Promise<HookResult> {
    if (ctx.session) {
      ctx.csrf = this.createHandle(ctx);
    }

    const verdict = await this.verify(ctx);
    if (verdict.valid) return;

    this.host.logger.warn('CSRF validation failed', {
      requestId: ctx.requestId,
      method: ctx.request.method,
      path: ctx.request.path,
      reason: verdict.reason,
    });
    return csrfFailureResponse();
  }

  override failureResponse(): Response {
    return csrfFailureResponse();
  }

  /**
   * Decide whether the request may reach its view
   */
  async verify(ctx: Context): Promise<CsrfVerdict> {
    if (!UNSAFE_METHODS.has(ctx.request.method)) {
      return { valid: true, reason: 'safe-method' };
    }
    if (ctx.route && (ctx.route.csrfExempt || isCsrfExempt(ctx.route.handler))) {
      return { valid: true, reason: 'exempt' };
    }
    if (this.isTrustedOrigin(ctx)) {
      return { valid: true, reason: 'trusted-origin' };
    }

    const session = ctx.session;
    if (!session) {
      return { valid: false, reason: 'no-session' };
    }

    const { fieldName, headerName } = this.host.config.csrf;
    const submitted = await ctx.request.field(fieldName);
    const header = ctx.request.header(headerName);
    if (!submitted || !header) {
      return { valid: false, reason: 'missing-token' };
    }
    if (!safeEqual(submitted, header)) {
      return { valid: false, reason: 'token-mismatch' };
    }

    let plaintext: string;
    try {
      plaintext = this.host.tokens.decrypt(submitted);
    } catch (error) {
      if (error instanceof DecryptionError) {
        return { valid: false, reason: 'undecryptable' };
      }
      throw error;
    }

    const parts = plaintext.split(TOKEN_SEPARATOR);
    if (parts.length !== 3) {
      return { valid: false, reason: 'malformed' };
    }
    const [, sessionKey, issued] = parts;
    const issuedAt = Number(issued);
    if (!/^\d+$/.test(issued) || !Number.isSafeInteger(issuedAt)) {
      return { valid: false, reason: 'malformed' };
    }
    if (!safeEqual(sessionKey, session.key)) {
      return { valid: false, reason: 'session-mismatch' };
    }
    if (Date.now() - issuedAt >= this.csrfExpiry * 1000) {
      return { valid: false, reason: 'expired' };
    }

    return { valid: true, reason: 'token' };
  }

  /**
   * Mint a token bound to the request's session
   */
  mintToken(ctx: Context): string {
    if (!ctx.session) {
      throw new Error('Cannot issue a CSRF token without a session');
    }
    const plaintext = [generateKey(16), ctx.session.key, String(Date.now())].join(TOKEN_SEPARATOR);
    return this.host.tokens.encrypt(plaintext);
  }

  private createHandle(ctx: Context): CsrfHandle {
    const { fieldName, headerName } = this.host.config.csrf;
    return {
      fieldName,
      headerName,
      token: () => this.mintToken(ctx),
      field: () => hiddenInput(fieldName, this.mintToken(ctx)),
    };
  }

  private isTrustedOrigin(ctx: Context): boolean {
    const trusted = this.host.config.csrf.trustedOrigins;
    if (trusted.length === 0) return false;

    let origin = ctx.request.header('Origin');
    if (!origin) {
      const referer = ctx.request.header('Referer');
      const host = ctx.request.host;
      if (referer && hostOf(referer) === host) {
        origin = host;
      }
    }

    return origin !== null && matchesTrustedOrigin(origin, trusted);
  }
}
