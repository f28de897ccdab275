/**
 * Session Management
 *
 * Session handle exposed to views as ctx.session, and the middleware that
 * loads it from the session cookie and writes it back on the way out.
 */

import { BaseMiddleware, type HookResult } from '../middleware/middleware.ts';
import { serializeCookie, withHeaders } from '../http/response.ts';
import type { Context } from '../http/types.ts';
import {
  isExpired,
  type SessionData,
  type SessionFingerprint,
  type SessionRecord,
  type SessionValue,
} from './session_store.ts';

/**
 * Request-scoped view of a session record
 */
export class Session {
  private data: SessionData;
  private modified = false;

  constructor(private readonly record: SessionRecord, readonly isNew: boolean) {
    this.data = structuredClone(record.data);
  }

  /**
   * Opaque key carried in the session cookie
   */
  get key(): string {
    return this.record.sessionKey;
  }

  get createdAt(): number {
    return this.record.createdAt;
  }

  get isModified(): boolean {
    return this.modified;
  }

  get(key: string): SessionValue | undefined {
    return this.data[key];
  }

  set(key: string, value: SessionValue): void {
    this.data[key] = value;
    this.modified = true;
  }

  has(key: string): boolean {
    return Object.hasOwn(this.data, key);
  }

  delete(key: string): void {
    delete this.data[key];
    this.modified = true;
  }

  clear(): void {
    this.data = {};
    this.modified = true;
  }

  all(): SessionData {
    return structuredClone(this.data);
  }

  /**
   * Snapshot for persistence
   */
  toRecord(): SessionRecord {
    return { ...this.record, data: structuredClone(this.data) };
  }
}

/**
 * Loads ctx.session from the session cookie, issuing a new session when the
 * cookie is missing, unknown, expired or bound to another client.
 */
export class SessionMiddleware extends BaseMiddleware {
  readonly name = 'SessionMiddleware';

  override async processRequest(ctx: Context): Promise<HookResult> {
    const { cookieName, maxAge } = this.host.config.session;
    const fingerprint: SessionFingerprint = {
      userAgent: ctx.request.header('User-Agent'),
      ipAddress: ctx.request.ip,
    };

    const key = ctx.request.cookie(cookieName);
    let record = key ? await this.host.sessions.get(key) : null;

    if (record && isExpired(record, maxAge)) {
      this.host.logger.debug('Session expired', { requestId: ctx.requestId });
      record = null;
    }
    if (record && !this.matchesClient(record, fingerprint)) {
      this.host.logger.warn('Session presented by a different client', {
        requestId: ctx.requestId,
      });
      record = null;
    }

    ctx.session = record
      ? new Session(record, false)
      : new Session(await this.host.sessions.create(fingerprint), true);
  }

  override async processResponse(ctx: Context, response: Response): Promise<HookResult> {
    const session = ctx.session;
    if (!session) return;

    // New sessions were persisted on creation; the cookie is refreshed regardless.
    if (session.isModified) {
      await this.host.sessions.save(session.toRecord());
    }

    const options = this.host.config.session;
    const cookie = serializeCookie(options.cookieName, session.key, {
      maxAge: options.maxAge,
      expires: new Date(session.createdAt + options.maxAge * 1000),
      path: options.cookiePath,
      domain: options.cookieDomain,
      secure: options.cookieSecure,
      httpOnly: options.cookieHttpOnly,
      sameSite: options.cookieSameSite,
    });

    return withHeaders(response, (headers) => headers.append('Set-Cookie', cookie));
  }

  private matchesClient(record: SessionRecord, fingerprint: SessionFingerprint): boolean {
    const { bindUserAgent, bindIpAddress } = this.host.config.session;
    if (bindUserAgent && record.userAgent !== fingerprint.userAgent) return false;
    if (bindIpAddress && record.ipAddress !== fingerprint.ipAddress) return false;
    return true;
  }
}
