/**
 * Response Builder
 *
 * Fluent builder for the responses views return. Status, headers and
 * cookies accumulate on the builder; a terminal method (json, html, text,
 * redirect...) produces the platform Response.
 */

import type { CookieOptions } from './types.ts';
import type { SafeHtml } from '../view/html.ts';

type RedirectStatus = 301 | 302 | 303 | 307 | 308;

const CONTENT_TYPES = {
  json: 'application/json; charset=utf-8',
  html: 'text/html; charset=utf-8',
  text: 'text/plain; charset=utf-8',
} as const;

export class TrellisResponse {
  private code = 200;
  private readonly fields = new Headers();
  private readonly cookies: string[] = [];

  status(code: number): this {
    this.code = code;
    return this;
  }

  header(name: string, value: string): this {
    this.fields.set(name, value);
    return this;
  }

  headers(headers: Record<string, string>): this {
    for (const [name, value] of Object.entries(headers)) {
      this.fields.set(name, value);
    }
    return this;
  }

  /**
   * Queue a Set-Cookie header; each call adds one header
   */
  cookie(name: string, value: string, options: CookieOptions = {}): this {
    this.cookies.push(serializeCookie(name, value, options));
    return this;
  }

  /**
   * Expire a cookie on the client
   */
  clearCookie(name: string, options: CookieOptions = {}): this {
    return this.cookie(name, '', { ...options, maxAge: 0, expires: new Date(0) });
  }

  json(data: unknown): Response {
    return this.send(JSON.stringify(data), CONTENT_TYPES.json);
  }

  html(content: string | SafeHtml): Response {
    return this.send(String(content), CONTENT_TYPES.html);
  }

  text(content: string): Response {
    return this.send(content, CONTENT_TYPES.text);
  }

  redirect(url: string, status: RedirectStatus = 302): Response {
    this.code = status;
    this.fields.set('Location', url);
    return this.send(null);
  }

  noContent(): Response {
    this.code = 204;
    return this.send(null);
  }

  notFound(message = 'Not Found'): Response {
    return this.status(404).text(message);
  }

  forbidden(message = 'Forbidden'): Response {
    return this.status(403).text(message);
  }

  serverError(message = 'Internal Server Error'): Response {
    return this.status(500).text(message);
  }

  private send(body: string | null, contentType?: string): Response {
    const headers = new Headers(this.fields);
    if (contentType) {
      headers.set('Content-Type', contentType);
    }
    for (const cookie of this.cookies) {
      headers.append('Set-Cookie', cookie);
    }
    return new Response(body, { status: this.code, headers });
  }
}

/**
 * Serialize a Set-Cookie header value. Attributes are written in a fixed
 * order: Max-Age, Expires, Path, Domain, Secure, HttpOnly, SameSite.
 */
export function serializeCookie(name: string, value: string, options: CookieOptions = {}): string {
  const attributes: (string | false | undefined)[] = [
    options.maxAge !== undefined && `Max-Age=${options.maxAge}`,
    options.expires && `Expires=${options.expires.toUTCString()}`,
    options.path && `Path=${options.path}`,
    options.domain && `Domain=${options.domain}`,
    options.secure && 'Secure',
    options.httpOnly && 'HttpOnly',
    options.sameSite && `SameSite=${options.sameSite}`,
  ];

  return [
    `${encodeURIComponent(name)}=${encodeURIComponent(value)}`,
    ...attributes.filter((part): part is string => typeof part === 'string' && part !== ''),
  ].join('; ');
}

/**
 * Copy a response with its headers modified. Responses handed out by the
 * platform may have immutable headers, so middleware rebuilds instead.
 */
export function withHeaders(response: Response, mutate: (headers: Headers) => void): Response {
  const headers = new Headers(response.headers);
  mutate(headers);
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
