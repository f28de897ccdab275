/**
 * CORS Middleware
 *
 * Handles Cross-Origin Resource Sharing (CORS) headers
 * and preflight OPTIONS requests.
 */

import { BaseMiddleware, type HookResult } from './middleware.ts';
import { withHeaders } from '../http/response.ts';
import type { Context } from '../http/types.ts';

const ALLOWED_METHODS = ['GET', 'HEAD', 'PUT', 'PATCH', 'POST', 'DELETE'];
const ALLOWED_HEADERS = ['Content-Type', 'Authorization', 'X-CSRF-Token'];
const PREFLIGHT_MAX_AGE = 86400; // 24 hours

export class CorsMiddleware extends BaseMiddleware {
  readonly name = 'CorsMiddleware';

  override processRequest(ctx: Context): HookResult {
    if (ctx.request.method !== 'OPTIONS' || !ctx.request.header('Access-Control-Request-Method')) {
      return;
    }

    return new Response(null, {
      status: 204,
      headers: {
        'Access-Control-Allow-Methods': ALLOWED_METHODS.join(', '),
        'Access-Control-Allow-Headers': ALLOWED_HEADERS.join(', '),
        'Access-Control-Max-Age': PREFLIGHT_MAX_AGE.toString(),
      },
    });
  }

  override processResponse(ctx: Context, response: Response): HookResult {
    const allowedOrigin = this.allowedOrigin(ctx.request.header('Origin'));
    if (!allowedOrigin) return;

    const { credentials } = this.host.config.cors;
    return withHeaders(response, (headers) => {
      headers.set('Access-Control-Allow-Origin', allowedOrigin);
      if (allowedOrigin !== '*') {
        headers.append('Vary', 'Origin');
      }
      if (credentials) {
        headers.set('Access-Control-Allow-Credentials', 'true');
      }
    });
  }

  /**
   * Determine the Access-Control-Allow-Origin header value
   */
  private allowedOrigin(origin: string | null): string | null {
    if (!origin) return null;

    const { origins, credentials } = this.host.config.cors;
    if (origins.includes('*')) {
      // A wildcard cannot be combined with credentials; echo the origin instead.
      return credentials ? origin : '*';
    }
    return origins.includes(origin) ? origin : null;
  }
}
