/**
 * Logging Middleware
 *
 * Request/response logging for monitoring and debugging.
 */

import { BaseMiddleware, type HookResult } from './middleware.ts';
import type { Context } from '../http/types.ts';

const START_TIME = 'logging.startTime';
const EXCLUDED_PATHS = ['/health', '/ready', '/favicon.ico'];

export class LoggingMiddleware extends BaseMiddleware {
  readonly name = 'LoggingMiddleware';

  override processRequest(ctx: Context): HookResult {
    if (this.isExcluded(ctx.request.path)) return;

    ctx.state.set(START_TIME, performance.now());
    this.host.logger.info(`→ ${ctx.request.method} ${ctx.request.path}`, {
      requestId: ctx.requestId,
      ip: ctx.request.ip,
    });
  }

  override processResponse(ctx: Context, response: Response): HookResult {
    if (this.isExcluded(ctx.request.path)) return;

    const started = ctx.state.get(START_TIME);
    const duration = typeof started === 'number' ? performance.now() - started : 0;
    const message = `← ${ctx.request.method} ${ctx.request.path} ${response.status} ${duration.toFixed(2)}ms`;
    const context = { requestId: ctx.requestId, status: response.status };

    if (response.status >= 500) {
      this.host.logger.warn(message, context);
    } else {
      this.host.logger.info(message, context);
    }
  }

  private isExcluded(path: string): boolean {
    return EXCLUDED_PATHS.some((excluded) => path.startsWith(excluded));
  }
}
