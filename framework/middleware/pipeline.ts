/**
 * Middleware Pipeline
 *
 * Runs the request hooks of the chain in order, dispatches to the view, then
 * runs the response hooks in reverse order. A hook that throws is handled by
 * its middleware's failure policy: evicted middleware are skipped for every
 * later hook call, including hooks of requests already in flight.
 */

import { MiddlewareRuntimeError, type MiddlewarePhase } from '../errors.ts';
import { withMiddlewareSpan } from '../telemetry/otel.ts';
import type { Context } from '../http/types.ts';
import type { Logger } from '../telemetry/logger.ts';
import type { HookResult, Middleware } from './middleware.ts';

interface PipelineEntry {
  readonly middleware: Middleware;
  alive: boolean;
}

export type Dispatch = (ctx: Context) => Promise<Response>;

/**
 * Middleware pipeline for request processing
 */
export class MiddlewarePipeline {
  private readonly entries: PipelineEntry[];

  constructor(middleware: readonly Middleware[], private readonly logger: Logger) {
    this.entries = middleware.map((m) => ({ middleware: m, alive: true }));
  }

  /**
   * Number of middleware still in the chain
   */
  get length(): number {
    return this.middleware.length;
  }

  /**
   * Middleware still in the chain, in configured order
   */
  get middleware(): Middleware[] {
    return this.entries.filter((e) => e.alive).map((e) => e.middleware);
  }

  isAlive(middleware: Middleware): boolean {
    return this.entries.some((e) => e.middleware === middleware && e.alive);
  }

  /**
   * Remove a middleware from the chain. Returns false when it was already gone.
   */
  evict(middleware: Middleware, reason?: MiddlewareRuntimeError): boolean {
    const entry = this.entries.find((e) => e.middleware === middleware);
    if (!entry || !entry.alive) return false;

    entry.alive = false;
    this.logger.error(`Middleware ${middleware.name} removed from the chain`, reason, {
      middleware: middleware.name,
      phase: reason?.phase,
    });
    return true;
  }

  /**
   * Execute the pipeline for one request
   */
  async execute(ctx: Context, dispatch: Dispatch): Promise<Response> {
    let response: Response | null = null;

    ctx.phase = 'request';
    for (const entry of this.entries) {
      if (!entry.alive) continue;
      const result = await this.invoke(entry, 'request', ctx, () =>
        entry.middleware.processRequest(ctx)
      );
      if (result instanceof Response) {
        response = result;
        break;
      }
    }

    if (!response) {
      ctx.phase = 'dispatch';
      response = await dispatch(ctx);
    }

    ctx.phase = 'response';
    for (const entry of [...this.entries].reverse()) {
      if (!entry.alive) continue;
      const current: Response = response;
      const result = await this.invoke(entry, 'response', ctx, () =>
        entry.middleware.processResponse(ctx, current)
      );
      if (result instanceof Response) {
        response = result;
      }
    }

    ctx.phase = 'done';
    return response;
  }

  private async invoke(
    entry: PipelineEntry,
    phase: MiddlewarePhase,
    ctx: Context,
    hook: () => Promise<HookResult> | HookResult
  ): Promise<HookResult> {
    const { middleware } = entry;

    try {
      return await withMiddlewareSpan(middleware.name, phase, async () => await hook());
    } catch (error) {
      const failure = new MiddlewareRuntimeError(middleware.name, phase, error);

      if (middleware.failurePolicy === 'fail-closed') {
        this.logger.error(`Middleware ${middleware.name} failed closed`, failure, {
          middleware: middleware.name,
          phase,
          requestId: ctx.requestId,
        });
        return (
          middleware.failureResponse(ctx, failure) ??
          new Response('Internal Server Error', { status: 500 })
        );
      }

      this.evict(middleware, failure);
      return undefined;
    }
  }
}
