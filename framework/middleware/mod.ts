/**
 * Middleware Layer
 *
 * Cross-cutting concerns that run around every request/response cycle.
 */

export {
  BaseMiddleware,
  StartupCheck,
  runStartupChecks,
  type FailurePolicy,
  type HookResult,
  type Middleware,
  type MiddlewareClass,
  type MiddlewareHost,
  type StartupCheckClass,
} from './middleware.ts';
export { MiddlewarePipeline, type Dispatch } from './pipeline.ts';
export { MiddlewareRegistry, createDefaultRegistry } from './registry.ts';
export {
  CSRFMiddleware,
  CheckForSessionMiddleware,
  VerifyCorrectMiddlewarePlacement,
  VerifyTrustedOriginsFormat,
  csrfExempt,
  isCsrfExempt,
  matchesTrustedOrigin,
  csrfFailureResponse,
  CSRF_FAILURE_BODY,
  type CsrfHandle,
  type CsrfVerdict,
  type CsrfFailureReason,
} from './csrf.ts';
export { CorsMiddleware } from './cors.ts';
export { LoggingMiddleware } from './logging.ts';
