/**
 * Request middleware.
 *
 * An interceptor wraps the next handler: `(next) => (request, scope) => response`.
 * The chain folds from last to first, so the interceptor added first is the
 * outermost layer: it sees the request before every other layer and the
 * response after them. A layer calls `next` at most once, or short-circuits by
 * returning an error response itself.
 *
 * RequestScope is frozen. A layer that needs to change it (identity, signal)
 * passes a derived copy downstream.
 */
import {
  createErrorResponse, validateEnvelope, type JsonRpcMessage, type JsonRpcResponse, type RequestId,
} from '../models/message';
import { Methods } from '../models/capabilities';
import { ErrorCode, isSemanticError, rpcError, toWireError } from './errors';
import type { Logger } from './logger';
import type { MetricsSink } from './metrics';
import type { RateLimiter } from './rateLimiter';

export interface Identity {
  id: string;
  name?: string;
  roles?: string[];
}

export interface RequestScope {
  readonly requestId: RequestId | null;
  readonly method: string;
  readonly origin?: string;
  readonly identity?: Identity;
  readonly startTime: number;
  readonly signal: AbortSignal;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export type RequestHandler = (request: JsonRpcMessage, scope: RequestScope) => Promise<JsonRpcResponse>;
export type Interceptor = (next: RequestHandler) => RequestHandler;

export interface ScopeInit {
  origin?: string;
  identity?: Identity;
  signal?: AbortSignal;
  metadata?: Record<string, unknown>;
}

export function createScope(request: JsonRpcMessage, init: ScopeInit = {}): RequestScope {
  return Object.freeze({
    requestId: request.id ?? null,
    method: request.method ?? '',
    origin: init.origin,
    identity: init.identity,
    startTime: Date.now(),
    signal: init.signal ?? new AbortController().signal,
    metadata: Object.freeze({ ...(init.metadata ?? {}) }),
  });
}

/** Frozen copy of `scope` with `patch` applied; metadata is merged, not replaced. */
export function deriveScope(scope: RequestScope, patch: Omit<Partial<RequestScope>, 'metadata'> & { metadata?: Record<string, unknown> }): RequestScope {
  return Object.freeze({
    ...scope,
    ...patch,
    metadata: Object.freeze({ ...scope.metadata, ...(patch.metadata ?? {}) }),
  });
}

export class InterceptorChain {
  private readonly interceptors: Interceptor[] = [];

  use(...interceptors: Interceptor[]): this {
    this.interceptors.push(...interceptors);
    return this;
  }

  get size(){ return this.interceptors.length; }

  /** Compose the chain around `final`. Later `use` calls do not affect an already built handler. */
  build(final: RequestHandler): RequestHandler {
    return this.interceptors.reduceRight<RequestHandler>((next, interceptor) => interceptor(next), final);
  }
}

function errorOf(request: JsonRpcMessage, e: unknown): JsonRpcResponse {
  return createErrorResponse(request.id, toWireError(e));
}

// ---- Standard interceptors ------------------------------------------------

export function loggingInterceptor(logger: Logger): Interceptor {
  return next => async (request, scope) => {
    const start = Date.now();
    logger.debug('request_start', { id: scope.requestId, method: scope.method, origin: scope.origin });
    try {
      const response = await next(request, scope);
      const ms = Date.now() - start;
      if(response.error) logger.info('request_end', { id: scope.requestId, method: scope.method, ms, code: response.error.code });
      else logger.info('request_end', { id: scope.requestId, method: scope.method, ms });
      return response;
    } catch(e){
      logger.warn('request_error', { id: scope.requestId, method: scope.method, ms: Date.now() - start, error: e instanceof Error ? e.message : String(e) });
      throw e;
    }
  };
}

export const REQUEST_METRICS = {
  total: 'mcp.requests.total',
  duration: 'mcp.requests.duration',
  success: 'mcp.requests.success',
  errors: 'mcp.requests.errors',
} as const;

export function metricsInterceptor(sink: MetricsSink): Interceptor {
  return next => async (request, scope) => {
    const tags = { method: scope.method };
    const start = Date.now();
    sink.increment(REQUEST_METRICS.total, tags);
    let failed = true;
    try {
      const response = await next(request, scope);
      failed = response.error !== undefined;
      return response;
    } finally {
      sink.observe(REQUEST_METRICS.duration, Date.now() - start, tags);
      sink.increment(failed ? REQUEST_METRICS.errors : REQUEST_METRICS.success, tags);
    }
  };
}

export type TokenValidator = (token: string, scope: RequestScope) => Promise<Identity | undefined> | Identity | undefined;

export interface AuthOptions {
  validate: TokenValidator;
  /** Methods that skip authentication (default: initialize, ping). */
  bypass?: readonly string[];
}

/** Token is read from `_meta.extra.authToken`; a resolved identity is attached to the downstream scope. */
export function authInterceptor(opts: AuthOptions): Interceptor {
  const bypass = new Set(opts.bypass ?? [Methods.Initialize, Methods.Ping]);
  return next => async (request, scope) => {
    if(bypass.has(scope.method)) return next(request, scope);
    const token = request._meta?.extra?.authToken;
    if(typeof token !== 'string' || !token.length){
      return errorOf(request, rpcError('authenticationFailed', 'missing auth token'));
    }
    const identity = await opts.validate(token, scope);
    if(!identity) return errorOf(request, rpcError('authenticationFailed', 'invalid auth token'));
    return next(request, deriveScope(scope, { identity }));
  };
}

export function rateLimitInterceptor(limiter: RateLimiter): Interceptor {
  return next => async (request, scope) => {
    const key = scope.identity?.id ?? scope.origin ?? 'anonymous';
    const decision = limiter.check(key);
    if(!decision.allowed){
      return errorOf(request, rpcError('rateLimited', undefined, { key, retryAfterMs: decision.retryAfterMs }));
    }
    return next(request, scope);
  };
}

export function validationInterceptor(): Interceptor {
  return next => async (request, scope) => {
    const problems = validateEnvelope(request);
    if(problems.length) return errorOf(request, rpcError('invalidRequest', problems[0], { problems }));
    return next(request, scope);
  };
}

/**
 * Race the downstream chain against a deadline. On expiry the downstream scope's
 * signal is aborted so the handler can stop, and request-failed is returned.
 */
export function timeoutInterceptor(timeoutMs: number, logger?: Logger): Interceptor {
  return next => async (request, scope) => {
    const controller = new AbortController();
    const parent = scope.signal;
    const onParentAbort = () => controller.abort(parent.reason);
    if(parent.aborted) controller.abort(parent.reason);
    else parent.addEventListener('abort', onParentAbort, { once: true });
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<JsonRpcResponse>(resolve => {
      timer = setTimeout(() => {
        const err = rpcError('requestFailed', 'request timeout', { method: scope.method, timeoutMs });
        // Settle first so a handler that returns on abort cannot win the race.
        resolve(errorOf(request, err));
        controller.abort(err);
        logger?.warn('request_timeout', { id: scope.requestId, method: scope.method, timeoutMs });
      }, timeoutMs);
    });
    const downstream = next(request, deriveScope(scope, { signal: controller.signal }));
    try {
      return await Promise.race([downstream, deadline]);
    } finally {
      if(timer) clearTimeout(timer);
      parent.removeEventListener('abort', onParentAbort);
      // The losing downstream may still settle; keep its rejection observed.
      downstream.catch(e => logger?.debug('request_abandoned', { method: scope.method, error: e instanceof Error ? e.message : String(e) }));
    }
  };
}

/**
 * Convert anything thrown downstream into an error response. Internal failures
 * are logged at error level; protocol and MCP errors at debug.
 */
export function errorHandlingInterceptor(logger: Logger): Interceptor {
  return next => async (request, scope) => {
    try {
      return await next(request, scope);
    } catch(e){
      const wire = toWireError(e);
      if(!isSemanticError(e) || wire.code === ErrorCode.InternalError){
        logger.error('request_internal_error', {
          id: scope.requestId,
          method: scope.method,
          error: e instanceof Error ? e.message : String(e),
          stack: e instanceof Error ? e.stack : undefined,
        });
      } else {
        logger.debug('request_protocol_error', { id: scope.requestId, method: scope.method, code: wire.code, message: wire.message });
      }
      return createErrorResponse(request.id, wire);
    }
  };
}
