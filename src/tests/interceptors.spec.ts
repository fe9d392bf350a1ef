import { describe, it, expect } from 'vitest';
import {
  authInterceptor, createScope, deriveScope, errorHandlingInterceptor, InterceptorChain, loggingInterceptor,
  metricsInterceptor, rateLimitInterceptor, REQUEST_METRICS, timeoutInterceptor, validationInterceptor,
  type Interceptor, type RequestHandler,
} from '../services/interceptors';
import { createResponse, type JsonRpcMessage } from '../models/message';
import { ErrorCode, rpcError } from '../services/errors';
import { MemoryLogger } from '../services/logger';
import { InMemoryMetrics } from '../services/metrics';
import { FixedWindowRateLimiter } from '../services/rateLimiter';

const ping: JsonRpcMessage = { jsonrpc: '2.0', id: 1, method: 'ping' };
const ok: RequestHandler = async req => createResponse(req.id ?? null, {});

function run(interceptors: Interceptor[], final: RequestHandler, request: JsonRpcMessage = ping) {
  const handler = new InterceptorChain().use(...interceptors).build(final);
  return handler(request, createScope(request));
}

describe('InterceptorChain', () => {
  it('runs the first interceptor outermost', async () => {
    const order: string[] = [];
    const tag = (name: string): Interceptor => next => async (req, scope) => {
      order.push(`${name}-in`);
      const resp = await next(req, scope);
      order.push(`${name}-out`);
      return resp;
    };
    await run([tag('a'), tag('b')], async req => { order.push('final'); return createResponse(req.id ?? null, null); });
    expect(order).toEqual(['a-in', 'b-in', 'final', 'b-out', 'a-out']);
  });

  it('lets a layer short-circuit', async () => {
    let reached = false;
    const stop: Interceptor = () => async req => createResponse(req.id ?? null, 'stopped');
    const resp = await run([stop], async req => { reached = true; return createResponse(req.id ?? null, null); });
    expect(resp.result).toBe('stopped');
    expect(reached).toBe(false);
  });
});

describe('request scope', () => {
  it('is frozen and derives with merged metadata', () => {
    const scope = createScope(ping, { origin: 'stdio', metadata: { a: 1 } });
    expect(Object.isFrozen(scope)).toBe(true);
    expect(scope.requestId).toBe(1);
    expect(scope.method).toBe('ping');
    const derived = deriveScope(scope, { identity: { id: 'u1' }, metadata: { b: 2 } });
    expect(derived.metadata).toEqual({ a: 1, b: 2 });
    expect(derived.identity).toEqual({ id: 'u1' });
    expect(scope.identity).toBeUndefined();
    expect(Object.isFrozen(derived.metadata)).toBe(true);
  });
});

describe('authInterceptor', () => {
  const validate = (token: string) => (token === 'test-secret' ? { id: 'tester' } : undefined);
  const call = (token?: string): JsonRpcMessage => ({
    jsonrpc: '2.0', id: 2, method: 'tools/list',
    ...(token === undefined ? {} : { _meta: { extra: { authToken: token } } }),
  });

  it('lets bypassed methods through without a token', async () => {
    expect((await run([authInterceptor({ validate })], ok)).result).toEqual({});
  });

  it('rejects a missing or unknown token', async () => {
    expect(await run([authInterceptor({ validate })], ok, call())).toEqual({
      jsonrpc: '2.0', id: 2, error: { code: ErrorCode.AuthenticationFailed, message: 'missing auth token' },
    });
    expect((await run([authInterceptor({ validate })], ok, call('wrong'))).error?.message).toBe('invalid auth token');
  });

  it('attaches the identity downstream', async () => {
    let who: string | undefined;
    await run([authInterceptor({ validate })], async (req, scope) => { who = scope.identity?.id; return ok(req, scope); }, call('test-secret'));
    expect(who).toBe('tester');
  });
});

describe('rateLimitInterceptor', () => {
  it('returns rate-limit-exceeded past the limit', async () => {
    const limiter = new FixedWindowRateLimiter({ limit: 1, windowMs: 1_000, now: () => 0 });
    const handler = new InterceptorChain().use(rateLimitInterceptor(limiter)).build(ok);
    expect((await handler(ping, createScope(ping))).error).toBeUndefined();
    expect((await handler(ping, createScope(ping))).error).toEqual({
      code: ErrorCode.RateLimitExceeded, message: 'Rate limit exceeded', data: { key: 'anonymous', retryAfterMs: 1_000 },
    });
    expect((await handler(ping, createScope(ping, { origin: 'other' }))).error).toBeUndefined();
  });
});

describe('validationInterceptor', () => {
  it('rejects a malformed envelope before the handler', async () => {
    const resp = await run([validationInterceptor()], ok, { jsonrpc: '1.0', id: 3, method: 'ping' });
    expect(resp.error).toEqual({
      code: ErrorCode.InvalidRequest, message: 'invalid JSON-RPC version', data: { problems: ['invalid JSON-RPC version'] },
    });
  });
});

describe('timeoutInterceptor', () => {
  it('aborts the handler and answers request-failed', async () => {
    let aborted = false;
    const slow: RequestHandler = (req, scope) => new Promise(resolve => {
      scope.signal.addEventListener('abort', () => {
        aborted = true;
        resolve(createResponse(req.id ?? null, 'late'));
      });
    });
    const resp = await run([timeoutInterceptor(20)], slow, { jsonrpc: '2.0', id: 4, method: 'slow' });
    expect(resp.error).toEqual({ code: ErrorCode.RequestFailed, message: 'request timeout', data: { method: 'slow', timeoutMs: 20 } });
    expect(aborted).toBe(true);
  });

  it('returns the handler result when it finishes in time', async () => {
    expect((await run([timeoutInterceptor(1_000)], ok)).result).toEqual({});
  });
});

describe('errorHandlingInterceptor', () => {
  it('turns an unexpected throw into internal error and logs it', async () => {
    const log = new MemoryLogger();
    const resp = await run([errorHandlingInterceptor(log)], async () => { throw new Error('boom'); });
    expect(resp).toEqual({ jsonrpc: '2.0', id: 1, error: { code: ErrorCode.InternalError, message: 'Internal error' } });
    expect(log.events('error')).toEqual(['request_internal_error']);
  });

  it('keeps protocol errors and logs them at debug', async () => {
    const log = new MemoryLogger();
    const resp = await run([errorHandlingInterceptor(log)], async () => { throw rpcError('invalidParams', 'bad'); });
    expect(resp.error).toEqual({ code: ErrorCode.InvalidParams, message: 'bad' });
    expect(log.events()).toEqual(['request_protocol_error']);
  });
});

describe('logging and metrics interceptors', () => {
  it('logs start and end', async () => {
    const log = new MemoryLogger();
    await run([loggingInterceptor(log)], ok);
    expect(log.records.map(r => `${r.level}:${r.evt}`)).toEqual(['debug:request_start', 'info:request_end']);
  });

  it('counts requests by method and outcome', async () => {
    const sink = new InMemoryMetrics();
    await run([metricsInterceptor(sink)], ok);
    await run([metricsInterceptor(sink)], async () => { throw new Error('x'); }).catch(() => undefined);
    const tags = { method: 'ping' };
    expect(sink.counter(REQUEST_METRICS.total, tags)).toBe(2);
    expect(sink.counter(REQUEST_METRICS.success, tags)).toBe(1);
    expect(sink.counter(REQUEST_METRICS.errors, tags)).toBe(1);
    expect(sink.snapshot().durations[`${REQUEST_METRICS.duration}{method=ping}`].count).toBe(2);
  });
});
