// Central semantic JSON-RPC error helpers. Errors are plain objects (instead of an
// Error subclass) so code/message/data survive every wrapping layer unchanged on
// their way to the wire. The __semantic marker distinguishes them from arbitrary
// thrown values.
import type { RpcErrorObject } from '../models/message';

export const ErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  NotInitialized: -32001,
  RequestFailed: -32002,
  InvalidTool: -32003,
  InvalidResource: -32004,
  MethodDisabled: -32005,
  InvalidPrompt: -32006,
  AuthenticationFailed: -32007,
  PermissionDenied: -32008,
  RateLimitExceeded: -32009,
} as const;

export type ErrorKind =
  | 'parse' | 'invalidRequest' | 'methodNotFound' | 'invalidParams' | 'internal'
  | 'notInitialized' | 'requestFailed' | 'invalidTool' | 'invalidResource' | 'methodDisabled'
  | 'invalidPrompt' | 'authenticationFailed' | 'permissionDenied' | 'rateLimited';

const TAXONOMY: Record<ErrorKind, { code: number; message: string }> = {
  parse: { code: ErrorCode.ParseError, message: 'Parse error' },
  invalidRequest: { code: ErrorCode.InvalidRequest, message: 'Invalid Request' },
  methodNotFound: { code: ErrorCode.MethodNotFound, message: 'Method not found' },
  invalidParams: { code: ErrorCode.InvalidParams, message: 'Invalid params' },
  internal: { code: ErrorCode.InternalError, message: 'Internal error' },
  notInitialized: { code: ErrorCode.NotInitialized, message: 'Not initialized' },
  requestFailed: { code: ErrorCode.RequestFailed, message: 'Request failed' },
  invalidTool: { code: ErrorCode.InvalidTool, message: 'Invalid tool' },
  invalidResource: { code: ErrorCode.InvalidResource, message: 'Invalid resource' },
  methodDisabled: { code: ErrorCode.MethodDisabled, message: 'Method disabled' },
  invalidPrompt: { code: ErrorCode.InvalidPrompt, message: 'Invalid prompt' },
  authenticationFailed: { code: ErrorCode.AuthenticationFailed, message: 'Authentication failed' },
  permissionDenied: { code: ErrorCode.PermissionDenied, message: 'Permission denied' },
  rateLimited: { code: ErrorCode.RateLimitExceeded, message: 'Rate limit exceeded' },
};

export interface SemanticRpcErrorShape<TData = unknown> {
  code: number;
  message: string;
  data?: TData;
  __semantic: true;
}

export function semanticErrorFor<TData = unknown>(code: number, message: string, data?: TData): SemanticRpcErrorShape<TData> {
  const err: SemanticRpcErrorShape<TData> = { code, message, __semantic: true };
  if(data !== undefined) err.data = data;
  return err;
}

/** Build the taxonomy entry for `kind`; `message` overrides the fixed default. */
export function rpcError<TData = unknown>(kind: ErrorKind, message?: string, data?: TData): SemanticRpcErrorShape<TData> {
  const entry = TAXONOMY[kind];
  return semanticErrorFor(entry.code, message && message.length ? message : entry.message, data);
}

export function raise<TData = unknown>(kind: ErrorKind, message?: string, data?: TData): never {
  // eslint-disable-next-line no-throw-literal
  throw rpcError(kind, message, data);
}

export function defaultMessage(kind: ErrorKind): string { return TAXONOMY[kind].message; }
export function codeOf(kind: ErrorKind): number { return TAXONOMY[kind].code; }

export function isSemanticError(e: unknown): e is SemanticRpcErrorShape {
  if(!e || typeof e !== 'object') return false;
  const maybe = e as { code?: unknown; message?: unknown; __semantic?: unknown };
  return maybe.__semantic === true && Number.isSafeInteger(maybe.code) && typeof maybe.message === 'string';
}

export function isStandardErrorCode(code: number): boolean {
  return code >= -32768 && code <= -32000;
}

export function isMcpErrorCode(code: number): boolean {
  return code >= -32009 && code <= -32001;
}

const NAMES: Record<number, string> = {
  [ErrorCode.ParseError]: 'ParseError',
  [ErrorCode.InvalidRequest]: 'InvalidRequest',
  [ErrorCode.MethodNotFound]: 'MethodNotFound',
  [ErrorCode.InvalidParams]: 'InvalidParams',
  [ErrorCode.InternalError]: 'InternalError',
  [ErrorCode.NotInitialized]: 'NotInitialized',
  [ErrorCode.RequestFailed]: 'RequestFailed',
  [ErrorCode.InvalidTool]: 'InvalidTool',
  [ErrorCode.InvalidResource]: 'InvalidResource',
  [ErrorCode.MethodDisabled]: 'MethodDisabled',
  [ErrorCode.InvalidPrompt]: 'InvalidPrompt',
  [ErrorCode.AuthenticationFailed]: 'AuthenticationFailed',
  [ErrorCode.PermissionDenied]: 'PermissionDenied',
  [ErrorCode.RateLimitExceeded]: 'RateLimitExceeded',
};

export function errorName(code: number): string {
  const name = NAMES[code];
  if(name) return name;
  return isStandardErrorCode(code) ? 'StandardError' : 'UnknownError';
}

/**
 * Convert anything thrown into a wire error object. Semantic errors keep their
 * code, message and data; everything else becomes an internal error.
 */
export function toWireError(e: unknown): RpcErrorObject {
  if(isSemanticError(e)){
    const wire: RpcErrorObject = { code: e.code, message: e.message };
    if(e.data !== undefined) wire.data = e.data;
    return wire;
  }
  return { code: ErrorCode.InternalError, message: TAXONOMY.internal.message };
}

/** Re-hydrate an error received from the peer so it can be thrown locally. */
export function fromWireError(err: RpcErrorObject): SemanticRpcErrorShape {
  return semanticErrorFor(err.code, err.message, err.data);
}

export function describeError(e: unknown): string {
  if(isSemanticError(e)) return `RPC error ${e.code}: ${e.message}`;
  if(e instanceof Error) return e.message;
  return String(e);
}

export type TransportErrorReason = 'closed' | 'not_connected' | 'send_failed' | 'receive_failed';

const TRANSPORT_MESSAGES: Record<TransportErrorReason, string> = {
  closed: 'transport is closed',
  not_connected: 'not connected',
  send_failed: 'failed to send message',
  receive_failed: 'failed to receive message',
};

/** Connection-level failure; surfaced to the caller, never retried by the core. */
export class TransportError extends Error {
  readonly reason: TransportErrorReason;
  constructor(reason: TransportErrorReason, message?: string, options?: { cause?: unknown }){
    super(message ?? TRANSPORT_MESSAGES[reason], options);
    this.name = 'TransportError';
    this.reason = reason;
  }
}

export function isTransportError(e: unknown): e is TransportError {
  return e instanceof TransportError;
}
