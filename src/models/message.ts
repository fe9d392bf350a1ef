/**
 * JSON-RPC 2.0 envelope with the MCP `_meta` extension.
 *
 * One message shape covers requests, notifications and responses; which one a
 * message is follows only from the fields it carries (see the predicates below).
 */
import crypto from 'crypto';
import type { JsonValue } from './jsonValue';
import { formatIssues, zEnvelope, zFrameId, zParamsProgressToken } from '../schemas';
import { rpcError } from '../services/errors';

export const JSONRPC_VERSION = '2.0';

export type RequestId = string | number;

export interface RpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

/** Observability / progress correlation only; never consulted for routing. */
export interface Meta {
  progressToken?: string;
  traceId?: string;
  spanId?: string;
  extra?: { [key: string]: JsonValue };
}

export interface JsonRpcMessage {
  jsonrpc: string;
  id?: RequestId | null;
  method?: string;
  params?: unknown;
  result?: unknown;
  error?: RpcErrorObject;
  _meta?: Meta;
}

export interface JsonRpcRequest extends JsonRpcMessage { id: RequestId; method: string }
export interface JsonRpcNotification extends JsonRpcMessage { method: string; id?: null }
export interface JsonRpcResponse extends JsonRpcMessage { id: RequestId | null; method?: undefined }

let requestSeq = 0;
const processTag = crypto.randomBytes(3).toString('hex');

/** Unique within the process: monotonically increasing counter plus a per-process tag. */
export function newRequestId(): string {
  requestSeq += 1;
  return `req_${processTag}_${requestSeq}`;
}

export function createRequest(method: string, params?: unknown, meta?: Meta): JsonRpcRequest {
  const msg: JsonRpcRequest = { jsonrpc: JSONRPC_VERSION, id: newRequestId(), method };
  if(params !== undefined) msg.params = params;
  if(meta) msg._meta = meta;
  return msg;
}

export function createNotification(method: string, params?: unknown, meta?: Meta): JsonRpcNotification {
  const msg: JsonRpcNotification = { jsonrpc: JSONRPC_VERSION, method };
  if(params !== undefined) msg.params = params;
  if(meta) msg._meta = meta;
  return msg;
}

/** `undefined` results are sent as `null` so the message still classifies as a response. */
export function createResponse(id: RequestId | null, result: unknown): JsonRpcResponse {
  return { jsonrpc: JSONRPC_VERSION, id, result: result === undefined ? null : result };
}

export function createErrorResponse(id: RequestId | null | undefined, error: RpcErrorObject): JsonRpcResponse {
  const wire: RpcErrorObject = { code: error.code, message: error.message };
  if(error.data !== undefined) wire.data = error.data;
  return { jsonrpc: JSONRPC_VERSION, id: id ?? null, error: wire };
}

function hasMethod(msg: JsonRpcMessage): boolean {
  return typeof msg.method === 'string' && msg.method.length > 0;
}

function hasId(msg: JsonRpcMessage): boolean {
  return msg.id !== undefined && msg.id !== null;
}

export function isRequest(msg: JsonRpcMessage): msg is JsonRpcRequest {
  return hasMethod(msg) && hasId(msg);
}

export function isNotification(msg: JsonRpcMessage): msg is JsonRpcNotification {
  return hasMethod(msg) && !hasId(msg);
}

export function isResponse(msg: JsonRpcMessage): msg is JsonRpcResponse {
  return !hasMethod(msg) && (msg.result !== undefined || msg.error !== undefined);
}

export type MessageKind = 'request' | 'notification' | 'response' | 'invalid';

export function classify(msg: JsonRpcMessage): MessageKind {
  if(isRequest(msg)) return 'request';
  if(isNotification(msg)) return 'notification';
  if(isResponse(msg)) return 'response';
  return 'invalid';
}

/**
 * Structural problems with an envelope: wrong version, a request without a
 * method, or more than one of {method, result, error} populated.
 */
export function validateEnvelope(msg: JsonRpcMessage): string[] {
  const problems: string[] = [];
  if(msg.jsonrpc !== JSONRPC_VERSION) problems.push('invalid JSON-RPC version');
  const populated = [hasMethod(msg), msg.result !== undefined, msg.error !== undefined].filter(Boolean).length;
  if(populated === 0){
    problems.push(hasId(msg) ? 'missing method' : 'empty message');
  } else if(populated > 1){
    problems.push('exactly one of method, result or error must be set');
  }
  return problems;
}

/** Stable map key for an id; keeps 1 and "1" apart. */
export function idKey(id: RequestId): string {
  return `${typeof id}:${id}`;
}

/** Progress token from `params._meta` (MCP convention) or the envelope `_meta`. */
export function progressTokenOf(msg: JsonRpcMessage): string | undefined {
  const parsed = zParamsProgressToken.safeParse(msg.params);
  if(parsed.success) return parsed.data._meta.progressToken;
  return msg._meta?.progressToken;
}

export function encodeMessage(msg: JsonRpcMessage): string {
  return JSON.stringify(msg);
}

/**
 * Parse one wire frame. Malformed JSON throws a parse error; anything that is not
 * an envelope-shaped object throws invalid-request, with the frame's id in the
 * error data when it can be read. The version is not checked here.
 */
export function decodeMessage(raw: string): JsonRpcMessage {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch(e){
    throw rpcError('parse', undefined, { reason: e instanceof Error ? e.message : String(e) });
  }
  if(typeof value !== 'object' || value === null || Array.isArray(value)){
    throw rpcError('invalidRequest', 'message must be a JSON object');
  }
  const parsed = zEnvelope.safeParse(value);
  if(!parsed.success){
    const issues = formatIssues(parsed.error);
    const frame = zFrameId.safeParse(value);
    throw rpcError('invalidRequest', undefined, frame.success ? { issues, id: frame.data.id } : { issues });
  }
  return parsed.data;
}

export function withProgress(meta: Meta | undefined, token: string): Meta {
  return { ...(meta ?? {}), progressToken: token };
}

/** Attach trace/span ids, keeping an existing trace id so spans chain under one trace. */
export function withTrace(meta?: Meta): Meta {
  return {
    ...(meta ?? {}),
    traceId: meta?.traceId ?? crypto.randomBytes(16).toString('hex'),
    spanId: crypto.randomBytes(8).toString('hex'),
  };
}
