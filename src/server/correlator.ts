/**
 * Request/response correlation over one shared transport.
 *
 * Exactly one reader loop calls transport.receive(). Callers never read: they
 * register a pending record under the request id before the frame is sent and
 * wait on it. The reader resolves the matching record, hands notifications to
 * the sink in arrival order, and passes peer-initiated requests to the request
 * handler. All mutations of the pending table happen in synchronous sections
 * of the event loop, so no lock is needed around it.
 */
import {
  classify, createErrorResponse, createNotification, createRequest, idKey, validateEnvelope,
  type JsonRpcMessage, type JsonRpcNotification, type JsonRpcRequest, type JsonRpcResponse, type Meta, type RequestId,
} from '../models/message';
import {
  fromWireError, isSemanticError, isTransportError, rpcError, toWireError, TransportError,
} from '../services/errors';
import { childLogger, silentLogger, type Logger } from '../services/logger';
import { zFrameId } from '../schemas';
import type { Transport } from './transport';

export type NotificationSink = (msg: JsonRpcNotification) => void | Promise<void>;
export type PeerRequestHandler = (msg: JsonRpcRequest) => Promise<JsonRpcResponse>;

export interface CorrelatorOptions {
  logger?: Logger;
  /** Default per-call deadline; 0 disables it. */
  requestTimeoutMs?: number;
  onNotification?: NotificationSink;
  onRequest?: PeerRequestHandler;
  /** Called once when the reader stops, with the failure if it stopped on one. */
  onClose?: (err?: unknown) => void;
}

export interface CallOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  meta?: Meta;
}

interface PendingCall {
  id: RequestId;
  method: string;
  startedAt: number;
  resolve: (resp: JsonRpcResponse) => void;
  reject: (err: unknown) => void;
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => { resolve = res; reject = rej; });
  return { promise, resolve, reject };
}

export class Correlator {
  private readonly pending = new Map<string, PendingCall>();
  private readonly log: Logger;
  private readonly timeoutMs: number;
  private readonly loopAbort = new AbortController();
  private readonly finished = deferred<void>();
  private readonly onNotification: NotificationSink | undefined;
  private onRequest: PeerRequestHandler | undefined;
  private readonly onClose: ((err?: unknown) => void) | undefined;
  private started = false;
  private stopped = false;
  private closing = false;
  private failure: unknown = undefined;

  constructor(private readonly transport: Transport, opts: CorrelatorOptions = {}){
    this.log = childLogger(opts.logger ?? silentLogger, { component: 'correlator' });
    this.timeoutMs = opts.requestTimeoutMs ?? 30_000;
    this.onNotification = opts.onNotification;
    this.onRequest = opts.onRequest;
    this.onClose = opts.onClose;
  }

  setRequestHandler(handler: PeerRequestHandler | undefined){ this.onRequest = handler; }

  /** Start the reader loop; idempotent. */
  start(){
    if(this.started || this.stopped) return;
    this.started = true;
    this.readLoop().catch(e => this.fail(new TransportError('receive_failed', undefined, { cause: e })));
  }

  isRunning(){ return this.started && !this.stopped; }
  pendingCount(){ return this.pending.size; }

  /** Resolves when the reader loop has stopped, for whatever reason. */
  done(): Promise<void> { return this.finished.promise; }

  /**
   * Send `request` and wait for the response with the same id. The pending record is
   * registered before the frame is written, so a fast response can never be missed.
   */
  async exchange(request: JsonRpcRequest, opts: CallOptions = {}): Promise<JsonRpcResponse> {
    this.assertOpen();
    this.start();
    const key = idKey(request.id);
    if(this.pending.has(key)) throw rpcError('invalidRequest', 'duplicate request id', { id: request.id });
    const timeoutMs = opts.timeoutMs ?? this.timeoutMs;
    const signal = opts.signal;
    const slot = deferred<JsonRpcResponse>();
    let timer: NodeJS.Timeout | undefined;
    const onAbort = () => {
      if(this.pending.get(key) !== record) return;
      this.pending.delete(key);
      this.log.debug('call_cancelled', { id: request.id, method: request.method });
      record.reject(rpcError('requestFailed', 'request cancelled', { method: request.method }));
    };
    const cleanup = () => {
      if(timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
    const record: PendingCall = {
      id: request.id,
      method: request.method,
      startedAt: Date.now(),
      resolve: resp => { cleanup(); slot.resolve(resp); },
      reject: err => { cleanup(); slot.reject(err); },
    };
    if(signal?.aborted) throw rpcError('requestFailed', 'request cancelled', { method: request.method });
    this.pending.set(key, record);
    if(timeoutMs > 0){
      timer = setTimeout(() => {
        if(this.pending.get(key) !== record) return;
        this.pending.delete(key);
        this.log.warn('call_timeout', { id: request.id, method: request.method, timeoutMs });
        record.reject(rpcError('requestFailed', 'request timeout', { method: request.method, timeoutMs }));
      }, timeoutMs);
    }
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      await this.transport.send(request);
    } catch(e){
      if(this.pending.get(key) === record) this.pending.delete(key);
      record.reject(isTransportError(e) ? e : new TransportError('send_failed', undefined, { cause: e }));
    }
    return slot.promise;
  }

  /** Call `method` and unwrap the result; a peer error is rethrown as a semantic error. */
  async call(method: string, params?: unknown, opts: CallOptions = {}): Promise<unknown> {
    const response = await this.exchange(createRequest(method, params, opts.meta), opts);
    if(response.error) throw fromWireError(response.error);
    return response.result;
  }

  async notify(method: string, params?: unknown, meta?: Meta): Promise<void> {
    this.assertOpen();
    await this.sendOrWrap(createNotification(method, params, meta));
  }

  /** Stop the reader, fail every pending call with TransportError('closed') and close the transport. */
  async close(): Promise<void> {
    if(this.closing) return this.finished.promise;
    this.closing = true;
    const wasStopped = this.stopped;
    this.stopped = true;
    this.loopAbort.abort(new TransportError('closed'));
    this.rejectAll(new TransportError('closed'));
    try {
      await this.transport.close();
    } catch(e){
      this.log.warn('transport_close_failed', { error: e instanceof Error ? e.message : String(e) });
    }
    if(!wasStopped) this.finish();
    return this.finished.promise;
  }

  private assertOpen(){
    if(!this.stopped) return;
    if(this.failure !== undefined) throw this.failure;
    throw new TransportError('closed');
  }

  private async sendOrWrap(msg: JsonRpcMessage){
    try {
      await this.transport.send(msg);
    } catch(e){
      throw isTransportError(e) ? e : new TransportError('send_failed', undefined, { cause: e });
    }
  }

  /** Best-effort write used for replies; a dead transport is logged, not thrown. */
  private async reply(msg: JsonRpcResponse){
    if(this.stopped || !this.transport.isConnected()){
      this.log.debug('reply_dropped', { id: msg.id, reason: 'closed' });
      return;
    }
    try {
      await this.transport.send(msg);
    } catch(e){
      this.log.warn('reply_failed', { id: msg.id, error: e instanceof Error ? e.message : String(e) });
    }
  }

  private async readLoop(){
    while(!this.stopped){
      let msg: JsonRpcMessage;
      try {
        msg = await this.transport.receive(this.loopAbort.signal);
      } catch(e){
        if(this.closing) return;
        if(isSemanticError(e)){
          // Bad frame; the stream itself is still usable. Answer under its id when readable.
          const frame = zFrameId.safeParse(e.data);
          const id = frame.success ? frame.data.id : null;
          this.log.warn('frame_rejected', { id, code: e.code, message: e.message });
          await this.reply(createErrorResponse(id, toWireError(e)));
          continue;
        }
        this.fail(isTransportError(e) ? e : new TransportError('receive_failed', undefined, { cause: e }));
        return;
      }
      this.dispatch(msg);
    }
  }

  private dispatch(msg: JsonRpcMessage){
    switch(classify(msg)){
      case 'response': this.deliverResponse(msg); return;
      case 'notification': this.deliverNotification(msg); return;
      case 'request': {
        const req = msg;
        if(typeof req.method === 'string' && req.id !== undefined && req.id !== null){
          const request: JsonRpcRequest = { ...req, id: req.id, method: req.method };
          this.handlePeerRequest(request).catch(e => this.log.error('peer_request_failed', { error: e instanceof Error ? e.message : String(e) }));
        }
        return;
      }
      default: {
        const problems = validateEnvelope(msg);
        this.log.warn('invalid_message', { id: msg.id ?? null, problems });
        if(msg.id !== undefined && msg.id !== null){
          this.reply(createErrorResponse(msg.id, toWireError(rpcError('invalidRequest', undefined, { problems }))))
            .catch(e => this.log.error('reply_failed', { error: String(e) }));
        }
      }
    }
  }

  private deliverResponse(msg: JsonRpcMessage){
    if(msg.id === undefined || msg.id === null){
      // Peer could not correlate one of our frames (e.g. it failed to parse).
      this.log.warn('uncorrelated_error', { error: msg.error });
      return;
    }
    const key = idKey(msg.id);
    const record = this.pending.get(key);
    if(!record){
      this.log.warn('late_response_dropped', { id: msg.id });
      return;
    }
    this.pending.delete(key);
    this.log.debug('call_completed', { id: msg.id, method: record.method, ms: Date.now() - record.startedAt });
    record.resolve({ jsonrpc: msg.jsonrpc, id: msg.id, result: msg.result, error: msg.error, _meta: msg._meta });
  }

  private deliverNotification(msg: JsonRpcMessage){
    const sink = this.onNotification;
    if(!sink || typeof msg.method !== 'string') return;
    const notification: JsonRpcNotification = { ...msg, method: msg.method, id: undefined };
    try {
      const pendingWork = sink(notification);
      if(pendingWork){
        pendingWork.catch(e => this.log.error('notification_handler_error', { method: msg.method, error: e instanceof Error ? e.message : String(e) }));
      }
    } catch(e){
      this.log.error('notification_handler_error', { method: msg.method, error: e instanceof Error ? e.message : String(e) });
    }
  }

  private async handlePeerRequest(req: JsonRpcRequest){
    let response: JsonRpcResponse;
    const handler = this.onRequest;
    if(!handler){
      response = createErrorResponse(req.id, toWireError(rpcError('methodNotFound', undefined, { method: req.method })));
    } else {
      try {
        response = await handler(req);
      } catch(e){
        this.log.error('request_handler_error', { method: req.method, error: e instanceof Error ? e.message : String(e) });
        response = createErrorResponse(req.id, toWireError(e));
      }
    }
    await this.reply(response);
  }

  private rejectAll(err: unknown){
    const records = [...this.pending.values()];
    this.pending.clear();
    for(const r of records) r.reject(err);
  }

  private fail(err: unknown){
    if(this.stopped) return;
    this.stopped = true;
    this.failure = err;
    this.log.error('reader_stopped', { error: err instanceof Error ? err.message : String(err), pending: this.pending.size });
    this.rejectAll(err);
    this.finish(err);
  }

  private finish(err?: unknown){
    this.finished.resolve();
    this.onClose?.(err);
  }
}
