/**
 * MCP client over a single transport.
 *
 * Every outgoing request runs through the client interceptor chain and then the
 * correlator. Server notifications (progress, resource updates, list changes)
 * arrive through the correlator's notification sink in transport order.
 */
import type { z } from 'zod';
import {
  Methods, type CallToolResult, type ClientCapabilities, type GetPromptResult, type Implementation,
  type InitializeResult, type Prompt, type ProgressNotificationParams, type ReadResourceResult, type Resource,
  type ServerCapabilities, type Tool,
} from '../models/capabilities';
import type { JsonObject } from '../models/jsonValue';
import {
  createErrorResponse, createRequest, createResponse, withTrace,
  type JsonRpcMessage, type JsonRpcNotification, type JsonRpcRequest, type JsonRpcResponse, type Meta,
} from '../models/message';
import {
  formatIssues, zCallToolResult, zClientOptionsData, zGetPromptResult, zInitializeResult, zListPromptsResult,
  zListResourcesResult, zListToolsResult, zProgressParams, zReadResourceResult, zUriParams,
} from '../schemas';
import { SUPPORTED_PROTOCOL_VERSIONS, getRuntimeConfig } from '../config/runtimeConfig';
import { CatalogMirror } from '../services/catalogMirror';
import { describeError, fromWireError, raise, rpcError, toWireError } from '../services/errors';
import {
  createScope, InterceptorChain, loggingInterceptor, metricsInterceptor, type Interceptor, type RequestHandler,
} from '../services/interceptors';
import { childLogger, silentLogger, type Logger } from '../services/logger';
import type { MetricsSink } from '../services/metrics';
import { generateProgressToken, ProgressTracker } from '../services/progressTracker';
import { Correlator } from './correlator';
import { HandshakeStateMachine, type HandshakeState } from './handshake';
import type { Transport } from './transport';

export interface ClientOptions {
  clientInfo?: Implementation;
  capabilities?: ClientCapabilities;
  requestTimeoutMs?: number;
  connectTimeoutMs?: number;
  /** List tools/resources/prompts right after the handshake and on list_changed. */
  autoCache?: boolean;
  protocolVersion?: string;
  /** Sent as `_meta.extra.authToken` on every request. */
  authToken?: string;
  /** Attach trace/span ids to every request's `_meta`. */
  tracing?: boolean;
  logger?: Logger;
  metrics?: MetricsSink;
  interceptors?: Interceptor[];
  progressHandler?: (update: ProgressNotificationParams) => void | Promise<void>;
  onResourceUpdated?: (uri: string) => void | Promise<void>;
}

export interface RequestOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  meta?: Meta;
}

function deepFreeze<T>(value: T): T {
  if(value && typeof value === 'object'){
    for(const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

export class McpClient {
  private readonly correlator: Correlator;
  private readonly handshake: HandshakeStateMachine;
  private readonly chain = new InterceptorChain();
  private handler: RequestHandler | undefined;
  private readonly log: Logger;
  private readonly progress: ProgressTracker | undefined;
  private readonly toolMirror = new CatalogMirror<Tool>(t => t.name);
  private readonly resourceMirror = new CatalogMirror<Resource>(r => r.uri);
  private readonly promptMirror = new CatalogMirror<Prompt>(p => p.name);
  private readonly info: Implementation;
  private readonly capabilities: ClientCapabilities;
  private readonly requestTimeoutMs: number;
  private readonly connectTimeoutMs: number;
  private readonly autoCache: boolean;
  private readonly protocolVersion: string;
  private serverInfo: Implementation | undefined;
  private serverCapabilities: ServerCapabilities | undefined;
  private negotiatedVersion: string | undefined;
  private instructions: string | undefined;

  constructor(private readonly transport: Transport, private readonly options: ClientOptions = {}){
    const checked = zClientOptionsData.safeParse(options);
    if(!checked.success) raise('invalidParams', 'invalid client options', { issues: formatIssues(checked.error) });
    const cfg = getRuntimeConfig();
    this.log = childLogger(options.logger ?? silentLogger, { component: 'client' });
    this.info = Object.freeze({ ...(options.clientInfo ?? cfg.client) });
    this.capabilities = structuredClone(options.capabilities ?? {});
    this.requestTimeoutMs = options.requestTimeoutMs ?? cfg.timeouts.requestMs;
    this.connectTimeoutMs = options.connectTimeoutMs ?? cfg.timeouts.connectMs;
    this.autoCache = options.autoCache ?? cfg.autoCache;
    this.protocolVersion = options.protocolVersion ?? cfg.protocolVersion;
    this.handshake = new HandshakeStateMachine({ logger: this.log });
    if(options.progressHandler){
      this.progress = new ProgressTracker({ notifier: options.progressHandler, logger: this.log });
    }
    this.correlator = new Correlator(transport, {
      logger: options.logger,
      requestTimeoutMs: this.requestTimeoutMs,
      onNotification: msg => this.handleNotification(msg),
      onRequest: req => this.handlePeerRequest(req),
      onClose: err => this.onTransportClosed(err),
    });
    this.chain.use(loggingInterceptor(this.log));
    if(options.metrics) this.chain.use(metricsInterceptor(options.metrics));
    if(options.interceptors?.length) this.chain.use(...options.interceptors);
  }

  get state(): HandshakeState { return this.handshake.state; }

  isConnected(): boolean {
    return this.handshake.isReady() && this.transport.isConnected();
  }

  getServerInfo(): Implementation | undefined { return this.serverInfo; }
  getServerCapabilities(): ServerCapabilities | undefined { return this.serverCapabilities; }
  getProtocolVersion(): string | undefined { return this.negotiatedVersion; }
  getInstructions(): string | undefined { return this.instructions; }
  handshakeHistory(){ return this.handshake.history(); }

  /** Add interceptors after construction; they apply to requests issued from now on. */
  use(...interceptors: Interceptor[]): this {
    this.chain.use(...interceptors);
    this.handler = undefined;
    return this;
  }

  /**
   * Run the handshake. On any failure the session moves to failed, then closed,
   * the transport is closed and the error is rethrown.
   */
  async connect(capabilities?: ClientCapabilities): Promise<InitializeResult> {
    if(this.handshake.state !== 'uninitialized'){
      raise('invalidRequest', `cannot connect in state ${this.handshake.state}`);
    }
    this.handshake.transition('negotiating');
    this.correlator.start();
    let result: InitializeResult;
    try {
      const raw = await this.request(Methods.Initialize, {
        protocolVersion: this.protocolVersion,
        capabilities: capabilities ?? this.capabilities,
        clientInfo: this.info,
      }, { timeoutMs: this.connectTimeoutMs });
      result = this.parseResult(zInitializeResult, raw, Methods.Initialize);
      const version = result.protocolVersion;
      if(!SUPPORTED_PROTOCOL_VERSIONS.some(v => v === version)){
        raise('requestFailed', `unsupported protocol version: ${version}`, { supported: [...SUPPORTED_PROTOCOL_VERSIONS] });
      }
      this.serverInfo = deepFreeze(structuredClone(result.serverInfo));
      this.serverCapabilities = deepFreeze(structuredClone(result.capabilities));
      this.negotiatedVersion = result.protocolVersion;
      this.instructions = result.instructions;
      await this.correlator.notify(Methods.Initialized);
      this.handshake.transition('ready');
    } catch(e){
      this.log.error('connect_failed', { error: describeError(e) });
      this.handshake.close(describeError(e));
      this.progress?.cancelAll();
      await this.correlator.close();
      throw e;
    }
    this.log.info('connected', { server: this.serverInfo, protocolVersion: this.negotiatedVersion });
    if(this.autoCache) await this.refreshCaches();
    return result;
  }

  async ping(opts?: RequestOptions): Promise<void> {
    await this.request(Methods.Ping, undefined, opts);
  }

  async listTools(opts?: RequestOptions): Promise<Tool[]> {
    const res = this.parseResult(zListToolsResult, await this.request(Methods.ToolsList, undefined, opts), Methods.ToolsList);
    this.toolMirror.replace(res.tools);
    return res.tools;
  }

  /**
   * Call a tool. With a progress handler configured, a fresh progress token is
   * attached and tracked until the call settles.
   */
  async callTool(name: string, args: JsonObject = {}, opts: RequestOptions = {}): Promise<CallToolResult> {
    const params: { name: string; arguments: JsonObject; _meta?: { progressToken: string } } = { name, arguments: args };
    let token: string | undefined;
    if(this.progress){
      token = generateProgressToken();
      this.progress.start(token, opts.signal);
      params._meta = { progressToken: token };
    }
    try {
      const raw = await this.request(Methods.ToolsCall, params, opts);
      const result = this.parseResult(zCallToolResult, raw, Methods.ToolsCall);
      if(token && this.progress?.has(token)){
        // The server's own final notification may already have reported completion.
        if(this.progress.get(token).progress < 1) await this.progress.complete(token);
        else this.progress.cancel(token, 'completed');
      }
      return result;
    } catch(e){
      if(token && this.progress?.has(token)) this.progress.cancel(token, 'failed');
      throw e;
    }
  }

  async listResources(opts?: RequestOptions): Promise<Resource[]> {
    const res = this.parseResult(zListResourcesResult, await this.request(Methods.ResourcesList, undefined, opts), Methods.ResourcesList);
    this.resourceMirror.replace(res.resources);
    return res.resources;
  }

  async readResource(uri: string, opts?: RequestOptions): Promise<ReadResourceResult> {
    return this.parseResult(zReadResourceResult, await this.request(Methods.ResourcesRead, { uri }, opts), Methods.ResourcesRead);
  }

  async subscribeResource(uri: string, opts?: RequestOptions): Promise<void> {
    await this.request(Methods.ResourcesSubscribe, { uri }, opts);
  }

  async unsubscribeResource(uri: string, opts?: RequestOptions): Promise<void> {
    await this.request(Methods.ResourcesUnsubscribe, { uri }, opts);
  }

  async listPrompts(opts?: RequestOptions): Promise<Prompt[]> {
    const res = this.parseResult(zListPromptsResult, await this.request(Methods.PromptsList, undefined, opts), Methods.PromptsList);
    this.promptMirror.replace(res.prompts);
    return res.prompts;
  }

  async getPrompt(name: string, args: JsonObject = {}, opts?: RequestOptions): Promise<GetPromptResult> {
    return this.parseResult(zGetPromptResult, await this.request(Methods.PromptsGet, { name, arguments: args }, opts), Methods.PromptsGet);
  }

  cachedTools(): Tool[] { return this.toolMirror.list(); }
  cachedResources(): Resource[] { return this.resourceMirror.list(); }
  cachedPrompts(): Prompt[] { return this.promptMirror.list(); }
  cachedTool(name: string): Tool | undefined { return this.toolMirror.get(name); }

  /** Progress of calls still in flight (only with a progress handler). */
  activeProgress(){ return this.progress?.list() ?? []; }

  async close(): Promise<void> {
    this.handshake.close('client closed');
    this.progress?.cancelAll();
    await this.correlator.close();
  }

  /**
   * Send one request through the interceptor chain and unwrap the result. Calls
   * other than initialize/ping fail with not-initialized until the handshake is done.
   */
  async request(method: string, params?: unknown, opts: RequestOptions = {}): Promise<unknown> {
    this.handshake.assertCallAllowed(method);
    const request = createRequest(method, params, this.outgoingMeta(opts.meta));
    const scope = createScope(request, {
      signal: opts.signal,
      metadata: { timeoutMs: opts.timeoutMs ?? this.requestTimeoutMs },
    });
    if(!this.handler) this.handler = this.chain.build((req, s) => this.exchange(req, s.signal, s.metadata.timeoutMs));
    const response = await this.handler(request, scope);
    if(response.error) throw fromWireError(response.error);
    return response.result;
  }

  private exchange(req: JsonRpcMessage, signal: AbortSignal, timeout: unknown): Promise<JsonRpcResponse> {
    if(typeof req.method !== 'string' || req.id === undefined || req.id === null){
      return Promise.reject(rpcError('invalidRequest', 'client chain produced a message that is not a request'));
    }
    const outgoing: JsonRpcRequest = { jsonrpc: req.jsonrpc, id: req.id, method: req.method };
    if(req.params !== undefined) outgoing.params = req.params;
    if(req._meta) outgoing._meta = req._meta;
    return this.correlator.exchange(outgoing, { signal, timeoutMs: typeof timeout === 'number' ? timeout : undefined });
  }

  private outgoingMeta(meta?: Meta): Meta | undefined {
    let out = meta;
    if(this.options.authToken){
      out = { ...(out ?? {}), extra: { ...(out?.extra ?? {}), authToken: this.options.authToken } };
    }
    if(this.options.tracing) out = withTrace(out);
    return out;
  }

  private parseResult<S extends z.ZodTypeAny>(schema: S, raw: unknown, method: string): z.infer<S> {
    const parsed = schema.safeParse(raw);
    if(!parsed.success){
      return raise('requestFailed', `invalid ${method} result`, { method, issues: formatIssues(parsed.error) });
    }
    return parsed.data;
  }

  /** Capability-gated listings after the handshake; failures are logged and leave the session ready. */
  private async refreshCaches(){
    const caps = this.serverCapabilities;
    if(!caps) return;
    const jobs: [string, () => Promise<unknown>][] = [];
    if(caps.tools) jobs.push(['tools', () => this.listTools()]);
    if(caps.resources) jobs.push(['resources', () => this.listResources()]);
    if(caps.prompts) jobs.push(['prompts', () => this.listPrompts()]);
    for(const [catalog, job] of jobs){
      try {
        await job();
      } catch(e){
        this.log.warn('auto_cache_failed', { catalog, error: describeError(e) });
      }
    }
  }

  private async refreshOne(catalog: 'tools' | 'resources' | 'prompts'){
    if(!this.autoCache || !this.handshake.isReady()) return;
    try {
      if(catalog === 'tools') await this.listTools();
      else if(catalog === 'resources') await this.listResources();
      else await this.listPrompts();
    } catch(e){
      this.log.warn('auto_cache_failed', { catalog, error: describeError(e) });
    }
  }

  private handleNotification(msg: JsonRpcNotification): void | Promise<void> {
    switch(msg.method){
      case Methods.Progress: return this.handleProgress(msg.params);
      case Methods.ResourceUpdated: {
        const parsed = zUriParams.safeParse(msg.params);
        if(!parsed.success){
          this.log.warn('invalid_notification', { method: msg.method, issues: formatIssues(parsed.error) });
          return;
        }
        return this.options.onResourceUpdated?.(parsed.data.uri);
      }
      case Methods.ToolsListChanged: return this.refreshOne('tools');
      case Methods.ResourcesListChanged: return this.refreshOne('resources');
      case Methods.PromptsListChanged: return this.refreshOne('prompts');
      default:
        this.log.debug('notification_ignored', { method: msg.method });
    }
  }

  private async handleProgress(params: unknown){
    const parsed = zProgressParams.safeParse(params);
    if(!parsed.success){
      this.log.warn('invalid_notification', { method: Methods.Progress, issues: formatIssues(parsed.error) });
      return;
    }
    const { progressToken, progress, total } = parsed.data;
    if(!this.progress || !this.progress.has(progressToken)){
      this.log.debug('progress_untracked', { token: progressToken });
      return;
    }
    try {
      await this.progress.update(progressToken, progress, total);
    } catch(e){
      this.log.warn('progress_rejected', { token: progressToken, error: describeError(e) });
    }
  }

  private async handlePeerRequest(req: JsonRpcRequest): Promise<JsonRpcResponse> {
    if(req.method === Methods.Ping) return createResponse(req.id, {});
    return createErrorResponse(req.id, toWireError(rpcError('methodNotFound', undefined, { method: req.method })));
  }

  private onTransportClosed(err?: unknown){
    if(err !== undefined) this.log.warn('transport_closed', { error: describeError(err) });
    this.progress?.cancelAll();
    // During connect() the failure surfaces through the pending initialize call instead.
    if(this.handshake.state === 'ready') this.handshake.close('transport closed');
  }
}
