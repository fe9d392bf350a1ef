/**
 * MCP server: owns the tool/resource/prompt registries and a progress tracker,
 * runs each inbound request through its interceptor chain and routes it to the
 * matching handler.
 *
 * Default chain, outermost first: error handling, logging, metrics (when a sink
 * is configured), envelope validation, then interceptors added with use(), then
 * the per-request timeout (when handlerTimeoutMs is set).
 */
import type { z } from 'zod';
import {
  Methods, type ClientCapabilities, type Implementation, type InitializeResult, type ServerCapabilities,
} from '../models/capabilities';
import {
  createErrorResponse, createResponse, isNotification, progressTokenOf,
  type JsonRpcMessage, type JsonRpcNotification, type JsonRpcResponse,
} from '../models/message';
import { formatIssues, zInitializeParams, zNamedParams, zServerOptionsData, zUriParams } from '../schemas';
import { SUPPORTED_PROTOCOL_VERSIONS, getRuntimeConfig } from '../config/runtimeConfig';
import { describeError, raise, rpcError, toWireError } from '../services/errors';
import {
  createScope, errorHandlingInterceptor, InterceptorChain, loggingInterceptor, metricsInterceptor, timeoutInterceptor,
  validationInterceptor, type Interceptor, type RequestHandler, type RequestScope,
} from '../services/interceptors';
import { childLogger, silentLogger, type Logger } from '../services/logger';
import type { MetricsSink } from '../services/metrics';
import { ProgressTracker } from '../services/progressTracker';
import { Correlator } from './correlator';
import { HandshakeStateMachine, type HandshakeState } from './handshake';
import {
  PromptRegistry, ResourceRegistry, ToolRegistry, type CallContext, type RegistryKind,
} from './registry';
import type { Transport } from './transport';

export interface ServerOptions {
  serverInfo?: Implementation;
  capabilities?: ServerCapabilities;
  instructions?: string;
  /** Versions this server speaks, most preferred first. */
  protocolVersions?: string[];
  /** Deadline for requests the server itself sends to the client. */
  requestTimeoutMs?: number;
  /** Deadline for handling one inbound request; adds the timeout interceptor. */
  handlerTimeoutMs?: number;
  logger?: Logger;
  metrics?: MetricsSink;
  interceptors?: Interceptor[];
  /**
   * Share registries between servers; fresh ones are created otherwise. The
   * server listens for changes on injected registries until it closes.
   */
  tools?: ToolRegistry;
  resources?: ResourceRegistry;
  prompts?: PromptRegistry;
}

const DEFAULT_CAPABILITIES: ServerCapabilities = {
  tools: { listChanged: true },
  resources: { subscribe: true, listChanged: true },
  prompts: { listChanged: true },
};

const LIST_CHANGED: Record<RegistryKind, string> = {
  tool: Methods.ToolsListChanged,
  resource: Methods.ResourcesListChanged,
  prompt: Methods.PromptsListChanged,
};

export class McpServer {
  readonly tools: ToolRegistry;
  readonly resources: ResourceRegistry;
  readonly prompts: PromptRegistry;
  readonly progress: ProgressTracker;
  private readonly handshake: HandshakeStateMachine;
  private readonly chain = new InterceptorChain();
  private handler: RequestHandler | undefined;
  private readonly log: Logger;
  private readonly info: Implementation;
  private readonly capabilities: ServerCapabilities;
  private readonly versions: readonly string[];
  private readonly subscriptions = new Set<string>();
  private correlator: Correlator | undefined;
  private clientInfo: Implementation | undefined;
  private clientCapabilities: ClientCapabilities | undefined;
  private closedSignal: Promise<void> = Promise.resolve();
  private readonly detachListeners: Array<() => void> = [];

  constructor(private readonly options: ServerOptions = {}){
    const checked = zServerOptionsData.safeParse(options);
    if(!checked.success) raise('invalidParams', 'invalid server options', { issues: formatIssues(checked.error) });
    this.log = childLogger(options.logger ?? silentLogger, { component: 'server' });
    this.info = Object.freeze({ ...(options.serverInfo ?? getRuntimeConfig().server) });
    this.capabilities = structuredClone(options.capabilities ?? DEFAULT_CAPABILITIES);
    this.versions = options.protocolVersions ?? [...SUPPORTED_PROTOCOL_VERSIONS];
    const onChange = (kind: RegistryKind) => this.announceListChanged(kind);
    this.tools = options.tools ?? new ToolRegistry({ logger: childLogger(this.log, { registry: 'tools' }) });
    this.resources = options.resources ?? new ResourceRegistry({ logger: childLogger(this.log, { registry: 'resources' }) });
    this.prompts = options.prompts ?? new PromptRegistry({ logger: childLogger(this.log, { registry: 'prompts' }) });
    for(const registry of [this.tools, this.resources, this.prompts]){
      this.detachListeners.push(registry.addChangeListener(onChange));
    }
    this.progress = new ProgressTracker({
      logger: this.log,
      notifier: async update => { await this.sendNotification(Methods.Progress, update); },
    });
    this.handshake = new HandshakeStateMachine({ logger: this.log });
    if(options.interceptors?.length) this.chain.use(...options.interceptors);
  }

  get state(): HandshakeState { return this.handshake.state; }
  getClientInfo(): Implementation | undefined { return this.clientInfo; }
  getClientCapabilities(): ClientCapabilities | undefined { return this.clientCapabilities; }
  getCapabilities(): ServerCapabilities { return structuredClone(this.capabilities); }
  isSubscribed(uri: string){ return this.subscriptions.has(uri); }
  handshakeHistory(){ return this.handshake.history(); }

  use(...interceptors: Interceptor[]): this {
    this.chain.use(...interceptors);
    this.handler = undefined;
    return this;
  }

  /** Serve one connection. The returned promise resolves once the reader loop is running. */
  async connect(transport: Transport): Promise<void> {
    if(this.correlator) raise('invalidRequest', 'server is already connected');
    if(this.handshake.isClosed()) raise('invalidRequest', 'server is closed');
    const correlator = new Correlator(transport, {
      logger: this.options.logger,
      requestTimeoutMs: this.options.requestTimeoutMs ?? getRuntimeConfig().timeouts.requestMs,
      onRequest: async req => (await this.processMessage(req)) ?? createErrorResponse(req.id, toWireError(rpcError('internal'))),
      onNotification: msg => this.handleNotification(msg),
      onClose: err => this.onTransportClosed(err),
    });
    this.correlator = correlator;
    this.closedSignal = correlator.done();
    correlator.start();
    this.log.info('server_connected', { server: this.info });
  }

  /** Resolves when the connection's reader loop has stopped. */
  closed(): Promise<void> { return this.closedSignal; }

  async close(): Promise<void> {
    this.handshake.close('server closed');
    this.progress.cancelAll('server closed');
    this.subscriptions.clear();
    this.detachRegistries();
    await this.correlator?.close();
  }

  /**
   * Process one inbound message without a transport. Requests yield a response;
   * notifications are applied and yield undefined.
   */
  async processMessage(msg: JsonRpcMessage, origin?: string): Promise<JsonRpcResponse | undefined> {
    if(isNotification(msg)){
      await this.handleNotification(msg);
      return undefined;
    }
    const scope = createScope(msg, { origin });
    try {
      return await this.pipeline()(msg, scope);
    } catch(e){
      // Outer boundary: nothing escapes as an exception.
      this.log.error('request_unhandled', { method: msg.method, error: describeError(e) });
      return createErrorResponse(msg.id, toWireError(e));
    }
  }

  /** Notify the client that a subscribed resource changed. Returns false when nothing was sent. */
  async notifyResourceUpdated(uri: string): Promise<boolean> {
    if(!this.subscriptions.has(uri)) return false;
    return this.sendNotification(Methods.ResourceUpdated, { uri });
  }

  private pipeline(): RequestHandler {
    if(this.handler) return this.handler;
    const outer = new InterceptorChain().use(errorHandlingInterceptor(this.log), loggingInterceptor(this.log));
    if(this.options.metrics) outer.use(metricsInterceptor(this.options.metrics));
    outer.use(validationInterceptor());
    const inner = this.chain.build(this.options.handlerTimeoutMs
      ? timeoutInterceptor(this.options.handlerTimeoutMs, this.log)((req, scope) => this.route(req, scope))
      : (req, scope) => this.route(req, scope));
    this.handler = outer.build(inner);
    return this.handler;
  }

  private async sendNotification(method: string, params: unknown): Promise<boolean> {
    const correlator = this.correlator;
    if(!correlator || !correlator.isRunning() || !this.handshake.isReady()){
      this.log.debug('notification_dropped', { method, state: this.handshake.state });
      return false;
    }
    try {
      await correlator.notify(method, params);
      return true;
    } catch(e){
      this.log.warn('notification_failed', { method, error: describeError(e) });
      return false;
    }
  }

  private announceListChanged(kind: RegistryKind){
    const cap = kind === 'tool' ? this.capabilities.tools : kind === 'resource' ? this.capabilities.resources : this.capabilities.prompts;
    if(!cap?.listChanged || !this.handshake.isReady()) return;
    this.sendNotification(LIST_CHANGED[kind], undefined)
      .catch(e => this.log.warn('notification_failed', { method: LIST_CHANGED[kind], error: describeError(e) }));
  }

  private handleNotification(msg: JsonRpcNotification): void | Promise<void> {
    if(msg.method === Methods.Initialized){
      if(this.handshake.state === 'negotiating'){
        this.handshake.transition('ready', 'client initialized');
        this.log.info('session_ready', { client: this.clientInfo });
      } else {
        this.log.warn('unexpected_initialized', { state: this.handshake.state });
      }
      return;
    }
    this.log.debug('notification_ignored', { method: msg.method });
  }

  private onTransportClosed(err?: unknown){
    if(err !== undefined) this.log.warn('transport_closed', { error: describeError(err) });
    this.progress.cancelAll('transport closed');
    this.subscriptions.clear();
    this.detachRegistries();
    if(!this.handshake.isClosed()) this.handshake.close('transport closed');
  }

  private detachRegistries(){
    for(const detach of this.detachListeners.splice(0)) detach();
  }

  private requireCapability(kind: 'tools' | 'resources' | 'prompts', method: string){
    if(!this.capabilities[kind]) raise('methodDisabled', undefined, { method, capability: kind });
  }

  private async route(req: JsonRpcMessage, scope: RequestScope): Promise<JsonRpcResponse> {
    const method = scope.method;
    const id = req.id ?? null;
    if(method === Methods.Initialize) return createResponse(id, this.initialize(req.params));
    this.handshake.assertCallAllowed(method);
    switch(method){
      case Methods.Ping:
        return createResponse(id, {});
      case Methods.ToolsList:
        this.requireCapability('tools', method);
        return createResponse(id, { tools: await this.tools.list() });
      case Methods.ToolsCall:
        this.requireCapability('tools', method);
        return createResponse(id, await this.callTool(req, scope));
      case Methods.ResourcesList:
        this.requireCapability('resources', method);
        return createResponse(id, { resources: await this.resources.list() });
      case Methods.ResourcesRead: {
        this.requireCapability('resources', method);
        const { uri } = this.parseParams(zUriParams, req.params);
        return createResponse(id, await this.resources.read(uri, this.contextFor(scope)));
      }
      case Methods.ResourcesSubscribe: {
        this.requireCapability('resources', method);
        if(!this.capabilities.resources?.subscribe) raise('methodDisabled', undefined, { method, capability: 'resources.subscribe' });
        const { uri } = this.parseParams(zUriParams, req.params);
        if(!(await this.resources.has(uri))) raise('invalidResource', `Unknown resource: ${uri}`, { resource: uri });
        this.subscriptions.add(uri);
        return createResponse(id, {});
      }
      case Methods.ResourcesUnsubscribe: {
        this.requireCapability('resources', method);
        if(!this.capabilities.resources?.subscribe) raise('methodDisabled', undefined, { method, capability: 'resources.subscribe' });
        const { uri } = this.parseParams(zUriParams, req.params);
        this.subscriptions.delete(uri);
        return createResponse(id, {});
      }
      case Methods.PromptsList:
        this.requireCapability('prompts', method);
        return createResponse(id, { prompts: await this.prompts.list() });
      case Methods.PromptsGet: {
        this.requireCapability('prompts', method);
        const { name, arguments: args } = this.parseParams(zNamedParams, req.params);
        return createResponse(id, await this.prompts.call(name, args, this.contextFor(scope)));
      }
      default:
        return raise('methodNotFound', undefined, { method });
    }
  }

  private initialize(params: unknown): InitializeResult {
    if(this.handshake.state !== 'uninitialized') raise('invalidRequest', 'Already initialized');
    const init = this.parseParams(zInitializeParams, params);
    this.handshake.transition('negotiating', 'initialize received');
    this.clientInfo = Object.freeze({ ...init.clientInfo });
    this.clientCapabilities = structuredClone(init.capabilities);
    const requested = init.protocolVersion;
    const protocolVersion = this.versions.includes(requested) ? requested : this.versions[0];
    this.log.info('initialize', { client: this.clientInfo, requested, protocolVersion });
    const result: InitializeResult = {
      protocolVersion,
      capabilities: structuredClone(this.capabilities),
      serverInfo: { ...this.info },
    };
    if(this.options.instructions) result.instructions = this.options.instructions;
    return result;
  }

  private async callTool(req: JsonRpcMessage, scope: RequestScope){
    const { name, arguments: args } = this.parseParams(zNamedParams, req.params);
    const token = progressTokenOf(req);
    if(!token) return this.tools.call(name, args, this.contextFor(scope));
    const signal = this.progress.start(token, scope.signal);
    const context: CallContext = {
      ...this.contextFor(scope),
      signal,
      progressToken: token,
      reportProgress: async (progress, total) => { await this.progress.update(token, progress, total); },
    };
    // The token may have been replaced by a newer call meanwhile; only settle our own record.
    const ours = () => this.progress.has(token) && this.progress.signalFor(token) === signal;
    try {
      const result = await this.tools.call(name, args, context);
      if(ours()) await this.progress.complete(token);
      return result;
    } catch(e){
      if(ours()) this.progress.cancel(token, 'failed');
      throw e;
    }
  }

  private contextFor(scope: RequestScope): CallContext {
    const ctx: CallContext = { signal: scope.signal };
    if(scope.requestId !== null) ctx.requestId = scope.requestId;
    if(scope.identity) ctx.identity = scope.identity;
    return ctx;
  }

  private parseParams<S extends z.ZodTypeAny>(schema: S, params: unknown): z.infer<S> {
    const parsed = schema.safeParse(params);
    if(!parsed.success) return raise('invalidParams', undefined, { issues: formatIssues(parsed.error) });
    return parsed.data;
  }
}
