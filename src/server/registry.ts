// Capability registries (tools, resources, prompts).
//
// One read/write lock per registry guards the backing map. call() holds the read
// lock only long enough to fetch the record and runs the handler after releasing
// it, so handlers may be slow or re-enter the registry. Callers only ever get
// copies of descriptors.
import type { JsonObject } from '../models/jsonValue';
import { parseArguments } from '../models/jsonValue';
import type {
  CallToolResult, GetPromptResult, InputSchema, Prompt, PromptArgument, ReadResourceResult, Resource, Tool,
} from '../models/capabilities';
import type { RequestId } from '../models/message';
import { describeError, isSemanticError, raise, rpcError, type ErrorKind } from '../services/errors';
import { childLogger, newCorrelationId, silentLogger, type Logger } from '../services/logger';
import type { Identity } from '../services/interceptors';
import { ReadWriteLock } from '../utils/rwLock';

export interface CallContext {
  requestId?: RequestId;
  signal: AbortSignal;
  identity?: Identity;
  progressToken?: string;
  /** Present when the caller attached a progress token; progress is a fraction in [0,1]. */
  reportProgress?: (progress: number, total?: number) => Promise<void>;
}

export interface EntryMetrics { count: number; totalMs: number; maxMs: number; errors: number }

export type RegistryKind = 'tool' | 'resource' | 'prompt';

export interface RegistryOptions {
  logger?: Logger;
  /** Fired after every register/unregister that changed the catalog. */
  onChange?: (kind: RegistryKind) => void;
}

interface RegistryRecord<TDesc, THandler> {
  descriptor: TDesc;
  handler: THandler;
}

function detachedContext(): CallContext {
  return { signal: new AbortController().signal };
}

abstract class CapabilityRegistry<TDesc, TSchema, THandler, TResult> {
  private readonly entries = new Map<string, RegistryRecord<TDesc, THandler>>();
  private readonly metrics = new Map<string, EntryMetrics>();
  private readonly lock = new ReadWriteLock();
  protected readonly log: Logger;
  private readonly changeListeners = new Set<(kind: RegistryKind) => void>();

  protected abstract readonly kind: RegistryKind;
  protected abstract readonly notFound: ErrorKind;
  protected abstract readonly failureLabel: string;
  protected abstract describe(key: string, schema?: TSchema): TDesc;
  protected abstract requiredOf(descriptor: TDesc): string[];
  protected abstract invoke(handler: THandler, key: string, args: JsonObject, context: CallContext): TResult | Promise<TResult>;

  constructor(opts: RegistryOptions = {}){
    this.log = opts.logger ?? silentLogger;
    if(opts.onChange) this.changeListeners.add(opts.onChange);
  }

  /** Listen for catalog changes alongside the constructor's onChange; returns the remover. */
  addChangeListener(listener: (kind: RegistryKind) => void): () => void {
    this.changeListeners.add(listener);
    return () => { this.changeListeners.delete(listener); };
  }

  private changed(){
    for(const listener of [...this.changeListeners]) listener(this.kind);
  }

  /** Duplicate keys overwrite silently: the last registration wins. */
  async register(key: string, handler: THandler, schema?: TSchema): Promise<void> {
    if(!key) raise('invalidParams', `${this.kind} key must be a non-empty string`);
    const descriptor = this.describe(key, schema);
    const replaced = await this.lock.withWrite(() => {
      const existed = this.entries.has(key);
      this.entries.set(key, { descriptor, handler });
      return existed;
    });
    this.log.debug(`${this.kind}_registered`, { key, replaced });
    this.changed();
  }

  async unregister(key: string): Promise<boolean> {
    const removed = await this.lock.withWrite(() => {
      this.metrics.delete(key);
      return this.entries.delete(key);
    });
    if(removed){
      this.log.debug(`${this.kind}_unregistered`, { key });
      this.changed();
    }
    return removed;
  }

  async get(key: string): Promise<TDesc | undefined> {
    return this.lock.withRead(() => {
      const rec = this.entries.get(key);
      return rec ? structuredClone(rec.descriptor) : undefined;
    });
  }

  async has(key: string): Promise<boolean> {
    return this.lock.withRead(() => this.entries.has(key));
  }

  /** Copies, ordered by key. */
  async list(): Promise<TDesc[]> {
    return this.lock.withRead(() => [...this.entries.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, rec]) => structuredClone(rec.descriptor)));
  }

  async size(): Promise<number> {
    return this.lock.withRead(() => this.entries.size);
  }

  /** Check that every schema-declared required parameter is present; returns the narrowed arguments. */
  async validate(key: string, params: unknown): Promise<JsonObject> {
    const rec = await this.lock.withRead(() => this.entries.get(key));
    if(!rec) return raise(this.notFound, `Unknown ${this.kind}: ${key}`, { [this.kind]: key });
    return this.checkArguments(key, rec.descriptor, params);
  }

  async call(key: string, params: unknown, context: CallContext = detachedContext()): Promise<TResult> {
    const rec = await this.lock.withRead(() => this.entries.get(key));
    if(!rec) return raise(this.notFound, `Unknown ${this.kind}: ${key}`, { [this.kind]: key });
    const args = this.checkArguments(key, rec.descriptor, params);
    const correlationId = newCorrelationId();
    const start = process.hrtime.bigint();
    let failed = false;
    this.log.info(`${this.kind}_start`, { [this.kind]: key, correlationId });
    try {
      return await this.invoke(rec.handler, key, args, context);
    } catch(e){
      failed = true;
      this.log.error(`${this.kind}_error`, { [this.kind]: key, correlationId, message: describeError(e) });
      if(isSemanticError(e)) throw e;
      throw rpcError('requestFailed', `${this.failureLabel}: ${describeError(e)}`, { [this.kind]: key });
    } finally {
      const ms = Number(process.hrtime.bigint() - start) / 1_000_000;
      this.recordMetric(key, ms, failed);
      this.log.info(`${this.kind}_end`, { [this.kind]: key, correlationId, ms });
    }
  }

  metricsFor(key: string): EntryMetrics | undefined {
    const m = this.metrics.get(key);
    return m ? { ...m } : undefined;
  }

  allMetrics(): Record<string, EntryMetrics> {
    const out: Record<string, EntryMetrics> = {};
    for(const [k, m] of this.metrics) out[k] = { ...m };
    return out;
  }

  private checkArguments(key: string, descriptor: TDesc, params: unknown): JsonObject {
    const parsed = parseArguments(params);
    if(!parsed.ok) return raise('invalidParams', 'arguments must be a JSON object', { [this.kind]: key, issues: parsed.issues });
    for(const field of this.requiredOf(descriptor)){
      if(!(field in parsed.value)){
        raise('invalidParams', `Missing required parameter: ${field}`, { [this.kind]: key, field });
      }
    }
    return parsed.value;
  }

  private recordMetric(key: string, ms: number, failed: boolean){
    let rec = this.metrics.get(key);
    if(!rec){ rec = { count: 0, totalMs: 0, maxMs: 0, errors: 0 }; this.metrics.set(key, rec); }
    rec.count++; rec.totalMs += ms; if(ms > rec.maxMs) rec.maxMs = ms;
    if(failed) rec.errors++;
  }
}

export type ToolHandler = (args: JsonObject, context: CallContext) => CallToolResult | Promise<CallToolResult>;
export interface ToolSchema { description?: string; inputSchema?: InputSchema }

export class ToolRegistry extends CapabilityRegistry<Tool, ToolSchema, ToolHandler, CallToolResult> {
  protected readonly kind = 'tool';
  protected readonly notFound = 'invalidTool';
  protected readonly failureLabel = 'Tool call failed';

  protected describe(name: string, schema?: ToolSchema): Tool {
    const tool: Tool = { name, inputSchema: schema?.inputSchema ? structuredClone(schema.inputSchema) : { type: 'object' } };
    if(schema?.description) tool.description = schema.description;
    return tool;
  }

  protected requiredOf(tool: Tool){ return tool.inputSchema.required ?? []; }

  protected invoke(handler: ToolHandler, _name: string, args: JsonObject, context: CallContext){
    return handler(args, context);
  }
}

export type ResourceHandler = (uri: string, context: CallContext) => ReadResourceResult | Promise<ReadResourceResult>;
export interface ResourceSchema { name?: string; description?: string; mimeType?: string }

export class ResourceRegistry extends CapabilityRegistry<Resource, ResourceSchema, ResourceHandler, ReadResourceResult> {
  protected readonly kind = 'resource';
  protected readonly notFound = 'invalidResource';
  protected readonly failureLabel = 'Resource read failed';

  protected describe(uri: string, schema?: ResourceSchema): Resource {
    const resource: Resource = { uri, name: schema?.name ?? uri };
    if(schema?.description) resource.description = schema.description;
    if(schema?.mimeType) resource.mimeType = schema.mimeType;
    return resource;
  }

  protected requiredOf(){ return []; }

  protected invoke(handler: ResourceHandler, uri: string, _args: JsonObject, context: CallContext){
    return handler(uri, context);
  }

  /** Read a resource; resources take no arguments. */
  read(uri: string, context?: CallContext): Promise<ReadResourceResult> {
    return this.call(uri, undefined, context);
  }
}

export type PromptHandler = (args: JsonObject, context: CallContext) => GetPromptResult | Promise<GetPromptResult>;
export interface PromptSchema { description?: string; arguments?: PromptArgument[] }

export class PromptRegistry extends CapabilityRegistry<Prompt, PromptSchema, PromptHandler, GetPromptResult> {
  protected readonly kind = 'prompt';
  protected readonly notFound = 'invalidPrompt';
  protected readonly failureLabel = 'Prompt get failed';

  protected describe(name: string, schema?: PromptSchema): Prompt {
    const prompt: Prompt = { name };
    if(schema?.description) prompt.description = schema.description;
    if(schema?.arguments) prompt.arguments = schema.arguments.map(a => ({ ...a }));
    return prompt;
  }

  protected requiredOf(prompt: Prompt){
    return (prompt.arguments ?? []).filter(a => a.required).map(a => a.name);
  }

  protected invoke(handler: PromptHandler, _name: string, args: JsonObject, context: CallContext){
    return handler(args, context);
  }
}

export function createRegistries(opts: RegistryOptions = {}){
  const logger = opts.logger ?? silentLogger;
  return {
    tools: new ToolRegistry({ ...opts, logger: childLogger(logger, { registry: 'tools' }) }),
    resources: new ResourceRegistry({ ...opts, logger: childLogger(logger, { registry: 'resources' }) }),
    prompts: new PromptRegistry({ ...opts, logger: childLogger(logger, { registry: 'prompts' }) }),
  };
}
