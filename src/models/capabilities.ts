// MCP catalog and handshake data types. Capability presence (not a boolean)
// signals support: an absent `tools` entry means the peer has no tools at all.
import type { JsonObject, JsonValue } from './jsonValue';

export interface Implementation {
  name: string;
  version: string;
}

export interface ListChangedCapability {
  listChanged?: boolean;
}

export interface ResourcesCapability extends ListChangedCapability {
  subscribe?: boolean;
}

export interface ClientCapabilities {
  experimental?: { [key: string]: JsonObject };
  sampling?: JsonObject;
  roots?: ListChangedCapability;
}

export interface ServerCapabilities {
  experimental?: { [key: string]: JsonObject };
  logging?: JsonObject;
  prompts?: ListChangedCapability;
  resources?: ResourcesCapability;
  tools?: ListChangedCapability;
}

/** JSON-Schema-like object; only `required` is enforced before a handler runs. */
export interface InputSchema {
  type: 'object';
  properties?: { [key: string]: JsonValue };
  required?: string[];
}

export interface Tool {
  name: string;
  description?: string;
  inputSchema: InputSchema;
}

export interface Resource {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

export interface PromptArgument {
  name: string;
  description?: string;
  required?: boolean;
}

export interface Prompt {
  name: string;
  description?: string;
  arguments?: PromptArgument[];
}

export type ContentType = 'text' | 'image' | 'resource';

export interface Content {
  type: ContentType;
  text?: string;
  data?: string;
  mimeType?: string;
}

export interface CallToolResult {
  content: Content[];
  isError?: boolean;
}

export interface ResourceContents {
  uri: string;
  mimeType?: string;
  text?: string;
  blob?: string;
}

export interface ReadResourceResult {
  contents: ResourceContents[];
}

export interface PromptMessage {
  role: 'user' | 'assistant';
  content: Content;
}

export interface GetPromptResult {
  description?: string;
  messages: PromptMessage[];
}

export interface InitializeParams {
  protocolVersion: string;
  capabilities: ClientCapabilities;
  clientInfo: Implementation;
}

export interface InitializeResult {
  protocolVersion: string;
  capabilities: ServerCapabilities;
  serverInfo: Implementation;
  instructions?: string;
}

export interface ListToolsResult { tools: Tool[] }
export interface ListResourcesResult { resources: Resource[] }
export interface ListPromptsResult { prompts: Prompt[] }

export interface CallToolParams { name: string; arguments?: JsonObject }
export interface ReadResourceParams { uri: string }
export interface SubscribeParams { uri: string }
export interface GetPromptParams { name: string; arguments?: JsonObject }

export interface ProgressNotificationParams {
  progressToken: string;
  progress: number;
  total?: number;
}

export interface ResourceUpdatedParams { uri: string }

export const Methods = {
  Initialize: 'initialize',
  Initialized: 'notifications/initialized',
  Ping: 'ping',
  ToolsList: 'tools/list',
  ToolsCall: 'tools/call',
  ResourcesList: 'resources/list',
  ResourcesRead: 'resources/read',
  ResourcesSubscribe: 'resources/subscribe',
  ResourcesUnsubscribe: 'resources/unsubscribe',
  ResourceUpdated: 'notifications/resources/updated',
  PromptsList: 'prompts/list',
  PromptsGet: 'prompts/get',
  Progress: 'notifications/progress',
  ToolsListChanged: 'notifications/tools/list_changed',
  ResourcesListChanged: 'notifications/resources/list_changed',
  PromptsListChanged: 'notifications/prompts/list_changed',
} as const;

export type MethodName = typeof Methods[keyof typeof Methods];

export function textContent(text: string): Content {
  return { type: 'text', text };
}
