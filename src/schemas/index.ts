import { z } from 'zod';
import { zJsonObject, zJsonValue } from '../models/jsonValue';

/**
 * Wire schemas. Only the envelope and the handshake/catalog results the client
 * consumes are checked here; tool and prompt arguments are checked against the
 * registered schema's `required` list by the registries.
 */

export const zRequestId = z.union([z.string(), z.number()]);

export const zRpcErrorObject = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

// Numeric progress tokens are accepted on the wire and stringified.
export const zMeta = z.object({
  progressToken: z.union([z.string().min(1), z.number()]).transform(String).optional(),
  traceId: z.string().optional(),
  spanId: z.string().optional(),
  extra: z.record(zJsonValue).optional(),
});

// Version is left as any string (missing reads as empty) so a wrong version still
// decodes and is rejected with an error response carrying the request id. A
// malformed _meta is dropped rather than failing the frame: it never routes.
export const zEnvelope = z.object({
  jsonrpc: z.string().default(''),
  id: z.union([zRequestId, z.null()]).optional(),
  method: z.string().optional(),
  params: z.unknown().optional(),
  result: z.unknown().optional(),
  error: zRpcErrorObject.optional(),
  _meta: zMeta.optional().catch(undefined),
});

/** The id of a frame that failed the envelope checks, when it is still readable. */
export const zFrameId = z.object({ id: zRequestId });

export const zImplementation = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
});

const zListChanged = z.object({ listChanged: z.boolean().optional() });

export const zClientCapabilities = z.object({
  experimental: z.record(zJsonObject).optional(),
  sampling: zJsonObject.optional(),
  roots: zListChanged.optional(),
});

export const zServerCapabilities = z.object({
  experimental: z.record(zJsonObject).optional(),
  logging: zJsonObject.optional(),
  prompts: zListChanged.optional(),
  resources: z.object({ subscribe: z.boolean().optional(), listChanged: z.boolean().optional() }).optional(),
  tools: zListChanged.optional(),
});

export const zInitializeParams = z.object({
  protocolVersion: z.string().min(1),
  capabilities: zClientCapabilities,
  clientInfo: zImplementation,
});

export const zInitializeResult = z.object({
  protocolVersion: z.string().min(1),
  capabilities: zServerCapabilities,
  serverInfo: zImplementation,
  instructions: z.string().optional(),
});

export const zInputSchema = z.object({
  type: z.literal('object'),
  properties: z.record(zJsonValue).optional(),
  required: z.array(z.string()).optional(),
});

export const zTool = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: zInputSchema,
});

export const zResource = z.object({
  uri: z.string().min(1),
  name: z.string(),
  description: z.string().optional(),
  mimeType: z.string().optional(),
});

export const zPrompt = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  arguments: z.array(z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    required: z.boolean().optional(),
  })).optional(),
});

export const zContent = z.object({
  type: z.enum(['text', 'image', 'resource']),
  text: z.string().optional(),
  data: z.string().optional(),
  mimeType: z.string().optional(),
});

export const zListToolsResult = z.object({ tools: z.array(zTool) });
export const zListResourcesResult = z.object({ resources: z.array(zResource) });
export const zListPromptsResult = z.object({ prompts: z.array(zPrompt) });

export const zCallToolResult = z.object({
  content: z.array(zContent),
  isError: z.boolean().optional(),
});

export const zReadResourceResult = z.object({
  contents: z.array(z.object({
    uri: z.string(),
    mimeType: z.string().optional(),
    text: z.string().optional(),
    blob: z.string().optional(),
  })),
});

export const zGetPromptResult = z.object({
  description: z.string().optional(),
  messages: z.array(z.object({
    role: z.enum(['user', 'assistant']),
    content: zContent,
  })),
});

export const zNamedParams = z.object({
  name: z.string().min(1),
  arguments: z.unknown().optional(),
});

export const zUriParams = z.object({ uri: z.string().min(1) });

export const zProgressParams = z.object({
  progressToken: z.union([z.string(), z.number()]).transform(String),
  progress: z.number(),
  total: z.number().optional(),
});

// MCP places the progress token under params._meta; numbers are accepted and stringified.
export const zParamsProgressToken = z.object({
  _meta: z.object({
    progressToken: z.union([z.string().min(1), z.number()]).transform(String),
  }),
});

/** Flatten zod issues into `path: message` strings for error data. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(i => `${i.path.length ? i.path.join('.') + ': ' : ''}${i.message}`);
}

const zTimeoutMs = z.number().int().nonnegative();

// Data fields of client/server options; callbacks and injected objects are not checked here.
export const zClientOptionsData = z.object({
  clientInfo: zImplementation.optional(),
  capabilities: zClientCapabilities.optional(),
  requestTimeoutMs: zTimeoutMs.optional(),
  connectTimeoutMs: zTimeoutMs.optional(),
  autoCache: z.boolean().optional(),
  protocolVersion: z.string().min(1).optional(),
  authToken: z.string().min(1).optional(),
  tracing: z.boolean().optional(),
});

export const zServerOptionsData = z.object({
  serverInfo: zImplementation.optional(),
  capabilities: zServerCapabilities.optional(),
  instructions: z.string().optional(),
  protocolVersions: z.array(z.string().min(1)).min(1).optional(),
  requestTimeoutMs: zTimeoutMs.optional(),
  handlerTimeoutMs: z.number().int().positive().optional(),
});
