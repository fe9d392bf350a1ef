/**
 * Unified runtime configuration loader.
 *
 * Goals:
 *  - Provide a single parsed, typed surface for environment driven behavior.
 *  - Keep process.env reads out of the protocol code; client and server options
 *    start from these values and override them per instance.
 *
 * Recognized variables:
 *  MCP_REQUEST_TIMEOUT_MS, MCP_CONNECT_TIMEOUT_MS, MCP_AUTO_CACHE,
 *  MCP_CLIENT_NAME, MCP_CLIENT_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION,
 *  MCP_PROTOCOL_VERSION, MCP_LOG_LEVEL, MCP_LOG_JSON, MCP_LOG_FILE, MCP_LOG_PROTOCOL
 */
import path from 'path';
import { getBooleanEnv, getOptionalStringEnv, getPositiveIntEnv, getStringEnv } from '../utils/envUtils';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

// Ordered by preference; the first entry is what this implementation speaks by default.
export const SUPPORTED_PROTOCOL_VERSIONS = ['2025-03-26', '2024-11-05'] as const;

export interface ImplementationConfig {
  name: string;
  version: string;
}

interface TimeoutConfig {
  requestMs: number;
  connectMs: number;
}

interface LoggingConfig {
  level: LogLevel;
  json: boolean;
  file?: string;
  protocol: boolean;
}

export interface RuntimeConfig {
  timeouts: TimeoutConfig;
  autoCache: boolean;
  protocolVersion: string;
  client: ImplementationConfig;
  server: ImplementationConfig;
  logging: LoggingConfig;
}

const deprecationNotices = new Set<string>();
function warnOnce(msg: string){
  if(!deprecationNotices.has(msg)){
    deprecationNotices.add(msg);
    // eslint-disable-next-line no-console
    console.warn(`[config] ${msg}`);
  }
}

function parseLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = env.MCP_LOG_LEVEL?.trim().toLowerCase();
  if(!raw) return 'info';
  const match = LOG_LEVELS.find(l => l === raw);
  if(match) return match;
  warnOnce(`Unknown MCP_LOG_LEVEL '${raw}', using info`);
  return 'info';
}

function parseProtocolVersion(env: NodeJS.ProcessEnv): string {
  const requested = getOptionalStringEnv('MCP_PROTOCOL_VERSION', env);
  if(!requested) return SUPPORTED_PROTOCOL_VERSIONS[0];
  if(SUPPORTED_PROTOCOL_VERSIONS.some(v => v === requested)) return requested;
  warnOnce(`Unsupported MCP_PROTOCOL_VERSION '${requested}', using ${SUPPORTED_PROTOCOL_VERSIONS[0]}`);
  return SUPPORTED_PROTOCOL_VERSIONS[0];
}

function parseLoggingConfig(env: NodeJS.ProcessEnv): LoggingConfig {
  const rawFile = getOptionalStringEnv('MCP_LOG_FILE', env);
  return {
    level: parseLogLevel(env),
    json: getBooleanEnv('MCP_LOG_JSON', false, env),
    file: rawFile ? (path.isAbsolute(rawFile) ? rawFile : path.resolve(process.cwd(), rawFile)) : undefined,
    protocol: getBooleanEnv('MCP_LOG_PROTOCOL', false, env),
  };
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    timeouts: {
      requestMs: getPositiveIntEnv('MCP_REQUEST_TIMEOUT_MS', 30_000, env),
      connectMs: getPositiveIntEnv('MCP_CONNECT_TIMEOUT_MS', 10_000, env),
    },
    autoCache: getBooleanEnv('MCP_AUTO_CACHE', true, env),
    protocolVersion: parseProtocolVersion(env),
    client: {
      name: getStringEnv('MCP_CLIENT_NAME', 'mcp-rpc-core-client', env),
      version: getStringEnv('MCP_CLIENT_VERSION', '1.0.0', env),
    },
    server: {
      name: getStringEnv('MCP_SERVER_NAME', 'mcp-rpc-core-server', env),
      version: getStringEnv('MCP_SERVER_VERSION', '1.0.0', env),
    },
    logging: parseLoggingConfig(env),
  };
}

let _cached: RuntimeConfig | undefined;
export function getRuntimeConfig(): RuntimeConfig {
  if(!_cached) _cached = loadRuntimeConfig();
  return _cached;
}

export function reloadRuntimeConfig(): RuntimeConfig {
  _cached = loadRuntimeConfig();
  return _cached;
}
