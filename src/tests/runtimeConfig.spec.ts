import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadRuntimeConfig, SUPPORTED_PROTOCOL_VERSIONS } from '../config/runtimeConfig';
import { parseBooleanEnv } from '../utils/envUtils';

describe('runtime config', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadRuntimeConfig({})).toEqual({
      timeouts: { requestMs: 30_000, connectMs: 10_000 },
      autoCache: true,
      protocolVersion: SUPPORTED_PROTOCOL_VERSIONS[0],
      client: { name: 'mcp-rpc-core-client', version: '1.0.0' },
      server: { name: 'mcp-rpc-core-server', version: '1.0.0' },
      logging: { level: 'info', json: false, protocol: false },
    });
  });

  it('reads overrides from the environment', () => {
    const cfg = loadRuntimeConfig({
      MCP_REQUEST_TIMEOUT_MS: '500',
      MCP_CONNECT_TIMEOUT_MS: '250',
      MCP_AUTO_CACHE: 'off',
      MCP_PROTOCOL_VERSION: '2024-11-05',
      MCP_CLIENT_NAME: ' probe ',
      MCP_LOG_LEVEL: 'DEBUG',
      MCP_LOG_JSON: 'yes',
      MCP_LOG_FILE: 'logs/core.log',
      MCP_LOG_PROTOCOL: '1',
    });
    expect(cfg.timeouts).toEqual({ requestMs: 500, connectMs: 250 });
    expect(cfg.autoCache).toBe(false);
    expect(cfg.protocolVersion).toBe('2024-11-05');
    expect(cfg.client.name).toBe('probe');
    expect(cfg.logging).toEqual({ level: 'debug', json: true, file: path.resolve(process.cwd(), 'logs/core.log'), protocol: true });
  });

  it('falls back on values it cannot use', () => {
    const cfg = loadRuntimeConfig({
      MCP_REQUEST_TIMEOUT_MS: 'soon',
      MCP_CONNECT_TIMEOUT_MS: '-5',
      MCP_PROTOCOL_VERSION: '1999-01-01',
      MCP_LOG_LEVEL: 'verbose',
    });
    expect(cfg.timeouts).toEqual({ requestMs: 30_000, connectMs: 10_000 });
    expect(cfg.protocolVersion).toBe('2025-03-26');
    expect(cfg.logging.level).toBe('info');
  });
});

describe('parseBooleanEnv', () => {
  it('accepts the usual spellings', () => {
    expect(['1', 'TRUE', ' yes ', 'on'].map(v => parseBooleanEnv(v))).toEqual([true, true, true, true]);
    expect(['0', 'False', 'no', 'OFF'].map(v => parseBooleanEnv(v, true))).toEqual([false, false, false, false]);
    expect(parseBooleanEnv('maybe', true)).toBe(true);
    expect(parseBooleanEnv(undefined)).toBe(false);
  });
});
