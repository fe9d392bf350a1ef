import { describe, it, expect } from 'vitest';
import { McpClient } from '../server/client';
import { MemoryTransport } from '../server/memoryTransport';
import { textContent, type CallToolResult, type ProgressNotificationParams } from '../models/capabilities';
import { ErrorCode, isTransportError } from '../services/errors';
import { authInterceptor } from '../services/interceptors';
import { InMemoryMetrics } from '../services/metrics';
import { asRequest, createPair, receiveN, registerEcho, thrownBy, waitFor } from './testUtils';

async function rejection(p: Promise<unknown>): Promise<unknown> {
  try { await p; } catch (e) { return e; }
  throw new Error('expected rejection');
}

describe('McpClient', () => {
  it('completes the handshake with a server', async () => {
    const { server, client, serverEnd } = createPair({ instructions: 'Be brief' });
    await server.connect(serverEnd);
    const result = await client.connect();
    expect(result.serverInfo).toEqual({ name: 'test-server', version: '0.0.1' });
    expect(client.state).toBe('ready');
    expect(client.isConnected()).toBe(true);
    expect(client.getProtocolVersion()).toBe('2025-03-26');
    expect(client.getInstructions()).toBe('Be brief');
    expect(Object.isFrozen(client.getServerCapabilities())).toBe(true);
    expect(await waitFor(() => server.state === 'ready')).toBe(true);
    expect(server.getClientInfo()).toEqual({ name: 'test-client', version: '0.0.1' });
    await client.close();
    await server.closed();
    expect(server.state).toBe('closed');
  });

  it('refuses calls before connect', async () => {
    const { client } = createPair();
    expect(await rejection(client.listTools())).toEqual({
      code: ErrorCode.NotInitialized, message: 'Not initialized', data: { method: 'tools/list', state: 'uninitialized' }, __semantic: true,
    });
  });

  it('calls tools and surfaces server errors', async () => {
    const { server, client, serverEnd } = createPair();
    await registerEcho(server);
    await server.connect(serverEnd);
    await client.connect();
    expect(await client.callTool('echo', { text: 'hi' })).toEqual({ content: [{ type: 'text', text: 'hi' }] });
    expect(await rejection(client.callTool('nope'))).toEqual({
      code: ErrorCode.InvalidTool, message: 'Unknown tool: nope', data: { tool: 'nope' }, __semantic: true,
    });
    await client.ping();
    await client.close();
  });

  it('delivers progress updates for a tool call', async () => {
    const updates: ProgressNotificationParams[] = [];
    const { server, client, serverEnd } = createPair({}, { progressHandler: u => { updates.push(u); } });
    await server.tools.register('work', async (_args, ctx) => {
      await ctx.reportProgress?.(0.5, 10);
      return { content: [textContent('done')] };
    });
    await server.connect(serverEnd);
    await client.connect();
    await client.callTool('work');
    expect(updates.map(u => u.progress)).toEqual([0.5, 1]);
    expect(updates[0].total).toBe(10);
    expect(updates[0].progressToken).toMatch(/^progress_[0-9a-f]{16}$/);
    expect(updates[1].progressToken).toBe(updates[0].progressToken);
    expect(client.activeProgress()).toEqual([]);
    await client.close();
  });

  it('gets a single final update from a tool that reports no progress', async () => {
    const updates: number[] = [];
    const { server, client, serverEnd } = createPair({}, { progressHandler: u => { updates.push(u.progress); } });
    await registerEcho(server);
    await server.connect(serverEnd);
    await client.connect();
    await client.callTool('echo', { text: 'x' });
    expect(updates).toEqual([1]);
    await client.close();
  });

  it('mirrors catalogs and refreshes them on list_changed', async () => {
    const { server, client, serverEnd } = createPair({}, { autoCache: true });
    await registerEcho(server);
    await server.connect(serverEnd);
    await client.connect();
    expect(client.cachedTools().map(t => t.name)).toEqual(['echo']);
    expect(client.cachedResources()).toEqual([]);
    expect(client.cachedTool('echo')?.description).toBe('Echo text back');
    await server.tools.register('second', () => ({ content: [] }));
    expect(await waitFor(() => client.cachedTools().length === 2)).toBe(true);
    expect(client.cachedTools().map(t => t.name)).toEqual(['echo', 'second']);
    await client.close();
  });

  it('reads resources and receives update notifications', async () => {
    const updated: string[] = [];
    const { server, client, serverEnd } = createPair({}, { onResourceUpdated: uri => { updated.push(uri); } });
    await server.resources.register('mem://notes', uri => ({ contents: [{ uri, text: 'v1' }] }), { name: 'notes' });
    await server.connect(serverEnd);
    await client.connect();
    expect(await client.listResources()).toEqual([{ uri: 'mem://notes', name: 'notes' }]);
    expect(await client.readResource('mem://notes')).toEqual({ contents: [{ uri: 'mem://notes', text: 'v1' }] });
    await client.subscribeResource('mem://notes');
    await server.notifyResourceUpdated('mem://notes');
    expect(await waitFor(() => updated.length === 1)).toBe(true);
    expect(updated).toEqual(['mem://notes']);
    await client.unsubscribeResource('mem://notes');
    expect(server.isSubscribed('mem://notes')).toBe(false);
    await client.close();
  });

  it('lists and renders prompts', async () => {
    const { server, client, serverEnd } = createPair();
    await server.prompts.register('greet', args => ({
      description: 'Greeting',
      messages: [{ role: 'assistant', content: textContent(`Hi ${String(args.name)}`) }],
    }), { description: 'Say hi', arguments: [{ name: 'name', required: true }] });
    await server.connect(serverEnd);
    await client.connect();
    expect(await client.listPrompts()).toEqual([{ name: 'greet', description: 'Say hi', arguments: [{ name: 'name', required: true }] }]);
    expect(await client.getPrompt('greet', { name: 'Ada' })).toEqual({
      description: 'Greeting',
      messages: [{ role: 'assistant', content: { type: 'text', text: 'Hi Ada' } }],
    });
    await client.close();
  });

  it('sends its auth token with every request', async () => {
    const validate = (token: string) => (token === 'test-secret' ? { id: 'tester' } : undefined);
    const authed = createPair({ interceptors: [authInterceptor({ validate })] }, { authToken: 'test-secret' });
    await authed.server.connect(authed.serverEnd);
    await authed.client.connect();
    expect(await authed.client.listTools()).toEqual([]);
    await authed.client.close();

    const anonymous = createPair({ interceptors: [authInterceptor({ validate })] });
    await anonymous.server.connect(anonymous.serverEnd);
    await anonymous.client.connect();
    expect(await rejection(anonymous.client.listTools())).toMatchObject({ code: ErrorCode.AuthenticationFailed, message: 'missing auth token' });
    await anonymous.client.close();
  });

  it('attaches trace ids when tracing is on', async () => {
    const metrics = new InMemoryMetrics();
    const { server, client, serverEnd, clientEnd } = createPair({}, { tracing: true, metrics });
    await server.connect(serverEnd);
    await client.connect();
    const meta = clientEnd.sent[0]._meta;
    expect(meta?.traceId).toMatch(/^[0-9a-f]{32}$/);
    expect(meta?.spanId).toMatch(/^[0-9a-f]{16}$/);
    expect(metrics.counter('mcp.requests.success', { method: 'initialize' })).toBe(1);
    await client.close();
  });

  it('fails the handshake on an unsupported protocol version', async () => {
    const { server, client, serverEnd } = createPair({ protocolVersions: ['2023-01-01'] });
    await server.connect(serverEnd);
    expect(await rejection(client.connect())).toMatchObject({
      code: ErrorCode.RequestFailed, message: 'unsupported protocol version: 2023-01-01',
    });
    expect(client.state).toBe('closed');
    expect(client.handshakeHistory().map(e => e.to)).toEqual(['negotiating', 'failed', 'closed']);
  });

  it('times out the handshake when nobody answers', async () => {
    const [clientEnd] = MemoryTransport.pair();
    const client = new McpClient(clientEnd, { connectTimeoutMs: 20, autoCache: false });
    expect(await rejection(client.connect())).toMatchObject({ code: ErrorCode.RequestFailed, message: 'request timeout' });
    expect(client.state).toBe('closed');
    expect(clientEnd.isConnected()).toBe(false);
  });

  it('answers server pings during the handshake', async () => {
    const [clientEnd, peer] = MemoryTransport.pair();
    const client = new McpClient(clientEnd, { autoCache: false });
    const connecting = client.connect();
    const [init] = await receiveN(peer, 1);
    expect(init.method).toBe('initialize');
    await peer.send({ jsonrpc: '2.0', id: 's1', method: 'ping' });
    const [pong] = await receiveN(peer, 1);
    expect(pong).toEqual({ jsonrpc: '2.0', id: 's1', result: {} });
    await peer.send({
      jsonrpc: '2.0',
      id: asRequest(init).id,
      result: { protocolVersion: '2024-11-05', capabilities: {}, serverInfo: { name: 'manual', version: '1' } },
    });
    await connecting;
    const [note] = await receiveN(peer, 1);
    expect(note).toEqual({ jsonrpc: '2.0', method: 'notifications/initialized' });
    expect(client.getProtocolVersion()).toBe('2024-11-05');
    await client.close();
  });

  it('fails in-flight calls when the server goes away', async () => {
    const { server, client, serverEnd } = createPair();
    await server.tools.register('hang', () => new Promise<CallToolResult>(() => undefined));
    await server.connect(serverEnd);
    await client.connect();
    const pending = rejection(client.callTool('hang'));
    await server.close();
    const err = await pending;
    expect(isTransportError(err)).toBe(true);
    expect(client.state).toBe('closed');
  });

  it('rejects invalid options', () => {
    const [clientEnd] = MemoryTransport.pair();
    expect(thrownBy(() => new McpClient(clientEnd, { requestTimeoutMs: -1 }))).toMatchObject({
      code: ErrorCode.InvalidParams, message: 'invalid client options',
    });
  });
});
