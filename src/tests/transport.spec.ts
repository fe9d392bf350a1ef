import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { StreamTransport } from '../server/transport';
import { MemoryTransport } from '../server/memoryTransport';
import { AsyncQueue } from '../utils/asyncQueue';
import { ErrorCode, isSemanticError, isTransportError } from '../services/errors';
import { MemoryLogger } from '../services/logger';

function streams() {
  const input = new PassThrough();
  const output = new PassThrough();
  const written: string[] = [];
  output.on('data', chunk => written.push(String(chunk)));
  return { input, output, written };
}

async function rejection(p: Promise<unknown>): Promise<unknown> {
  try { await p; } catch (e) { return e; }
  throw new Error('expected rejection');
}

describe('StreamTransport', () => {
  it('reads one message per line and skips blank lines', async () => {
    const { input, output } = streams();
    const t = new StreamTransport({ input, output, protocolLog: false });
    input.write('\n   \n{"jsonrpc":"2.0","id":1,"method":"ping"}\n');
    const msg = await t.receive();
    expect(msg).toEqual({ jsonrpc: '2.0', id: 1, method: 'ping' });
    await t.close();
  });

  it('writes newline-terminated frames', async () => {
    const { input, output, written } = streams();
    const t = new StreamTransport({ input, output, protocolLog: false });
    await t.send({ jsonrpc: '2.0', id: 1, result: {} });
    expect(written.join('')).toBe('{"jsonrpc":"2.0","id":1,"result":{}}\n');
    await t.close();
  });

  it('reports a bad frame and keeps reading', async () => {
    const { input, output } = streams();
    const log = new MemoryLogger();
    const t = new StreamTransport({ input, output, logger: log, protocolLog: false });
    input.write('not json\n{"jsonrpc":"2.0","method":"notifications/initialized"}\n');
    const err = await rejection(t.receive());
    expect(isSemanticError(err) && err.code).toBe(ErrorCode.ParseError);
    expect(log.events('error')).toEqual(['parse_error']);
    const next = await t.receive();
    expect(next.method).toBe('notifications/initialized');
    await t.close();
  });

  it('logs frames when protocol logging is on', async () => {
    const { input, output } = streams();
    const log = new MemoryLogger();
    const t = new StreamTransport({ input, output, logger: log, protocolLog: true });
    await t.send({ jsonrpc: '2.0', id: 2, method: 'ping' });
    input.write('{"jsonrpc":"2.0","id":2,"result":{}}\n');
    await t.receive();
    expect(log.events('debug')).toEqual(['send', 'recv']);
    await t.close();
  });

  it('fails receive with a closed TransportError when input ends', async () => {
    const { input, output } = streams();
    const t = new StreamTransport({ input, output, protocolLog: false });
    input.end();
    const err = await rejection(t.receive());
    expect(isTransportError(err) && err.reason).toBe('closed');
    expect(t.isConnected()).toBe(false);
    const sendErr = await rejection(t.send({ jsonrpc: '2.0', method: 'x' }));
    expect(isTransportError(sendErr) && sendErr.reason).toBe('not_connected');
  });

  it('stops waiting when the signal aborts', async () => {
    const { input, output } = streams();
    const t = new StreamTransport({ input, output, protocolLog: false });
    const controller = new AbortController();
    const pending = t.receive(controller.signal);
    controller.abort(new Error('stop'));
    await expect(pending).rejects.toThrow('stop');
    await t.close();
  });
});

describe('MemoryTransport', () => {
  it('delivers messages in order with wire semantics', async () => {
    const [a, b] = MemoryTransport.pair();
    await a.send({ jsonrpc: '2.0', method: 'first', params: undefined });
    await a.send({ jsonrpc: '2.0', method: 'second' });
    const first = await b.receive();
    expect(first).toEqual({ jsonrpc: '2.0', method: 'first' });
    expect('params' in first).toBe(false);
    expect((await b.receive()).method).toBe('second');
    expect(a.sent.map(m => m.method)).toEqual(['first', 'second']);
  });

  it('closing one end closes the peer after buffered frames drain', async () => {
    const [a, b] = MemoryTransport.pair();
    await a.send({ jsonrpc: '2.0', method: 'last' });
    await a.close();
    expect(b.isConnected()).toBe(false);
    expect((await b.receive()).method).toBe('last');
    const err = await rejection(b.receive());
    expect(isTransportError(err) && err.reason).toBe('closed');
    const sendErr = await rejection(a.send({ jsonrpc: '2.0', method: 'x' }));
    expect(isTransportError(sendErr) && sendErr.reason).toBe('not_connected');
  });

  it('rejects raw frames that are not JSON', async () => {
    const [, b] = MemoryTransport.pair();
    b.deliverRaw('{oops');
    const err = await rejection(b.receive());
    expect(isSemanticError(err) && err.code).toBe(ErrorCode.ParseError);
  });
});

describe('AsyncQueue', () => {
  it('hands items to waiting takers first, then buffers', async () => {
    const q = new AsyncQueue<number>();
    const waiting = q.shift();
    q.push(1);
    q.push(2);
    expect(await waiting).toBe(1);
    expect(q.size).toBe(1);
    expect(await q.shift()).toBe(2);
  });

  it('rejects takers on close and refuses new items', async () => {
    const q = new AsyncQueue<number>();
    const waiting = q.shift();
    q.close(new Error('done'));
    await expect(waiting).rejects.toThrow('done');
    expect(q.push(1)).toBe(false);
  });
});
