/**
 * Transport contract plus the line-delimited stream transport.
 *
 * Framing: one JSON-RPC object per line (the stdio convention). The transport
 * only moves frames; correlation, ordering of callers and error responses
 * belong to the correlator. A single reader is expected to call receive().
 */
import { createInterface, type Interface } from 'readline';
import { decodeMessage, encodeMessage, type JsonRpcMessage } from '../models/message';
import { TransportError } from '../services/errors';
import { silentLogger, type Logger } from '../services/logger';
import { getRuntimeConfig } from '../config/runtimeConfig';
import { AsyncQueue } from '../utils/asyncQueue';

export interface Transport {
  send(msg: JsonRpcMessage): Promise<void>;
  /** Next inbound message. Rejects with a semantic parse/invalid-request error for a bad frame (the stream stays usable) or a TransportError when the stream is gone. */
  receive(signal?: AbortSignal): Promise<JsonRpcMessage>;
  close(): Promise<void>;
  isConnected(): boolean;
}

export interface StreamTransportOptions {
  input?: NodeJS.ReadableStream;        // defaults to process.stdin
  output?: NodeJS.WritableStream;       // defaults to process.stdout
  logger?: Logger;
  /** Log every frame at debug level (defaults to MCP_LOG_PROTOCOL). */
  protocolLog?: boolean;
}

export class StreamTransport implements Transport {
  private readonly rl: Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly lines = new AsyncQueue<string>();
  private readonly log: Logger;
  private readonly protocolLog: boolean;
  private connected = true;

  constructor(opts: StreamTransportOptions = {}){
    this.output = opts.output || process.stdout;
    this.log = opts.logger ?? silentLogger;
    this.protocolLog = opts.protocolLog ?? getRuntimeConfig().logging.protocol;
    // Use readline only for input parsing; no output so inbound frames are never echoed.
    this.rl = createInterface({ input: opts.input || process.stdin, crlfDelay: Infinity });
    this.rl.on('line', (line: string) => {
      const trimmed = line.trim();
      if(!trimmed) return;
      this.lines.push(trimmed);
    });
    this.rl.on('close', () => {
      this.connected = false;
      this.lines.close(new TransportError('closed', 'input stream ended'));
    });
  }

  isConnected(){ return this.connected; }

  async send(msg: JsonRpcMessage): Promise<void> {
    if(!this.connected) throw new TransportError('not_connected');
    const frame = encodeMessage(msg);
    if(this.protocolLog) this.log.debug('send', { id: msg.id ?? null, method: msg.method, error: msg.error?.code });
    await new Promise<void>((resolve, reject) => {
      this.output.write(frame + '\n', (err?: Error | null) => {
        if(err) reject(new TransportError('send_failed', undefined, { cause: err }));
        else resolve();
      });
    });
  }

  async receive(signal?: AbortSignal): Promise<JsonRpcMessage> {
    const line = await this.lines.shift(signal);
    try {
      const msg = decodeMessage(line);
      if(this.protocolLog) this.log.debug('recv', { id: msg.id ?? null, method: msg.method });
      return msg;
    } catch(e){
      this.log.error('parse_error', { raw: line.slice(0, 200) });
      throw e;
    }
  }

  async close(): Promise<void> {
    if(!this.connected && this.lines.isClosed) return;
    this.connected = false;
    this.lines.close(new TransportError('closed'));
    this.rl.close();
  }
}
