// In-process transport pair. Each frame is serialized and re-parsed on the way
// across so both ends see exactly what a wire peer would (undefined fields
// dropped, no shared object references).
import { decodeMessage, encodeMessage, type JsonRpcMessage } from '../models/message';
import { TransportError } from '../services/errors';
import { AsyncQueue } from '../utils/asyncQueue';
import type { Transport } from './transport';

export class MemoryTransport implements Transport {
  private readonly inbound = new AsyncQueue<string>();
  private peer: MemoryTransport | undefined;
  private connected = true;
  /** Every frame this end has sent, for assertions in tests and diagnostics. */
  readonly sent: JsonRpcMessage[] = [];

  static pair(): [MemoryTransport, MemoryTransport] {
    const a = new MemoryTransport();
    const b = new MemoryTransport();
    a.peer = b;
    b.peer = a;
    return [a, b];
  }

  isConnected(){ return this.connected; }

  async send(msg: JsonRpcMessage): Promise<void> {
    if(!this.connected || !this.peer) throw new TransportError('not_connected');
    const frame = encodeMessage(msg);
    this.sent.push(decodeMessage(frame));
    if(!this.peer.inbound.push(frame)) throw new TransportError('send_failed', 'peer is closed');
  }

  /** Inject a raw frame as if the peer had written it. */
  deliverRaw(frame: string){
    this.inbound.push(frame);
  }

  async receive(signal?: AbortSignal): Promise<JsonRpcMessage> {
    const frame = await this.inbound.shift(signal);
    return decodeMessage(frame);
  }

  async close(): Promise<void> {
    if(!this.connected) return;
    this.connected = false;
    this.inbound.close(new TransportError('closed'));
    const peer = this.peer;
    if(peer && peer.connected){
      peer.connected = false;
      peer.inbound.close(new TransportError('closed', 'peer closed the connection'));
    }
  }
}
