// Connection lifecycle shared by client and server sessions.
//
//   uninitialized -> negotiating -> ready -> closed
//                    negotiating -> failed -> closed
//   uninitialized -> closed
import { Methods } from '../models/capabilities';
import { raise } from '../services/errors';
import { silentLogger, type Logger } from '../services/logger';

export type HandshakeState = 'uninitialized' | 'negotiating' | 'ready' | 'failed' | 'closed';

export interface HandshakeEvent {
  from: HandshakeState;
  to: HandshakeState;
  at: string; // ISO timestamp
  reason?: string;
}

const TRANSITIONS: Record<HandshakeState, readonly HandshakeState[]> = {
  uninitialized: ['negotiating', 'closed'],
  negotiating: ['ready', 'failed'],
  ready: ['closed'],
  failed: ['closed'],
  closed: [],
};

// Calls allowed before the session is ready.
const PRE_READY_METHODS: ReadonlySet<string> = new Set([Methods.Initialize, Methods.Ping]);

const DEFAULT_HISTORY_LIMIT = 50;

export interface HandshakeOptions {
  historyLimit?: number;
  logger?: Logger;
  onTransition?: (event: HandshakeEvent) => void;
}

export class HandshakeStateMachine {
  private current: HandshakeState = 'uninitialized';
  private readonly events: HandshakeEvent[] = [];
  private readonly limit: number;
  private readonly log: Logger;
  private readonly onTransition?: (event: HandshakeEvent) => void;

  constructor(opts: HandshakeOptions = {}){
    this.limit = opts.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.log = opts.logger ?? silentLogger;
    this.onTransition = opts.onTransition;
  }

  get state(): HandshakeState { return this.current; }
  isReady(){ return this.current === 'ready'; }
  isClosed(){ return this.current === 'closed'; }

  canTransition(to: HandshakeState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  /** Move to `to`; an edge not in the lifecycle graph throws invalid-request. */
  transition(to: HandshakeState, reason?: string): HandshakeEvent {
    const from = this.current;
    if(!this.canTransition(to)){
      raise('invalidRequest', `invalid handshake transition ${from} -> ${to}`, { from, to });
    }
    this.current = to;
    const event: HandshakeEvent = { from, to, at: new Date().toISOString() };
    if(reason) event.reason = reason;
    this.events.push(event);
    if(this.events.length > this.limit) this.events.splice(0, this.events.length - this.limit);
    this.log.debug('handshake_transition', event);
    this.onTransition?.(event);
    return event;
  }

  /**
   * Drive the machine to `closed` from wherever it is: an in-flight negotiation is
   * recorded as failed first. Closing twice is a no-op.
   */
  close(reason?: string){
    if(this.current === 'closed') return;
    if(this.current === 'negotiating') this.transition('failed', reason ?? 'closed during negotiation');
    this.transition('closed', reason);
  }

  assertCallAllowed(method: string){
    if(this.current === 'ready' || PRE_READY_METHODS.has(method)) return;
    raise('notInitialized', undefined, { method, state: this.current });
  }

  history(): HandshakeEvent[] {
    return this.events.map(e => ({ ...e }));
  }
}
