import crypto from 'crypto';
import type { ProgressNotificationParams } from '../models/capabilities';
import { raise } from './errors';
import { silentLogger, type Logger } from './logger';

export interface ProgressSnapshot {
  token: string;
  /** Fraction complete, 0..1. */
  progress: number;
  total?: number;
  startTime: number;
  updatedAt: number;
}

export type ProgressNotifier = (update: ProgressNotificationParams) => void | Promise<void>;

interface ProgressRecord {
  snapshot: ProgressSnapshot;
  controller: AbortController;
  detach: () => void;
}

export interface ProgressTrackerOptions {
  notifier?: ProgressNotifier;
  logger?: Logger;
  now?: () => number;
}

export function generateProgressToken(): string {
  return `progress_${crypto.randomBytes(8).toString('hex')}`;
}

/**
 * Tracks fractional completion of long-running calls. Each token owns an
 * AbortController (its cancellable scope), linked to the parent signal given to
 * start(). Records are removed by complete() or cancel(); any later use of the
 * token fails with invalid-request.
 */
export class ProgressTracker {
  private readonly records = new Map<string, ProgressRecord>();
  private readonly notifier?: ProgressNotifier;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(opts: ProgressTrackerOptions = {}){
    this.notifier = opts.notifier;
    this.log = opts.logger ?? silentLogger;
    this.now = opts.now ?? Date.now;
  }

  /**
   * Begin tracking `token` under the request scope `parent` (token first so the
   * scope can be left out). A previous record under the same token is cancelled
   * and replaced. When `parent` aborts, the record is cancelled the same way
   * cancel() does it: no final notification, and the token is forgotten.
   */
  start(token: string, parent?: AbortSignal): AbortSignal {
    if(!token) raise('invalidParams', 'progress token must be a non-empty string');
    const prior = this.records.get(token);
    if(prior){
      this.records.delete(token);
      this.abortRecord(prior, 'replaced');
    }
    const controller = new AbortController();
    if(parent?.aborted){
      controller.abort(parent.reason);
      this.log.debug('progress_cancel', { token, reason: 'aborted' });
      return controller.signal;
    }
    const started = this.now();
    const rec: ProgressRecord = {
      snapshot: { token, progress: 0, startTime: started, updatedAt: started },
      controller,
      detach: () => {},
    };
    if(parent){
      const onAbort = () => {
        if(this.records.get(token) === rec) this.records.delete(token);
        if(!controller.signal.aborted) controller.abort(parent.reason);
        this.log.debug('progress_cancel', { token, reason: 'aborted' });
      };
      parent.addEventListener('abort', onAbort, { once: true });
      rec.detach = () => parent.removeEventListener('abort', onAbort);
    }
    this.records.set(token, rec);
    this.log.debug('progress_start', { token });
    return controller.signal;
  }

  async update(token: string, progress: number, total?: number): Promise<ProgressSnapshot> {
    const rec = this.require(token);
    if(!Number.isFinite(progress) || progress < 0 || progress > 1){
      raise('invalidParams', 'progress must be between 0 and 1', { token, progress });
    }
    if(total !== undefined && (!Number.isFinite(total) || total < 0)){
      raise('invalidParams', 'total must be a non-negative number', { token, total });
    }
    rec.snapshot.progress = progress;
    if(total !== undefined) rec.snapshot.total = total;
    rec.snapshot.updatedAt = this.now();
    const snap = { ...rec.snapshot };
    await this.emit(snap);
    return snap;
  }

  /** Force progress to 1, send the final notification, then forget the token. */
  async complete(token: string): Promise<ProgressSnapshot> {
    const rec = this.require(token);
    this.records.delete(token);
    rec.detach();
    rec.snapshot.progress = 1;
    rec.snapshot.updatedAt = this.now();
    const snap = { ...rec.snapshot };
    this.log.debug('progress_complete', { token, ms: snap.updatedAt - snap.startTime });
    await this.emit(snap);
    return snap;
  }

  /** Abort the token's scope and forget it; no notification is sent. */
  cancel(token: string, reason = 'cancelled'){
    const rec = this.require(token);
    this.records.delete(token);
    this.abortRecord(rec, reason);
    this.log.debug('progress_cancel', { token, reason });
  }

  get(token: string): ProgressSnapshot {
    return { ...this.require(token).snapshot };
  }

  has(token: string): boolean { return this.records.has(token); }

  list(): ProgressSnapshot[] {
    return [...this.records.values()].map(r => ({ ...r.snapshot }));
  }

  tokens(): string[] { return [...this.records.keys()]; }

  signalFor(token: string): AbortSignal {
    return this.require(token).controller.signal;
  }

  /** Cancel every tracked token (used on shutdown). */
  cancelAll(reason = 'closed'){
    for(const [token, rec] of [...this.records]){
      this.records.delete(token);
      this.abortRecord(rec, reason);
    }
  }

  private require(token: string): ProgressRecord {
    const rec = this.records.get(token);
    if(!rec) return raise('invalidRequest', 'progress token not found', { token });
    return rec;
  }

  private abortRecord(rec: ProgressRecord, reason: string){
    rec.detach();
    if(!rec.controller.signal.aborted) rec.controller.abort(new Error(`progress ${reason}`));
  }

  private async emit(snap: ProgressSnapshot){
    if(!this.notifier) return;
    const update: ProgressNotificationParams = { progressToken: snap.token, progress: snap.progress };
    if(snap.total !== undefined) update.total = snap.total;
    try {
      await this.notifier(update);
    } catch(e){
      // Tracking state is already updated; a lost notification does not fail the operation.
      this.log.warn('progress_notify_failed', { token: snap.token, error: e instanceof Error ? e.message : String(e) });
    }
  }
}
