// Fixed-window request limiter keyed by caller (identity id, origin, or "anonymous").

export interface RateDecision {
  allowed: boolean;
  remaining: number;
  /** Milliseconds until the current window resets. */
  retryAfterMs: number;
}

export interface RateLimiter {
  check(key: string): RateDecision;
}

export interface FixedWindowOptions {
  limit: number;
  windowMs: number;
  now?: () => number;
}

export class FixedWindowRateLimiter implements RateLimiter {
  private readonly windows = new Map<string, { count: number; windowStart: number }>();
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private sweptWindow = Number.NEGATIVE_INFINITY;

  constructor(opts: FixedWindowOptions){
    if(!Number.isSafeInteger(opts.limit) || opts.limit < 1) throw new RangeError('limit must be a positive integer');
    if(!(opts.windowMs > 0)) throw new RangeError('windowMs must be positive');
    this.limit = opts.limit;
    this.windowMs = opts.windowMs;
    this.now = opts.now ?? Date.now;
  }

  check(key: string): RateDecision {
    const now = this.now();
    const windowStart = Math.floor(now / this.windowMs) * this.windowMs;
    const retryAfterMs = windowStart + this.windowMs - now;
    if(windowStart !== this.sweptWindow) this.evictBefore(windowStart);
    const current = this.windows.get(key);
    if(!current || current.windowStart !== windowStart){
      // New window or first access
      this.windows.set(key, { count: 1, windowStart });
      return { allowed: true, remaining: this.limit - 1, retryAfterMs };
    }
    if(current.count >= this.limit) return { allowed: false, remaining: 0, retryAfterMs };
    current.count++;
    return { allowed: true, remaining: this.limit - current.count, retryAfterMs };
  }

  /** Keys with a live window. */
  get size(){ return this.windows.size; }

  // Once per window: entries from earlier windows can only ever be replaced.
  private evictBefore(windowStart: number){
    this.sweptWindow = windowStart;
    for(const [key, w] of this.windows){
      if(w.windowStart < windowStart) this.windows.delete(key);
    }
  }

  reset(key?: string){
    if(key) this.windows.delete(key);
    else this.windows.clear();
  }
}
