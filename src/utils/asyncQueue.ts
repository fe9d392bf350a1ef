// Unbounded FIFO with awaitable shift(). Used to model one direction of an
// in-process channel: items pushed before anyone waits are buffered in order.

interface Taker<T> {
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
  cleanup: () => void;
}

export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Taker<T>[] = [];
  private closedWith: unknown = undefined;
  private closed = false;

  get size(){ return this.items.length; }
  get isClosed(){ return this.closed; }

  push(item: T): boolean {
    if(this.closed) return false;
    const taker = this.takers.shift();
    if(taker){
      taker.cleanup();
      taker.resolve(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /** Resolves with the next item; rejects once closed and drained, or when `signal` aborts. */
  shift(signal?: AbortSignal): Promise<T> {
    if(this.items.length){
      const item = this.items.shift();
      if(item !== undefined) return Promise.resolve(item);
    }
    if(this.closed) return Promise.reject(this.closedWith);
    if(signal?.aborted) return Promise.reject(signal.reason);
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.takers.indexOf(taker);
        if(idx >= 0) this.takers.splice(idx, 1);
        reject(signal?.reason);
      };
      const taker: Taker<T> = {
        resolve,
        reject,
        cleanup: () => signal?.removeEventListener('abort', onAbort),
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.takers.push(taker);
    });
  }

  /** Reject current and future takers with `reason` once buffered items are consumed. */
  close(reason: unknown){
    if(this.closed) return;
    this.closed = true;
    this.closedWith = reason;
    for(const t of this.takers.splice(0)){
      t.cleanup();
      t.reject(reason);
    }
  }
}
