// Async read/write lock. Waiters are granted in arrival order: a queued writer
// blocks readers that arrive after it, so a steady stream of reads cannot
// starve registration.

type Release = () => void;
interface Waiter { kind: 'read' | 'write'; grant: () => void }

export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private readonly waiters: Waiter[] = [];

  acquireRead(): Promise<Release> {
    if(!this.writer && this.waiters.length === 0){
      this.readers++;
      return Promise.resolve(this.releaser('read'));
    }
    return new Promise(resolve => {
      this.waiters.push({ kind: 'read', grant: () => resolve(this.releaser('read')) });
    });
  }

  acquireWrite(): Promise<Release> {
    if(!this.writer && this.readers === 0 && this.waiters.length === 0){
      this.writer = true;
      return Promise.resolve(this.releaser('write'));
    }
    return new Promise(resolve => {
      this.waiters.push({ kind: 'write', grant: () => resolve(this.releaser('write')) });
    });
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try { return await fn(); } finally { release(); }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try { return await fn(); } finally { release(); }
  }

  /** Diagnostics only. */
  state(){ return { readers: this.readers, writer: this.writer, waiting: this.waiters.length }; }

  private releaser(kind: 'read' | 'write'): Release {
    let released = false;
    return () => {
      if(released) return;
      released = true;
      if(kind === 'read') this.readers--; else this.writer = false;
      this.drain();
    };
  }

  private drain(){
    while(this.waiters.length){
      const head = this.waiters[0];
      if(head.kind === 'write'){
        if(this.readers === 0 && !this.writer){
          this.waiters.shift();
          this.writer = true;
          head.grant();
        }
        return;
      }
      if(this.writer) return;
      this.waiters.shift();
      this.readers++;
      head.grant();
    }
  }
}
