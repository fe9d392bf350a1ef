// Client-side cache of one server catalog (tools, resources or prompts).
// Every successful list call replaces the whole map in a single assignment, so a
// reader never sees entries from two different server states.

export interface MirrorState {
  version: number;
  size: number;
  updatedAt?: string;
}

export class CatalogMirror<T> {
  private entries: ReadonlyMap<string, T> = new Map();
  private version = 0;
  private updatedAt: string | undefined;

  constructor(private readonly keyOf: (item: T) => string){}

  replace(items: readonly T[]){
    const next = new Map<string, T>();
    for(const item of items) next.set(this.keyOf(item), structuredClone(item));
    this.entries = next;
    this.version++;
    this.updatedAt = new Date().toISOString();
  }

  get(key: string): T | undefined {
    const item = this.entries.get(key);
    return item === undefined ? undefined : structuredClone(item);
  }

  has(key: string){ return this.entries.has(key); }

  /** Copies, in the order the server listed them. */
  list(): T[] {
    return [...this.entries.values()].map(item => structuredClone(item));
  }

  keys(): string[] { return [...this.entries.keys()]; }

  clear(){
    this.entries = new Map();
    this.version++;
    this.updatedAt = undefined;
  }

  state(): MirrorState {
    const s: MirrorState = { version: this.version, size: this.entries.size };
    if(this.updatedAt) s.updatedAt = this.updatedAt;
    return s;
  }
}
