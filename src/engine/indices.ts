export abstract class Index<K, T> {
  private index = new Map<string, T>();

  protected abstract getIndex(key: K): string;

  value(key: K, value: T): T | null; // Adds
  value(key: K, value: null): T | null; // Removes
  value(key: K): T | null; // Gets
  value(key: K, value?: T | null): T | null {
    const i = this.getIndex(key);
    const old = this.index.get(i) ?? null;
    if (typeof value != 'undefined') {
      if (value != null)
        this.index.set(i, value);
      else
        this.index.delete(i);
    }
    return old;
  }

  get size() {
    return this.index.size;
  }

  [Symbol.iterator]() {
    return this.index.values();
  }
}

export abstract class IndexSet<T> extends Index<T, T> {
  constructor(ts?: Iterable<T>) {
    super();
    this.addAll(ts);
  }

  has(t: T): boolean {
    return this.value(t) != null;
  }

  /** @returns `true` if the item was not already present */
  add(t: T): boolean {
    return this.value(t, t) == null;
  }

  /** @returns `true` if the item was present */
  delete(t: T): boolean {
    return this.value(t, null) != null;
  }

  addAll(ts: Iterable<T> | undefined): this {
    for (let t of (ts ?? []))
      this.add(t);
    return this;
  }
}
