/**
 * Keyed collection backing the in-memory repositories.
 * Rows are copied on the way in and out so callers never share references.
 */
export class InMemoryStore<T extends object> {
  private store: Map<string, T> = new Map();

  get(key: string): T | undefined {
    const value = this.store.get(key);
    return value ? { ...value } : undefined;
  }

  set(key: string, value: T): void {
    this.store.set(key, { ...value });
  }

  values(): T[] {
    return Array.from(this.store.values(), (value) => ({ ...value }));
  }

  find(predicate: (value: T) => boolean): T | undefined {
    for (const value of this.store.values()) {
      if (predicate(value)) {
        return { ...value };
      }
    }
    return undefined;
  }

  snapshot(): Map<string, T> {
    return new Map(Array.from(this.store.entries(), ([key, value]) => [key, { ...value }]));
  }

  restore(snapshot: Map<string, T>): void {
    this.store = new Map(snapshot);
  }
}
