// src/budget/keyedStore.ts

/**
 * Per-user state holder. Each key is only ever written from its owner's
 * lane, so no locking happens here.
 */
export class KeyedStore<T> {
  private readonly items = new Map<string, T>();

  get(key: string): T | undefined {
    return this.items.get(key);
  }

  set(key: string, value: T): void {
    this.items.set(key, value);
  }

  delete(key: string): boolean {
    return this.items.delete(key);
  }

  keys(): string[] {
    return Array.from(this.items.keys());
  }

  get size(): number {
    return this.items.size;
  }
}
