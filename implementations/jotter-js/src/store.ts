import type { Value } from "./types.js";

/**
 * Key/value storage behind a {@link Document}. A plain `Map` satisfies it and
 * keeps insertion order.
 */
export interface EntryStore {
  readonly size: number;
  get(key: string): Value | undefined;
  set(key: string, value: Value): unknown;
  has(key: string): boolean;
  delete(key: string): boolean;
  clear(): void;
  entries(): IterableIterator<[string, Value]>;
}

/** Iterates keys in ascending code-unit order, whatever order they were set in. */
export class SortedStore implements EntryStore {
  private readonly map = new Map<string, Value>();
  private sorted: string[] | null = null;

  get size(): number {
    return this.map.size;
  }

  get(key: string): Value | undefined {
    return this.map.get(key);
  }

  set(key: string, value: Value): this {
    if (!this.map.has(key)) this.sorted = null;
    this.map.set(key, value);
    return this;
  }

  has(key: string): boolean {
    return this.map.has(key);
  }

  delete(key: string): boolean {
    const deleted = this.map.delete(key);
    if (deleted) this.sorted = null;
    return deleted;
  }

  clear(): void {
    this.map.clear();
    this.sorted = null;
  }

  *entries(): IterableIterator<[string, Value]> {
    if (!this.sorted) {
      this.sorted = [...this.map.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    }
    for (const key of this.sorted) {
      const value = this.map.get(key);
      if (value) yield [key, value];
    }
  }
}
