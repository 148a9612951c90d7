/**
 * String-keyed map with case-insensitive lookup. Iteration yields the
 * spelling under which each key was first stored.
 */
export class CaseInsensitiveMap<V> implements Iterable<[string, V]> {
  private readonly entriesByKey = new Map<string, [string, V]>();

  constructor(entries?: Iterable<readonly [string, V]>) {
    if (entries) {
      for (const [key, value] of entries) this.set(key, value);
    }
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get(key: string): V | undefined {
    return this.entriesByKey.get(fold(key))?.[1];
  }

  has(key: string): boolean {
    return this.entriesByKey.has(fold(key));
  }

  set(key: string, value: V): this {
    const folded = fold(key);
    const existing = this.entriesByKey.get(folded);
    if (existing) {
      existing[1] = value;
    } else {
      this.entriesByKey.set(folded, [key, value]);
    }
    return this;
  }

  delete(key: string): boolean {
    return this.entriesByKey.delete(fold(key));
  }

  clear(): void {
    this.entriesByKey.clear();
  }

  *keys(): IterableIterator<string> {
    for (const [key] of this.entriesByKey.values()) yield key;
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entriesByKey.values()) yield value;
  }

  *entries(): IterableIterator<[string, V]> {
    for (const [key, value] of this.entriesByKey.values()) yield [key, value];
  }

  [Symbol.iterator](): IterableIterator<[string, V]> {
    return this.entries();
  }

  /** Plain object keyed by the stored spellings, for JSON output. */
  toJSON(): Record<string, V> {
    return Object.fromEntries(this.entries());
  }
}

function fold(key: string): string {
  return key.toLowerCase();
}
