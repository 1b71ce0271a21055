/**
 * String interning for keys and values that repeat across many files
 * (cultures, religions, tags). Injected into the parser; parsing behaves
 * the same with or without one.
 */

export interface StringInterner {
  intern(value: string): string;
}

export interface StringPoolStatistics {
  uniqueStrings: number;
  totalReferences: number;
  /** UTF-16 code units held by the pool, in bytes */
  estimatedBytes: number;
}

interface PoolEntry {
  value: string;
  id: number;
  refCount: number;
}

/**
 * Reference-counted pool. Each distinct string gets a stable numeric id
 * until its last reference is released.
 */
export class StringPool implements StringInterner {
  private pool = new Map<string, PoolEntry>();
  private nextId = 1;

  intern(value: string): string {
    if (value === '') return value;

    const existing = this.pool.get(value);
    if (existing) {
      existing.refCount++;
      return existing.value;
    }

    this.pool.set(value, { value, id: this.nextId++, refCount: 1 });
    return value;
  }

  release(value: string): void {
    const entry = this.pool.get(value);
    if (!entry) return;

    entry.refCount--;
    if (entry.refCount <= 0) {
      this.pool.delete(value);
    }
  }

  getId(value: string): number | undefined {
    return this.pool.get(value)?.id;
  }

  getStatistics(): StringPoolStatistics {
    let totalReferences = 0;
    let estimatedBytes = 0;

    for (const entry of this.pool.values()) {
      totalReferences += entry.refCount;
      estimatedBytes += entry.value.length * 2;
    }

    return { uniqueStrings: this.pool.size, totalReferences, estimatedBytes };
  }

  /** Interned strings and their ids */
  entries(): Map<string, number> {
    return new Map([...this.pool.values()].map((e) => [e.value, e.id]));
  }

  clear(): void {
    this.pool.clear();
  }
}
