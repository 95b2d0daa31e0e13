/**
 * REASON Document Cache
 *
 * Instance-owned in-memory map from composite keys to documents.
 * Entries never expire: they leave only through clear().
 */

export interface CacheStats {
  entryCount: number;
  hits: number;
  misses: number;
  hitRate: number;         // hits / (hits + misses)
}

export class DocumentCache<T> {
  protected cache = new Map<string, T>();
  private hits = 0;
  private misses = 0;

  /**
   * Compose a cache key from a category and optional sub-key.
   * `gene_expression` + `Asthma` → `gene_expression_Asthma`.
   */
  static compositeKey(category: string, subKey?: string): string {
    return subKey ? `${category}_${subKey}` : category;
  }

  get(key: string): T | undefined {
    const value = this.cache.get(key);
    if (value === undefined) {
      this.misses++;
      return undefined;
    }
    this.hits++;
    return value;
  }

  set(key: string, value: T): void {
    this.cache.set(key, value);
  }

  clear(): void {
    this.cache.clear();
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      entryCount: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total === 0 ? 0 : this.hits / total,
    };
  }
}
