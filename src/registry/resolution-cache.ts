/**
 * Write-once cache from type key to resolved mapper.
 *
 * Entries are never evicted or overwritten: the first mapper stored for a
 * key stays for the life of the cache. Failed lookups are never stored.
 */

import type { Mapper } from '../mapper/base.js';

export class ResolutionCache {
  private readonly entries: Map<string, Mapper> = new Map();

  get(key: string): Mapper | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Store a mapper unless the key is already taken.
   *
   * @returns The mapper held for the key after the call
   */
  store(key: string, mapper: Mapper): Mapper {
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }
    this.entries.set(key, mapper);
    return mapper;
  }

  size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }
}
