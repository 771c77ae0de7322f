import type { CacheStats } from './types'

/**
 * Counters owned by one cache. They only ever go up; {@link snapshot} hands
 * out frozen copies so readers can never move them.
 */
export class StatsLedger {
  private reads = 0
  private writes = 0
  private hits = 0
  private misses = 0

  recordHit(): void {
    this.hits++
  }

  // A miss always costs one memory read to bring the block in
  recordMiss(): void {
    this.misses++
    this.reads++
  }

  recordWrite(): void {
    this.writes++
  }

  recordPrefetchRead(): void {
    this.reads++
  }

  snapshot(): CacheStats {
    return Object.freeze({
      reads: this.reads,
      writes: this.writes,
      hits: this.hits,
      misses: this.misses,
    })
  }
}

export function hitRate({ hits, misses }: CacheStats): number {
  const accesses = hits + misses
  return accesses > 0 ? hits / accesses : 0
}

// Reads beyond demand fetches are prefetches
export function prefetchesIssued({ reads, misses }: CacheStats): number {
  return reads - misses
}
