import type { CacheSet, ReplacementPolicy } from './types'

/**
 * Both policies share one aging rule. Inserting a line sets its age to 0 and
 * ages every other valid line by one, so the oldest line always carries the
 * largest age. Under LRU a hit applies the same rule to the hit line, which
 * turns "oldest inserted" into "least recently used". FIFO hits leave ages
 * alone.
 */

// =============================================================================
// VICTIM SELECTION
// =============================================================================

/**
 * The first invalid slot if there is one, otherwise the valid slot with the
 * largest age. The scan uses `>=`, so among equal ages the later slot wins.
 * Ages inside a full set are always distinct, so the tie never arises.
 */
export function selectVictim(set: CacheSet): number {
  let victim = -1
  let maxAge = 0

  for (let i = 0; i < set.length; i++) {
    const line = set[i]
    if (!line.valid) return i
    if (line.age >= maxAge) {
      maxAge = line.age
      victim = i
    }
  }
  return victim
}

function age(set: CacheSet, youngest: number): void {
  set.forEach((line, i) => {
    if (!line.valid) return
    line.age = i === youngest ? 0 : line.age + 1
  })
}

// =============================================================================
// INSERTION & ACCESS
// =============================================================================

/**
 * Install `tag` into the set, evicting if it is full.
 * Returns the slot used and the tag it displaced, if any.
 */
export function insertLine(set: CacheSet, tag: bigint): { slot: number; evicted: bigint | null } {
  const slot = selectVictim(set)
  const line = set[slot]
  const evicted = line.valid ? line.tag : null

  line.valid = true
  line.tag = tag
  age(set, slot)

  return { slot, evicted }
}

// Hit-time update; only LRU cares about recency
export function touchLine(set: CacheSet, slot: number, policy: ReplacementPolicy): void {
  if (policy !== 'lru') return
  age(set, slot)
}
