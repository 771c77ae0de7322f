import { blockAddress, blockIdOf } from './address'
import type { StatsLedger } from './stats'
import type { DerivedGeometry, LineLookup } from './types'

// What the prefetcher needs from a cache: lookup and fill
export interface PrefetchTarget {
  readonly derived: DerivedGeometry
  find(address: bigint): LineLookup
  load(address: bigint): void
}

export function nextBlockAddress(address: bigint, derived: DerivedGeometry): bigint {
  return blockAddress(blockIdOf(address, derived) + 1n, derived)
}

/**
 * Next-block prefetch, issued after a demand miss. Fetches the block after
 * `address` unless it is already cached. A fetch counts as one memory read and
 * nothing else; a block that is already present is left untouched, recency
 * included.
 *
 * @returns whether a block was fetched
 */
export function prefetchNext(target: PrefetchTarget, ledger: StatsLedger, address: bigint): boolean {
  const next = nextBlockAddress(address, target.derived)
  if (target.find(next).lineIndex !== null) return false

  ledger.recordPrefetchRead()
  target.load(next)
  return true
}
