import { decompose } from './address'
import { createSets, findLine } from './cacheSet'
import { validateGeometry } from './config'
import { prefetchNext, type PrefetchTarget } from './prefetch'
import { insertLine, touchLine } from './replacement'
import { StatsLedger } from './stats'
import type {
  AccessOutcome,
  CacheConfig,
  CacheGeometry,
  CacheLineState,
  CacheSet,
  CacheStats,
  DerivedGeometry,
  LineLookup,
  ReplacementPolicy,
  TraceEvent,
} from './types'

export interface CacheOptions {
  prefetch?: boolean
}

/**
 * One simulated cache: geometry, line storage and statistics.
 *
 * Writes are write-allocate and write-through: a write miss fetches the block
 * exactly like a read miss, and every write is counted once whether it hits or
 * misses.
 */
export class Cache implements PrefetchTarget {
  readonly geometry: CacheGeometry
  readonly derived: DerivedGeometry
  readonly policy: ReplacementPolicy
  readonly prefetch: boolean

  private readonly sets: CacheSet[]
  private readonly ledger = new StatsLedger()

  constructor(config: CacheConfig, options: CacheOptions = {}) {
    const { cacheSize, associativity, blockSize, policy } = config
    this.geometry = { cacheSize, associativity, blockSize }
    this.derived = validateGeometry(this.geometry)
    this.policy = policy
    this.prefetch = options.prefetch ?? false
    this.sets = createSets(this.derived.numSets, associativity)
  }

  find(address: bigint): LineLookup {
    const { setIndex, tag } = decompose(address, this.derived)
    const lineIndex = findLine(this.sets[setIndex], tag)
    return { setIndex, lineIndex: lineIndex === -1 ? null : lineIndex }
  }

  /**
   * Install the block holding `address`, evicting per policy when its set is
   * full. Call exactly once per miss, demand or prefetch.
   */
  load(address: bigint): void {
    const { setIndex, tag } = decompose(address, this.derived)
    insertLine(this.sets[setIndex], tag)
  }

  read(address: bigint): AccessOutcome {
    return this.access({ kind: 'read', address })
  }

  write(address: bigint): AccessOutcome {
    return this.access({ kind: 'write', address })
  }

  access({ kind, address }: TraceEvent): AccessOutcome {
    const { setIndex, lineIndex } = this.find(address)

    if (lineIndex !== null) {
      this.ledger.recordHit()
      if (kind === 'write') this.ledger.recordWrite()
      touchLine(this.sets[setIndex], lineIndex, this.policy)
      return 'hit'
    }

    this.ledger.recordMiss()
    this.load(address)
    if (kind === 'write') this.ledger.recordWrite()
    if (this.prefetch) prefetchNext(this, this.ledger, address)
    return 'miss'
  }

  stats(): CacheStats {
    return this.ledger.snapshot()
  }

  // Current contents, set-major then way order
  lines(): CacheLineState[] {
    return this.sets.flatMap((set, setIndex) =>
      set.map((line, way) => ({
        set: setIndex,
        way,
        valid: line.valid,
        tag: line.valid ? line.tag.toString(16) : '',
        age: line.age,
      }))
    )
  }
}
