// Cache Lab Type Definitions
// Shared by the engine, the CLI and the front end

// =============================================================================
// CONFIGURATION
// =============================================================================

export type ReplacementPolicy = 'fifo' | 'lru'

export interface CacheGeometry {
  cacheSize: number      // bytes
  associativity: number  // lines per set
  blockSize: number      // bytes
}

export interface DerivedGeometry {
  numSets: number
  blockOffsetBits: number
  setIndexBits: number
}

export interface CacheConfig extends CacheGeometry {
  policy: ReplacementPolicy
}

// =============================================================================
// CACHE STORAGE
// =============================================================================

export interface CacheLine {
  valid: boolean
  tag: bigint
  age: number  // insertion order (FIFO) or recency (LRU), not wall-clock time
}

export type CacheSet = CacheLine[]

export interface AddressParts {
  blockId: bigint
  setIndex: number
  tag: bigint
}

export interface LineLookup {
  setIndex: number
  lineIndex: number | null
}

// Flattened view of one slot, for display
export interface CacheLineState {
  set: number
  way: number
  valid: boolean
  tag: string  // hex, empty when invalid
  age: number
}

// =============================================================================
// STATISTICS
// =============================================================================

export interface CacheStats {
  readonly reads: number
  readonly writes: number
  readonly hits: number
  readonly misses: number
}

// =============================================================================
// TRACE
// =============================================================================

export type AccessKind = 'read' | 'write'

export type AccessOutcome = 'hit' | 'miss'

export interface TraceEvent {
  kind: AccessKind
  address: bigint
}

export type TraceLine =
  | { kind: 'event'; event: TraceEvent }
  | { kind: 'end' }
  | { kind: 'ignored' }
  | { kind: 'malformed' }

// =============================================================================
// REPORT
// =============================================================================

export interface RunReport {
  prefetch: boolean
  stats: CacheStats
}

export interface SimulationReport {
  config: CacheConfig
  derived: DerivedGeometry
  events: number
  skipped: number
  runs: [RunReport, RunReport]  // prefetch off, prefetch on
}
