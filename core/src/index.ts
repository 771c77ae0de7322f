// Engine
export { Cache } from './cache'
export type { CacheOptions } from './cache'
export { PairedSimulator, createCachePair, runTrace } from './simulate'
export type { CachePair, StepOutcome } from './simulate'

// Building blocks
export { decompose, blockIdOf, blockAddress, toAddress, formatAddress } from './address'
export { createSet, createSets, findLine } from './cacheSet'
export { selectVictim, insertLine, touchLine } from './replacement'
export { prefetchNext, nextBlockAddress } from './prefetch'
export type { PrefetchTarget } from './prefetch'
export { StatsLedger, hitRate, prefetchesIssued } from './stats'

// Configuration & input
export {
  REPLACEMENT_POLICIES,
  isPowerOfTwo,
  log2Int,
  validateGeometry,
  parseAssociativity,
  parseCacheConfig,
  describeConfig,
} from './config'
export type { RawCacheConfig } from './config'
export { END_MARKER, parseTraceLine, parseTrace, formatTraceEvent } from './trace'
export type { ParsedTrace } from './trace'

// Errors
export { ExitCode, SimulatorError, CacheConfigError, TraceReadError, isSimulatorError } from './errors'
export type { ExitCodeValue, ErrorCodeValue } from './errors'

export type * from './types'
