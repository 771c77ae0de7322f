// Cache Lab front-end types
// Engine types come from core; these describe UI state

import type {
  AccessOutcome,
  CacheConfig,
  CacheLineState,
  ReplacementPolicy,
  SimulationReport,
} from '../../../core/src'

export type { CacheConfig, CacheLineState, ReplacementPolicy, SimulationReport }

// =============================================================================
// CONFIGURATION
// =============================================================================

export type AssociativityMode = 'direct' | 'set' | 'full'

// Form state, kept as entered; validated by the engine on run
export interface ConfigForm {
  cacheSize: number
  blockSize: number
  mode: AssociativityMode
  ways: number       // only used in 'set' mode
  policy: ReplacementPolicy
}

export type PresetName = 'direct-mapped' | '2-way' | '4-way' | 'fully-assoc' | 'custom'

export interface SelectOption {
  value: string
  label: string
  group?: string
  desc?: string
}

// =============================================================================
// RESULTS
// =============================================================================

// One trace event and how each cache handled it
export interface TimelineEvent {
  i: number          // event index
  t: 'R' | 'W'       // type
  a: string          // address (hex)
  base: AccessOutcome
  pf: AccessOutcome
}

export interface SimulationResult {
  report: SimulationReport
  timeline: TimelineEvent[]
  lines: {
    baseline: CacheLineState[]
    prefetching: CacheLineState[]
  }
}

export type Stage = 'idle' | 'running' | 'done'

export interface ErrorResult {
  type: 'config_error' | 'trace_error' | 'unknown_error'
  message: string
  suggestion?: string
}

// =============================================================================
// UI STATE
// =============================================================================

export type Theme = 'dark' | 'light'

export interface ShareableState {
  trace: string
  config: ConfigForm
}
