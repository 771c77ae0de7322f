import type { ConfigForm, PresetName, SelectOption } from '../types'

export const PRESETS: Record<Exclude<PresetName, 'custom'>, ConfigForm> = {
  'direct-mapped': { cacheSize: 128, blockSize: 16, mode: 'direct', ways: 1, policy: 'lru' },
  '2-way': { cacheSize: 128, blockSize: 16, mode: 'set', ways: 2, policy: 'lru' },
  '4-way': { cacheSize: 256, blockSize: 16, mode: 'set', ways: 4, policy: 'lru' },
  'fully-assoc': { cacheSize: 128, blockSize: 16, mode: 'full', ways: 8, policy: 'lru' },
}

export const DEFAULT_PRESET: Exclude<PresetName, 'custom'> = '2-way'

export const PRESET_OPTIONS: SelectOption[] = [
  { value: 'direct-mapped', label: 'Direct-mapped', group: 'Learning', desc: '128B, one line per set' },
  { value: '2-way', label: '2-way', group: 'Learning', desc: '128B, 4 sets of 2 lines' },
  { value: '4-way', label: '4-way', group: 'Learning', desc: '256B, 4 sets of 4 lines' },
  { value: 'fully-assoc', label: 'Fully associative', group: 'Learning', desc: '128B, one set of 8 lines' },
  { value: 'custom', label: 'Custom', group: 'Custom', desc: 'Configure your own geometry' },
]

export const POLICY_OPTIONS: SelectOption[] = [
  { value: 'lru', label: 'LRU', desc: 'Evict the least recently used line' },
  { value: 'fifo', label: 'FIFO', desc: 'Evict the oldest inserted line' },
]

export const ASSOCIATIVITY_OPTIONS: SelectOption[] = [
  { value: 'direct', label: 'Direct-mapped', desc: 'One line per set' },
  { value: 'set', label: 'Set-associative', desc: 'N lines per set' },
  { value: 'full', label: 'Fully associative', desc: 'A single set holding every line' },
]

export const SIZE_OPTIONS: SelectOption[] = [64, 128, 256, 512, 1024, 4096, 32768].map(size => ({
  value: String(size),
  label: size >= 1024 ? `${size / 1024}KB` : `${size}B`,
}))

export const BLOCK_SIZE_OPTIONS: SelectOption[] = [4, 8, 16, 32, 64].map(size => ({
  value: String(size),
  label: `${size}B`,
}))
