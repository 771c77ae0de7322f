import { describe, it, expect } from 'vitest'
import LZString from 'lz-string'
import { CacheConfigError, runTrace } from '../../core/src'
import { PRESETS } from '../src/constants'
import { associativityToken, toCacheConfig, toCommandLine } from '../src/utils/config'
import { reportToCSV } from '../src/utils/export'
import { formatDelta, formatPercent, getRateClass } from '../src/utils/formatting'
import { decodeState, encodeState } from '../src/utils/state'

describe('formatting', () => {
  it('formats rates as percentages', () => {
    expect(formatPercent(0.25)).toBe('25.0%')
    expect(formatPercent(1)).toBe('100.0%')
  })

  it('classifies hit rates', () => {
    expect(getRateClass(0.96)).toBe('excellent')
    expect(getRateClass(0.9)).toBe('good')
    expect(getRateClass(0.5)).toBe('poor')
  })

  it('describes rate differences in percentage points', () => {
    expect(formatDelta(0.5, 0.25)).toEqual({ text: '+25.0 pts', isPositive: true, isNeutral: false })
    expect(formatDelta(0.2, 0.3)).toEqual({ text: '-10.0 pts', isPositive: false, isNeutral: false })
    expect(formatDelta(0.25, 0.25)).toEqual({ text: '+0.0 pts', isPositive: false, isNeutral: true })
  })
})

describe('config form', () => {
  it('maps associativity modes to tokens', () => {
    expect(associativityToken(PRESETS['direct-mapped'])).toBe('direct')
    expect(associativityToken(PRESETS['2-way'])).toBe('assoc:2')
    expect(associativityToken(PRESETS['fully-assoc'])).toBe('assoc')
  })

  it('resolves a form into a cache configuration', () => {
    expect(toCacheConfig(PRESETS['2-way'])).toEqual({ cacheSize: 128, associativity: 2, blockSize: 16, policy: 'lru' })
    expect(toCacheConfig(PRESETS['fully-assoc'])).toEqual({ cacheSize: 128, associativity: 8, blockSize: 16, policy: 'lru' })
  })

  it('rejects impossible geometries', () => {
    expect(() => toCacheConfig({ ...PRESETS['2-way'], ways: 3 })).toThrow(CacheConfigError)
    expect(() => toCacheConfig({ ...PRESETS['2-way'], ways: 3 })).toThrow('Associativity must be a power of 2')
    expect(() => toCacheConfig({ ...PRESETS['2-way'], ways: 16 })).toThrow('Associativity cannot exceed 8 lines')
  })

  it('renders the equivalent command line', () => {
    expect(toCommandLine(PRESETS['2-way'])).toBe('cache-lab 128 assoc:2 lru 16 trace.txt')
    expect(toCommandLine(PRESETS['direct-mapped'], 'loop.trace')).toBe('cache-lab 128 direct lru 16 loop.trace')
  })
})

describe('export', () => {
  it('writes one CSV row per prefetch mode', () => {
    const report = runTrace(
      [0x00n, 0x10n, 0x20n, 0x00n].map(address => ({ kind: 'read' as const, address })),
      { cacheSize: 128, associativity: 2, blockSize: 16, policy: 'lru' }
    )

    expect(reportToCSV(report).split('\n')).toEqual([
      'Prefetch,Reads,Writes,Hits,Misses,Hit Rate',
      '0,3,0,1,3,25.00%',
      '1,4,0,2,2,50.00%',
    ])
  })
})

describe('shareable state', () => {
  const state = { trace: '0x400: R 0x10\n0x404: W 0x20', config: PRESETS['4-way'] }

  it('decodes what it encodes', () => {
    expect(decodeState(encodeState(state))).toEqual(state)
  })

  it('rejects state that fails validation', () => {
    const tampered = LZString.compressToEncodedURIComponent(
      JSON.stringify({ ...state, config: { ...state.config, policy: 'random' } })
    )
    expect(decodeState(tampered)).toBeNull()
  })

  it('rejects undecodable input', () => {
    expect(decodeState('')).toBeNull()
    expect(decodeState(LZString.compressToEncodedURIComponent('not json'))).toBeNull()
  })
})
