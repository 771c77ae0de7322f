/**
 * @vitest-environment jsdom
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { renderHook, act } from '@testing-library/react'
import { PRESETS } from '../src/constants'
import { useConfigState } from '../src/hooks/useConfigState'
import { useSimulation } from '../src/hooks/useSimulation'
import { useTheme } from '../src/hooks/useTheme'

describe('useConfigState', () => {
  it('starts from a preset and turns custom on edit', () => {
    const { result } = renderHook(() => useConfigState('direct-mapped'))
    expect(result.current.form).toEqual(PRESETS['direct-mapped'])

    act(() => result.current.updateForm({ policy: 'fifo' }))
    expect(result.current.preset).toBe('custom')
    expect(result.current.form).toEqual({ ...PRESETS['direct-mapped'], policy: 'fifo' })

    act(() => result.current.setPreset('4-way'))
    expect(result.current.preset).toBe('4-way')
    expect(result.current.form).toEqual(PRESETS['4-way'])
  })

  it('keeps the form when switching to custom', () => {
    const { result } = renderHook(() => useConfigState())
    act(() => result.current.setPreset('custom'))
    expect(result.current.form).toEqual(PRESETS['2-way'])
  })
})

describe('useSimulation', () => {
  it('stores the result of a successful run', () => {
    const { result } = renderHook(() => useSimulation())
    act(() => result.current.run('0: R 0x00\n0: R 0x00', PRESETS['2-way']))

    expect(result.current.stage).toBe('done')
    expect(result.current.error).toBeNull()
    expect(result.current.result?.report.runs[0].stats).toEqual({ reads: 1, writes: 0, hits: 1, misses: 1 })
  })

  it('reports an empty trace', () => {
    const { result } = renderHook(() => useSimulation())
    act(() => result.current.run('#eof', PRESETS['2-way']))

    expect(result.current.result).toBeNull()
    expect(result.current.error?.type).toBe('trace_error')
  })

  it('reports an invalid configuration', () => {
    const { result } = renderHook(() => useSimulation())
    act(() => result.current.run('0: R 0x00', { ...PRESETS['2-way'], blockSize: 256 }))

    expect(result.current.error).toEqual({
      type: 'config_error',
      message: 'Block size cannot exceed cache size',
      suggestion: 'Sizes and associativity must be powers of 2',
    })
    expect(result.current.stage).toBe('idle')
  })
})

describe('useTheme', () => {
  beforeEach(() => {
    localStorage.clear()
  })

  it('defaults to dark and persists toggles', () => {
    const { result } = renderHook(() => useTheme())
    expect(result.current.theme).toBe('dark')

    act(() => result.current.toggleTheme())
    expect(result.current.theme).toBe('light')
    expect(localStorage.getItem('cache-lab-theme')).toBe('light')
    expect(document.documentElement.getAttribute('data-theme')).toBe('light')
  })
})
