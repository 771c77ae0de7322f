import { useState, useCallback } from 'react'
import type { ConfigForm, PresetName } from '../types'
import { PRESETS, DEFAULT_PRESET } from '../constants/options'

export function useConfigState(initialPreset: Exclude<PresetName, 'custom'> = DEFAULT_PRESET) {
  const [preset, setPresetState] = useState<PresetName>(initialPreset)
  const [form, setForm] = useState<ConfigForm>(PRESETS[initialPreset])

  const setPreset = useCallback((name: PresetName) => {
    setPresetState(name)
    if (name !== 'custom') setForm(PRESETS[name])
  }, [])

  // Any manual edit turns the configuration into a custom one
  const updateForm = useCallback((patch: Partial<ConfigForm>) => {
    setForm(prev => ({ ...prev, ...patch }))
    setPresetState('custom')
  }, [])

  const loadForm = useCallback((next: ConfigForm) => {
    setForm(next)
    setPresetState('custom')
  }, [])

  return {
    preset,
    form,
    setPreset,
    updateForm,
    loadForm,
  }
}
