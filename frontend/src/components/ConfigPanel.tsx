import {
  ASSOCIATIVITY_OPTIONS,
  BLOCK_SIZE_OPTIONS,
  POLICY_OPTIONS,
  PRESET_OPTIONS,
  SIZE_OPTIONS,
} from '../constants/options'
import { toCommandLine } from '../utils/config'
import type { AssociativityMode, ConfigForm, PresetName, ReplacementPolicy, SelectOption } from '../types'

interface ConfigPanelProps {
  preset: PresetName
  form: ConfigForm
  onPresetChange: (preset: PresetName) => void
  onFormChange: (patch: Partial<ConfigForm>) => void
}

const PRESET_NAMES: readonly PresetName[] = ['direct-mapped', '2-way', '4-way', 'fully-assoc', 'custom']
const MODES: readonly AssociativityMode[] = ['direct', 'set', 'full']
const POLICIES: readonly ReplacementPolicy[] = ['fifo', 'lru']
const WAY_OPTIONS = [1, 2, 4, 8, 16]

function pick<T extends string>(allowed: readonly T[], value: string): T | undefined {
  return allowed.find(item => item === value)
}

function renderOptions(options: SelectOption[]) {
  const groups = [...new Set(options.flatMap(o => o.group ? [o.group] : []))]
  const render = (o: SelectOption) => <option key={o.value} value={o.value} title={o.desc}>{o.label}</option>
  if (groups.length === 0) return options.map(render)
  return groups.map(group => (
    <optgroup key={group} label={group}>
      {options.filter(o => o.group === group).map(render)}
    </optgroup>
  ))
}

export function ConfigPanel({ preset, form, onPresetChange, onFormChange }: ConfigPanelProps) {
  return (
    <div className="config-panel">
      <div className="quick-config-row">
        <label htmlFor="config-preset">Preset</label>
        <select
          id="config-preset"
          value={preset}
          onChange={e => {
            const next = pick(PRESET_NAMES, e.target.value)
            if (next) onPresetChange(next)
          }}
        >
          {renderOptions(PRESET_OPTIONS)}
        </select>
      </div>

      <div className="quick-config-row">
        <label htmlFor="config-size">Cache size</label>
        <select
          id="config-size"
          value={String(form.cacheSize)}
          onChange={e => onFormChange({ cacheSize: Number(e.target.value) })}
        >
          {renderOptions(SIZE_OPTIONS)}
        </select>
      </div>

      <div className="quick-config-row">
        <label htmlFor="config-block">Block size</label>
        <select
          id="config-block"
          value={String(form.blockSize)}
          onChange={e => onFormChange({ blockSize: Number(e.target.value) })}
        >
          {renderOptions(BLOCK_SIZE_OPTIONS)}
        </select>
      </div>

      <div className="quick-config-row">
        <label htmlFor="config-mode">Associativity</label>
        <select
          id="config-mode"
          value={form.mode}
          onChange={e => {
            const mode = pick(MODES, e.target.value)
            if (mode) onFormChange({ mode })
          }}
        >
          {renderOptions(ASSOCIATIVITY_OPTIONS)}
        </select>
      </div>

      {form.mode === 'set' && (
        <div className="quick-config-row">
          <label htmlFor="config-ways">Ways</label>
          <select
            id="config-ways"
            value={String(form.ways)}
            onChange={e => onFormChange({ ways: Number(e.target.value) })}
          >
            {WAY_OPTIONS.map(w => <option key={w} value={String(w)}>{w}</option>)}
          </select>
        </div>
      )}

      <div className="quick-config-row">
        <label htmlFor="config-policy">Replacement</label>
        <select
          id="config-policy"
          value={form.policy}
          onChange={e => {
            const policy = pick(POLICIES, e.target.value)
            if (policy) onFormChange({ policy })
          }}
        >
          {renderOptions(POLICY_OPTIONS)}
        </select>
      </div>

      <code className="config-command">{toCommandLine(form)}</code>
    </div>
  )
}
