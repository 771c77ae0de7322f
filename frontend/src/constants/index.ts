// Examples
export { EXAMPLES, DEFAULT_EXAMPLE, sequentialTrace } from './examples'
export type { Example } from './examples'

// Select Options
export {
  PRESETS,
  DEFAULT_PRESET,
  PRESET_OPTIONS,
  POLICY_OPTIONS,
  ASSOCIATIVITY_OPTIONS,
  SIZE_OPTIONS,
  BLOCK_SIZE_OPTIONS,
} from './options'
