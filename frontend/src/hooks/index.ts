// Core hooks
export { useTheme } from './useTheme'
export { useUrlState, shareUrl } from './useUrlState'

// Domain hooks
export { useConfigState } from './useConfigState'
export { useSimulation, simulate, toErrorResult } from './useSimulation'
