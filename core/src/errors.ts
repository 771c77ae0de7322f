// =============================================================================
// Exit Codes
// =============================================================================

export const ExitCode = {
  SUCCESS: 0,
  ERROR: 1,
  CONFIG_ERROR: 10,
} as const

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode]

export type ErrorCodeValue = 'config_error' | 'trace_unreadable'

// =============================================================================
// Error Classes
// =============================================================================

export class SimulatorError extends Error {
  readonly code: ErrorCodeValue
  readonly exitCode: ExitCodeValue

  constructor(message: string, code: ErrorCodeValue, exitCode: ExitCodeValue, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SimulatorError'
    this.code = code
    this.exitCode = exitCode
  }
}

/**
 * Invalid cache geometry, policy or associativity token.
 * Raised before any simulation runs.
 */
export class CacheConfigError extends SimulatorError {
  constructor(message: string) {
    super(message, 'config_error', ExitCode.CONFIG_ERROR)
    this.name = 'CacheConfigError'
  }
}

export class TraceReadError extends SimulatorError {
  readonly path: string

  constructor(path: string, cause?: unknown) {
    super(`Cannot open trace file ${path}`, 'trace_unreadable', ExitCode.ERROR, { cause })
    this.name = 'TraceReadError'
    this.path = path
  }
}

export function isSimulatorError(error: unknown): error is SimulatorError {
  return error instanceof SimulatorError
}
