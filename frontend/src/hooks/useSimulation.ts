import { useState, useCallback } from 'react'
import { PairedSimulator, formatAddress, isSimulatorError, parseTrace } from '../../../core/src'
import { toCacheConfig } from '../utils/config'
import type { ConfigForm, ErrorResult, SimulationResult, Stage, TimelineEvent } from '../types'

/**
 * Replay `trace` on a cache pair built from `form`. Throws CacheConfigError
 * for an invalid form.
 */
export function simulate(trace: string, form: ConfigForm): SimulationResult {
  const config = toCacheConfig(form)
  const { events, skipped } = parseTrace(trace)
  const simulator = new PairedSimulator(config)
  simulator.skip(skipped)

  const timeline = events.map((event, i): TimelineEvent => {
    const outcome = simulator.feed(event)
    return {
      i,
      t: event.kind === 'read' ? 'R' : 'W',
      a: formatAddress(event.address),
      base: outcome.baseline,
      pf: outcome.prefetching,
    }
  })

  return {
    report: simulator.report(),
    timeline,
    lines: {
      baseline: simulator.baseline.lines(),
      prefetching: simulator.prefetching.lines(),
    },
  }
}

export function toErrorResult(error: unknown): ErrorResult {
  if (isSimulatorError(error) && error.code === 'config_error') {
    return { type: 'config_error', message: error.message, suggestion: 'Sizes and associativity must be powers of 2' }
  }
  return { type: 'unknown_error', message: error instanceof Error ? error.message : String(error) }
}

export function useSimulation() {
  const [result, setResult] = useState<SimulationResult | null>(null)
  const [stage, setStage] = useState<Stage>('idle')
  const [error, setError] = useState<ErrorResult | null>(null)

  const run = useCallback((trace: string, form: ConfigForm) => {
    setStage('running')
    setError(null)

    try {
      const next = simulate(trace, form)
      if (next.report.events === 0) {
        setResult(null)
        setError({ type: 'trace_error', message: 'No trace events to simulate', suggestion: 'Lines look like "0x400: R 0x1f"' })
        setStage('idle')
        return
      }
      setResult(next)
      setStage('done')
    } catch (err) {
      setResult(null)
      setError(toErrorResult(err))
      setStage('idle')
    }
  }, [])

  const clear = useCallback(() => {
    setResult(null)
    setError(null)
    setStage('idle')
  }, [])

  return { result, stage, error, run, clear }
}
