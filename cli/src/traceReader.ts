import { open, type FileHandle } from 'node:fs/promises'
import { PairedSimulator, TraceReadError, parseTraceLine } from '../../core/src'
import type { CacheConfig, SimulationReport, TraceEvent } from '../../core/src'
import type { Logger } from './logger'

async function openTrace(path: string): Promise<FileHandle> {
  try {
    return await open(path, 'r')
  } catch (error) {
    throw new TraceReadError(path, error)
  }
}

/**
 * Stream the events of a trace file, stopping at the end marker.
 * Malformed lines are skipped and reported through `onSkip`.
 */
export async function* readTrace(
  path: string,
  onSkip: (lineNumber: number, line: string) => void = () => {}
): AsyncGenerator<TraceEvent> {
  const handle = await openTrace(path)
  let lineNumber = 0

  try {
    for await (const line of handle.readLines()) {
      lineNumber++
      const parsed = parseTraceLine(line)
      if (parsed.kind === 'end') break
      if (parsed.kind === 'event') yield parsed.event
      else if (parsed.kind === 'malformed') onSkip(lineNumber, line)
    }
  } catch (error) {
    throw new TraceReadError(path, error)
  } finally {
    await handle.close()
  }
}

export async function simulateTraceFile(path: string, config: CacheConfig, logger: Logger): Promise<SimulationReport> {
  const log = logger.child('trace')
  const simulator = new PairedSimulator(config)

  const events = readTrace(path, (lineNumber, line) => {
    simulator.skip()
    log.debug('Skipping malformed line', { line: lineNumber, text: line })
  })
  for await (const event of events) {
    simulator.feed(event)
  }

  const report = simulator.report()
  log.debug('Trace replayed', { events: report.events, skipped: report.skipped })
  return report
}
