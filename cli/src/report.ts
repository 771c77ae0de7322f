import { describeConfig, hitRate } from '../../core/src'
import type { RunReport, SimulationReport } from '../../core/src'

export type ReportFormat = 'text' | 'json'

export const REPORT_FORMATS = ['text', 'json'] as const satisfies readonly ReportFormat[]

function formatRun({ prefetch, stats }: RunReport): string[] {
  return [
    `Prefetch ${prefetch ? 1 : 0}`,
    `Memory reads: ${stats.reads}`,
    `Memory writes: ${stats.writes}`,
    `Cache hits: ${stats.hits}`,
    `Cache misses: ${stats.misses}`,
  ]
}

// One block per run, prefetch off first
export function formatTextReport(report: SimulationReport): string {
  return report.runs.flatMap(formatRun).join('\n')
}

export function formatJsonReport(report: SimulationReport): string {
  return JSON.stringify(
    {
      config: report.config,
      description: describeConfig(report.config),
      derived: report.derived,
      events: report.events,
      skipped: report.skipped,
      runs: report.runs.map(run => ({
        prefetch: run.prefetch,
        ...run.stats,
        hitRate: hitRate(run.stats),
      })),
    },
    null,
    2
  )
}

export function formatReport(report: SimulationReport, format: ReportFormat): string {
  return format === 'json' ? formatJsonReport(report) : formatTextReport(report)
}
