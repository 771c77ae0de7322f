import { hitRate } from '../../../core/src'
import type { SimulationReport } from '../types'

export function reportToJSON(report: SimulationReport): string {
  return JSON.stringify(report, null, 2)
}

export function reportToCSV(report: SimulationReport): string {
  const lines: string[] = ['Prefetch,Reads,Writes,Hits,Misses,Hit Rate']
  for (const { prefetch, stats } of report.runs) {
    lines.push(`${prefetch ? 1 : 0},${stats.reads},${stats.writes},${stats.hits},${stats.misses},${(hitRate(stats) * 100).toFixed(2)}%`)
  }
  return lines.join('\n')
}

function download(content: string, type: string, extension: string) {
  const blob = new Blob([content], { type })
  const url = URL.createObjectURL(blob)
  const a = document.createElement('a')
  a.href = url
  a.download = `cache-lab-${new Date().toISOString().slice(0, 10)}.${extension}`
  a.click()
  URL.revokeObjectURL(url)
}

export function exportAsJSON(report: SimulationReport) {
  download(reportToJSON(report), 'application/json', 'json')
}

export function exportAsCSV(report: SimulationReport) {
  download(reportToCSV(report), 'text/csv', 'csv')
}
