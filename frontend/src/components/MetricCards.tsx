import { hitRate } from '../../../core/src'
import { formatPercent, formatDelta, getRateClass } from '../utils/formatting'
import type { SimulationReport } from '../types'

interface MetricCardsProps {
  report: SimulationReport
}

export function MetricCards({ report }: MetricCardsProps) {
  const [baseline, prefetching] = report.runs
  const baseRate = hitRate(baseline.stats)
  const pfRate = hitRate(prefetching.stats)
  const delta = formatDelta(pfRate, baseRate)
  const missesSaved = baseline.stats.misses - prefetching.stats.misses

  return (
    <div className="metric-grid">
      <div className={`metric-card ${getRateClass(baseRate)}`} data-testid="metric-baseline">
        <div className="metric-label">Hit Rate (no prefetch)</div>
        <div className="metric-value">{formatPercent(baseRate)}</div>
        <div className="metric-detail">{baseline.stats.hits.toLocaleString()} hits</div>
      </div>

      <div className={`metric-card ${getRateClass(pfRate)}`} data-testid="metric-prefetch">
        <div className="metric-label">Hit Rate (prefetch)</div>
        <div className="metric-value">{formatPercent(pfRate)}</div>
        {!delta.isNeutral && (
          <div className={`metric-delta ${delta.isPositive ? 'positive' : 'negative'}`}>
            {delta.text}
          </div>
        )}
        <div className="metric-detail">{prefetching.stats.hits.toLocaleString()} hits</div>
      </div>

      <div className="metric-card" data-testid="metric-saved">
        <div className="metric-label">Misses Avoided</div>
        <div className="metric-value">{missesSaved.toLocaleString()}</div>
        <div className="metric-detail">of {baseline.stats.misses.toLocaleString()} misses</div>
      </div>
    </div>
  )
}
