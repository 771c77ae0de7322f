import { prefetchesIssued } from '../../../core/src'
import type { CacheStats } from '../../../core/src'

interface PrefetchStatsPanelProps {
  baseline: CacheStats
  prefetching: CacheStats
}

export function PrefetchStatsPanel({ baseline, prefetching }: PrefetchStatsPanelProps) {
  const issued = prefetchesIssued(prefetching)
  const avoided = baseline.misses - prefetching.misses
  const extraReads = prefetching.reads - baseline.reads

  return (
    <div className="panel">
      <div className="panel-header">
        <span className="panel-title">Prefetching: next block</span>
      </div>
      <div className="panel-content">
        <div className="metric-grid">
          <div className="metric-card">
            <div className="metric-label">Issued</div>
            <div className="metric-value">{issued.toLocaleString()}</div>
          </div>
          <div className={`metric-card ${avoided > 0 ? 'excellent' : 'warning'}`}>
            <div className="metric-label">Misses avoided</div>
            <div className="metric-value">{avoided.toLocaleString()}</div>
          </div>
          <div className="metric-card">
            <div className="metric-label">Extra memory reads</div>
            <div className="metric-value">{extraReads.toLocaleString()}</div>
          </div>
        </div>
      </div>
    </div>
  )
}
