import { describeConfig, hitRate } from '../../../core/src'
import { formatPercent, getRateClass } from '../utils/formatting'
import type { SimulationReport } from '../types'

interface CacheStatsDisplayProps {
  report: SimulationReport
}

export function CacheStatsDisplay({ report }: CacheStatsDisplayProps) {
  return (
    <div className="cache-stats">
      <table className="cache-stats-table">
        <thead>
          <tr>
            <th>Prefetch</th>
            <th>Memory reads</th>
            <th>Memory writes</th>
            <th>Cache hits</th>
            <th>Cache misses</th>
            <th>Hit rate</th>
          </tr>
        </thead>
        <tbody>
          {report.runs.map(({ prefetch, stats }) => (
            <tr key={String(prefetch)}>
              <td>{prefetch ? 'On' : 'Off'}</td>
              <td>{stats.reads.toLocaleString()}</td>
              <td>{stats.writes.toLocaleString()}</td>
              <td>{stats.hits.toLocaleString()}</td>
              <td>{stats.misses.toLocaleString()}</td>
              <td className={`cache-stat-value ${getRateClass(hitRate(stats))}`}>{formatPercent(hitRate(stats))}</td>
            </tr>
          ))}
        </tbody>
      </table>
      <div className="cache-stat-detail">
        {report.events.toLocaleString()} events
        {report.skipped > 0 && `, ${report.skipped.toLocaleString()} skipped`}
        {' · '}{describeConfig(report.config)}
      </div>
    </div>
  )
}
