import type { TimelineEvent } from '../types'

interface AccessTimelineDisplayProps {
  events: TimelineEvent[]
}

const MAX_EVENTS = 500

type Outcome = 'hit' | 'saved' | 'lost' | 'miss'

// 'saved': only the prefetching cache hit. 'lost': a prefetch evicted a line the baseline still had.
function classify({ base, pf }: TimelineEvent): Outcome {
  if (base === 'hit') return pf === 'hit' ? 'hit' : 'lost'
  return pf === 'hit' ? 'saved' : 'miss'
}

export function AccessTimelineDisplay({ events }: AccessTimelineDisplayProps) {
  const displayEvents = events.slice(-MAX_EVENTS)

  const counts: Record<Outcome, number> = { hit: 0, saved: 0, lost: 0, miss: 0 }
  for (const e of events) counts[classify(e)]++

  return (
    <div className="access-timeline">
      <div className="timeline-header">
        <span className="timeline-title">Access Timeline</span>
        <span className="timeline-count">{events.length.toLocaleString()} events</span>
      </div>

      <div className="timeline-summary">
        <span className="timeline-stat outcome-hit">{counts.hit} hit</span>
        <span className="timeline-stat outcome-saved">{counts.saved} prefetched</span>
        <span className="timeline-stat outcome-lost">{counts.lost} missed only with prefetch</span>
        <span className="timeline-stat outcome-miss">{counts.miss} miss</span>
      </div>

      <div className="timeline-strip">
        {displayEvents.map(e => (
          <div
            key={e.i}
            className={`timeline-event outcome-${classify(e)}`}
            title={`#${e.i}: ${e.t === 'R' ? 'Read' : 'Write'} ${e.a} (${e.base} / ${e.pf} with prefetch)`}
          />
        ))}
      </div>

      <div className="timeline-legend">
        <span className="legend-item"><span className="legend-dot outcome-hit" /> Hit</span>
        <span className="legend-item"><span className="legend-dot outcome-saved" /> Hit only with prefetch</span>
        <span className="legend-item"><span className="legend-dot outcome-lost" /> Missed only with prefetch</span>
        <span className="legend-item"><span className="legend-dot outcome-miss" /> Miss</span>
      </div>

      {events.length > MAX_EVENTS && (
        <div className="timeline-truncated">
          Showing last {MAX_EVENTS} of {events.length.toLocaleString()} events
        </div>
      )}
    </div>
  )
}
