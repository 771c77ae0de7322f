import { useMemo, useState } from 'react'
import type { CacheLineState } from '../types'
import './CacheGrid.css'

interface CacheGridProps {
  lines: CacheLineState[]
  sets: number
  ways: number
  compact?: boolean
}

const COMPACT_SETS = 16

export function CacheGrid({
  lines,
  sets,
  ways,
  compact = false
}: CacheGridProps) {
  const [hoveredLine, setHoveredLine] = useState<CacheLineState | null>(null)
  const [tooltipPos, setTooltipPos] = useState({ x: 0, y: 0 })

  // Build grid from lines array
  const grid = useMemo(() => {
    const gridData: (CacheLineState | null)[][] = Array.from({ length: sets }, () =>
      Array.from({ length: ways }, () => null)
    )
    for (const line of lines) {
      if (line.set < sets && line.way < ways) {
        gridData[line.set][line.way] = line
      }
    }
    return gridData
  }, [lines, sets, ways])

  const handleMouseEnter = (e: React.MouseEvent, line: CacheLineState | null) => {
    if (line?.valid) {
      setHoveredLine(line)
      setTooltipPos({ x: e.clientX, y: e.clientY })
    }
  }

  if (sets === 0 || ways === 0) {
    return <div className="cache-grid-empty">No cache state available</div>
  }

  const displaySets = compact ? Math.min(sets, COMPACT_SETS) : sets
  const showMoreIndicator = compact && sets > COMPACT_SETS

  return (
    <div className={`cache-grid-container ${compact ? 'compact' : ''}`}>
      <div className="cache-grid-header">
        <div className="set-label">Set</div>
        {Array.from({ length: ways }, (_, w) => (
          <div key={w} className="way-label">
            Way {w}
          </div>
        ))}
      </div>

      <div className="cache-grid-body">
        {grid.slice(0, displaySets).map((row, set) => (
          <div key={set} className="cache-grid-row">
            <div className="set-index">{set}</div>
            {row.map((line, way) => {
              const isValid = line?.valid === true
              return (
                <div
                  key={way}
                  data-testid={`cell-${set}-${way}`}
                  className={`cache-cell ${isValid ? 'valid' : 'invalid'}`}
                  onMouseEnter={(e) => handleMouseEnter(e, line)}
                  onMouseLeave={() => setHoveredLine(null)}
                >
                  {isValid && line ? `0x${line.tag}` : '·'}
                </div>
              )
            })}
          </div>
        ))}

        {showMoreIndicator && (
          <div className="more-sets-indicator">
            ... {sets - COMPACT_SETS} more sets
          </div>
        )}
      </div>

      {hoveredLine && (
        <div
          className="cache-tooltip"
          style={{
            left: tooltipPos.x + 10,
            top: tooltipPos.y + 10,
          }}
        >
          <div className="tooltip-row">
            <strong>Set:</strong> {hoveredLine.set}
          </div>
          <div className="tooltip-row">
            <strong>Way:</strong> {hoveredLine.way}
          </div>
          <div className="tooltip-row">
            <strong>Tag:</strong> 0x{hoveredLine.tag}
          </div>
          <div className="tooltip-row">
            <strong>Age:</strong> {hoveredLine.age}
          </div>
        </div>
      )}
    </div>
  )
}

export default CacheGrid
