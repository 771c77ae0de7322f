export function formatPercent(rate: number): string {
  return (rate * 100).toFixed(1) + '%'
}

export function getRateClass(rate: number): string {
  return rate > 0.95 ? 'excellent' : rate > 0.80 ? 'good' : 'poor'
}

export interface Delta {
  text: string
  isPositive: boolean
  isNeutral: boolean
}

// Difference between two rates, in percentage points
export function formatDelta(current: number, baseline: number): Delta {
  const points = (current - baseline) * 100
  const isNeutral = Math.abs(points) < 0.05
  return {
    text: `${points >= 0 ? '+' : ''}${points.toFixed(1)} pts`,
    isPositive: points > 0,
    isNeutral,
  }
}
