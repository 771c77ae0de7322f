// Config Components
export { ConfigPanel } from './ConfigPanel'
export { default as TraceEditor } from './TraceEditor'

// Cache Visualization Components
export { CacheGrid } from './CacheGrid'
export { AccessTimelineDisplay } from './AccessTimelineDisplay'

// Results Display Components
export { MetricCards } from './MetricCards'
export { CacheStatsDisplay } from './CacheStatsDisplay'
export { PrefetchStatsPanel } from './PrefetchStatsPanel'
export { ErrorDisplay } from './ErrorDisplay'
export { EmptyState } from './EmptyState'
