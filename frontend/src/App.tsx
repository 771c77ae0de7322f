import { useState, useEffect, useCallback, useMemo } from 'react'
import {
  AccessTimelineDisplay,
  CacheGrid,
  CacheStatsDisplay,
  ConfigPanel,
  EmptyState,
  ErrorDisplay,
  MetricCards,
  PrefetchStatsPanel,
  TraceEditor,
} from './components'
import { EXAMPLES, DEFAULT_EXAMPLE } from './constants'
import { useConfigState, useSimulation, useTheme, useUrlState, shareUrl } from './hooks'
import { exportAsCSV, exportAsJSON } from './utils/export'
import type { ShareableState } from './types'
import './App.css'

type GridView = 'baseline' | 'prefetching'

export default function App() {
  const { theme, toggleTheme } = useTheme()
  const { preset, form, setPreset, updateForm, loadForm } = useConfigState(EXAMPLES[DEFAULT_EXAMPLE].preset)
  const { result, stage, error, run, clear } = useSimulation()

  const [trace, setTrace] = useState(EXAMPLES[DEFAULT_EXAMPLE].trace)
  const [gridView, setGridView] = useState<GridView>('baseline')
  const [copied, setCopied] = useState(false)

  const shareable = useMemo<ShareableState>(() => ({ trace, config: form }), [trace, form])

  const loadState = useCallback((state: ShareableState) => {
    setTrace(state.trace)
    loadForm(state.config)
  }, [loadForm])

  useUrlState(shareable, loadState)

  const runSimulation = useCallback(() => run(trace, form), [run, trace, form])

  const loadExample = (key: string) => {
    const example = EXAMPLES[key]
    if (!example) return
    setTrace(example.trace)
    setPreset(example.preset)
    clear()
  }

  const copyShareLink = useCallback(() => {
    navigator.clipboard.writeText(shareUrl(shareable)).then(
      () => {
        setCopied(true)
        setTimeout(() => setCopied(false), 2000)
      },
      (err: unknown) => console.warn('Could not copy link', err)
    )
  }, [shareable])

  // Keyboard shortcuts
  useEffect(() => {
    const handleKeyDown = (e: KeyboardEvent) => {
      // Ctrl/Cmd + Enter to run
      if ((e.ctrlKey || e.metaKey) && e.key === 'Enter') {
        e.preventDefault()
        runSimulation()
      }
    }
    window.addEventListener('keydown', handleKeyDown)
    return () => window.removeEventListener('keydown', handleKeyDown)
  }, [runSimulation])

  const gridLines = result ? result.lines[gridView] : []

  return (
    <div className="app">
      <div className="topbar">
        <div className="topbar-left">
          <span className="topbar-title">Cache Lab</span>
          <select
            className="topbar-examples"
            value=""
            onChange={e => loadExample(e.target.value)}
            aria-label="Load example"
          >
            <option value="" disabled>Examples…</option>
            {Object.entries(EXAMPLES).map(([key, example]) => (
              <option key={key} value={key} title={example.description}>{example.name}</option>
            ))}
          </select>
        </div>

        <div className="topbar-right">
          <button className="btn-ghost" onClick={toggleTheme} title="Toggle theme">
            {theme === 'dark' ? '☀' : '☾'}
          </button>
          <button className="btn-ghost" onClick={copyShareLink} title="Copy share link">
            Share
          </button>
          <button
            onClick={runSimulation}
            disabled={stage === 'running'}
            className="btn-run-cinema"
          >
            ▶ Run
          </button>
        </div>
      </div>

      {copied && (
        <div className="toast">Link copied!</div>
      )}

      <div className="main">
        <div className="editor-pane">
          <ConfigPanel
            preset={preset}
            form={form}
            onPresetChange={setPreset}
            onFormChange={updateForm}
          />
          <TraceEditor trace={trace} theme={theme} onChange={setTrace} />
        </div>

        <div className="results-pane">
          <div className="results-scroll">
            {error && <ErrorDisplay error={error} />}

            {!result && !error && <EmptyState />}

            {result && (
              <>
                <div className="status-banner success">
                  <div className="status-title">Simulation Complete</div>
                  <div className="status-meta">
                    {result.report.events.toLocaleString()} events | {result.report.derived.numSets} sets of {result.report.config.associativity}
                  </div>
                </div>

                <MetricCards report={result.report} />

                <div className="panel">
                  <div className="panel-header">
                    <span className="panel-title">Statistics</span>
                    <div className="panel-actions">
                      <button className="btn-ghost" onClick={() => exportAsJSON(result.report)}>JSON</button>
                      <button className="btn-ghost" onClick={() => exportAsCSV(result.report)}>CSV</button>
                    </div>
                  </div>
                  <div className="panel-body">
                    <CacheStatsDisplay report={result.report} />
                  </div>
                </div>

                <PrefetchStatsPanel
                  baseline={result.report.runs[0].stats}
                  prefetching={result.report.runs[1].stats}
                />

                <div className="panel">
                  <div className="panel-header">
                    <span className="panel-title">Cache Contents</span>
                    <select
                      value={gridView}
                      onChange={e => setGridView(e.target.value === 'prefetching' ? 'prefetching' : 'baseline')}
                      aria-label="Cache shown"
                    >
                      <option value="baseline">Without prefetch</option>
                      <option value="prefetching">With prefetch</option>
                    </select>
                  </div>
                  <div className="panel-body">
                    <CacheGrid
                      lines={gridLines}
                      sets={result.report.derived.numSets}
                      ways={result.report.config.associativity}
                      compact={result.report.derived.numSets > 64}
                    />
                  </div>
                </div>

                <div className="panel">
                  <div className="panel-body">
                    <AccessTimelineDisplay events={result.timeline} />
                  </div>
                </div>
              </>
            )}
          </div>
        </div>
      </div>
    </div>
  )
}
