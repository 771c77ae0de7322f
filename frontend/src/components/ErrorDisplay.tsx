import type { ErrorResult } from '../types'

interface ErrorDisplayProps {
  error: ErrorResult
}

const titles: Record<ErrorResult['type'], string> = {
  config_error: 'Invalid Configuration',
  trace_error: 'Empty Trace',
  unknown_error: 'Error',
}

const icons: Record<ErrorResult['type'], string> = {
  config_error: '⚠',
  trace_error: '✗',
  unknown_error: '❓',
}

export function ErrorDisplay({ error }: ErrorDisplayProps) {
  return (
    <div className="error-box" role="alert">
      <div className="error-header">
        <span className="error-icon">{icons[error.type]}</span>
        <span className="error-title">{titles[error.type]}</span>
      </div>

      <div className="error-message-box">
        <div className="error-msg">{error.message}</div>
        {error.suggestion && (
          <div className="error-suggestion">
            <span className="suggestion-icon">{'\u{1F4A1}'}</span> {error.suggestion}
          </div>
        )}
      </div>
    </div>
  )
}
