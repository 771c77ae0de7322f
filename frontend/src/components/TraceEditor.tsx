import Editor from '@monaco-editor/react'
import type { Theme } from '../types'

interface TraceEditorProps {
  trace: string
  theme: Theme
  onChange: (value: string) => void
}

export default function TraceEditor({ trace, theme, onChange }: TraceEditorProps) {
  return (
    <div style={{ flex: 1, minWidth: 0 }}>
      <Editor
        height="100%"
        defaultLanguage="plaintext"
        value={trace}
        onChange={(value) => onChange(value || '')}
        theme={theme === 'dark' ? 'vs-dark' : 'light'}
        options={{
          minimap: { enabled: false },
          fontSize: 14,
          lineNumbers: 'on',
          scrollBeyondLastLine: false,
          automaticLayout: true,
        }}
      />
    </div>
  )
}
