export function EmptyState() {
  return (
    <div className="empty-state">
      <div className="empty-state-logo">
        <div className="logo-layer l2"></div>
        <div className="logo-layer l1"></div>
      </div>
      <div className="empty-state-title">Ready to Simulate</div>
      <div className="empty-state-desc">
        Write or paste a memory trace in the editor, then run it through the cache with and without prefetching.
      </div>
      <div className="empty-state-shortcut">
        Press <kbd>⌘</kbd>+<kbd>Enter</kbd> to run
      </div>
    </div>
  )
}
