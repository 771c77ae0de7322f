import { useEffect, useRef } from 'react'
import { encodeState, decodeState } from '../utils/state'
import type { ShareableState } from '../types'

export function useUrlState(state: ShareableState, onLoadState: (state: ShareableState) => void) {
  const loaded = useRef(false)

  // Load state from URL on mount
  useEffect(() => {
    const hash = window.location.hash.slice(1)
    if (hash) {
      const saved = decodeState(hash)
      if (saved) {
        onLoadState(saved)
      } else {
        console.warn('Ignoring unreadable state in URL')
      }
    }
    loaded.current = true
  }, [onLoadState])

  // Update URL when state changes
  useEffect(() => {
    if (!loaded.current) return
    const timer = setTimeout(() => {
      window.history.replaceState(null, '', `${window.location.pathname}#${encodeState(state)}`)
    }, 500)
    return () => clearTimeout(timer)
  }, [state])
}

export function shareUrl(state: ShareableState): string {
  return `${window.location.origin}${window.location.pathname}#${encodeState(state)}`
}
