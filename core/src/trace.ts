import { toAddress } from './address'
import type { TraceEvent, TraceLine } from './types'

export const END_MARKER = '#eof'

// <pc>: <op> <address>, both numbers in hex with an optional 0x prefix
const TRACE_LINE = /^\s*(?:0x)?[0-9a-f]+:\s*(\S)\s*(?:0x)?([0-9a-f]+)/i

export function parseTraceLine(line: string): TraceLine {
  if (line.startsWith(END_MARKER)) return { kind: 'end' }
  if (line.trim() === '') return { kind: 'ignored' }

  const match = TRACE_LINE.exec(line)
  if (!match) return { kind: 'malformed' }

  const [, op, hex] = match
  const address = toAddress(BigInt('0x' + hex))
  switch (op) {
    case 'R':
      return { kind: 'event', event: { kind: 'read', address } }
    case 'W':
      return { kind: 'event', event: { kind: 'write', address } }
    default:
      return { kind: 'ignored' }
  }
}

export interface ParsedTrace {
  events: TraceEvent[]
  skipped: number  // malformed lines
}

// Whole-text variant for traces already in memory
export function parseTrace(text: string): ParsedTrace {
  const events: TraceEvent[] = []
  let skipped = 0

  for (const line of text.split(/\r?\n/)) {
    const parsed = parseTraceLine(line)
    if (parsed.kind === 'end') break
    if (parsed.kind === 'event') events.push(parsed.event)
    else if (parsed.kind === 'malformed') skipped++
  }

  return { events, skipped }
}

export function formatTraceEvent({ kind, address }: TraceEvent, pc = 0): string {
  return `0x${pc.toString(16)}: ${kind === 'read' ? 'R' : 'W'} 0x${address.toString(16)}`
}
