import { formatTraceEvent } from '../../../core/src'
import type { PresetName } from '../types'

export interface Example {
  name: string
  description: string
  preset: Exclude<PresetName, 'custom'>
  trace: string
}

// Block-stride read stream, the case next-block prefetching is built for
export function sequentialTrace(count: number, stride: number): string {
  return Array.from({ length: count }, (_, i) =>
    formatTraceEvent({ kind: 'read', address: BigInt(i * stride) }, 0x400 + i * 4)
  ).join('\n')
}

export const EXAMPLES: Record<string, Example> = {
  replacement: {
    name: 'LRU vs FIFO',
    description: 'A, B, A, C in one set: LRU keeps A, FIFO evicts it',
    preset: '2-way',
    trace: [
      '0x400: R 0x00',
      '0x404: R 0x40',
      '0x408: R 0x00',
      '0x40c: R 0x80',
      '0x410: R 0x00',
      '#eof',
    ].join('\n'),
  },
  sequential: {
    name: 'Sequential stream',
    description: 'Reads one block after another; prefetching halves the misses',
    preset: '2-way',
    trace: sequentialTrace(32, 16),
  },
  conflict: {
    name: 'Conflict misses',
    description: 'Two blocks fighting over one direct-mapped set',
    preset: 'direct-mapped',
    trace: [
      '0x400: R 0x00',
      '0x404: R 0x80',
      '0x408: R 0x00',
      '0x40c: R 0x80',
      '0x410: W 0x04',
      '0x414: W 0x84',
    ].join('\n'),
  },
  writes: {
    name: 'Write-through',
    description: 'Every write is counted once; write misses fetch the block first',
    preset: 'fully-assoc',
    trace: [
      '0x400: W 0x00',
      '0x404: R 0x04',
      '0x408: W 0x10',
      '0x40c: R 0x20',
      '0x410: W 0x00',
    ].join('\n'),
  },
}

export const DEFAULT_EXAMPLE = 'replacement'
