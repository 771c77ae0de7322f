import LZString from 'lz-string'
import { z } from 'zod'
import type { ShareableState } from '../types'

const shareableStateSchema = z.object({
  trace: z.string(),
  config: z.object({
    cacheSize: z.number().int(),
    blockSize: z.number().int(),
    mode: z.enum(['direct', 'set', 'full']),
    ways: z.number().int(),
    policy: z.enum(['fifo', 'lru']),
  }),
})

export function encodeState(state: ShareableState): string {
  return LZString.compressToEncodedURIComponent(JSON.stringify(state))
}

export function decodeState(encoded: string): ShareableState | null {
  try {
    const json = LZString.decompressFromEncodedURIComponent(encoded)
    if (!json) return null
    const parsed = shareableStateSchema.safeParse(JSON.parse(json))
    return parsed.success ? parsed.data : null
  } catch {
    return null
  }
}
