import { z } from 'zod'
import { CacheConfigError } from './errors'
import type { CacheConfig, CacheGeometry, DerivedGeometry, ReplacementPolicy } from './types'

export const REPLACEMENT_POLICIES = ['fifo', 'lru'] as const satisfies readonly ReplacementPolicy[]

export function isPowerOfTwo(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0 && 2 ** log2Int(value) === value
}

// Integer log2 of a power of two
export function log2Int(value: number): number {
  let bits = 0
  while (value > 1) {
    value = Math.floor(value / 2)
    bits++
  }
  return bits
}

// =============================================================================
// GEOMETRY
// =============================================================================

/**
 * Check the numeric invariants of a geometry and derive its set count and
 * bit widths. Throws {@link CacheConfigError} on the first violation.
 */
export function validateGeometry({ cacheSize, associativity, blockSize }: CacheGeometry): DerivedGeometry {
  if (!isPowerOfTwo(cacheSize) || !isPowerOfTwo(blockSize)) {
    throw new CacheConfigError('Cache size and block size must be powers of 2')
  }
  if (blockSize > cacheSize) {
    throw new CacheConfigError('Block size cannot exceed cache size')
  }
  if (!isPowerOfTwo(associativity)) {
    throw new CacheConfigError('Associativity must be a power of 2')
  }
  const totalLines = cacheSize / blockSize
  if (associativity > totalLines) {
    throw new CacheConfigError(`Associativity cannot exceed ${totalLines} lines`)
  }

  const numSets = cacheSize / (associativity * blockSize)
  return {
    numSets,
    blockOffsetBits: log2Int(blockSize),
    setIndexBits: log2Int(numSets),
  }
}

/**
 * Resolve an associativity token against a geometry:
 * `direct` is one line per set, `assoc` is a single set holding every line,
 * `assoc:N` is N lines per set. Tokens are case-insensitive.
 */
export function parseAssociativity(token: string, cacheSize: number, blockSize: number): number {
  const normalized = token.trim().toLowerCase()
  if (normalized === 'direct') return 1
  if (normalized === 'assoc') return Math.floor(cacheSize / blockSize)

  const match = /^assoc:(\d+)$/.exec(normalized)
  if (!match) {
    throw new CacheConfigError('Invalid associativity')
  }
  const ways = Number(match[1])
  if (!isPowerOfTwo(ways)) {
    throw new CacheConfigError('Associativity must be a power of 2')
  }
  return ways
}

// =============================================================================
// RAW INPUT
// =============================================================================

// Sizes arrive as numbers from the front end and as decimal strings from the CLI
const powerOfTwo = (label: string) =>
  z
    .union([
      z.number(),
      z.string().trim().regex(/^\d+$/, `${label} must be a decimal integer`).transform(Number),
    ])
    .pipe(
      z
        .number()
        .int(`${label} must be an integer`)
        .positive(`${label} must be positive`)
        .refine(isPowerOfTwo, `${label} must be a power of 2`)
    )

export const rawCacheConfigSchema = z.object({
  cacheSize: powerOfTwo('Cache size'),
  blockSize: powerOfTwo('Block size'),
  associativity: z.string(),
  policy: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(REPLACEMENT_POLICIES, { errorMap: () => ({ message: 'Invalid replacement policy' }) })),
})

export type RawCacheConfig = z.input<typeof rawCacheConfigSchema>

/**
 * Validate user-supplied configuration (CLI arguments, URL state) into a
 * {@link CacheConfig}.
 */
export function parseCacheConfig(raw: RawCacheConfig): CacheConfig {
  const parsed = rawCacheConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new CacheConfigError(issue?.message ?? 'Invalid cache configuration')
  }

  const { cacheSize, blockSize, policy } = parsed.data
  const associativity = parseAssociativity(parsed.data.associativity, cacheSize, blockSize)
  const config: CacheConfig = { cacheSize, associativity, blockSize, policy }
  validateGeometry(config)
  return config
}

export function describeConfig({ cacheSize, associativity, blockSize, policy }: CacheConfig): string {
  const lines = cacheSize / blockSize
  const mapping = associativity === 1
    ? 'direct-mapped'
    : associativity === lines
      ? 'fully associative'
      : `${associativity}-way`
  return `${cacheSize}B ${mapping}, ${blockSize}B blocks, ${policy.toUpperCase()}`
}
