import { parseCacheConfig } from '../../../core/src'
import type { CacheConfig, ConfigForm } from '../types'

export function associativityToken({ mode, ways }: ConfigForm): string {
  switch (mode) {
    case 'direct': return 'direct'
    case 'full': return 'assoc'
    case 'set': return `assoc:${ways}`
  }
}

// Throws CacheConfigError for an invalid form
export function toCacheConfig(form: ConfigForm): CacheConfig {
  return parseCacheConfig({
    cacheSize: form.cacheSize,
    blockSize: form.blockSize,
    associativity: associativityToken(form),
    policy: form.policy,
  })
}

// Equivalent CLI invocation, shown under the config panel
export function toCommandLine(form: ConfigForm, traceFile = 'trace.txt'): string {
  return `cache-lab ${form.cacheSize} ${associativityToken(form)} ${form.policy} ${form.blockSize} ${traceFile}`
}
