import { Cache } from './cache'
import type { AccessOutcome, CacheConfig, SimulationReport, TraceEvent } from './types'

export interface CachePair {
  baseline: Cache
  prefetching: Cache
}

export function createCachePair(config: CacheConfig): CachePair {
  return {
    baseline: new Cache(config, { prefetch: false }),
    prefetching: new Cache(config, { prefetch: true }),
  }
}

export interface StepOutcome {
  baseline: AccessOutcome
  prefetching: AccessOutcome
}

/**
 * Feeds every event to two identically configured caches, one without and one
 * with next-block prefetching, so their statistics can be compared.
 */
export class PairedSimulator {
  readonly config: CacheConfig
  private readonly caches: CachePair
  private events = 0
  private skipped = 0

  constructor(config: CacheConfig) {
    this.config = config
    this.caches = createCachePair(config)
  }

  feed(event: TraceEvent): StepOutcome {
    this.events++
    return {
      baseline: this.caches.baseline.access(event),
      prefetching: this.caches.prefetching.access(event),
    }
  }

  // Malformed input lines are only counted
  skip(count = 1): void {
    this.skipped += count
  }

  get baseline(): Cache {
    return this.caches.baseline
  }

  get prefetching(): Cache {
    return this.caches.prefetching
  }

  report(): SimulationReport {
    return {
      config: this.config,
      derived: this.caches.baseline.derived,
      events: this.events,
      skipped: this.skipped,
      runs: [
        { prefetch: false, stats: this.caches.baseline.stats() },
        { prefetch: true, stats: this.caches.prefetching.stats() },
      ],
    }
  }
}

export function runTrace(events: Iterable<TraceEvent>, config: CacheConfig, skipped = 0): SimulationReport {
  const simulator = new PairedSimulator(config)
  for (const event of events) simulator.feed(event)
  simulator.skip(skipped)
  return simulator.report()
}
