import type { CacheLine, CacheSet } from './types'

export function createSet(associativity: number): CacheSet {
  return Array.from({ length: associativity }, (): CacheLine => ({ valid: false, tag: 0n, age: 0 }))
}

export function createSets(numSets: number, associativity: number): CacheSet[] {
  return Array.from({ length: numSets }, () => createSet(associativity))
}

// Index of the first valid line holding `tag`, or -1
export function findLine(set: CacheSet, tag: bigint): number {
  return set.findIndex(line => line.valid && line.tag === tag)
}
