import { describe, it, expect } from 'vitest'
import { createSet, findLine } from '../src/cacheSet'
import { insertLine, selectVictim, touchLine } from '../src/replacement'
import type { CacheSet } from '../src/types'

const ages = (set: CacheSet) => set.map(line => (line.valid ? line.age : null))
const tags = (set: CacheSet) => set.map(line => (line.valid ? line.tag : null))

describe('selectVictim', () => {
  it('takes the lowest invalid slot first', () => {
    const set = createSet(4)
    expect(selectVictim(set)).toBe(0)
    insertLine(set, 1n)
    insertLine(set, 2n)
    expect(selectVictim(set)).toBe(2)
  })

  it('takes the oldest line once the set is full', () => {
    const set: CacheSet = [
      { valid: true, tag: 1n, age: 1 },
      { valid: true, tag: 2n, age: 2 },
      { valid: true, tag: 3n, age: 0 },
    ]
    expect(selectVictim(set)).toBe(1)
  })

  it('prefers an invalid slot over any age', () => {
    const set: CacheSet = [
      { valid: true, tag: 1n, age: 7 },
      { valid: false, tag: 0n, age: 0 },
    ]
    expect(selectVictim(set)).toBe(1)
  })
})

describe('insertLine', () => {
  it('fills slots in order and ages the other lines', () => {
    const set = createSet(4)
    insertLine(set, 0xan)
    insertLine(set, 0xbn)
    insertLine(set, 0xcn)
    expect(tags(set)).toEqual([0xan, 0xbn, 0xcn, null])
    expect(ages(set)).toEqual([2, 1, 0, null])
  })

  it('evicts the oldest line when full and reports its tag', () => {
    const set = createSet(2)
    insertLine(set, 1n)
    insertLine(set, 2n)
    expect(insertLine(set, 3n)).toEqual({ slot: 0, evicted: 1n })
    expect(tags(set)).toEqual([3n, 2n])
    expect(ages(set)).toEqual([0, 1])
  })

  it('reports no eviction for an empty slot', () => {
    expect(insertLine(createSet(2), 9n)).toEqual({ slot: 0, evicted: null })
  })
})

describe('touchLine', () => {
  const filled = () => {
    const set = createSet(4)
    insertLine(set, 0xan)
    insertLine(set, 0xbn)
    insertLine(set, 0xcn)
    return set
  }

  it('makes the hit line youngest under LRU', () => {
    const set = filled()
    touchLine(set, 0, 'lru')
    expect(ages(set)).toEqual([0, 2, 1, null])
  })

  it('leaves ages alone under FIFO', () => {
    const set = filled()
    touchLine(set, 0, 'fifo')
    expect(ages(set)).toEqual([2, 1, 0, null])
  })
})

describe('aging invariants', () => {
  it('keeps valid ages distinct and tags unique through any access mix', () => {
    for (const policy of ['fifo', 'lru'] as const) {
      const set = createSet(4)
      let seed = 7
      for (let step = 0; step < 500; step++) {
        seed = (seed * 75 + 74) % 65537
        const tag = BigInt(seed % 9)
        const slot = findLine(set, tag)
        if (slot === -1) insertLine(set, tag)
        else touchLine(set, slot, policy)

        const valid = set.filter(line => line.valid)
        expect(new Set(valid.map(line => line.age)).size).toBe(valid.length)
        expect(new Set(valid.map(line => line.tag)).size).toBe(valid.length)
      }
    }
  })
})
