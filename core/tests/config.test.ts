import { describe, it, expect } from 'vitest'
import {
  describeConfig,
  isPowerOfTwo,
  log2Int,
  parseAssociativity,
  parseCacheConfig,
  validateGeometry,
} from '../src/config'
import { CacheConfigError, ExitCode } from '../src/errors'

describe('isPowerOfTwo', () => {
  it('accepts powers of two, including ones past 32 bits', () => {
    for (const value of [1, 2, 64, 4096, 2 ** 31, 2 ** 40]) {
      expect(isPowerOfTwo(value)).toBe(true)
    }
  })

  it('rejects everything else', () => {
    for (const value of [0, -4, 3, 96, 2 ** 31 + 2, 1.5, Number.NaN]) {
      expect(isPowerOfTwo(value)).toBe(false)
    }
  })

  it('pairs with log2Int', () => {
    expect(log2Int(1)).toBe(0)
    expect(log2Int(16)).toBe(4)
    expect(log2Int(2 ** 40)).toBe(40)
  })
})

describe('validateGeometry', () => {
  it('derives set count and bit widths', () => {
    expect(validateGeometry({ cacheSize: 128, associativity: 2, blockSize: 16 })).toEqual({
      numSets: 4,
      blockOffsetBits: 4,
      setIndexBits: 2,
    })
  })

  it('keeps numSets x associativity x blockSize equal to the cache size', () => {
    for (const cacheSize of [64, 1024, 32768]) {
      for (const blockSize of [4, 16, 64]) {
        for (let associativity = 1; associativity <= cacheSize / blockSize; associativity *= 2) {
          const { numSets } = validateGeometry({ cacheSize, associativity, blockSize })
          expect(numSets * associativity * blockSize).toBe(cacheSize)
        }
      }
    }
  })

  it('has a single set and no index bits when fully associative', () => {
    expect(validateGeometry({ cacheSize: 128, associativity: 8, blockSize: 16 })).toEqual({
      numSets: 1,
      blockOffsetBits: 4,
      setIndexBits: 0,
    })
  })

  it.each([
    [{ cacheSize: 100, associativity: 1, blockSize: 16 }, 'Cache size and block size must be powers of 2'],
    [{ cacheSize: 128, associativity: 1, blockSize: 12 }, 'Cache size and block size must be powers of 2'],
    [{ cacheSize: 128, associativity: 1, blockSize: 256 }, 'Block size cannot exceed cache size'],
    [{ cacheSize: 128, associativity: 3, blockSize: 16 }, 'Associativity must be a power of 2'],
    [{ cacheSize: 128, associativity: 16, blockSize: 16 }, 'Associativity cannot exceed 8 lines'],
  ])('rejects %o', (geometry, message) => {
    expect(() => validateGeometry(geometry)).toThrow(message)
  })
})

describe('parseAssociativity', () => {
  it('resolves the three token forms', () => {
    expect(parseAssociativity('direct', 128, 16)).toBe(1)
    expect(parseAssociativity('assoc', 128, 16)).toBe(8)
    expect(parseAssociativity('assoc:4', 128, 16)).toBe(4)
  })

  it('ignores case', () => {
    expect(parseAssociativity('ASSOC:2', 128, 16)).toBe(2)
    expect(parseAssociativity(' Direct ', 128, 16)).toBe(1)
  })

  it('requires the assoc: prefix on a way count', () => {
    expect(() => parseAssociativity('4', 128, 16)).toThrow('Invalid associativity')
    expect(() => parseCacheConfig({ cacheSize: '128', associativity: '4', policy: 'lru', blockSize: '16' }))
      .toThrow(CacheConfigError)
  })

  it('rejects unknown tokens and non-power-of-two counts', () => {
    expect(() => parseAssociativity('fourway', 128, 16)).toThrow('Invalid associativity')
    expect(() => parseAssociativity('assoc:3', 128, 16)).toThrow('Associativity must be a power of 2')
  })
})

describe('parseCacheConfig', () => {
  it('validates raw string input', () => {
    expect(parseCacheConfig({ cacheSize: '128', associativity: 'assoc:2', policy: 'LRU', blockSize: '16' })).toEqual({
      cacheSize: 128,
      associativity: 2,
      blockSize: 16,
      policy: 'lru',
    })
  })

  it('takes numeric input as well', () => {
    expect(parseCacheConfig({ cacheSize: 256, associativity: 'direct', policy: 'fifo', blockSize: 32 })).toEqual({
      cacheSize: 256,
      associativity: 1,
      blockSize: 32,
      policy: 'fifo',
    })
  })

  it('reports the first invalid field', () => {
    expect(() => parseCacheConfig({ cacheSize: '96', associativity: 'direct', policy: 'lru', blockSize: '16' }))
      .toThrow('Cache size must be a power of 2')
    expect(() => parseCacheConfig({ cacheSize: '128', associativity: 'direct', policy: 'random', blockSize: '16' }))
      .toThrow('Invalid replacement policy')
    expect(() => parseCacheConfig({ cacheSize: 'abc', associativity: 'direct', policy: 'lru', blockSize: '16' }))
      .toThrow(CacheConfigError)
  })

  it('accepts only decimal sizes', () => {
    expect(() => parseCacheConfig({ cacheSize: '0x80', associativity: 'direct', policy: 'lru', blockSize: '16' }))
      .toThrow('Cache size must be a decimal integer')
    expect(() => parseCacheConfig({ cacheSize: '128', associativity: 'direct', policy: 'lru', blockSize: '1e1' }))
      .toThrow('Block size must be a decimal integer')
    expect(parseCacheConfig({ cacheSize: ' 128 ', associativity: 'direct', policy: 'lru', blockSize: '16' }).cacheSize)
      .toBe(128)
  })

  it('checks associativity against the geometry', () => {
    expect(() => parseCacheConfig({ cacheSize: '128', associativity: 'assoc:16', policy: 'lru', blockSize: '16' }))
      .toThrow('Associativity cannot exceed 8 lines')
  })

  it('raises configuration errors with the configuration exit code', () => {
    try {
      parseCacheConfig({ cacheSize: '128', associativity: 'sideways', policy: 'lru', blockSize: '16' })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(CacheConfigError)
      if (error instanceof CacheConfigError) {
        expect(error.code).toBe('config_error')
        expect(error.exitCode).toBe(ExitCode.CONFIG_ERROR)
      }
    }
  })
})

describe('describeConfig', () => {
  it('names the mapping', () => {
    expect(describeConfig({ cacheSize: 128, associativity: 2, blockSize: 16, policy: 'lru' }))
      .toBe('128B 2-way, 16B blocks, LRU')
    expect(describeConfig({ cacheSize: 128, associativity: 1, blockSize: 16, policy: 'fifo' }))
      .toBe('128B direct-mapped, 16B blocks, FIFO')
    expect(describeConfig({ cacheSize: 128, associativity: 8, blockSize: 16, policy: 'fifo' }))
      .toBe('128B fully associative, 16B blocks, FIFO')
  })
})
