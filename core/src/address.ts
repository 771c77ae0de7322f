import type { AddressParts, DerivedGeometry } from './types'

const ADDRESS_BITS = 64

// Addresses behave like 64-bit unsigned integers: anything wider wraps
export function toAddress(value: bigint | number): bigint {
  return BigInt.asUintN(ADDRESS_BITS, BigInt(value))
}

export function blockIdOf(address: bigint, { blockOffsetBits }: DerivedGeometry): bigint {
  return address >> BigInt(blockOffsetBits)
}

export function blockAddress(blockId: bigint, { blockOffsetBits }: DerivedGeometry): bigint {
  return toAddress(blockId << BigInt(blockOffsetBits))
}

export function decompose(address: bigint, derived: DerivedGeometry): AddressParts {
  const { blockOffsetBits, setIndexBits } = derived
  const blockId = blockIdOf(address, derived)
  const mask = (1n << BigInt(setIndexBits)) - 1n
  return {
    blockId,
    setIndex: Number(blockId & mask),
    tag: address >> BigInt(blockOffsetBits + setIndexBits),
  }
}

export function formatAddress(value: bigint): string {
  return '0x' + value.toString(16)
}
