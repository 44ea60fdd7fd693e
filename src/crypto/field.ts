// Field elements for the hash chain
// Seeds, chain heads, commitments and checkpoints all live in the STARK field

import { InvalidArgumentError } from '../engine/errors.js'

export type FieldElement = bigint

/** 2^251 + 17 * 2^192 + 1 */
export const FIELD_PRIME: FieldElement = (1n << 251n) + 17n * (1n << 192n) + 1n

const HEX_PATTERN = /^0x[0-9a-fA-F]+$/
const DECIMAL_PATTERN = /^[0-9]+$/

export function isFieldElement(value: bigint): boolean {
  return value >= 0n && value < FIELD_PRIME
}

export function assertFieldElement(value: bigint, label: string): FieldElement {
  if (!isFieldElement(value)) {
    throw new InvalidArgumentError(`${label} is not a field element: ${value}`)
  }
  return value
}

/**
 * Parse decimal or 0x-prefixed hex text (or a safe integer) into a field element
 */
export function parseFieldElement(input: string | number | bigint, label = 'value'): FieldElement {
  if (typeof input === 'bigint') {
    return assertFieldElement(input, label)
  }

  if (typeof input === 'number') {
    if (!Number.isSafeInteger(input)) {
      throw new InvalidArgumentError(`${label} must be a safe integer, got ${input}`)
    }
    return assertFieldElement(BigInt(input), label)
  }

  const text = input.trim()
  if (!HEX_PATTERN.test(text) && !DECIMAL_PATTERN.test(text)) {
    throw new InvalidArgumentError(`${label} must be decimal or 0x-prefixed hex, got "${input}"`)
  }
  return assertFieldElement(BigInt(text), label)
}

export function formatFieldElement(value: FieldElement): string {
  return `0x${value.toString(16)}`
}

/**
 * Big-endian 32-byte encoding. Only field elements fit.
 */
export function toBytes32(value: FieldElement): Buffer {
  const element = assertFieldElement(value, 'Hash operand')
  return Buffer.from(element.toString(16).padStart(64, '0'), 'hex')
}
