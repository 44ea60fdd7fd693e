// Two-argument hash over field elements

import { createHash } from 'crypto'
import { FIELD_PRIME, toBytes32 } from './field.js'
import type { FieldElement } from './field.js'

// ============================================
// DOMAIN TAGS
// ============================================

/** Second operand when deriving a commitment from a seed */
export const COMMITMENT_TAG: FieldElement = 0n

/** Second operand when advancing the chain */
export const CHAIN_STEP_TAG: FieldElement = 1n

// ============================================
// HASH
// ============================================

/**
 * H(a, b) = SHA-256(be32(a) || be32(b)) mod FIELD_PRIME
 */
export function hashPair(a: FieldElement, b: FieldElement): FieldElement {
  const digest = createHash('sha256')
    .update(toBytes32(a))
    .update(toBytes32(b))
    .digest('hex')
  return BigInt(`0x${digest}`) % FIELD_PRIME
}
