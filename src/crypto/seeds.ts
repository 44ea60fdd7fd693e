// Seed Cryptography
// Commit side of the commit-reveal scheme

import { randomBytes } from 'crypto'
import { assertFieldElement, isFieldElement } from './field.js'
import type { FieldElement } from './field.js'
import { hashPair, COMMITMENT_TAG } from './hash.js'

// ============================================
// COMMITMENT HASHING
// ============================================

/**
 * Derive the public commitment for a seed.
 * Uses the commitment tag, so a commitment is never a chain head.
 */
export function deriveCommitment(seed: FieldElement): FieldElement {
  return hashPair(assertFieldElement(seed, 'Seed'), COMMITMENT_TAG)
}

/**
 * Verify a seed matches its commitment
 */
export function verifyCommitment(seed: FieldElement, commitment: FieldElement): boolean {
  if (!isFieldElement(seed)) return false
  return deriveCommitment(seed) === commitment
}

// ============================================
// SEED GENERATION
// ============================================

/**
 * Fresh secret seed, uniform below 2^251
 */
export function generateSeed(): FieldElement {
  const bytes = randomBytes(32)
  bytes[0] &= 0x07
  return BigInt(`0x${bytes.toString('hex')}`)
}
