// ============================================
// HASH CHAIN ENGINE
// ============================================

import { hashPair, CHAIN_STEP_TAG } from '../crypto/hash.js'
import type { FieldElement } from '../crypto/field.js'
import { ConversionOverflowError } from './errors.js'

export type DieFace = 1 | 2 | 3 | 4 | 5 | 6

export const DIE_FACES: readonly DieFace[] = [1, 2, 3, 4, 5, 6]

export interface ChainStep {
  nextHead: FieldElement
  outcome: DieFace
}

export function isDieFace(value: unknown): value is DieFace {
  return typeof value === 'number' && DIE_FACES.some(face => face === value)
}

/**
 * Next chain position. Pure, no hidden state beyond the head.
 */
export function advance(head: FieldElement): FieldElement {
  return hashPair(head, CHAIN_STEP_TAG)
}

/**
 * Reduce a chain head to a die face: (head mod 6) + 1.
 *
 * The hash codomain is ~2^251, so the modulo bias is on the order of
 * 2^-248 and plain reduction is uniform enough. A narrow hash would need
 * rejection sampling here instead.
 */
export function extractOutcome(head: FieldElement): DieFace {
  const value = Number(head % 6n) + 1
  if (!isDieFace(value)) {
    throw new ConversionOverflowError(`Outcome ${value} out of range for head ${head}`)
  }
  return value
}

/**
 * One atomic chain step: advance, then roll the new head
 */
export function advanceAndRoll(head: FieldElement): ChainStep {
  const nextHead = advance(head)
  return { nextHead, outcome: extractOutcome(nextHead) }
}
