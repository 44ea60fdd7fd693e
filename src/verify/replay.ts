// Session replay

import { formatFieldElement, isFieldElement } from '../crypto/field.js'
import type { FieldElement } from '../crypto/field.js'
import type { DieFace } from '../engine/chain.js'
import { roll } from '../engine/session.js'
import type { VerificationInput } from './types.js'

export type ReplayResult =
  | { ok: true; outcomes: DieFace[]; finalHead: FieldElement }
  | { ok: false; error: string }

/**
 * Re-run the chain from the revealed seed for as many rolls as were claimed
 */
export function replayOutcomes(input: VerificationInput): ReplayResult {
  if (!isFieldElement(input.seed)) {
    return { ok: false, error: `Seed ${input.seed} is not a field element` }
  }
  if (input.outcomes.length === 0) {
    return { ok: false, error: 'No outcomes claimed' }
  }

  const batch = roll(input.seed, input.outcomes.length)
  return { ok: true, outcomes: batch.outcomes, finalHead: batch.finalHead }
}

/**
 * Element-wise comparison of replayed and claimed outcomes
 */
export function compareOutcomes(
  actual: readonly DieFace[],
  claimed: readonly number[]
): { match: boolean; firstMismatchIndex?: number; differences: string[] } {
  const differences: string[] = []
  let firstMismatchIndex: number | undefined

  if (actual.length !== claimed.length) {
    differences.push(`Roll count: expected ${actual.length}, got ${claimed.length}`)
  }

  const length = Math.min(actual.length, claimed.length)
  for (let i = 0; i < length; i++) {
    if (actual[i] !== claimed[i]) {
      if (firstMismatchIndex === undefined) firstMismatchIndex = i
      differences.push(`Roll #${i + 1}: expected ${actual[i]}, got ${claimed[i]}`)
    }
  }

  if (firstMismatchIndex === undefined && actual.length !== claimed.length) {
    firstMismatchIndex = length
  }

  return {
    match: differences.length === 0,
    firstMismatchIndex,
    differences,
  }
}

/**
 * Compare the replayed final head with a claimed checkpoint
 */
export function compareCheckpoint(
  actual: FieldElement,
  claimed: FieldElement
): { match: boolean; difference?: string } {
  if (actual === claimed) {
    return { match: true }
  }
  return {
    match: false,
    difference: `Checkpoint: expected ${formatFieldElement(actual)}, got ${formatFieldElement(claimed)}`,
  }
}
