// Chain sessions: start a chain from a seed or resume it from a checkpoint

import { assertFieldElement } from '../crypto/field.js'
import type { FieldElement } from '../crypto/field.js'
import { advanceAndRoll } from './chain.js'
import type { DieFace } from './chain.js'
import { InvalidArgumentError } from './errors.js'

export interface RollBatch {
  /** In production order */
  outcomes: DieFace[]
  /** Opaque continuation state, feed to resume() */
  finalHead: FieldElement
}

/**
 * Run `count` chain steps from `startingHead`.
 * Resuming from the returned finalHead is indistinguishable from never stopping.
 */
export function roll(startingHead: FieldElement, count: number): RollBatch {
  if (!Number.isSafeInteger(count) || count <= 0) {
    throw new InvalidArgumentError(`Roll count must be a positive integer, got ${count}`)
  }
  assertFieldElement(startingHead, 'Starting head')

  const outcomes: DieFace[] = []
  let head = startingHead

  for (let i = 0; i < count; i++) {
    const step = advanceAndRoll(head)
    outcomes.push(step.outcome)
    head = step.nextHead
  }

  return { outcomes, finalHead: head }
}

/** Begin a new chain at the secret seed */
export function start(seed: FieldElement, count: number): RollBatch {
  return roll(seed, count)
}

/** Continue a chain from a previously returned checkpoint */
export function resume(checkpoint: FieldElement, count: number): RollBatch {
  return roll(checkpoint, count)
}
