// Full session verification orchestrator

import { isDieFace } from '../engine/chain.js'
import type { DieFace } from '../engine/chain.js'
import type { FieldElement } from '../crypto/field.js'
import type { VerificationInput, VerificationResult } from './types.js'
import { verifyCommitments } from './commitments.js'
import { replayOutcomes, compareOutcomes, compareCheckpoint } from './replay.js'

/**
 * Full session verification. Never throws on bad claims: every failure
 * ends up in `errors` and `valid` is false.
 */
export function verifySession(input: VerificationInput): VerificationResult {
  const errors: string[] = []
  const warnings: string[] = []

  // Step 1: Verify commitment
  const commitmentResult = verifyCommitments(input)
  errors.push(...commitmentResult.errors)

  // Step 2: Claimed values must at least be die faces
  input.outcomes.forEach((value, i) => {
    if (!isDieFace(value)) {
      errors.push(`Claimed roll #${i + 1} is not a die face: ${value}`)
    }
  })

  // Step 3: Replay and compare
  const replay = replayOutcomes(input)
  let outcomesValid = false
  let firstMismatchIndex: number | undefined
  let replayedOutcomes: DieFace[] = []
  let replayedFinalHead: FieldElement | undefined
  let checkpointValid: boolean | undefined

  if (replay.ok) {
    replayedOutcomes = replay.outcomes
    replayedFinalHead = replay.finalHead

    const comparison = compareOutcomes(replay.outcomes, input.outcomes)
    outcomesValid = comparison.match
    firstMismatchIndex = comparison.firstMismatchIndex
    errors.push(...comparison.differences.map(d => `Outcome mismatch: ${d}`))

    // Step 4: Compare checkpoint if one was claimed
    if (input.checkpoint !== undefined) {
      const checkpoint = compareCheckpoint(replay.finalHead, input.checkpoint)
      checkpointValid = checkpoint.match
      if (checkpoint.difference) {
        errors.push(`Checkpoint mismatch: ${checkpoint.difference}`)
      }
    } else {
      warnings.push('No checkpoint claimed; final head not compared')
    }
  } else {
    errors.push(`Replay failed: ${replay.error}`)
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    commitmentValid: commitmentResult.commitmentValid,
    outcomesValid,
    rollsCompared: replayedOutcomes.length,
    firstMismatchIndex,
    replayedOutcomes,
    replayedFinalHead,
    checkpointValid,
  }
}
