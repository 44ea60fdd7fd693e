// Verification data structures

import type { FieldElement } from '../crypto/field.js'
import type { DieFace } from '../engine/chain.js'

export interface VerificationInput {
  // Revealed seed and the commitment published before rolling
  seed: FieldElement
  commitment: FieldElement

  // Claimed outcomes, in production order. Plain numbers: claims are untrusted.
  outcomes: readonly number[]

  // Claimed final checkpoint (optional)
  checkpoint?: FieldElement
}

export interface VerificationResult {
  valid: boolean
  errors: string[]
  warnings: string[]

  // Commitment verification
  commitmentValid: boolean

  // Replay results
  outcomesValid: boolean
  rollsCompared: number
  firstMismatchIndex?: number
  replayedOutcomes: DieFace[]
  replayedFinalHead?: FieldElement

  // Checkpoint comparison (if a checkpoint was claimed)
  checkpointValid?: boolean
}
