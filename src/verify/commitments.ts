// Commitment verification

import { formatFieldElement } from '../crypto/field.js'
import { verifyCommitment } from '../crypto/seeds.js'
import type { VerificationInput } from './types.js'

/**
 * Check the revealed seed against the published commitment
 */
export function verifyCommitments(input: VerificationInput): {
  commitmentValid: boolean
  errors: string[]
} {
  const errors: string[] = []

  const commitmentValid = verifyCommitment(input.seed, input.commitment)
  if (!commitmentValid) {
    errors.push(
      `Seed ${formatFieldElement(input.seed)} does not match commitment ${formatFieldElement(input.commitment)}`
    )
  }

  return { commitmentValid, errors }
}
