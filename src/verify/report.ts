// Verification report generation

import { formatFieldElement } from '../crypto/field.js'
import type { VerificationInput, VerificationResult } from './types.js'

function mark(ok: boolean): string {
  return ok ? '✓' : '✗'
}

/**
 * Generate verification report as string
 */
export function generateVerificationReport(result: VerificationResult): string {
  const lines: string[] = []

  lines.push('='.repeat(60))
  lines.push('DICE CHAIN VERIFICATION REPORT')
  lines.push('='.repeat(60))
  lines.push('')

  // Overall result
  lines.push(`Overall Result: ${result.valid ? '✓ VALID' : '✗ INVALID'}`)
  lines.push('')

  lines.push('Checks:')
  lines.push(`  Commitment: ${mark(result.commitmentValid)}`)
  lines.push(`  Outcomes: ${mark(result.outcomesValid)}`)
  if (result.checkpointValid !== undefined) {
    lines.push(`  Checkpoint: ${mark(result.checkpointValid)}`)
  }
  lines.push('')

  // Replay summary
  lines.push('Replay Summary:')
  lines.push(`  Rolls compared: ${result.rollsCompared}`)
  if (result.firstMismatchIndex !== undefined) {
    lines.push(`  First mismatch: roll #${result.firstMismatchIndex + 1}`)
  }
  if (result.replayedOutcomes.length > 0) {
    lines.push(`  Replayed outcomes: ${result.replayedOutcomes.join(', ')}`)
  }
  if (result.replayedFinalHead !== undefined) {
    lines.push(`  Final head: ${formatFieldElement(result.replayedFinalHead)}`)
  }
  lines.push('')

  // Errors
  if (result.errors.length > 0) {
    lines.push('Errors:')
    for (const error of result.errors) {
      lines.push(`  ✗ ${error}`)
    }
    lines.push('')
  }

  // Warnings
  if (result.warnings.length > 0) {
    lines.push('Warnings:')
    for (const warning of result.warnings) {
      lines.push(`  ⚠ ${warning}`)
    }
    lines.push('')
  }

  lines.push('='.repeat(60))

  return lines.join('\n')
}

/**
 * Export verification data to JSON. Field elements are written as hex strings.
 */
export function exportVerificationData(
  input: VerificationInput,
  result: VerificationResult
): string {
  return JSON.stringify({
    input: {
      seed: formatFieldElement(input.seed),
      commitment: formatFieldElement(input.commitment),
      checkpoint: input.checkpoint === undefined ? undefined : formatFieldElement(input.checkpoint),
      rollCount: input.outcomes.length,
    },
    result: {
      valid: result.valid,
      errors: result.errors,
      warnings: result.warnings,
      checks: {
        commitment: result.commitmentValid,
        outcomes: result.outcomesValid,
        checkpoint: result.checkpointValid,
      },
      replay: {
        rollsCompared: result.rollsCompared,
        firstMismatchIndex: result.firstMismatchIndex,
        outcomes: result.replayedOutcomes,
        finalHead: result.replayedFinalHead === undefined
          ? undefined
          : formatFieldElement(result.replayedFinalHead),
      },
    },
    timestamp: Date.now(),
  }, null, 2)
}
