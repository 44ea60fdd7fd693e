// Command implementations. Pure: all I/O stays in index.ts.

import { formatFieldElement, parseFieldElement } from '../crypto/field.js'
import type { FieldElement } from '../crypto/field.js'
import { deriveCommitment, generateSeed } from '../crypto/seeds.js'
import { isDieFace } from '../engine/chain.js'
import type { DieFace } from '../engine/chain.js'
import { InvalidArgumentError } from '../engine/errors.js'
import { start, resume } from '../engine/session.js'
import { verifySession } from '../verify/verify.js'
import { generateVerificationReport, exportVerificationData } from '../verify/report.js'
import type { VerificationInput } from '../verify/types.js'
import { analyzeDistribution, parseRolls } from '../stats/distribution.js'
import { formatDistributionReport } from '../stats/report.js'
import { parseCount } from './args.js'
import type { CLIArgs, OutputFormat } from './args.js'

export const DEFAULTS = {
  count: 10,
  followUp: 5,
} as const

// ============================================
// ROLL
// ============================================

export interface RollOptions {
  seed: FieldElement
  count: number
  /** 0n starts fresh from the seed */
  checkpoint: FieldElement
  followUp: number
  format: OutputFormat
}

/**
 * Roll options from the command line. The seed defaults to a fresh one only
 * for a new chain: a resumed chain's commitment must come from its own seed.
 */
export function resolveRollOptions(args: CLIArgs): RollOptions {
  const checkpoint = args.checkpoint === undefined ? 0n : parseFieldElement(args.checkpoint, 'checkpoint')
  if (checkpoint !== 0n && args.seed === undefined) {
    throw new InvalidArgumentError('--checkpoint needs the --seed of the chain it came from')
  }

  return {
    seed: args.seed === undefined ? generateSeed() : parseFieldElement(args.seed, 'seed'),
    count: args.count === undefined ? DEFAULTS.count : parseCount(args.count, 'count'),
    checkpoint,
    followUp: args.followUp === undefined ? DEFAULTS.followUp : parseCount(args.followUp, 'follow-up'),
    format: args.format,
  }
}

export function runRoll(options: RollOptions): string {
  const commitment = deriveCommitment(options.seed)
  const fresh = options.checkpoint === 0n

  const batch = fresh
    ? start(options.seed, options.count)
    : resume(options.checkpoint, options.count)
  const continuation = resume(batch.finalHead, options.followUp)

  if (options.format === 'json') {
    return JSON.stringify({
      commitment: formatFieldElement(commitment),
      seed: formatFieldElement(options.seed),
      startedFrom: fresh ? 'seed' : formatFieldElement(options.checkpoint),
      outcomes: batch.outcomes,
      checkpoint: formatFieldElement(batch.finalHead),
      continuation: {
        outcomes: continuation.outcomes,
        checkpoint: formatFieldElement(continuation.finalHead),
      },
    }, null, 2)
  }

  const lines: string[] = []
  lines.push(`Commitment: ${formatFieldElement(commitment)}`)
  lines.push(`Seed: ${formatFieldElement(options.seed)}`)
  lines.push(`Started from: ${fresh ? 'seed' : formatFieldElement(options.checkpoint)}`)
  lines.push(`Outcomes: ${batch.outcomes.join(', ')}`)
  lines.push(`Checkpoint: ${formatFieldElement(batch.finalHead)}`)
  lines.push('')
  lines.push(`Continuation (${options.followUp} rolls from checkpoint):`)
  lines.push(`Outcomes: ${continuation.outcomes.join(', ')}`)
  lines.push(`Checkpoint: ${formatFieldElement(continuation.finalHead)}`)
  return lines.join('\n')
}

// ============================================
// VERIFY
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function fieldFromJson(value: unknown, label: string): FieldElement {
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new InvalidArgumentError(`Missing or invalid ${label}`)
  }
  return parseFieldElement(value, label)
}

/**
 * Parse and validate verification JSON:
 * { "seed": "42", "commitment": "0x...", "outcomes": [3, 1, 6], "checkpoint": "0x..." }
 */
export function loadVerificationInput(content: string): VerificationInput {
  const data: unknown = JSON.parse(content)
  if (!isRecord(data)) {
    throw new InvalidArgumentError('Verification data must be a JSON object')
  }

  const outcomes = data.outcomes
  if (!Array.isArray(outcomes) || !outcomes.every((o): o is number => typeof o === 'number')) {
    throw new InvalidArgumentError('Missing or invalid outcomes')
  }

  return {
    seed: fieldFromJson(data.seed, 'seed'),
    commitment: fieldFromJson(data.commitment, 'commitment'),
    outcomes,
    checkpoint: data.checkpoint === undefined ? undefined : fieldFromJson(data.checkpoint, 'checkpoint'),
  }
}

export function runVerify(
  input: VerificationInput,
  format: OutputFormat
): { output: string; valid: boolean } {
  const result = verifySession(input)
  const output = format === 'json'
    ? exportVerificationData(input, result)
    : generateVerificationReport(result)
  return { output, valid: result.valid }
}

// ============================================
// ANALYZE
// ============================================

function dieFaces(value: unknown): DieFace[] {
  return Array.isArray(value) ? value.filter(isDieFace) : []
}

const OUTCOMES_LINE = /^Outcomes:(.*)$/gm

/**
 * Rolls from `roll` output (batch plus continuation, JSON or text),
 * or every standalone 1-6 digit in free text
 */
export function extractRolls(text: string): DieFace[] {
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch {
    const outcomeLines = [...text.matchAll(OUTCOMES_LINE)].map(m => m[1])
    return parseRolls(outcomeLines.length > 0 ? outcomeLines.join('\n') : text)
  }

  if (isRecord(data) && Array.isArray(data.outcomes)) {
    const continuation = data.continuation
    const followUp = isRecord(continuation) ? dieFaces(continuation.outcomes) : []
    return [...dieFaces(data.outcomes), ...followUp]
  }
  if (Array.isArray(data)) {
    return dieFaces(data)
  }
  return parseRolls(text)
}

export function runAnalyze(text: string): string {
  const rolls = extractRolls(text)
  if (rolls.length === 0) {
    throw new InvalidArgumentError('No valid dice rolls found in input (expected integers 1-6)')
  }
  return formatDistributionReport(analyzeDistribution(rolls))
}
