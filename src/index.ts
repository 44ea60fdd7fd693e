// dicechain — Public API
// Provably fair dice rolls from a commit-reveal hash chain

// Field elements
export {
  FIELD_PRIME,
  isFieldElement,
  assertFieldElement,
  parseFieldElement,
  formatFieldElement,
} from './crypto/field.js'
export type { FieldElement } from './crypto/field.js'

// Hash primitive
export { hashPair, COMMITMENT_TAG, CHAIN_STEP_TAG } from './crypto/hash.js'

// Seed cryptography
export { deriveCommitment, verifyCommitment, generateSeed } from './crypto/seeds.js'

// Hash chain engine
export { advance, extractOutcome, advanceAndRoll, isDieFace, DIE_FACES } from './engine/chain.js'
export type { DieFace, ChainStep } from './engine/chain.js'

// Chain sessions
export { roll, start, resume } from './engine/session.js'
export type { RollBatch } from './engine/session.js'

// Errors
export { DiceChainError, InvalidArgumentError, ConversionOverflowError } from './engine/errors.js'

// Verification
export { verifySession } from './verify/verify.js'
export { verifyCommitments } from './verify/commitments.js'
export { replayOutcomes, compareOutcomes, compareCheckpoint } from './verify/replay.js'
export { generateVerificationReport, exportVerificationData } from './verify/report.js'
export type { VerificationInput, VerificationResult } from './verify/types.js'
export type { ReplayResult } from './verify/replay.js'

// Distribution analysis
export {
  parseRolls,
  analyzeDistribution,
  CHI_SQUARE_CRITICAL_5DF,
  EXPECTED_MEAN,
  EXPECTED_STD_DEV,
} from './stats/distribution.js'
export type { DistributionReport, FaceFrequency, RangeCount } from './stats/distribution.js'
export { formatDistributionReport } from './stats/report.js'
