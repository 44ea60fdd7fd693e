import { createHash } from 'crypto'
import {
  FIELD_PRIME,
  parseFieldElement,
  formatFieldElement,
  isFieldElement,
  hashPair,
  COMMITMENT_TAG,
  CHAIN_STEP_TAG,
  deriveCommitment,
  verifyCommitment,
  generateSeed,
  advance,
  extractOutcome,
  advanceAndRoll,
  roll,
  start,
  resume,
  InvalidArgumentError,
  ConversionOverflowError,
} from '../src/index.js'

// Helper: H(a, b) computed independently of the library
function referenceHash(a: bigint, b: bigint): bigint {
  const encode = (v: bigint) => Buffer.from(v.toString(16).padStart(64, '0'), 'hex')
  const digest = createHash('sha256').update(Buffer.concat([encode(a), encode(b)])).digest('hex')
  return BigInt(`0x${digest}`) % FIELD_PRIME
}

const SEED_42_COMMITMENT = 0x5d920dc4975df184b195804c4cb2eb3c111bd8da7e6ae88596fdf1ef0420a33n
const SEED_42_CHECKPOINT_3 = 0x1da6146ccde5f7ad5b5d3f5d68521cb891287a95571008698c9187f6500c015n
const SEED_42_CHECKPOINT_5 = 0x130e7eee6f462be3a027cdfdc45ca70ad091c6a70a62865a6365998831089a0n

describe('Field elements', () => {
  test('FIELD_PRIME is the STARK prime', () => {
    expect(formatFieldElement(FIELD_PRIME)).toBe('0x800000000000011000000000000000000000000000000000000000000000001')
  })

  test('parses decimal, hex and safe integers', () => {
    expect(parseFieldElement('42')).toBe(42n)
    expect(parseFieldElement('0x2a')).toBe(42n)
    expect(parseFieldElement(42)).toBe(42n)
    expect(parseFieldElement(0)).toBe(0n)
  })

  test('rejects values outside the field and malformed text', () => {
    expect(() => parseFieldElement(formatFieldElement(FIELD_PRIME))).toThrow(InvalidArgumentError)
    expect(() => parseFieldElement(-1)).toThrow(InvalidArgumentError)
    expect(() => parseFieldElement(1.5)).toThrow(InvalidArgumentError)
    expect(() => parseFieldElement('12abc')).toThrow(InvalidArgumentError)
    expect(() => parseFieldElement('')).toThrow(InvalidArgumentError)
  })

  test('isFieldElement bounds', () => {
    expect(isFieldElement(0n)).toBe(true)
    expect(isFieldElement(FIELD_PRIME - 1n)).toBe(true)
    expect(isFieldElement(FIELD_PRIME)).toBe(false)
    expect(isFieldElement(-1n)).toBe(false)
  })
})

describe('Hash primitive', () => {
  test('matches SHA-256 of both operands reduced into the field', () => {
    expect(hashPair(42n, 7n)).toBe(referenceHash(42n, 7n))
    expect(hashPair(FIELD_PRIME - 1n, 0n)).toBe(referenceHash(FIELD_PRIME - 1n, 0n))
  })

  test('only takes field elements as operands', () => {
    expect(() => hashPair(-1n, 0n)).toThrow(InvalidArgumentError)
    expect(() => hashPair(0n, FIELD_PRIME)).toThrow('Hash operand is not a field element')
    expect(() => advance(FIELD_PRIME)).toThrow(InvalidArgumentError)
    expect(() => advanceAndRoll(-5n)).toThrow(InvalidArgumentError)
  })

  test('domain tags are 0 and 1', () => {
    expect(COMMITMENT_TAG).toBe(0n)
    expect(CHAIN_STEP_TAG).toBe(1n)
  })
})

describe('Commitment Deriver', () => {
  test('commitment for seed 42 is pinned', () => {
    expect(deriveCommitment(42n)).toBe(SEED_42_COMMITMENT)
    expect(deriveCommitment(42n)).toBe(referenceHash(42n, 0n))
  })

  test('accepts a zero seed', () => {
    expect(deriveCommitment(0n)).toBe(0x5a5fd42d16a1e322798ef6ed309979b43003d2320d9f0e8ea9831a92759fb2dn)
  })

  test('distinct seeds give distinct commitments', () => {
    const commitments = new Set<bigint>()
    for (let s = 0n; s < 200n; s++) {
      commitments.add(deriveCommitment(s))
    }
    expect(commitments.size).toBe(200)
  })

  test('commitment never equals the first chain step for the same seed', () => {
    for (let s = 0n; s < 200n; s++) {
      expect(deriveCommitment(s)).not.toBe(advance(s))
    }
  })

  test('rejects a seed outside the field', () => {
    expect(() => deriveCommitment(FIELD_PRIME)).toThrow(InvalidArgumentError)
  })

  test('verifyCommitment', () => {
    expect(verifyCommitment(42n, SEED_42_COMMITMENT)).toBe(true)
    expect(verifyCommitment(43n, SEED_42_COMMITMENT)).toBe(false)
    expect(verifyCommitment(-42n, SEED_42_COMMITMENT)).toBe(false)
  })

  test('generateSeed stays below 2^251', () => {
    for (let i = 0; i < 50; i++) {
      const seed = generateSeed()
      expect(seed).toBeGreaterThanOrEqual(0n)
      expect(seed < (1n << 251n)).toBe(true)
    }
  })
})

describe('Hash Chain Engine', () => {
  test('advance uses the chain-step tag', () => {
    expect(advance(42n)).toBe(referenceHash(42n, 1n))
    expect(advance(42n)).toBe(0xa83eaf778ad88b8a6c297278a4119476f5f5a8e06b4cbf16b2fc609b945f89n)
  })

  test('extractOutcome is head mod 6 plus one', () => {
    expect(extractOutcome(0n)).toBe(1)
    expect(extractOutcome(5n)).toBe(6)
    expect(extractOutcome(6n)).toBe(1)
    expect(extractOutcome(FIELD_PRIME - 1n)).toBe(5)
    expect(extractOutcome((1n << 256n) - 1n)).toBe(Number(((1n << 256n) - 1n) % 6n) + 1)
  })

  test('extractOutcome stays in range along a long chain', () => {
    let head = 7n
    for (let i = 0; i < 500; i++) {
      head = advance(head)
      const outcome = extractOutcome(head)
      expect(outcome).toBeGreaterThanOrEqual(1)
      expect(outcome).toBeLessThanOrEqual(6)
    }
  })

  test('a reduction outside [1, 6] is reported as an overflow', () => {
    expect(() => extractOutcome(-1n)).toThrow(ConversionOverflowError)
  })

  test('advanceAndRoll rolls the new head, not the old one', () => {
    const step = advanceAndRoll(42n)
    expect(step.nextHead).toBe(advance(42n))
    expect(step.outcome).toBe(extractOutcome(advance(42n)))
  })
})

describe('Chain Session', () => {
  test('seed 42, three rolls', () => {
    const batch = start(42n, 3)
    expect(batch.outcomes).toEqual([2, 5, 4])
    expect(batch.finalHead).toBe(SEED_42_CHECKPOINT_3)
  })

  test('resume from the checkpoint reproduces rolls 4 and 5', () => {
    const continued = resume(SEED_42_CHECKPOINT_3, 2)
    const straight = roll(42n, 5)
    expect(continued.outcomes).toEqual([1, 1])
    expect(continued.outcomes).toEqual(straight.outcomes.slice(3))
    expect(continued.finalHead).toBe(straight.finalHead)
    expect(straight.finalHead).toBe(SEED_42_CHECKPOINT_5)
  })

  test('deterministic', () => {
    expect(roll(123456789n, 40)).toEqual(roll(123456789n, 40))
  })

  test('continuation equivalence across split points', () => {
    const seed = 987654321n
    const whole = roll(seed, 30)
    for (const split of [1, 7, 29]) {
      const first = roll(seed, split)
      const second = roll(first.finalHead, 30 - split)
      expect([...first.outcomes, ...second.outcomes]).toEqual(whole.outcomes)
      expect(second.finalHead).toBe(whole.finalHead)
    }
  })

  test('returns exactly count outcomes, all die faces', () => {
    const batch = roll(0n, 100)
    expect(batch.outcomes).toHaveLength(100)
    for (const o of batch.outcomes) {
      expect([1, 2, 3, 4, 5, 6]).toContain(o)
    }
  })

  test('rejects non-positive and non-integer counts', () => {
    expect(() => roll(42n, 0)).toThrow(InvalidArgumentError)
    expect(() => roll(42n, -1)).toThrow(InvalidArgumentError)
    expect(() => roll(42n, 2.5)).toThrow(InvalidArgumentError)
    expect(() => roll(42n, Number.NaN)).toThrow(InvalidArgumentError)
    expect(() => start(42n, 0)).toThrow('Roll count must be a positive integer, got 0')
  })

  test('rejects a starting head outside the field', () => {
    expect(() => resume(FIELD_PRIME, 1)).toThrow(InvalidArgumentError)
  })
})
