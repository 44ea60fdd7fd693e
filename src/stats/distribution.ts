// Dice roll distribution analysis
// Frequency table and chi-square goodness-of-fit against a fair die

import { DIE_FACES, isDieFace } from '../engine/chain.js'
import type { DieFace } from '../engine/chain.js'
import { InvalidArgumentError } from '../engine/errors.js'

// ============================================
// CONSTANTS
// ============================================

/** Chi-square critical value, 5 degrees of freedom, 5% significance */
export const CHI_SQUARE_CRITICAL_5DF = 11.070

/** Mean of a fair six-sided die */
export const EXPECTED_MEAN = 3.5

/** Standard deviation of a fair six-sided die */
export const EXPECTED_STD_DEV = Math.sqrt(35 / 12)

const ROLL_PATTERN = /\b[1-6]\b/g

// ============================================
// TYPES
// ============================================

export interface FaceFrequency {
  face: DieFace
  count: number
  percentage: number
  expected: number
  deviation: number
  chiSquareComponent: number
}

export interface RangeCount {
  label: string
  count: number
  percentage: number
}

export interface DistributionReport {
  totalRolls: number
  frequencies: FaceFrequency[]
  chiSquare: number
  criticalValue: number
  fair: boolean
  mean: number
  median: number
  stdDev: number
  min: DieFace
  max: DieFace
  ranges: RangeCount[]
  maxConsecutive: number
  consecutiveRuns: number
}

// ============================================
// PARSING
// ============================================

/**
 * Pull every standalone digit 1-6 out of free text, in order
 */
export function parseRolls(text: string): DieFace[] {
  const rolls: DieFace[] = []
  for (const match of text.matchAll(ROLL_PATTERN)) {
    const value = Number(match[0])
    if (isDieFace(value)) rolls.push(value)
  }
  return rolls
}

// ============================================
// ANALYSIS
// ============================================

function median(sorted: readonly number[]): number {
  const mid = Math.floor(sorted.length / 2)
  return sorted.length % 2 === 0
    ? (sorted[mid - 1] + sorted[mid]) / 2
    : sorted[mid]
}

/** Sample standard deviation (n - 1); zero for a single roll */
function sampleStdDev(values: readonly number[], mean: number): number {
  if (values.length < 2) return 0
  const squares = values.reduce((acc, v) => acc + (v - mean) ** 2, 0)
  return Math.sqrt(squares / (values.length - 1))
}

/**
 * Longest run of equal consecutive rolls, and how many runs longer than one
 * are closed by a different roll. A run still open at the end of the
 * sequence counts toward the longest run but not toward `runs`.
 */
function consecutivePatterns(rolls: readonly DieFace[]): { maxConsecutive: number; runs: number } {
  let maxConsecutive = 1
  let current = 1
  let runs = 0

  for (let i = 1; i < rolls.length; i++) {
    if (rolls[i] === rolls[i - 1]) {
      current++
      maxConsecutive = Math.max(maxConsecutive, current)
    } else {
      if (current > 1) runs++
      current = 1
    }
  }

  return { maxConsecutive, runs }
}

export function analyzeDistribution(rolls: readonly DieFace[]): DistributionReport {
  if (rolls.length === 0) {
    throw new InvalidArgumentError('No dice rolls to analyze')
  }

  const total = rolls.length
  const expected = total / 6
  const counts = new Map<DieFace, number>(DIE_FACES.map(face => [face, 0]))
  for (const r of rolls) {
    counts.set(r, (counts.get(r) ?? 0) + 1)
  }

  const frequencies: FaceFrequency[] = DIE_FACES.map(face => {
    const count = counts.get(face) ?? 0
    const deviation = count - expected
    return {
      face,
      count,
      percentage: (count / total) * 100,
      expected,
      deviation,
      chiSquareComponent: deviation ** 2 / expected,
    }
  })
  const chiSquare = frequencies.reduce((acc, f) => acc + f.chiSquareComponent, 0)

  const sorted = [...rolls].sort((a, b) => a - b)
  const mean = rolls.reduce<number>((acc, r) => acc + r, 0) / total

  const ranges: RangeCount[] = [
    { label: '1-2 (low)', faces: [1, 2] },
    { label: '3-4 (mid)', faces: [3, 4] },
    { label: '5-6 (high)', faces: [5, 6] },
  ].map(({ label, faces }) => {
    const count = rolls.filter(r => faces.includes(r)).length
    return { label, count, percentage: (count / total) * 100 }
  })

  const patterns = consecutivePatterns(rolls)

  return {
    totalRolls: total,
    frequencies,
    chiSquare,
    criticalValue: CHI_SQUARE_CRITICAL_5DF,
    fair: chiSquare < CHI_SQUARE_CRITICAL_5DF,
    mean,
    median: median(sorted),
    stdDev: sampleStdDev(rolls, mean),
    min: sorted[0],
    max: sorted[sorted.length - 1],
    ranges,
    maxConsecutive: patterns.maxConsecutive,
    consecutiveRuns: patterns.runs,
  }
}
