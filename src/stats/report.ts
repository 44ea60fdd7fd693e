// Distribution report formatting

import { EXPECTED_MEAN, EXPECTED_STD_DEV } from './distribution.js'
import type { DistributionReport } from './distribution.js'

function signed(value: number, digits: number): string {
  const text = value.toFixed(digits)
  return value >= 0 ? `+${text}` : text
}

export function formatDistributionReport(report: DistributionReport): string {
  const lines: string[] = []

  lines.push('=== DICE ROLL DISTRIBUTION ANALYSIS ===')
  lines.push(`Total rolls: ${report.totalRolls}`)
  lines.push('')

  lines.push('FREQUENCY ANALYSIS:')
  lines.push('Face | Count | Percentage | Expected | Deviation')
  lines.push('-'.repeat(50))
  for (const f of report.frequencies) {
    lines.push(
      `  ${f.face}  |  ${String(f.count).padStart(3)}  |   ${f.percentage.toFixed(1).padStart(5)}%   |  ` +
      `${f.expected.toFixed(1).padStart(5)}  |  ${signed(f.deviation, 1).padStart(6)}`
    )
  }
  lines.push('-'.repeat(50))
  lines.push(`Chi-square statistic: ${report.chiSquare.toFixed(3)}`)
  lines.push(`Critical value (5% significance, 5 df): ${report.criticalValue.toFixed(3)}`)
  lines.push(report.fair
    ? '✓ Distribution appears fair (fails to reject null hypothesis)'
    : '⚠ Distribution may not be fair (rejects null hypothesis)')
  lines.push('')

  lines.push('STATISTICAL MEASURES:')
  lines.push(`Mean: ${report.mean.toFixed(3)} (expected: ${EXPECTED_MEAN.toFixed(3)})`)
  lines.push(`Median: ${report.median.toFixed(1)} (expected: ${EXPECTED_MEAN.toFixed(3)})`)
  lines.push(`Standard deviation: ${report.stdDev.toFixed(3)} (expected: ~${EXPECTED_STD_DEV.toFixed(3)})`)
  lines.push(`Min: ${report.min}, Max: ${report.max}`)
  lines.push('')

  lines.push('RANGE ANALYSIS:')
  for (const range of report.ranges) {
    lines.push(`${range.label}: ${range.count} rolls (${range.percentage.toFixed(1)}%)`)
  }
  lines.push('')

  lines.push('PATTERN ANALYSIS:')
  lines.push(`Maximum consecutive same number: ${report.maxConsecutive}`)
  lines.push(`Total consecutive same occurrences: ${report.consecutiveRuns}`)

  return lines.join('\n')
}
