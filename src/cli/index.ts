#!/usr/bin/env node
// CLI Tool for provably fair dice rolls
// Rolls from a committed seed, verifies revealed sessions, analyzes distributions

import { readFileSync, writeFileSync, existsSync } from 'fs'
import { formatFieldElement } from '../crypto/field.js'
import { parseArgs } from './args.js'
import type { CLIArgs } from './args.js'
import { DEFAULTS, resolveRollOptions, runRoll, loadVerificationInput, runVerify, runAnalyze } from './commands.js'

// ============================================
// CLI INTERFACE
// ============================================

function printUsage(): void {
  console.log(`
Dice Chain
==========

Provably fair dice rolls from a committed hash chain.

Usage:
  dicechain roll [options]
  dicechain verify [options] <input-file>
  dicechain analyze [input-file]

Roll options:
  -s, --seed <felt>        Secret seed, decimal or 0x hex (default: random)
  -n, --count <n>          Number of rolls (default: ${DEFAULTS.count})
  -c, --checkpoint <felt>  Resume from a checkpoint (needs --seed); 0 starts fresh (default: 0)
      --follow-up <n>      Rolls in the continuation demo (default: ${DEFAULTS.followUp})

Verify options:
  -i, --input <file>       Input JSON file with verification data
  -o, --output <file>      Output file for verification report

Common options:
  -f, --format <fmt>       Output format: text or json (default: text)
  -v, --verbose            Verbose output
  -h, --help               Show this help message

Verification File Format:
  {
    "seed": "42",
    "commitment": "0x...",
    "outcomes": [3, 1, 6],
    "checkpoint": "0x..."
  }

Examples:
  # Roll 20 dice from a seed
  dicechain roll --seed 42 --count 20

  # Continue from the printed checkpoint
  dicechain roll --seed 42 --checkpoint 0x... --count 20

  # Verify a revealed session
  dicechain verify session.json

  # Distribution of a long run
  dicechain roll --count 6000 --format json | dicechain analyze
`)
}

// ============================================
// COMMANDS
// ============================================

function rollCommand(args: CLIArgs): number {
  const options = resolveRollOptions(args)

  if (args.verbose) {
    console.error(args.seed === undefined ? 'Generated a random seed' : 'Using supplied seed')
    console.error(options.checkpoint === 0n ? 'Starting a fresh chain' : 'Resuming from checkpoint')
  }

  console.log(runRoll(options))
  return 0
}

function verifyCommand(args: CLIArgs): number {
  if (!args.inputFile) {
    console.error('Error: No input specified. Use -i <file> or provide a file path.')
    printUsage()
    return 1
  }
  if (!existsSync(args.inputFile)) {
    throw new Error(`File not found: ${args.inputFile}`)
  }

  const input = loadVerificationInput(readFileSync(args.inputFile, 'utf-8'))

  if (args.verbose) {
    console.log('\nLoaded verification data:')
    console.log(`  Seed: ${formatFieldElement(input.seed)}`)
    console.log(`  Commitment: ${formatFieldElement(input.commitment).substring(0, 18)}...`)
    console.log(`  Claimed rolls: ${input.outcomes.length}`)
    console.log(`  Checkpoint: ${input.checkpoint === undefined ? 'N/A' : 'claimed'}`)
    console.log('')
  }

  console.log('Verifying session...\n')
  const { output, valid } = runVerify(input, args.format)

  if (args.outputFile) {
    writeFileSync(args.outputFile, output)
    console.log(`Report written to ${args.outputFile}`)
  } else {
    console.log(output)
  }

  return valid ? 0 : 1
}

function analyzeCommand(args: CLIArgs): number {
  let text: string
  if (args.inputFile) {
    if (!existsSync(args.inputFile)) {
      throw new Error(`File not found: ${args.inputFile}`)
    }
    text = readFileSync(args.inputFile, 'utf-8')
  } else {
    if (process.stdin.isTTY) {
      console.error('Usage: dicechain roll --format json | dicechain analyze')
      console.error('This command expects dice roll data piped on stdin or a file path.')
      return 1
    }
    text = readFileSync(0, 'utf-8')
  }

  console.log(runAnalyze(text))
  return 0
}

function main(): void {
  let code = 1

  try {
    const args = parseArgs(process.argv.slice(2))

    if (args.help || args.command === undefined) {
      printUsage()
      process.exit(args.help ? 0 : 1)
    }

    switch (args.command) {
      case 'roll':
        code = rollCommand(args)
        break
      case 'verify':
        code = verifyCommand(args)
        break
      case 'analyze':
        code = analyzeCommand(args)
        break
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
    code = 1
  }

  process.exit(code)
}

// Run
main()
