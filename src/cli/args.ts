// Command-line argument parsing

import { InvalidArgumentError } from '../engine/errors.js'

export type Command = 'roll' | 'verify' | 'analyze'
export type OutputFormat = 'text' | 'json'

export interface CLIArgs {
  command?: Command
  seed?: string
  count?: string
  checkpoint?: string
  followUp?: string
  inputFile?: string
  outputFile?: string
  format: OutputFormat
  verbose: boolean
  help: boolean
}

const COMMANDS: readonly Command[] = ['roll', 'verify', 'analyze']

function isCommand(value: string): value is Command {
  return COMMANDS.some(c => c === value)
}

function parseFormat(value: string | undefined): OutputFormat {
  if (value === 'text' || value === 'json') return value
  throw new InvalidArgumentError(`Unknown format: ${value ?? '(missing)'}`)
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('-')) {
    throw new InvalidArgumentError(`Option ${flag} needs a value`)
  }
  return value
}

export function parseArgs(argv: readonly string[]): CLIArgs {
  const result: CLIArgs = {
    format: 'text',
    verbose: false,
    help: false,
  }

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]

    switch (arg) {
      case '-s':
      case '--seed':
        result.seed = requireValue(arg, argv[++i])
        break
      case '-n':
      case '--count':
        result.count = requireValue(arg, argv[++i])
        break
      case '-c':
      case '--checkpoint':
        result.checkpoint = requireValue(arg, argv[++i])
        break
      case '--follow-up':
        result.followUp = requireValue(arg, argv[++i])
        break
      case '-i':
      case '--input':
        result.inputFile = requireValue(arg, argv[++i])
        break
      case '-o':
      case '--output':
        result.outputFile = requireValue(arg, argv[++i])
        break
      case '-f':
      case '--format':
        result.format = parseFormat(argv[++i])
        break
      case '-v':
      case '--verbose':
        result.verbose = true
        break
      case '-h':
      case '--help':
        result.help = true
        break
      default:
        if (arg.startsWith('-')) {
          throw new InvalidArgumentError(`Unknown option: ${arg}`)
        }
        if (result.command === undefined) {
          if (!isCommand(arg)) {
            throw new InvalidArgumentError(`Unknown command: ${arg}`)
          }
          result.command = arg
        } else if (!result.inputFile) {
          result.inputFile = arg
        }
    }
  }

  return result
}

/**
 * Positive integer option, e.g. --count
 */
export function parseCount(value: string, label: string): number {
  if (!/^[0-9]+$/.test(value.trim())) {
    throw new InvalidArgumentError(`${label} must be a positive integer, got "${value}"`)
  }
  const count = Number(value)
  if (!Number.isSafeInteger(count) || count <= 0) {
    throw new InvalidArgumentError(`${label} must be a positive integer, got "${value}"`)
  }
  return count
}
