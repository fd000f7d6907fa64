/**
 * @beta99/node - CLI Argument Parser
 *
 * Pure functions for parsing command line arguments.
 * No I/O happens here so the parser can be tested directly.
 */

import { DEFAULT_MAX_OPS_PER_FRAGMENT } from '@beta99/core'

// =============================================================================
// Types
// =============================================================================

/**
 * Error for invalid command line usage. The CLI prints help text after it.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  help: boolean
  version: boolean
  quiet: boolean
  verbose: boolean
  ssfPath?: string
  logPath?: string
  outPath?: string
  jsonPath?: string
  maxOps: number
}

// =============================================================================
// Parser
// =============================================================================

/**
 * Parse command line arguments
 *
 * @throws UsageError on unknown flags, missing values or a bad --max-ops
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    help: false,
    version: false,
    quiet: false,
    verbose: false,
    maxOps: DEFAULT_MAX_OPS_PER_FRAGMENT,
  }

  const value = (i: number, flag: string): string => {
    const next = argv[i]
    if (next === undefined || (next.startsWith('-') && !/^-\d+$/.test(next))) {
      throw new UsageError(`Missing value for ${flag}`)
    }
    return next
  }

  let i = 0
  while (i < argv.length) {
    const arg = argv[i]

    switch (arg) {
      case '-h':
      case '--help':
        result.help = true
        break
      case '-v':
      case '--version':
        result.version = true
        break
      case '-q':
      case '--quiet':
        result.quiet = true
        break
      case '--verbose':
        result.verbose = true
        break
      case '--ssf':
        result.ssfPath = value(++i, arg)
        break
      case '--log':
        result.logPath = value(++i, arg)
        break
      case '--out':
        result.outPath = value(++i, arg)
        break
      case '--json':
        result.jsonPath = value(++i, arg)
        break
      case '--max-ops': {
        const raw = value(++i, arg)
        if (!/^-?\d+$/.test(raw)) {
          throw new UsageError(`Invalid --max-ops: ${raw}`)
        }
        // Values below 1 are clamped, not rejected
        result.maxOps = Math.max(1, parseInt(raw, 10))
        break
      }
      default:
        throw new UsageError(arg.startsWith('-') ? `Unknown option: ${arg}` : `Unexpected argument: ${arg}`)
    }
    i++
  }

  return result
}

/**
 * Paths required to run a pack, once help/version are ruled out.
 *
 * @throws UsageError naming the first missing flag
 */
export function requirePaths(args: ParsedArgs): { ssfPath: string; logPath: string; outPath: string } {
  if (args.ssfPath === undefined) throw new UsageError('Missing required option --ssf')
  if (args.logPath === undefined) throw new UsageError('Missing required option --log')
  if (args.outPath === undefined) throw new UsageError('Missing required option --out')
  return { ssfPath: args.ssfPath, logPath: args.logPath, outPath: args.outPath }
}
