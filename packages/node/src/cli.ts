#!/usr/bin/env node
/**
 * @beta99/node - CLI
 *
 * Usage:
 *   beta99-pack --ssf tune.ssf.zst --log tune.log.zst --out tune.b99 [--json tune.json]
 */

import { parseArgs, requirePaths, UsageError } from './args'
import { createConsoleLogger, logger, setLogger } from './logger'
import { runPack } from './pack-command'

// =============================================================================
// Constants
// =============================================================================

export const VERSION = '0.1.0'

export const HELP_TEXT = `
beta99-pack v${VERSION}

Pack SSF register logs into a beta99 bundle.

USAGE:
  beta99-pack --ssf <file> --log <file> --out <file> [options]

OPTIONS:
  --ssf <path>                  zstd-compressed SSF table (*.ssf.zst)
  --log <path>                  zstd-compressed playback log (*.log.zst)
  --out <path>                  Output bundle (*.b99)
  --json <path>                 Also write a JSON debug dump
  --max-ops <n>                 Operations per SSF before splitting (default: 512)
  -q, --quiet                   Only print errors
  --verbose                     Print debug output
  -h, --help                    Show this help message
  -v, --version                 Show version number
`

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Run the CLI and return the process exit code.
 */
export async function main(argv: readonly string[]): Promise<number> {
  try {
    const args = parseArgs(argv)
    setLogger(createConsoleLogger(args.quiet ? 'error' : args.verbose ? 'debug' : 'info'))

    if (args.help) {
      process.stdout.write(HELP_TEXT)
      return 0
    }
    if (args.version) {
      process.stdout.write(`${VERSION}\n`)
      return 0
    }

    const paths = requirePaths(args)
    await runPack({ ...paths, jsonPath: args.jsonPath, maxOps: args.maxOps })
    return 0
  } catch (error) {
    if (error instanceof UsageError) {
      setLogger(createConsoleLogger('error'))
      logger.error(`${error.name}: ${error.message}`)
      process.stderr.write(HELP_TEXT)
      return 1
    }
    logger.error(error instanceof Error ? `${error.name}: ${error.message}` : String(error))
    return 1
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code
    },
    (error: unknown) => {
      console.error(error)
      process.exitCode = 1
    }
  )
}
