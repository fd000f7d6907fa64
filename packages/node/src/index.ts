/**
 * @beta99/node
 *
 * Node.js adapters for the beta99 packer: compressed CSV input,
 * row coercion, the pack command and its CLI.
 * Requires Node.js 20+.
 */

export { readZstdCsv, parseCsv } from './csv'
export type { CsvRecord } from './csv'
export { toSsfRows, toLogRows, parseRegisterCell, parseRequiredInt, parseHashId } from './rows'
export { runPack, writeFileAtomic, writeFilesAtomic } from './pack-command'
export type { PackCommandOptions, PackSummary, OutputFile } from './pack-command'
export { parseArgs, requirePaths, UsageError } from './args'
export type { ParsedArgs } from './args'
export { createConsoleLogger, consoleLogger, noopLogger, logger, setLogger } from './logger'
export type { Logger, LogLevel } from './logger'
export { main, VERSION, HELP_TEXT } from './cli'
