/**
 * @beta99/node - Pack Command
 *
 * Reads the SSF and log tables, builds the bundle and writes it (plus an
 * optional JSON debug dump). Output files only appear once all of them are written.
 */

import * as fs from 'fs'
import { buildBundle, packBundle, serializeDebugDump } from '@beta99/core'
import { logger } from './logger'
import { readZstdCsv } from './csv'
import { toLogRows, toSsfRows } from './rows'

// =============================================================================
// Types
// =============================================================================

/**
 * Pack command configuration.
 */
export interface PackCommandOptions {
  /** Path to the zstd-compressed SSF table */
  ssfPath: string
  /** Path to the zstd-compressed playback log */
  logPath: string
  /** Destination of the binary bundle */
  outPath: string
  /** Optional destination of the JSON debug dump */
  jsonPath?: string
  /** Operations per fragment before splitting (default: 512) */
  maxOps?: number
}

/**
 * What a successful pack produced.
 */
export interface PackSummary {
  fragments: number
  triggers: number
  bytes: number
}

// =============================================================================
// Command
// =============================================================================

export async function runPack(options: PackCommandOptions): Promise<PackSummary> {
  const { ssfPath, logPath, outPath, jsonPath, maxOps } = options

  const [ssfRecords, logRecords] = await Promise.all([readZstdCsv(ssfPath), readZstdCsv(logPath)])
  logger.debug(`read ${ssfRecords.length} SSF rows from ${ssfPath}, ${logRecords.length} log rows from ${logPath}`)

  const bundle = buildBundle(toSsfRows(ssfRecords, ssfPath), toLogRows(logRecords, logPath), {
    maxOpsPerFragment: maxOps,
  })
  const bytes = packBundle(bundle)

  const outputs: OutputFile[] = [{ path: outPath, data: bytes }]
  if (jsonPath !== undefined) {
    outputs.push({ path: jsonPath, data: serializeDebugDump(bundle) })
  }
  await writeFilesAtomic(outputs)
  if (jsonPath !== undefined) {
    logger.debug(`debug dump written to ${jsonPath}`)
  }

  logger.info(
    `beta99 bundle written to ${outPath} | SSFs: ${bundle.fragments.length} | Triggers: ${bundle.triggers.length}`
  )

  return { fragments: bundle.fragments.length, triggers: bundle.triggers.length, bytes: bytes.byteLength }
}

/**
 * One file to be written by {@link writeFilesAtomic}.
 */
export interface OutputFile {
  path: string
  data: Uint8Array | string
}

/**
 * Write every file to a sibling temp file, then rename them all into place.
 * If any step fails, temp files and files already renamed are removed, so
 * either every output appears or none does.
 */
export async function writeFilesAtomic(files: readonly OutputFile[]): Promise<void> {
  const committed: string[] = []
  try {
    for (const file of files) {
      await fs.promises.writeFile(`${file.path}.tmp`, file.data)
    }
    for (const file of files) {
      await fs.promises.rename(`${file.path}.tmp`, file.path)
      committed.push(file.path)
    }
  } catch (error) {
    await Promise.all([
      ...files.map(file => fs.promises.rm(`${file.path}.tmp`, { force: true })),
      ...committed.map(path => fs.promises.rm(path, { force: true })),
    ])
    throw error
  }
}

/**
 * Write a single file through a sibling temp file.
 */
export async function writeFileAtomic(path: string, data: Uint8Array | string): Promise<void> {
  await writeFilesAtomic([{ path, data }])
}
