/**
 * @beta99/node - Test Utilities
 */

import * as fs from 'fs'
import * as path from 'path'
import * as os from 'os'

/**
 * Largest raw block a zstd frame may carry.
 */
const MAX_RAW_BLOCK = 128 * 1024

/**
 * Wrap bytes in a single-segment zstd frame made of raw (stored) blocks.
 * Node.js 20 has no zstd compressor, and the reader only needs a valid frame.
 */
export function zstdStore(data: Uint8Array): Uint8Array {
  const size = data.byteLength
  const out: number[] = [
    0x28, 0xB5, 0x2F, 0xFD, // magic
    0xA0, // single segment, 4-byte content size
    size & 0xFF, (size >>> 8) & 0xFF, (size >>> 16) & 0xFF, (size >>> 24) & 0xFF
  ]
  let offset = 0
  do {
    const blockSize = Math.min(MAX_RAW_BLOCK, size - offset)
    const last = offset + blockSize >= size ? 1 : 0
    const header = (blockSize << 3) | last // block type 0 = raw
    out.push(header & 0xFF, (header >>> 8) & 0xFF, (header >>> 16) & 0xFF)
    for (let i = 0; i < blockSize; i++) out.push(data[offset + i])
    offset += blockSize
  } while (offset < size)
  return Uint8Array.from(out)
}

/**
 * Write CSV text as a zstd-framed file.
 */
export function writeZstdCsv(filePath: string, csv: string): void {
  fs.writeFileSync(filePath, zstdStore(Buffer.from(csv, 'utf8')))
}

/**
 * Create a temporary directory for testing.
 */
export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'beta99-test-'))
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true })
}
