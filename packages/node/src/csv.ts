/**
 * @beta99/node - Compressed CSV Reader
 *
 * Reads the zstd-compressed CSV tables (`*.ssf.zst`, `*.log.zst`) into
 * header-keyed string records.
 */

import * as fs from 'fs'
import { decompress } from 'fzstd'
import { parse } from 'csv-parse'

/**
 * One CSV data row keyed by header name
 */
export type CsvRecord = Record<string, string>

/**
 * Read and decompress a zstd file, then parse it as CSV with a header row.
 */
export async function readZstdCsv(path: string): Promise<CsvRecord[]> {
  const compressed = await fs.promises.readFile(path)
  const payload = decompress(new Uint8Array(compressed.buffer, compressed.byteOffset, compressed.byteLength))
  return parseCsv(Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength).toString('utf8'))
}

/**
 * Parse CSV text with a header row into string records.
 */
export function parseCsv(content: string): Promise<CsvRecord[]> {
  return new Promise((resolve, reject) => {
    parse(
      content,
      {
        columns: true,
        skip_empty_lines: true,
        trim: true,
        bom: true,
        // Short rows read as missing trailing cells
        relax_column_count: true,
      },
      (err: Error | undefined, records: unknown) => {
        if (err) {
          reject(err)
          return
        }
        if (!isRecordArray(records)) {
          reject(new Error('CSV parser returned unexpected records'))
          return
        }
        resolve(records)
      }
    )
  })
}

function isRecordArray(value: unknown): value is CsvRecord[] {
  return (
    Array.isArray(value) &&
    value.every(
      (row: unknown) =>
        typeof row === 'object' &&
        row !== null &&
        Object.values(row).every(cell => typeof cell === 'string')
    )
  )
}
