/**
 * @beta99/node - Row Coercion
 *
 * Turns header-keyed CSV records into typed SSF and log rows.
 * Missing cells become `null`; register columns absent from the header
 * read as missing on every row.
 */

import { InvalidRowError, REGISTER_FIELDS, createSsfRow } from '@beta99/core'
import type { LogRow, RegisterField, RegisterValue, SsfRow } from '@beta99/core'
import type { CsvRecord } from './csv'

/**
 * Cell texts treated as a missing value
 */
const NULL_TOKENS = new Set(['', 'nan', 'NaN', '-nan', 'NA', '<NA>', 'N/A', 'None', 'null', 'NULL'])

const INTEGER_PATTERN = /^[+-]?\d+(\.0*)?$/

// =============================================================================
// Cell Parsers
// =============================================================================

/**
 * Parse a register cell: missing → null, numeric → truncated integer.
 */
export function parseRegisterCell(
  raw: string | undefined,
  source: string,
  rowNumber: number,
  column: string
): RegisterValue {
  if (raw === undefined) return null
  const text = raw.trim()
  if (NULL_TOKENS.has(text)) return null
  if (text === 'True' || text === 'true') return 1
  if (text === 'False' || text === 'false') return 0
  const value = Number(text)
  if (!Number.isFinite(value)) {
    throw new InvalidRowError(source, rowNumber, column, `not a number: '${raw}'`)
  }
  return Math.trunc(value)
}

/**
 * Parse a required integer cell such as clock or voice.
 */
export function parseRequiredInt(
  raw: string | undefined,
  source: string,
  rowNumber: number,
  column: string
): number {
  const value = parseRegisterCell(raw, source, rowNumber, column)
  if (value === null) {
    throw new InvalidRowError(source, rowNumber, column, 'missing value')
  }
  return value
}

/**
 * Parse a 64-bit hash cell. Negative (signed) hashes wrap to unsigned.
 */
export function parseHashId(
  raw: string | undefined,
  source: string,
  rowNumber: number
): bigint {
  const text = raw?.trim() ?? ''
  if (!INTEGER_PATTERN.test(text)) {
    throw new InvalidRowError(source, rowNumber, 'hashid', `not an integer hash: '${raw ?? ''}'`)
  }
  const digits = text.replace(/\.0*$/, '')
  return BigInt.asUintN(64, BigInt(digits))
}

// =============================================================================
// Row Builders
// =============================================================================

/**
 * Convert SSF table records into typed rows, preserving order.
 */
export function toSsfRows(records: readonly CsvRecord[], source = 'ssf'): SsfRow[] {
  return records.map((record, index) => {
    const rowNumber = index + 1
    const registers: Partial<Record<RegisterField, RegisterValue>> = {}
    for (const field of REGISTER_FIELDS) {
      registers[field] = parseRegisterCell(record[field], source, rowNumber, field)
    }
    return createSsfRow(
      parseHashId(record.hashid, source, rowNumber),
      parseRequiredInt(record.clock, source, rowNumber, 'clock'),
      registers
    )
  })
}

/**
 * Convert playback log records into typed rows, preserving order.
 */
export function toLogRows(records: readonly CsvRecord[], source = 'log'): LogRow[] {
  return records.map((record, index) => {
    const rowNumber = index + 1
    return {
      hashid: parseHashId(record.hashid, source, rowNumber),
      clock: parseRequiredInt(record.clock, source, rowNumber, 'clock'),
      voice: parseRequiredInt(record.voice, source, rowNumber, 'voice'),
    }
  })
}
