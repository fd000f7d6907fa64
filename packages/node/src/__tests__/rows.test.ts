/**
 * @beta99/node - Row Coercion and CSV Tests
 */

import * as path from 'path'
import { InvalidRowError } from '@beta99/core'
import { parseCsv, readZstdCsv } from '../csv'
import { parseHashId, parseRegisterCell, toLogRows, toSsfRows } from '../rows'
import { cleanupTempDir, createTempDir, writeZstdCsv } from './helpers'

describe('parseRegisterCell', () => {
  it('maps missing cells to null', () => {
    expect(parseRegisterCell(undefined, 'ssf', 1, 'freq1')).toBeNull()
    expect(parseRegisterCell('', 'ssf', 1, 'freq1')).toBeNull()
    expect(parseRegisterCell('nan', 'ssf', 1, 'freq1')).toBeNull()
    expect(parseRegisterCell('NaN', 'ssf', 1, 'freq1')).toBeNull()
  })

  it('truncates numeric cells', () => {
    expect(parseRegisterCell('100', 'ssf', 1, 'freq1')).toBe(100)
    expect(parseRegisterCell('100.0', 'ssf', 1, 'freq1')).toBe(100)
    expect(parseRegisterCell('7.9', 'ssf', 1, 'freq1')).toBe(7)
    expect(parseRegisterCell('True', 'ssf', 1, 'gate1')).toBe(1)
  })

  it('rejects text that is not a number', () => {
    expect(() => parseRegisterCell('abc', 'ssf', 3, 'freq1')).toThrow(InvalidRowError)
    expect(() => parseRegisterCell('abc', 'ssf', 3, 'freq1')).toThrow(
      "ssf: row 3, column 'freq1': not a number: 'abc'"
    )
  })
})

describe('parseHashId', () => {
  it('parses unsigned and signed 64-bit hashes', () => {
    expect(parseHashId('42', 'log', 1)).toBe(42n)
    expect(parseHashId('42.0', 'log', 1)).toBe(42n)
    expect(parseHashId('18446744073709551615', 'log', 1)).toBe(18446744073709551615n)
    expect(parseHashId('-1', 'log', 1)).toBe(18446744073709551615n)
  })

  it('rejects missing or fractional hashes', () => {
    expect(() => parseHashId(undefined, 'log', 2)).toThrow("log: row 2, column 'hashid'")
    expect(() => parseHashId('1.5', 'log', 2)).toThrow(InvalidRowError)
  })
})

describe('toSsfRows', () => {
  it('fills absent register columns with null', () => {
    const [row] = toSsfRows([{ hashid: '5', clock: '12', freq1: '300', gate1: '' }])

    expect(row.hashid).toBe(5n)
    expect(row.clock).toBe(12)
    expect(row.freq1).toBe(300)
    expect(row.gate1).toBeNull()
    expect(row.vol).toBeNull()
  })

  it('requires a clock', () => {
    expect(() => toSsfRows([{ hashid: '5', clock: '' }], 'tune.ssf')).toThrow(
      "tune.ssf: row 1, column 'clock': missing value"
    )
  })
})

describe('toLogRows', () => {
  it('reads hash, clock and voice', () => {
    expect(toLogRows([{ clock: '40', hashid: '7', voice: '2' }])).toEqual([{ hashid: 7n, clock: 40, voice: 2 }])
  })

  it('requires a voice', () => {
    expect(() => toLogRows([{ clock: '40', hashid: '7' }])).toThrow("log: row 1, column 'voice': missing value")
  })
})

describe('parseCsv', () => {
  it('keys rows by header and keeps empty cells', async () => {
    const records = await parseCsv('hashid,clock,freq1\n1,0,100\n1,10,\n')
    expect(records).toEqual([
      { hashid: '1', clock: '0', freq1: '100' },
      { hashid: '1', clock: '10', freq1: '' },
    ])
  })

  it('reads cells missing from a short row as missing registers', async () => {
    const records = await parseCsv('hashid,clock,vol\n1,0\n1,4,9\n')
    const rows = toSsfRows(records)

    expect(rows).toHaveLength(2)
    expect(rows[0].clock).toBe(0)
    expect(rows[0].vol).toBeNull()
    expect(rows[1].vol).toBe(9)
  })
})

describe('readZstdCsv', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = createTempDir()
  })

  afterEach(() => {
    cleanupTempDir(tempDir)
  })

  it('decompresses and parses a table', async () => {
    const file = path.join(tempDir, 'tune.log.zst')
    writeZstdCsv(file, 'clock,hashid,voice\n0,11,1\n16,12,3\n')

    expect(await readZstdCsv(file)).toEqual([
      { clock: '0', hashid: '11', voice: '1' },
      { clock: '16', hashid: '12', voice: '3' },
    ])
  })
})
