// =============================================================================
// Beta99 - Fragment Table and Trigger Tests
// =============================================================================

import { buildFragmentTable, groupByHash } from '../bundle/fragment-table'
import { buildTriggers } from '../bundle/triggers'
import { buildBundle } from '../bundle/build'
import { createSsfRow } from '../format/rows'
import { OP } from '../format/constants'
import { FragmentCapacityError, UnknownFragmentHashError } from '../errors'
import type { SsfRow } from '../format/types'

// =============================================================================
// Fixtures
// =============================================================================

const HASH_A = 0xAAn
const HASH_B = 0xBBn

/**
 * Five rows one tick apart, each changing the volume: five ops with delta 1.
 */
function fiveVolumeSteps(): SsfRow[] {
  return [1, 2, 3, 4, 5].map(tick => createSsfRow(HASH_A, tick, { vol: tick }))
}

/**
 * A group whose only row carries no values at all.
 */
function silentGroup(): SsfRow[] {
  return [createSsfRow(HASH_B, 7)]
}

// =============================================================================
// Grouping
// =============================================================================

describe('groupByHash', () => {
  it('keeps groups in first-encounter order and rows in source order', () => {
    const rows = [
      createSsfRow(5n, 10),
      createSsfRow(2n, 0),
      createSsfRow(5n, 3),
      createSsfRow(9n, 1)
    ]

    const groups = groupByHash(rows)

    expect([...groups.keys()]).toEqual([5n, 2n, 9n])
    expect(groups.get(5n)?.map(r => r.clock)).toEqual([10, 3])
  })
})

// =============================================================================
// Fragment Table
// =============================================================================

describe('buildFragmentTable', () => {
  it('assigns consecutive indices to chunks across hashes', () => {
    const groups = new Map([
      [HASH_A, fiveVolumeSteps()],
      [HASH_B, silentGroup()]
    ])

    const { fragments, chunks } = buildFragmentTable(groups, 2)

    expect(chunks.get(HASH_A)).toEqual([0, 1, 2])
    expect(chunks.get(HASH_B)).toEqual([3])
    expect(fragments.map(f => f.hashid)).toEqual([HASH_A, HASH_A, HASH_A, HASH_B])
    expect(fragments.map(f => f.ops.length)).toEqual([2, 2, 1, 0])
    expect(fragments.map(f => f.duration)).toEqual([2, 2, 1, 7])
  })

  it('uses the absolute duration when no split is needed', () => {
    const { fragments } = buildFragmentTable(new Map([[HASH_A, fiveVolumeSteps()]]))

    expect(fragments).toHaveLength(1)
    expect(fragments[0].duration).toBe(5)
    expect(fragments[0].ops.map(op => op.opcode)).toEqual(new Array<number>(5).fill(OP.SET_VOLUME))
  })

  it('rejects tables that outgrow 16-bit indices', () => {
    const groups = new Map<bigint, SsfRow[]>()
    for (let i = 0; i <= 0xFFFF; i++) {
      groups.set(BigInt(i), [])
    }

    expect(() => buildFragmentTable(groups)).toThrow(FragmentCapacityError)
    expect(() => buildFragmentTable(groups)).toThrow('Count=65536, Capacity=65535')
  })
})

// =============================================================================
// Triggers
// =============================================================================

describe('buildTriggers', () => {
  const chunks = new Map<bigint, readonly number[]>([
    [HASH_A, [0, 1, 2]],
    [HASH_B, [3]]
  ])

  it('fans out one trigger per chunk with the delta on the first', () => {
    const triggers = buildTriggers([{ hashid: HASH_A, clock: 5, voice: 1 }], chunks)

    expect(triggers).toEqual([
      { delta: 5, ssfIndex: 0, voice: 1 },
      { delta: 0, ssfIndex: 1, voice: 1 },
      { delta: 0, ssfIndex: 2, voice: 1 }
    ])
  })

  it('measures deltas across the whole sorted log', () => {
    const log = [
      { hashid: HASH_B, clock: 10, voice: 0 },
      { hashid: HASH_A, clock: 4, voice: 2 },
      { hashid: HASH_B, clock: 10, voice: 1 }
    ]

    expect(buildTriggers(log, chunks)).toEqual([
      { delta: 4, ssfIndex: 0, voice: 2 },
      { delta: 0, ssfIndex: 1, voice: 2 },
      { delta: 0, ssfIndex: 2, voice: 2 },
      { delta: 6, ssfIndex: 3, voice: 0 },
      { delta: 0, ssfIndex: 3, voice: 1 }
    ])
  })

  it('fails on a hash with no table entry', () => {
    const log = [{ hashid: 0xCCn, clock: 0, voice: 0 }]

    expect(() => buildTriggers(log, chunks)).toThrow(UnknownFragmentHashError)
    expect(() => buildTriggers(log, chunks)).toThrow('Unknown fragment hash referenced by trigger: 204')
  })
})

// =============================================================================
// Bundle
// =============================================================================

describe('buildBundle', () => {
  it('builds the table before resolving triggers', () => {
    const ssfRows = [...fiveVolumeSteps(), ...silentGroup()]
    const log = [
      { hashid: HASH_B, clock: 3, voice: 2 },
      { hashid: HASH_A, clock: 8, voice: 0 }
    ]

    const bundle = buildBundle(ssfRows, log, { maxOpsPerFragment: 4 })

    expect(bundle.fragments.map(f => [f.ops.length, f.duration])).toEqual([[4, 4], [1, 1], [0, 7]])
    expect(bundle.triggers).toEqual([
      { delta: 3, ssfIndex: 2, voice: 2 },
      { delta: 5, ssfIndex: 0, voice: 0 },
      { delta: 0, ssfIndex: 1, voice: 0 }
    ])
  })

  it('produces no triggers for an empty log', () => {
    const bundle = buildBundle(silentGroup(), [])
    expect(bundle.fragments).toHaveLength(1)
    expect(bundle.triggers).toEqual([])
  })
})
