// =============================================================================
// Beta99 - Fragment Table Builder
// =============================================================================

import { MAX_FRAGMENTS } from '../format/constants'
import type { Fragment, FragmentTable, SsfRow } from '../format/types'
import { FragmentCapacityError } from '../errors'
import { encodeFragment } from '../encoder/encode'
import { chunkFragment, resolveMaxOps } from '../encoder/chunk'

/**
 * Group rows by hash, keeping groups in first-encounter order and rows in
 * their original order within each group.
 */
export function groupByHash(rows: Iterable<SsfRow>): Map<bigint, SsfRow[]> {
  const groups = new Map<bigint, SsfRow[]>()
  for (const row of rows) {
    const group = groups.get(row.hashid)
    if (group) {
      group.push(row)
    } else {
      groups.set(row.hashid, [row])
    }
  }
  return groups
}

/**
 * Encode and chunk every fragment group, assigning table indices in order.
 *
 * @throws FragmentCapacityError if the table outgrows 16-bit indices
 */
export function buildFragmentTable(
  groups: ReadonlyMap<bigint, readonly SsfRow[]>,
  maxOps?: number
): FragmentTable {
  const limit = resolveMaxOps(maxOps)
  const fragments: Fragment[] = []
  const chunks = new Map<bigint, readonly number[]>()

  for (const [hashid, rows] of groups) {
    const indices: number[] = []
    for (const fragment of chunkFragment(hashid, encodeFragment(rows), limit)) {
      indices.push(fragments.length)
      fragments.push(fragment)
    }
    chunks.set(hashid, indices)
  }

  if (fragments.length > MAX_FRAGMENTS) {
    throw new FragmentCapacityError(fragments.length, MAX_FRAGMENTS)
  }

  return { fragments, chunks }
}
