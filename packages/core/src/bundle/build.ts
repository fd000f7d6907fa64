// =============================================================================
// Beta99 - Bundle Builder
// =============================================================================

import type { Bundle, LogRow, PackOptions, SsfRow } from '../format/types'
import { DEFAULT_MAX_OPS_PER_FRAGMENT } from '../format/constants'
import { buildFragmentTable, groupByHash } from './fragment-table'
import { buildTriggers } from './triggers'

/**
 * Build the complete in-memory bundle: the fragment table is fully
 * materialized before the log is turned into triggers.
 *
 * @param ssfRows - Register rows for every fragment hash, in source order
 * @param log - Playback log rows, in source order
 * @param options - Build options (chunk limit)
 */
export function buildBundle(
  ssfRows: Iterable<SsfRow>,
  log: readonly LogRow[],
  options: PackOptions = {}
): Bundle {
  const { maxOpsPerFragment = DEFAULT_MAX_OPS_PER_FRAGMENT } = options

  const table = buildFragmentTable(groupByHash(ssfRows), maxOpsPerFragment)
  const triggers = buildTriggers(log, table.chunks)

  return { fragments: table.fragments, triggers }
}
