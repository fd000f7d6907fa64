// =============================================================================
// Beta99 - Trigger Builder
// =============================================================================

import type { ChunkIndexTable, LogRow, Trigger } from '../format/types'
import { UnknownFragmentHashError } from '../errors'
import { sortByClock } from '../encoder/encode'

/**
 * Turn the playback log into triggers, one per chunk of the referenced hash.
 * The delta is measured from the previous log row across the whole log and
 * rides on the first trigger of each row only.
 *
 * @throws UnknownFragmentHashError if a row names a hash missing from `chunks`
 */
export function buildTriggers(log: readonly LogRow[], chunks: ChunkIndexTable): Trigger[] {
  const triggers: Trigger[] = []
  let prevClock = 0

  for (const row of sortByClock(log)) {
    const delta = row.clock - prevClock
    prevClock = row.clock

    const indices = chunks.get(row.hashid)
    if (indices === undefined) {
      throw new UnknownFragmentHashError(row.hashid)
    }

    indices.forEach((ssfIndex, i) => {
      triggers.push({ delta: i === 0 ? delta : 0, ssfIndex, voice: row.voice })
    })
  }

  return triggers
}
