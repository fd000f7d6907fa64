// =============================================================================
// Beta99 - Chunker
// =============================================================================

import { DEFAULT_MAX_OPS_PER_FRAGMENT } from '../format/constants'
import type { Fragment, Operation } from '../format/types'
import type { EncodedFragment } from './encode'

/**
 * Clamp a requested chunk limit to a usable integer (at least 1).
 */
export function resolveMaxOps(maxOps: number = DEFAULT_MAX_OPS_PER_FRAGMENT): number {
  if (!Number.isFinite(maxOps)) return DEFAULT_MAX_OPS_PER_FRAGMENT
  return Math.max(1, Math.trunc(maxOps))
}

/**
 * Split an encoded fragment into fragment records of at most `maxOps` ops.
 *
 * Durations differ between the two shapes:
 * - unsplit (or empty): the encoder's absolute duration
 * - split: each chunk's duration is the sum of its own deltas
 */
export function chunkFragment(
  hashid: bigint,
  encoded: EncodedFragment,
  maxOps: number = DEFAULT_MAX_OPS_PER_FRAGMENT
): Fragment[] {
  const limit = resolveMaxOps(maxOps)
  const { ops, duration } = encoded

  if (ops.length <= limit) {
    return [{ hashid, duration, ops }]
  }

  const chunks: Fragment[] = []
  for (let start = 0; start < ops.length; start += limit) {
    const slice = ops.slice(start, start + limit)
    if (slice.length === 0) continue
    chunks.push({ hashid, duration: sumDeltas(slice), ops: slice })
  }
  return chunks
}

export function sumDeltas(ops: readonly Operation[]): number {
  let total = 0
  for (const op of ops) {
    total += op.delta
  }
  return total
}
