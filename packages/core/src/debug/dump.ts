// =============================================================================
// Beta99 - Debug Dump
// =============================================================================

import type { Bundle } from '../format/types'

export interface DebugOp {
  delta: number
  opcode: number
  data: number[]
}

export interface DebugFragment {
  /** Unsigned 64-bit hash as a decimal string (exceeds JSON safe integers) */
  hashid: string
  duration: number
  ops: DebugOp[]
}

export interface DebugTrigger {
  delta: number
  ssf_index: number
  voice: number
}

export interface DebugDump {
  ssfs: DebugFragment[]
  triggers: DebugTrigger[]
}

/**
 * Mirror a bundle as plain JSON-safe data.
 */
export function toDebugDump(bundle: Bundle): DebugDump {
  return {
    ssfs: bundle.fragments.map(fragment => ({
      hashid: BigInt.asUintN(64, fragment.hashid).toString(),
      duration: fragment.duration,
      ops: fragment.ops.map(op => ({
        delta: op.delta,
        opcode: op.opcode,
        data: Array.from(op.payload)
      }))
    })),
    triggers: bundle.triggers.map(trigger => ({
      delta: trigger.delta,
      ssf_index: trigger.ssfIndex,
      voice: trigger.voice
    }))
  }
}

export function serializeDebugDump(bundle: Bundle): string {
  return JSON.stringify(toDebugDump(bundle), null, 2)
}
