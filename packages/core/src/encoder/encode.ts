// =============================================================================
// Beta99 - State-Diff Encoder
// =============================================================================

import { CONTROL_FLAGS, FILTER_MODE_FLAGS, OP } from '../format/constants'
import type { Operation, RegisterValue, SsfRow } from '../format/types'
import {
  createChangeState,
  normalize,
  packControl,
  packFilterMode,
  packNibbles,
  payloadOf
} from './state'
import type { ChangeState, LastEmitted, RegisterWidth } from './state'

// =============================================================================
// Types
// =============================================================================

/**
 * Encoder output for one fragment group.
 */
export interface EncodedFragment {
  readonly ops: readonly Operation[]
  /** Highest clock seen in the group (absolute ticks) */
  readonly duration: number
}

type Emit = (opcode: number, payload: Uint8Array) => void

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Encode the rows of one fragment hash into delta-timed register changes.
 * Rows are stably sorted by clock first; the input array is not modified.
 */
export function encodeFragment(rows: readonly SsfRow[]): EncodedFragment {
  const state = createChangeState()
  const ops: Operation[] = []
  let prevClock = 0
  let duration = 0

  for (const row of sortByClock(rows)) {
    // Only the first op of a row carries the row delta; the rest are simultaneous
    let pendingDelta = row.clock - prevClock
    const emit: Emit = (opcode, payload) => {
      ops.push({ delta: pendingDelta, opcode, payload })
      pendingDelta = 0
    }

    encodeRow(state, row, emit)

    prevClock = row.clock
    duration = row.clock
  }

  return { ops, duration }
}

/**
 * Stable ascending sort by clock. Returns a new array.
 */
export function sortByClock<T extends { readonly clock: number }>(rows: readonly T[]): T[] {
  return [...rows].sort((a, b) => a.clock - b.clock)
}

// =============================================================================
// Row Encoding
// =============================================================================

/**
 * Diff one row against the tracked state, emitting in register order.
 * The order is part of the format: it fixes the op sequence within a tick.
 */
function encodeRow(state: ChangeState, row: SsfRow, emit: Emit): void {
  const { last } = state

  diffScalar(last, 'freq', row.freq1, 'u16', OP.SET_FREQ, emit)
  diffScalar(last, 'pw', row.pwduty1, 'u16', OP.SET_PW, emit)

  let controlTouched = false
  for (const flag of CONTROL_FLAGS) {
    const value = row[flag]
    if (value === null) continue
    state.control[flag] = value !== 0
    controlTouched = true
  }
  if (controlTouched) {
    diffPacked(last, 'ctrl', packControl(state.control), OP.SET_CTRL, emit)
  }

  if (row.atk1 !== null) state.attack = row.atk1 & 0x0F
  if (row.dec1 !== null) state.decay = row.dec1 & 0x0F
  if (row.atk1 !== null || row.dec1 !== null) {
    diffPacked(last, 'ad', packNibbles(state.attack, state.decay), OP.SET_AD, emit)
  }

  if (row.sus1 !== null) state.sustain = row.sus1 & 0x0F
  if (row.rel1 !== null) state.release = row.rel1 & 0x0F
  if (row.sus1 !== null || row.rel1 !== null) {
    diffPacked(last, 'sr', packNibbles(state.sustain, state.release), OP.SET_SR, emit)
  }

  diffScalar(last, 'modFreq', row.freq3, 'u16', OP.SET_MOD_FREQ, emit)
  diffScalar(last, 'modTest', row.test3, 'flag', OP.SET_MOD_TEST, emit)
  diffScalar(last, 'filterRoute', row.flt1, 'flag', OP.SET_FILTER_ROUTE, emit)
  diffScalar(last, 'filterExt', row.fltext, 'flag', OP.SET_FILTER_EXT, emit)
  diffScalar(last, 'filterCutoff', row.fltcoff, 'u16', OP.SET_FILTER_CUTOFF, emit)
  diffScalar(last, 'filterRes', row.fltres, 'nibble', OP.SET_FILTER_RES, emit)

  let modeTouched = false
  for (const flag of FILTER_MODE_FLAGS) {
    const value = row[flag]
    if (value === null) continue
    state.filterMode[flag] = value !== 0
    modeTouched = true
  }
  if (modeTouched) {
    diffPacked(last, 'filterMode', packFilterMode(state.filterMode) & 0x07, OP.SET_FILTER_MODE, emit)
  }

  diffScalar(last, 'volume', row.vol, 'nibble', OP.SET_VOLUME, emit)
}

/**
 * Emit a scalar register if present and different from what was last written.
 */
function diffScalar(
  last: LastEmitted,
  key: keyof LastEmitted,
  raw: RegisterValue,
  width: RegisterWidth,
  opcode: number,
  emit: Emit
): void {
  if (raw === null) return
  const value = normalize(raw, width)
  if (value === last[key]) return
  emit(opcode, payloadOf(value, width))
  last[key] = value
}

/**
 * Emit a recomputed single-byte register if it changed.
 */
function diffPacked(
  last: LastEmitted,
  key: keyof LastEmitted,
  value: number,
  opcode: number,
  emit: Emit
): void {
  if (value === last[key]) return
  emit(opcode, Uint8Array.of(value))
  last[key] = value
}
