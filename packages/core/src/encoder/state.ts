// =============================================================================
// Beta99 - Change-State Tracker
// =============================================================================

import {
  CONTROL_BITS,
  CONTROL_FLAGS,
  FILTER_MODE_BITS,
  FILTER_MODE_FLAGS
} from '../format/constants'
import type { ControlFlag, FilterModeFlag } from '../format/constants'

// =============================================================================
// Types
// =============================================================================

/**
 * Last value written for each register, as it was serialized.
 * `null` until the first emission for that register.
 */
export interface LastEmitted {
  freq: number | null
  pw: number | null
  ctrl: number | null
  ad: number | null
  sr: number | null
  modFreq: number | null
  modTest: number | null
  filterRoute: number | null
  filterExt: number | null
  filterCutoff: number | null
  filterRes: number | null
  filterMode: number | null
  volume: number | null
}

/**
 * Tracking state for one fragment group. Created fresh per group and
 * owned by the encode pass for that group only.
 */
export interface ChangeState {
  /** Known control flags (unset flags read as off) */
  control: Record<ControlFlag, boolean>
  /** Known filter mode flags */
  filterMode: Record<FilterModeFlag, boolean>
  /** Envelope nibbles, already masked to 4 bits */
  attack: number
  decay: number
  sustain: number
  release: number
  last: LastEmitted
}

/**
 * Serialized shape of a scalar register.
 * - u16: 16-bit little-endian word
 * - flag: one byte, 0 or 1
 * - nibble: one byte, low 4 bits
 */
export type RegisterWidth = 'u16' | 'flag' | 'nibble'

// =============================================================================
// Construction
// =============================================================================

export function createChangeState(): ChangeState {
  return {
    control: {
      gate1: false,
      sync1: false,
      ring1: false,
      test1: false,
      tri1: false,
      saw1: false,
      pulse1: false,
      noise1: false
    },
    filterMode: { fltlo: false, fltband: false, flthi: false },
    attack: 0,
    decay: 0,
    sustain: 0,
    release: 0,
    last: {
      freq: null,
      pw: null,
      ctrl: null,
      ad: null,
      sr: null,
      modFreq: null,
      modTest: null,
      filterRoute: null,
      filterExt: null,
      filterCutoff: null,
      filterRes: null,
      filterMode: null,
      volume: null
    }
  }
}

// =============================================================================
// Packing Helpers
// =============================================================================

/**
 * Reduce a raw register value to what will be written for `width`.
 */
export function normalize(value: number, width: RegisterWidth): number {
  switch (width) {
    case 'u16':
      return value & 0xFFFF
    case 'flag':
      return value !== 0 ? 1 : 0
    case 'nibble':
      return value & 0x0F
  }
}

/**
 * Encode an already-normalized register value as its payload bytes.
 */
export function payloadOf(value: number, width: RegisterWidth): Uint8Array {
  if (width === 'u16') {
    return u16le(value)
  }
  return Uint8Array.of(value & 0xFF)
}

export function u16le(value: number): Uint8Array {
  return Uint8Array.of(value & 0xFF, (value >>> 8) & 0xFF)
}

/**
 * Pack the control flags into the control register byte.
 */
export function packControl(flags: Readonly<Record<ControlFlag, boolean>>): number {
  let value = 0
  for (const flag of CONTROL_FLAGS) {
    if (flags[flag]) value |= 1 << CONTROL_BITS[flag]
  }
  return value
}

/**
 * Pack the filter mode flags into the low 3 bits of the mode byte.
 */
export function packFilterMode(flags: Readonly<Record<FilterModeFlag, boolean>>): number {
  let value = 0
  for (const flag of FILTER_MODE_FLAGS) {
    if (flags[flag]) value |= 1 << FILTER_MODE_BITS[flag]
  }
  return value
}

/**
 * Pack two 4-bit envelope values into one byte, high nibble first.
 */
export function packNibbles(high: number, low: number): number {
  return ((high & 0x0F) << 4) | (low & 0x0F)
}
