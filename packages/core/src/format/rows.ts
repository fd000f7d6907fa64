// =============================================================================
// Beta99 - Row Construction
// =============================================================================

import { REGISTER_FIELDS } from './types'
import type { RegisterField, RegisterValue, SsfRow } from './types'

/**
 * Register values for a row where every cell is missing.
 */
export function blankRegisters(): { [K in RegisterField]: RegisterValue } {
  return {
    freq1: null,
    pwduty1: null,
    gate1: null,
    sync1: null,
    ring1: null,
    test1: null,
    tri1: null,
    saw1: null,
    pulse1: null,
    noise1: null,
    atk1: null,
    dec1: null,
    sus1: null,
    rel1: null,
    freq3: null,
    test3: null,
    flt1: null,
    fltext: null,
    fltcoff: null,
    fltres: null,
    fltlo: null,
    fltband: null,
    flthi: null,
    vol: null
  }
}

/**
 * Build an SSF row; registers not named in `values` (or given as
 * `undefined`) are missing.
 */
export function createSsfRow(
  hashid: bigint,
  clock: number,
  values: Partial<Record<RegisterField, RegisterValue>> = {}
): SsfRow {
  const registers = blankRegisters()
  for (const field of REGISTER_FIELDS) {
    const value = values[field]
    if (value !== undefined) registers[field] = value
  }
  return { ...registers, hashid, clock }
}
