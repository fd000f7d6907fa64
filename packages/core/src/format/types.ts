// =============================================================================
// Beta99 - Bundle Types
// =============================================================================

import type { ControlFlag, FilterModeFlag } from './constants'

// =============================================================================
// Input Rows
// =============================================================================

/**
 * A register value read from the source table. `null` marks a missing cell,
 * which never resets tracked state.
 */
export type RegisterValue = number | null

/**
 * Register columns carried by each SSF row (voice 1 plus the voice 3
 * modulator and the shared filter/volume registers).
 */
export type RegisterField =
  | 'freq1'
  | 'pwduty1'
  | ControlFlag
  | 'atk1'
  | 'dec1'
  | 'sus1'
  | 'rel1'
  | 'freq3'
  | 'test3'
  | 'flt1'
  | 'fltext'
  | 'fltcoff'
  | 'fltres'
  | FilterModeFlag
  | 'vol'

export const REGISTER_FIELDS: readonly RegisterField[] = [
  'freq1', 'pwduty1',
  'gate1', 'sync1', 'ring1', 'test1', 'tri1', 'saw1', 'pulse1', 'noise1',
  'atk1', 'dec1', 'sus1', 'rel1',
  'freq3', 'test3',
  'flt1', 'fltext', 'fltcoff', 'fltres',
  'fltlo', 'fltband', 'flthi',
  'vol'
]

/**
 * One tick of register state for one sound fragment.
 */
export type SsfRow = {
  readonly hashid: bigint
  readonly clock: number
} & { readonly [K in RegisterField]: RegisterValue }

/**
 * One entry of the playback log: start fragment `hashid` on `voice` at `clock`.
 */
export interface LogRow {
  readonly hashid: bigint
  readonly clock: number
  readonly voice: number
}

// =============================================================================
// Bundle Model
// =============================================================================

/**
 * A single register change, timed relative to the previous op in its fragment.
 */
export interface Operation {
  readonly delta: number
  readonly opcode: number
  readonly payload: Uint8Array
}

/**
 * One fragment-table entry. A source hash that was chunked owns several.
 */
export interface Fragment {
  readonly hashid: bigint
  readonly duration: number
  readonly ops: readonly Operation[]
}

export interface Trigger {
  readonly delta: number
  /** Index into the fragment table */
  readonly ssfIndex: number
  readonly voice: number
}

/**
 * Fragment-table indices produced from each source hash, in chunk order.
 */
export type ChunkIndexTable = ReadonlyMap<bigint, readonly number[]>

export interface FragmentTable {
  readonly fragments: readonly Fragment[]
  readonly chunks: ChunkIndexTable
}

export interface Bundle {
  readonly fragments: readonly Fragment[]
  readonly triggers: readonly Trigger[]
}

// =============================================================================
// Options
// =============================================================================

/**
 * Options for building a bundle.
 */
export interface PackOptions {
  /** Operations per fragment before splitting into chunks (default: 512, min: 1) */
  maxOpsPerFragment?: number
}
