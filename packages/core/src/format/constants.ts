// =============================================================================
// Beta99 - Format Constants
// =============================================================================
// All byte values use hexadecimal notation to match the on-disk layout.

/**
 * Magic bytes identifying a beta99 bundle: "B99F" as ASCII.
 */
export const B99_MAGIC = new Uint8Array([0x42, 0x39, 0x39, 0x46])

/**
 * Current bundle format version.
 */
export const B99_VERSION = 0x0001

/**
 * Operations per fragment before the chunker splits it.
 */
export const DEFAULT_MAX_OPS_PER_FRAGMENT = 512

/**
 * Largest fragment table addressable by the 16-bit trigger index.
 */
export const MAX_FRAGMENTS = 0xFFFF

/**
 * Largest payload any operation may carry.
 */
export const MAX_PAYLOAD_BYTES = 4

// =============================================================================
// Record Sizes (bytes)
// =============================================================================

/**
 * Sizes of the fixed parts of each record.
 * Layouts (little-endian):
 *   HEADER   [magic×4, version:u16, reserved:u16, fragments:u32, triggers:u32]
 *   FRAGMENT [hashid:u64, duration:u32, opCount:u32]
 *   OP       [delta:u32, opcode:u8, length:u8] + payload
 *   TRIGGER  [delta:u32, index:u16, voice:u8, pad:u8]
 */
export const SIZE = {
  HEADER: 16,
  FRAGMENT: 16,
  OP: 6,
  TRIGGER: 8
} as const

// =============================================================================
// Opcodes
// =============================================================================

/**
 * Register-change opcodes, in the order the encoder evaluates them.
 */
export const OP = {
  /** SET_FREQ u16 — Voice oscillator frequency */
  SET_FREQ: 0x01,
  /** SET_PW u16 — Pulse width */
  SET_PW: 0x02,
  /** SET_CTRL u8 — Waveform/gate control byte */
  SET_CTRL: 0x03,
  /** SET_AD u8 — Attack (high nibble) / decay (low nibble) */
  SET_AD: 0x04,
  /** SET_SR u8 — Sustain (high nibble) / release (low nibble) */
  SET_SR: 0x05,
  /** SET_MOD_FREQ u16 — Modulator voice frequency */
  SET_MOD_FREQ: 0x06,
  /** SET_MOD_TEST u8 — Modulator test bit (0/1) */
  SET_MOD_TEST: 0x07,
  /** SET_FILTER_ROUTE u8 — Voice routed through filter (0/1) */
  SET_FILTER_ROUTE: 0x08,
  /** SET_FILTER_EXT u8 — External input routed through filter (0/1) */
  SET_FILTER_EXT: 0x09,
  /** SET_FILTER_CUTOFF u16 — Filter cutoff */
  SET_FILTER_CUTOFF: 0x0A,
  /** SET_FILTER_RES u8 — Filter resonance (low nibble) */
  SET_FILTER_RES: 0x0B,
  /** SET_FILTER_MODE u8 — Low/band/high pass bits */
  SET_FILTER_MODE: 0x0C,
  /** SET_VOLUME u8 — Master volume (low nibble) */
  SET_VOLUME: 0x0D
} as const

export type OpCode = typeof OP[keyof typeof OP]

/**
 * Required payload length per opcode. Opcodes absent from this table
 * may carry anywhere from 0 to MAX_PAYLOAD_BYTES.
 */
export const PAYLOAD_LENGTH: ReadonlyMap<number, number> = new Map<number, number>([
  [OP.SET_FREQ, 2],
  [OP.SET_PW, 2],
  [OP.SET_CTRL, 1],
  [OP.SET_AD, 1],
  [OP.SET_SR, 1],
  [OP.SET_MOD_FREQ, 2],
  [OP.SET_MOD_TEST, 1],
  [OP.SET_FILTER_ROUTE, 1],
  [OP.SET_FILTER_EXT, 1],
  [OP.SET_FILTER_CUTOFF, 2],
  [OP.SET_FILTER_RES, 1],
  [OP.SET_FILTER_MODE, 1],
  [OP.SET_VOLUME, 1]
])

// =============================================================================
// Packed Bit Fields
// =============================================================================

/**
 * Control register flags and their bit positions.
 */
export const CONTROL_BITS = {
  gate1: 0,
  sync1: 1,
  ring1: 2,
  test1: 3,
  tri1: 4,
  saw1: 5,
  pulse1: 6,
  noise1: 7
} as const

/**
 * Filter mode flags and their bit positions.
 */
export const FILTER_MODE_BITS = {
  fltlo: 0,
  fltband: 1,
  flthi: 2
} as const

export type ControlFlag = keyof typeof CONTROL_BITS
export type FilterModeFlag = keyof typeof FILTER_MODE_BITS

export const CONTROL_FLAGS: readonly ControlFlag[] = [
  'gate1', 'sync1', 'ring1', 'test1', 'tri1', 'saw1', 'pulse1', 'noise1'
]

export const FILTER_MODE_FLAGS: readonly FilterModeFlag[] = ['fltlo', 'fltband', 'flthi']
