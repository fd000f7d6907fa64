// =============================================================================
// Beta99 - Binary Packer
// =============================================================================

import {
  B99_MAGIC,
  B99_VERSION,
  MAX_FRAGMENTS,
  MAX_PAYLOAD_BYTES,
  PAYLOAD_LENGTH,
  SIZE
} from '../format/constants'
import type { Bundle, Operation } from '../format/types'
import {
  FragmentCapacityError,
  PayloadLengthMismatchError,
  PayloadTooLargeError
} from '../errors'

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Serialize a bundle to its little-endian binary layout.
 * Uses two passes: validation and size calculation, then emission.
 *
 * @returns A freshly allocated buffer holding the whole bundle
 */
export function packBundle(bundle: Bundle): Uint8Array {
  validateBundle(bundle)

  // Pass 1: Calculate size
  const bytes = new Uint8Array(calculateBundleSize(bundle))
  const view = new DataView(bytes.buffer)

  // Pass 2: Emit
  let offset = 0

  bytes.set(B99_MAGIC, offset)
  view.setUint16(offset + 4, B99_VERSION, true)
  view.setUint16(offset + 6, 0, true) // reserved
  view.setUint32(offset + 8, bundle.fragments.length >>> 0, true)
  view.setUint32(offset + 12, bundle.triggers.length >>> 0, true)
  offset += SIZE.HEADER

  for (const fragment of bundle.fragments) {
    view.setBigUint64(offset, BigInt.asUintN(64, fragment.hashid), true)
    view.setUint32(offset + 8, fragment.duration >>> 0, true)
    view.setUint32(offset + 12, fragment.ops.length >>> 0, true)
    offset += SIZE.FRAGMENT

    for (const op of fragment.ops) {
      view.setUint32(offset, op.delta >>> 0, true)
      view.setUint8(offset + 4, op.opcode & 0xFF)
      view.setUint8(offset + 5, op.payload.length)
      offset += SIZE.OP
      bytes.set(op.payload, offset)
      offset += op.payload.length
    }
  }

  for (const trigger of bundle.triggers) {
    view.setUint32(offset, trigger.delta >>> 0, true)
    view.setUint16(offset + 4, trigger.ssfIndex & 0xFFFF, true)
    view.setUint8(offset + 6, trigger.voice & 0xFF)
    view.setUint8(offset + 7, 0) // padding
    offset += SIZE.TRIGGER
  }

  return bytes
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Check the invariants the layout depends on.
 *
 * @throws FragmentCapacityError if there are more than 65535 fragments
 * @throws PayloadTooLargeError if any payload exceeds 4 bytes
 * @throws PayloadLengthMismatchError if a fixed-length opcode has the wrong length
 */
export function validateBundle(bundle: Bundle): void {
  if (bundle.fragments.length > MAX_FRAGMENTS) {
    throw new FragmentCapacityError(bundle.fragments.length, MAX_FRAGMENTS)
  }
  for (const fragment of bundle.fragments) {
    for (const op of fragment.ops) {
      validateOperation(op)
    }
  }
}

export function validateOperation(op: Operation): void {
  const opcode = op.opcode & 0xFF
  const length = op.payload.length
  if (length > MAX_PAYLOAD_BYTES) {
    throw new PayloadTooLargeError(opcode, length)
  }
  const expected = PAYLOAD_LENGTH.get(opcode)
  if (expected !== undefined && length !== expected) {
    throw new PayloadLengthMismatchError(opcode, expected, length)
  }
}

// =============================================================================
// Size Calculation
// =============================================================================

/**
 * Total encoded size of a bundle in bytes.
 */
export function calculateBundleSize(bundle: Bundle): number {
  let size = SIZE.HEADER
  for (const fragment of bundle.fragments) {
    size += SIZE.FRAGMENT
    for (const op of fragment.ops) {
      size += SIZE.OP + op.payload.length
    }
  }
  size += bundle.triggers.length * SIZE.TRIGGER
  return size
}
