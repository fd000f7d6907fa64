// =============================================================================
// Beta99 - Bundle Reader
// =============================================================================
// Structural inverse of packBundle, for inspection and tests. Opcodes and
// payloads are returned as raw values; nothing here interprets them.

import { B99_MAGIC, B99_VERSION, SIZE } from '../format/constants'
import type { Bundle, Fragment, Operation, Trigger } from '../format/types'
import { BundleFormatError } from '../errors'

/**
 * Parse a packed bundle.
 *
 * @throws BundleFormatError on bad magic, unknown version, truncation or trailing bytes
 */
export function readBundle(bytes: Uint8Array): Bundle {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  let offset = 0

  const need = (count: number, what: string): void => {
    if (offset + count > bytes.byteLength) {
      throw new BundleFormatError(`truncated ${what} at offset ${offset}`)
    }
  }

  need(SIZE.HEADER, 'header')
  for (let i = 0; i < B99_MAGIC.length; i++) {
    if (bytes[i] !== B99_MAGIC[i]) {
      throw new BundleFormatError('bad magic')
    }
  }
  const version = view.getUint16(4, true)
  if (version !== B99_VERSION) {
    throw new BundleFormatError(`unsupported version ${version}`)
  }
  const fragmentCount = view.getUint32(8, true)
  const triggerCount = view.getUint32(12, true)
  offset = SIZE.HEADER

  const fragments: Fragment[] = []
  for (let f = 0; f < fragmentCount; f++) {
    need(SIZE.FRAGMENT, 'fragment header')
    const hashid = view.getBigUint64(offset, true)
    const duration = view.getUint32(offset + 8, true)
    const opCount = view.getUint32(offset + 12, true)
    offset += SIZE.FRAGMENT

    const ops: Operation[] = []
    for (let o = 0; o < opCount; o++) {
      need(SIZE.OP, 'operation')
      const delta = view.getUint32(offset, true)
      const opcode = view.getUint8(offset + 4)
      const length = view.getUint8(offset + 5)
      offset += SIZE.OP
      need(length, 'operation payload')
      ops.push({ delta, opcode, payload: bytes.slice(offset, offset + length) })
      offset += length
    }
    fragments.push({ hashid, duration, ops })
  }

  const triggers: Trigger[] = []
  for (let t = 0; t < triggerCount; t++) {
    need(SIZE.TRIGGER, 'trigger')
    triggers.push({
      delta: view.getUint32(offset, true),
      ssfIndex: view.getUint16(offset + 4, true),
      voice: view.getUint8(offset + 6)
    })
    offset += SIZE.TRIGGER
  }

  if (offset !== bytes.byteLength) {
    throw new BundleFormatError(`${bytes.byteLength - offset} trailing byte(s)`)
  }

  return { fragments, triggers }
}
