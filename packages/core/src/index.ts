// =============================================================================
// @beta99/core - Public API
// Pure encode path: rows → fragment table + triggers → bundle bytes
// =============================================================================

// --- Format ---
export {
  B99_MAGIC,
  B99_VERSION,
  DEFAULT_MAX_OPS_PER_FRAGMENT,
  MAX_FRAGMENTS,
  MAX_PAYLOAD_BYTES,
  SIZE,
  OP,
  PAYLOAD_LENGTH,
  CONTROL_BITS,
  CONTROL_FLAGS,
  FILTER_MODE_BITS,
  FILTER_MODE_FLAGS
} from './format/constants'
export type { OpCode, ControlFlag, FilterModeFlag } from './format/constants'
export { REGISTER_FIELDS } from './format/types'
export { blankRegisters, createSsfRow } from './format/rows'
export type {
  RegisterValue,
  RegisterField,
  SsfRow,
  LogRow,
  Operation,
  Fragment,
  Trigger,
  ChunkIndexTable,
  FragmentTable,
  Bundle,
  PackOptions
} from './format/types'

// --- Encoder ---
export { encodeFragment, sortByClock } from './encoder/encode'
export type { EncodedFragment } from './encoder/encode'
export { chunkFragment, resolveMaxOps, sumDeltas } from './encoder/chunk'
export { createChangeState } from './encoder/state'
export type { ChangeState } from './encoder/state'

// --- Bundle ---
export { groupByHash, buildFragmentTable } from './bundle/fragment-table'
export { buildTriggers } from './bundle/triggers'
export { buildBundle } from './bundle/build'

// --- Binary ---
export { packBundle, validateBundle, validateOperation, calculateBundleSize } from './packer/pack'
export { readBundle } from './packer/read'

// --- Debug ---
export { toDebugDump, serializeDebugDump } from './debug/dump'
export type { DebugDump, DebugFragment, DebugOp, DebugTrigger } from './debug/dump'

// --- Errors ---
export {
  UnknownFragmentHashError,
  FragmentCapacityError,
  PayloadTooLargeError,
  PayloadLengthMismatchError,
  BundleFormatError,
  InvalidRowError
} from './errors'
