// =============================================================================
// Beta99 - Errors
// =============================================================================

/**
 * Error thrown when a log row references a hash with no fragment-table entry.
 */
export class UnknownFragmentHashError extends Error {
  constructor(public readonly hashid: bigint) {
    super(`Beta99: Unknown fragment hash referenced by trigger: ${hashid}`)
    this.name = 'UnknownFragmentHashError'
  }
}

/**
 * Error thrown when the fragment table outgrows the 16-bit trigger index.
 */
export class FragmentCapacityError extends Error {
  constructor(
    public readonly count: number,
    public readonly capacity: number
  ) {
    super(
      `Beta99: Too many fragments for 16-bit indices. ` +
        `Count=${count}, Capacity=${capacity}`
    )
    this.name = 'FragmentCapacityError'
  }
}

/**
 * Error thrown when an operation payload exceeds the per-op limit.
 */
export class PayloadTooLargeError extends Error {
  constructor(
    public readonly opcode: number,
    public readonly length: number
  ) {
    super(`Beta99: Operation payload too large for opcode ${hex(opcode)} (${length} bytes)`)
    this.name = 'PayloadTooLargeError'
  }
}

/**
 * Error thrown when a fixed-length opcode carries the wrong payload length.
 */
export class PayloadLengthMismatchError extends Error {
  constructor(
    public readonly opcode: number,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Beta99: Opcode ${hex(opcode)} expects ${expected} byte(s), got ${actual}`)
    this.name = 'PayloadLengthMismatchError'
  }
}

/**
 * Error thrown when bytes handed to the reader are not a well-formed bundle.
 */
export class BundleFormatError extends Error {
  constructor(public readonly reason: string) {
    super(`Beta99: Malformed bundle - ${reason}`)
    this.name = 'BundleFormatError'
  }
}

/**
 * Error thrown when a source table row cannot be turned into a typed row.
 * `rowNumber` is 1-based and counts data rows only.
 */
export class InvalidRowError extends Error {
  constructor(
    public readonly source: string,
    public readonly rowNumber: number,
    public readonly column: string,
    public readonly reason: string
  ) {
    super(`${source}: row ${rowNumber}, column '${column}': ${reason}`)
    this.name = 'InvalidRowError'
  }
}

function hex(value: number): string {
  return `0x${value.toString(16).padStart(2, '0')}`
}
