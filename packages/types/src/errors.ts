/**
 * Packing Error Constants
 *
 * Centralized definitions of every error a packing operation can report.
 * Codes are grouped by the site that detects them: the graph-pack
 * primitive, the graph-unpack primitive, and the packet codecs.
 */

/**
 * Errors reported by the graph-pack primitive
 */
export const PACK_ERRORS = {
  BLACKHOLE: 'blackhole',
  NO_BUFFER: 'no_buffer',
  CANNOT_PACK: 'cannot_pack',
  UNSUPPORTED: 'unsupported',
  IMPOSSIBLE: 'impossible',
} as const

/**
 * Errors reported by the graph-unpack primitive
 */
export const UNPACK_ERRORS = {
  GARBLED: 'garbled',
} as const

/**
 * Errors raised by the text and binary packet codecs
 */
export const DECODE_ERRORS = {
  PARSE_ERROR: 'parse_error',
  BINARY_MISMATCH: 'binary_mismatch',
  TYPE_MISMATCH: 'type_mismatch',
} as const

export type PackFailureCode = (typeof PACK_ERRORS)[keyof typeof PACK_ERRORS]
export type UnpackFailureCode =
  (typeof UNPACK_ERRORS)[keyof typeof UNPACK_ERRORS]
export type DecodeFailureCode =
  (typeof DECODE_ERRORS)[keyof typeof DECODE_ERRORS]
export type PackErrorCode =
  | PackFailureCode
  | UnpackFailureCode
  | DecodeFailureCode

/**
 * Mapping from error codes to human-readable error messages
 */
export const ERROR_MESSAGES: Record<PackErrorCode, string> = {
  [PACK_ERRORS.BLACKHOLE]:
    'Packing hit a computation that is currently being evaluated',
  [PACK_ERRORS.NO_BUFFER]:
    'Pack buffer too small (raise HEAPPACK_BUFFER_WORDS)',
  [PACK_ERRORS.CANNOT_PACK]:
    'Data contain a value that cannot be packed (synchronised cell, promise, weak reference)',
  [PACK_ERRORS.UNSUPPORTED]:
    'Data contain a value kind without packing support',
  [PACK_ERRORS.IMPOSSIBLE]:
    'An impossible case happened while packing. This is probably a bug.',
  [UNPACK_ERRORS.GARBLED]: 'Garbled data for deserialisation',
  [DECODE_ERRORS.PARSE_ERROR]: 'Packet parse error',
  [DECODE_ERRORS.BINARY_MISMATCH]: 'Executable binaries do not match',
  [DECODE_ERRORS.TYPE_MISMATCH]: 'Packet data has unexpected type',
}

/**
 * Error carrying one member of the packing error taxonomy
 */
export class PackError<C extends PackErrorCode = PackErrorCode> extends Error {
  readonly code: C
  readonly context?: Record<string, unknown>

  constructor(code: C, context?: Record<string, unknown>) {
    super(ERROR_MESSAGES[code])
    this.name = 'PackError'
    this.code = code
    this.context = context
  }
}

export function isPackError(error: unknown): error is PackError {
  return error instanceof PackError
}

/**
 * Internal invariant violations in the pack primitive are bugs, not
 * conditions a caller can recover from.
 */
export function isFatal(error: PackError): boolean {
  return error.code === PACK_ERRORS.IMPOSSIBLE
}
