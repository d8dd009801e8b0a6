/**
 * Packing Constants
 *
 * Layout parameters shared by the graph codec and the packet codecs.
 */

/**
 * Word layout of packed buffers
 */
export const WORD_CONSTANTS = {
  /** Bytes per machine word */
  WORD_SIZE: 8,

  /** Hex digits needed to print one word */
  WORD_HEX_DIGITS: 16,

  /** Words printed per row of a text packet */
  WORDS_PER_ROW: 4,
} as const

/**
 * Fingerprint layout
 */
export const FINGERPRINT_CONSTANTS = {
  /** Bytes in a fingerprint (two 64-bit words) */
  FINGERPRINT_SIZE: 16,

  /** Hex digits in a printed fingerprint, excluding the 0x prefix */
  FINGERPRINT_HEX_DIGITS: 32,
} as const

/**
 * Binary packet header layout: program fingerprint, type fingerprint,
 * word count.
 */
export const BINARY_PACKET_CONSTANTS = {
  PROGRAM_OFFSET: 0,
  TYPE_OFFSET: 16,
  WORD_COUNT_OFFSET: 32,
  HEADER_SIZE: 40,
} as const

/** Default pack buffer capacity in words */
export const DEFAULT_BUFFER_WORDS = 1 << 20
