/**
 * Packed graph layout
 *
 * word 0        magic
 * word 1        node count
 * word 2...     nodes in discovery order, node 0 being the root
 *
 * Every node opens with a header word: tag in the low 8 bits, a count in
 * the upper 56. References between nodes are node indices.
 */

/** "HEAPPACK" read as a little-endian word */
export const GRAPH_MAGIC = 0x4b43415050414548n

export const GRAPH_PREAMBLE_WORDS = 2

export enum NodeTag {
  UNDEFINED = 1,
  NULL = 2,
  /** count holds 0 or 1 */
  BOOL = 3,
  /** one word of IEEE-754 bits */
  NUMBER = 4,
  /** count magnitude words, least significant first */
  BIGINT_POS = 5,
  BIGINT_NEG = 6,
  /** count UTF-8 bytes, zero-padded to whole words */
  STRING = 7,
  /** count element refs */
  ARRAY = 8,
  /** count key/value ref pairs, keys are STRING nodes */
  OBJECT = 9,
  /** count key/value ref pairs */
  MAP = 10,
  /** count element refs */
  SET = 11,
  /** one word of IEEE-754 bits holding the epoch milliseconds */
  DATE = 12,
  /** count bytes, zero-padded to whole words */
  BYTES = 13,
  /** code index word, then count argument refs */
  THUNK = 14,
  /** one ref to the computed value */
  EVALUATED = 15,
  /** code index word, then count captured refs */
  CLOSURE = 16,
}

const TAG_BITS = 8n
const TAG_MASK = (1n << TAG_BITS) - 1n

export function isNodeTag(value: number): value is NodeTag {
  return value in NodeTag
}

export function headerWord(tag: NodeTag, count: number): bigint {
  return BigInt(tag) | (BigInt(count) << TAG_BITS)
}

export function splitHeader(word: bigint): { tag: number; count: bigint } {
  return { tag: Number(word & TAG_MASK), count: word >> TAG_BITS }
}

export function wordsForBytes(byteLength: number): number {
  return Math.ceil(byteLength / 8)
}

const scratch = new DataView(new ArrayBuffer(8))

export function numberToWord(value: number): bigint {
  scratch.setFloat64(0, value, true)
  return scratch.getBigUint64(0, true)
}

export function wordToNumber(word: bigint): number {
  scratch.setBigUint64(0, word, true)
  return scratch.getFloat64(0, true)
}
