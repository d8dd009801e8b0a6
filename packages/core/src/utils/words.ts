/**
 * Word utilities
 *
 * Helpers over byte buffers laid out as little-endian 64-bit words
 */

import { WORD_CONSTANTS } from '@heappack/types'
import { numberToHex } from 'viem'

const MAX_WORD = (1n << 64n) - 1n

export class WordUtils {
  static isAligned(buffer: Uint8Array): boolean {
    return buffer.length % WORD_CONSTANTS.WORD_SIZE === 0
  }

  /**
   * Number of whole words in the buffer
   */
  static count(buffer: Uint8Array): number {
    return Math.floor(buffer.length / WORD_CONSTANTS.WORD_SIZE)
  }

  static alloc(words: number): Uint8Array {
    return new Uint8Array(words * WORD_CONSTANTS.WORD_SIZE)
  }

  static read(buffer: Uint8Array, index: number): bigint {
    return WordUtils.view(buffer).getBigUint64(
      index * WORD_CONSTANTS.WORD_SIZE,
      true,
    )
  }

  static write(buffer: Uint8Array, index: number, value: bigint): void {
    WordUtils.view(buffer).setBigUint64(
      index * WORD_CONSTANTS.WORD_SIZE,
      value,
      true,
    )
  }

  static toWords(buffer: Uint8Array): bigint[] {
    const words: bigint[] = []
    for (let i = 0; i < WordUtils.count(buffer); i++) {
      words.push(WordUtils.read(buffer, i))
    }
    return words
  }

  /**
   * Throws on values outside the unsigned 64-bit range
   */
  static fromWords(words: readonly bigint[]): Uint8Array {
    const buffer = WordUtils.alloc(words.length)
    words.forEach((word, index) => {
      if (word < 0n || word > MAX_WORD) {
        throw new Error(`Word ${index} out of range: ${word}`)
      }
      WordUtils.write(buffer, index, word)
    })
    return buffer
  }

  static equals(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false
    for (let i = 0; i < a.length; i++) {
      if (a[i] !== b[i]) return false
    }
    return true
  }

  /**
   * `0x` plus exactly 16 lowercase hex digits
   */
  static toHex(word: bigint): string {
    return numberToHex(word, { size: WORD_CONSTANTS.WORD_SIZE })
  }

  private static view(buffer: Uint8Array): DataView {
    return new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength)
  }
}
