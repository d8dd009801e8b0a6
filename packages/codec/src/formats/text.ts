/**
 * Text Packet Format
 *
 * Human-readable packet form: a two-line header naming the size and both
 * identities, then the payload words in hex, four to a row, each row
 * prefixed by the index of its first word.
 *
 *   Serialization Packet, size 3, program 0x…
 *   , type 0x…
 *   0:\t0x0000000000000001\t0x0000000000000002\t0x0000000000000003
 */

import {
  fingerprintToHex,
  parseFingerprint,
  programIdentity,
  WordUtils,
} from '@heappack/core'
import { HeapGraphCodec } from '@heappack/heap'
import {
  type DecodeFailureCode,
  type EncodedRecord,
  type Fingerprint,
  type GraphCodec,
  type PackError,
  type Safe,
  type ScannedRecord,
  safeError,
  safeResult,
  type TypeRep,
  WORD_CONSTANTS,
} from '@heappack/types'
import { hexToBigInt } from 'viem'
import type { Packet } from '../packet'
import { checkSize, packetRecord, parseError, validateRecord } from './record'

const HEADER_LINE =
  /^Serialization Packet,[ \t]*size[ \t]+(\d+),[ \t]*program[ \t]+(\S+)$/
const TYPE_LINE = /^,[ \t]*type[ \t]+(\S+)$/
const ROW_LINE = /^(\d+):[ \t]+(.*)$/
const WORD = /^0x[0-9a-fA-F]{1,16}$/

export class TextCodec {
  constructor(private readonly graphCodec: GraphCodec = new HeapGraphCodec()) {}

  /**
   * Program identity this codec accepts
   */
  programIdentity(): Fingerprint {
    return programIdentity(this.graphCodec.codeIdentity())
  }

  encode(packet: Packet<unknown>): string {
    return this.format(packetRecord(packet))
  }

  format(record: EncodedRecord): string {
    let text =
      `Serialization Packet, size ${record.wordCount}, program ${fingerprintToHex(record.program)}\n` +
      `, type ${fingerprintToHex(record.type)}\n`

    const words = WordUtils.toWords(record.payload)
    for (let i = 0; i < words.length; i += WORD_CONSTANTS.WORDS_PER_ROW) {
      const row = words
        .slice(i, i + WORD_CONSTANTS.WORDS_PER_ROW)
        .map((word) => WordUtils.toHex(word))
      text += `${i}:\t${row.join('\t')}\n`
    }
    return text
  }

  /**
   * Structural parse only: no size or identity checks
   */
  scan(text: string): Safe<ScannedRecord, PackError<'parse_error'>> {
    const lines = text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0)

    const header = HEADER_LINE.exec(lines[0] ?? '')
    if (!header) return safeError(parseError('missing packet header'))
    const typeLine = TYPE_LINE.exec(lines[1] ?? '')
    if (!typeLine) return safeError(parseError('missing type line'))

    const declaredWords = Number(header[1])
    if (!Number.isSafeInteger(declaredWords)) {
      return safeError(parseError(`size ${header[1]} out of range`))
    }
    const [programError, program] = this.fingerprint(header[2])
    if (programError) return safeError(programError)
    const [typeError, type] = this.fingerprint(typeLine[1])
    if (typeError) return safeError(typeError)

    const words: bigint[] = []
    for (const line of lines.slice(2)) {
      const row = ROW_LINE.exec(line)
      if (!row) return safeError(parseError(`malformed row: ${line}`))
      if (Number(row[1]) !== words.length) {
        return safeError(
          parseError(`row index ${row[1]} where ${words.length} was expected`),
        )
      }
      for (const item of row[2].split(/[ \t]+/)) {
        if (!WORD.test(item)) {
          return safeError(parseError(`malformed word: ${item}`))
        }
        words.push(hexToBigInt(`0x${item.slice(2)}`))
      }
    }

    return safeResult({
      program,
      type,
      declaredWords,
      payload: WordUtils.fromWords(words),
    })
  }

  /**
   * Scan plus the size check, for inspecting packets of any program and
   * type
   */
  parse(text: string): Safe<EncodedRecord, PackError<'parse_error'>> {
    const [scanError, scanned] = this.scan(text)
    if (scanError) return safeError(scanError)
    return checkSize(scanned)
  }

  decode<T>(
    text: string,
    type: TypeRep<T>,
  ): Safe<Packet<T>, PackError<DecodeFailureCode>> {
    const [scanError, scanned] = this.scan(text)
    if (scanError) return safeError(scanError)
    return validateRecord(scanned, type, this.programIdentity())
  }

  private fingerprint(
    text: string,
  ): Safe<Fingerprint, PackError<'parse_error'>> {
    const [error, fingerprint] = parseFingerprint(text)
    if (error) return safeError(parseError(error.message))
    return safeResult(fingerprint)
  }
}
