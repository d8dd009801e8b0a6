/**
 * Binary Packet Format
 *
 * Fixed 40-byte header followed by the payload words as stored:
 *
 *   bytes  0..16  program fingerprint (hi, lo; big-endian)
 *   bytes 16..32  type fingerprint
 *   bytes 32..40  word count (little-endian)
 *   bytes 40..    payload
 */

import {
  fingerprintFromBytes,
  fingerprintToBytes,
  logger,
  programIdentity,
} from '@heappack/core'
import { HeapGraphCodec } from '@heappack/heap'
import {
  BINARY_PACKET_CONSTANTS,
  type DecodeFailureCode,
  type EncodedRecord,
  FINGERPRINT_CONSTANTS,
  type Fingerprint,
  type GraphCodec,
  type PackError,
  type Safe,
  type ScannedRecord,
  safeError,
  safeResult,
  type TypeRep,
} from '@heappack/types'
import type { Packet } from '../packet'
import { checkSize, packetRecord, parseError, validateRecord } from './record'

const { PROGRAM_OFFSET, TYPE_OFFSET, WORD_COUNT_OFFSET, HEADER_SIZE } =
  BINARY_PACKET_CONSTANTS

export class BinaryCodec {
  constructor(private readonly graphCodec: GraphCodec = new HeapGraphCodec()) {}

  /**
   * Program identity this codec accepts
   */
  programIdentity(): Fingerprint {
    return programIdentity(this.graphCodec.codeIdentity())
  }

  encode(packet: Packet<unknown>): Uint8Array {
    return this.format(packetRecord(packet))
  }

  format(record: EncodedRecord): Uint8Array {
    const bytes = new Uint8Array(HEADER_SIZE + record.payload.length)
    const view = new DataView(bytes.buffer)
    bytes.set(fingerprintToBytes(record.program), PROGRAM_OFFSET)
    bytes.set(fingerprintToBytes(record.type), TYPE_OFFSET)
    view.setBigUint64(WORD_COUNT_OFFSET, BigInt(record.wordCount), true)
    bytes.set(record.payload, HEADER_SIZE)

    logger.debug('Binary packet formatted', {
      words: record.wordCount,
      bytes: bytes.length,
    })
    return bytes
  }

  /**
   * Header parse only: no size or identity checks
   */
  scan(data: Uint8Array): Safe<ScannedRecord, PackError<'parse_error'>> {
    if (data.length < HEADER_SIZE) {
      return safeError(
        parseError(`${data.length} bytes is shorter than the packet header`),
      )
    }

    const [programError, program] = this.fingerprint(data, PROGRAM_OFFSET)
    if (programError) return safeError(programError)
    const [typeError, type] = this.fingerprint(data, TYPE_OFFSET)
    if (typeError) return safeError(typeError)

    const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
    const declared = view.getBigUint64(WORD_COUNT_OFFSET, true)
    if (declared > BigInt(Number.MAX_SAFE_INTEGER)) {
      return safeError(parseError(`word count ${declared} out of range`))
    }

    return safeResult({
      program,
      type,
      declaredWords: Number(declared),
      payload: data.slice(HEADER_SIZE),
    })
  }

  parse(data: Uint8Array): Safe<EncodedRecord, PackError<'parse_error'>> {
    const [scanError, scanned] = this.scan(data)
    if (scanError) return safeError(scanError)
    return checkSize(scanned)
  }

  decode<T>(
    data: Uint8Array,
    type: TypeRep<T>,
  ): Safe<Packet<T>, PackError<DecodeFailureCode>> {
    const [scanError, scanned] = this.scan(data)
    if (scanError) return safeError(scanError)
    return validateRecord(scanned, type, this.programIdentity())
  }

  private fingerprint(
    data: Uint8Array,
    offset: number,
  ): Safe<Fingerprint, PackError<'parse_error'>> {
    const [error, fingerprint] = fingerprintFromBytes(
      data.subarray(offset, offset + FINGERPRINT_CONSTANTS.FINGERPRINT_SIZE),
    )
    if (error) return safeError(parseError(error.message))
    return safeResult(fingerprint)
  }
}
