/**
 * Record checks shared by both packet encodings
 */

import { fingerprintEquals, fingerprintToHex } from '@heappack/core'
import {
  DECODE_ERRORS,
  type DecodeFailureCode,
  type EncodedRecord,
  type Fingerprint,
  PackError,
  type Safe,
  type ScannedRecord,
  safeError,
  safeResult,
  type TypeRep,
  WORD_CONSTANTS,
} from '@heappack/types'
import { createPacket, type Packet, packetPayload } from '../packet'
import { typeIdentity } from '../type-identity'

export function parseError(detail: string): PackError<'parse_error'> {
  return new PackError(DECODE_ERRORS.PARSE_ERROR, { detail })
}

export function packetRecord(packet: Packet<unknown>): EncodedRecord {
  return {
    program: packet.programIdentity,
    type: packet.typeIdentity,
    wordCount: packet.wordCount,
    payload: packetPayload(packet),
  }
}

/**
 * Declared word count against the payload actually present
 */
export function checkSize(
  scanned: ScannedRecord,
): Safe<EncodedRecord, PackError<'parse_error'>> {
  const expected = scanned.declaredWords * WORD_CONSTANTS.WORD_SIZE
  if (scanned.payload.length !== expected) {
    return safeError(
      parseError(
        `declared ${scanned.declaredWords} words, found ${scanned.payload.length} bytes of payload`,
      ),
    )
  }
  return safeResult({
    program: scanned.program,
    type: scanned.type,
    wordCount: scanned.declaredWords,
    payload: scanned.payload,
  })
}

/**
 * Checks after a successful scan, in order: program identity, size, type
 * identity. Only a record passing all three becomes a packet.
 */
export function validateRecord<T>(
  scanned: ScannedRecord,
  type: TypeRep<T>,
  program: Fingerprint,
): Safe<Packet<T>, PackError<DecodeFailureCode>> {
  if (!fingerprintEquals(scanned.program, program)) {
    return safeError(
      new PackError(DECODE_ERRORS.BINARY_MISMATCH, {
        expected: fingerprintToHex(program),
        found: fingerprintToHex(scanned.program),
      }),
    )
  }

  const [sizeError, record] = checkSize(scanned)
  if (sizeError) return safeError(sizeError)

  const expectedType = typeIdentity(type)
  if (!fingerprintEquals(record.type, expectedType)) {
    return safeError(
      new PackError(DECODE_ERRORS.TYPE_MISMATCH, {
        expected: fingerprintToHex(expectedType),
        found: fingerprintToHex(record.type),
        type: type.signature,
      }),
    )
  }

  return safeResult(
    createPacket(type, record.type, record.program, record.payload),
  )
}
