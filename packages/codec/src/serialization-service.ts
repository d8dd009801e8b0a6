/**
 * Serialization Service
 *
 * Turns values into typed packets and back through a graph codec
 */

import {
  fingerprintEquals,
  fingerprintToHex,
  logger,
  programIdentity,
} from '@heappack/core'
import { HeapGraphCodec } from '@heappack/heap'
import {
  DECODE_ERRORS,
  type Fingerprint,
  type GraphCodec,
  isFatal,
  PACK_ERRORS,
  PackError,
  type PackFailureCode,
  PackStatus,
  type Safe,
  type SafePromise,
  safeError,
  safeResult,
  type TypeRep,
  UNPACK_ERRORS,
  type UnpackFailureCode,
} from '@heappack/types'
import { createPacket, type Packet, packetPayload } from './packet'
import { typeIdentity } from './type-identity'

function packFailureCode(status: number): PackFailureCode {
  switch (status) {
    case PackStatus.BLACKHOLE:
      return PACK_ERRORS.BLACKHOLE
    case PackStatus.NO_BUFFER:
      return PACK_ERRORS.NO_BUFFER
    case PackStatus.CANNOT_PACK:
      return PACK_ERRORS.CANNOT_PACK
    case PackStatus.UNSUPPORTED:
      return PACK_ERRORS.UNSUPPORTED
    default:
      return PACK_ERRORS.IMPOSSIBLE
  }
}

/**
 * Error for a primitive's status code, or undefined on success.
 * Codes outside the known range are treated as impossible.
 */
export function packStatusToError(
  status: number,
  context?: Record<string, unknown>,
): PackError<PackFailureCode | UnpackFailureCode> | undefined {
  if (status === PackStatus.SUCCESS) return undefined
  if (status === PackStatus.GARBLED) {
    return new PackError(UNPACK_ERRORS.GARBLED, context)
  }
  return new PackError(packFailureCode(status), context)
}

/** Pack failures plus a value its own TypeRep rejects */
export type SerializeFailureCode = PackFailureCode | 'type_mismatch'

interface PackAttempt<T> {
  result: Safe<Packet<T>, PackError<SerializeFailureCode>>
  /** Present when the attempt hit a computation under evaluation */
  blockedOn?: Promise<unknown>
}

export class SerializationService {
  constructor(readonly graphCodec: GraphCodec = new HeapGraphCodec()) {}

  /**
   * Identity recorded in every packet this service builds
   */
  programIdentity(): Fingerprint {
    return programIdentity(this.graphCodec.codeIdentity())
  }

  /**
   * Pack a value without waiting. A computation under evaluation anywhere
   * in the graph yields `blackhole`.
   */
  trySerialize<T>(
    value: T,
    type: TypeRep<T>,
  ): Safe<Packet<T>, PackError<SerializeFailureCode>> {
    return this.attempt(value, type).result
  }

  /**
   * Pack a value, waiting out any computation under evaluation that the
   * walk runs into
   */
  async serialize<T>(
    value: T,
    type: TypeRep<T>,
  ): SafePromise<Packet<T>, PackError<SerializeFailureCode>> {
    for (;;) {
      const { result, blockedOn } = this.attempt(value, type)
      if (blockedOn === undefined) return result

      logger.debug('Waiting for computation under evaluation', {
        type: type.signature,
      })
      await Promise.allSettled([blockedOn])
    }
  }

  /**
   * Rebuild the packet's value. Every call produces a fresh graph. A
   * packet built for other code is refused before anything is unpacked.
   */
  deserialize<T>(
    packet: Packet<T>,
  ): Safe<T, PackError<'garbled' | 'binary_mismatch'>> {
    const program = this.programIdentity()
    if (!fingerprintEquals(packet.programIdentity, program)) {
      return safeError(
        new PackError(DECODE_ERRORS.BINARY_MISMATCH, {
          expected: fingerprintToHex(program),
          found: fingerprintToHex(packet.programIdentity),
        }),
      )
    }

    const outcome = this.graphCodec.unpack(packetPayload(packet))
    if (outcome.status !== PackStatus.SUCCESS) {
      return safeError(
        new PackError(UNPACK_ERRORS.GARBLED, {
          status: outcome.status,
          detail: outcome.detail,
        }),
      )
    }

    const root = outcome.root
    if (!packet.type.is(root)) {
      return safeError(
        new PackError(UNPACK_ERRORS.GARBLED, {
          detail: `rebuilt value is not a ${packet.type.signature}`,
        }),
      )
    }
    return safeResult(root)
  }

  private attempt<T>(value: T, type: TypeRep<T>): PackAttempt<T> {
    if (!type.is(value)) {
      return {
        result: safeError(
          new PackError(DECODE_ERRORS.TYPE_MISMATCH, {
            type: type.signature,
            detail: `value is not a ${type.signature}`,
          }),
        ),
      }
    }

    const outcome = this.graphCodec.pack(value)

    if (outcome.status === PackStatus.SUCCESS && outcome.buffer) {
      return {
        result: safeResult(
          createPacket(
            type,
            typeIdentity(type),
            this.programIdentity(),
            outcome.buffer,
          ),
        ),
      }
    }

    const error = new PackError(packFailureCode(outcome.status), {
      status: outcome.status,
      type: type.signature,
      detail: outcome.detail,
    })
    if (isFatal(error)) {
      logger.error('Packing failed on an internal inconsistency', error)
    }
    return {
      result: safeError(error),
      blockedOn:
        outcome.status === PackStatus.BLACKHOLE ? outcome.blockedOn : undefined,
    }
  }
}
