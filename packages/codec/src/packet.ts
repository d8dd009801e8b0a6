/**
 * Serialization packets
 *
 * A packet is the packed word buffer of one value, tagged with the
 * identity of the value's type and of the program whose code the buffer
 * points at. Packets are only built from a successful
 * pack or from a record that passed every decode check; the payload stays
 * inside this package.
 */

import { fingerprintEquals, WordUtils } from '@heappack/core'
import type { Fingerprint, TypeRep } from '@heappack/types'
import { typeIdentity } from './type-identity'

const sealed = Symbol('Packet')

const payloads = new WeakMap<object, Uint8Array>()

export class Packet<T> {
  readonly typeIdentity: Fingerprint
  readonly wordCount: number

  constructor(
    seal: typeof sealed,
    readonly type: TypeRep<T>,
    typeTag: Fingerprint,
    readonly programIdentity: Fingerprint,
    payload: Uint8Array,
  ) {
    if (seal !== sealed) {
      throw new Error('Packets are only created by serialization')
    }
    if (!WordUtils.isAligned(payload)) {
      throw new Error(`Packet payload of ${payload.length} bytes is not word aligned`)
    }
    if (!fingerprintEquals(typeTag, typeIdentity(type))) {
      throw new Error(`Packet type tag does not identify ${type.signature}`)
    }
    this.typeIdentity = typeTag
    this.wordCount = WordUtils.count(payload)
    payloads.set(this, payload.slice())
  }

  get byteLength(): number {
    return packetPayload(this).length
  }

  /**
   * Same program and type identities over the same payload words
   */
  equals(other: Packet<unknown>): boolean {
    return (
      fingerprintEquals(this.programIdentity, other.programIdentity) &&
      fingerprintEquals(this.typeIdentity, other.typeIdentity) &&
      WordUtils.equals(packetPayload(this), packetPayload(other))
    )
  }
}

export function createPacket<T>(
  type: TypeRep<T>,
  typeTag: Fingerprint,
  program: Fingerprint,
  payload: Uint8Array,
): Packet<T> {
  return new Packet(sealed, type, typeTag, program, payload)
}

/**
 * Packed words of a packet; callers must not mutate the result
 */
export function packetPayload(packet: Packet<unknown>): Uint8Array {
  const payload = payloads.get(packet)
  if (payload === undefined) {
    throw new Error('Packet has no payload')
  }
  return payload
}
