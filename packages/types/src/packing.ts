/**
 * Packet Types
 *
 * Runtime type descriptors and the logical record both packet encodings
 * carry.
 */

import type { Fingerprint } from './fingerprint'

/**
 * Supported packet encodings
 */
export enum EncodingFormat {
  BINARY = 'BINARY',
  TEXT = 'TEXT',
}

/**
 * Runtime descriptor of a static type. The signature is the canonical
 * text hashed into the type's identity; the guard checks a rebuilt value.
 */
export interface TypeRep<T> {
  readonly signature: string
  is(value: unknown): value is T
}

/** Static type described by a TypeRep */
export type RepType<R> = R extends TypeRep<infer T> ? T : never

/**
 * Logical packet record, identical under both encodings
 */
export interface EncodedRecord {
  /** Identity of the program that packed the data */
  program: Fingerprint
  /** Identity of the packed value's type */
  type: Fingerprint
  wordCount: number
  /** wordCount little-endian words */
  payload: Uint8Array
}

/**
 * Record as read off the wire, before the declared size is checked
 * against the words actually present
 */
export interface ScannedRecord {
  program: Fingerprint
  type: Fingerprint
  declaredWords: number
  payload: Uint8Array
}

/**
 * Packet codec configuration
 */
export interface PacketCodecConfig {
  /** Encoding used when a call names none */
  defaultFormat: EncodingFormat
}

export const DEFAULT_PACKET_CODEC_CONFIG: PacketCodecConfig = {
  defaultFormat: EncodingFormat.BINARY,
}
