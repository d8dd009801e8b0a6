/**
 * Packet Codec
 *
 * Dispatches packet encoding and decoding to the binary or text format
 */

import { logger, programIdentity } from '@heappack/core'
import { HeapGraphCodec } from '@heappack/heap'
import {
  DEFAULT_PACKET_CODEC_CONFIG,
  type DecodeFailureCode,
  type EncodedRecord,
  EncodingFormat,
  type Fingerprint,
  type GraphCodec,
  type PackError,
  type PacketCodecConfig,
  type Safe,
  type TypeRep,
} from '@heappack/types'
import { bytesToString, stringToBytes } from 'viem'
import { BinaryCodec } from './formats/binary'
import { TextCodec } from './formats/text'
import type { Packet } from './packet'

export class PacketCodec {
  private readonly config: PacketCodecConfig
  private binaryCodec?: BinaryCodec
  private textCodec?: TextCodec

  /**
   * Decoding accepts only packets whose program identity matches the one
   * built from this graph codec's code
   */
  constructor(
    config: Partial<PacketCodecConfig> = {},
    readonly graphCodec: GraphCodec = new HeapGraphCodec(),
  ) {
    this.config = { ...DEFAULT_PACKET_CODEC_CONFIG, ...config }
  }

  get defaultFormat(): EncodingFormat {
    return this.config.defaultFormat
  }

  programIdentity(): Fingerprint {
    return programIdentity(this.graphCodec.codeIdentity())
  }

  /**
   * Get or create binary codec
   */
  get binary(): BinaryCodec {
    if (!this.binaryCodec) {
      this.binaryCodec = new BinaryCodec(this.graphCodec)
    }
    return this.binaryCodec
  }

  /**
   * Get or create text codec
   */
  get text(): TextCodec {
    if (!this.textCodec) {
      this.textCodec = new TextCodec(this.graphCodec)
    }
    return this.textCodec
  }

  encode(
    packet: Packet<unknown>,
    format: EncodingFormat = this.config.defaultFormat,
  ): Uint8Array {
    logger.debug('Encoding packet', {
      format,
      words: packet.wordCount,
      type: packet.type.signature,
    })

    switch (format) {
      case EncodingFormat.BINARY:
        return this.binary.encode(packet)
      case EncodingFormat.TEXT:
        return stringToBytes(this.text.encode(packet))
    }
  }

  /**
   * Write a record in the given format without going through a packet
   */
  format(
    record: EncodedRecord,
    format: EncodingFormat = this.config.defaultFormat,
  ): Uint8Array {
    switch (format) {
      case EncodingFormat.BINARY:
        return this.binary.format(record)
      case EncodingFormat.TEXT:
        return stringToBytes(this.text.format(record))
    }
  }

  /**
   * Read a record of any program and type; only its structure and size
   * are checked
   */
  parse(
    data: Uint8Array,
    format: EncodingFormat = this.config.defaultFormat,
  ): Safe<EncodedRecord, PackError<'parse_error'>> {
    switch (format) {
      case EncodingFormat.BINARY:
        return this.binary.parse(data)
      case EncodingFormat.TEXT:
        return this.text.parse(bytesToString(data))
    }
  }

  decode<T>(
    data: Uint8Array,
    type: TypeRep<T>,
    format: EncodingFormat = this.config.defaultFormat,
  ): Safe<Packet<T>, PackError<DecodeFailureCode>> {
    const result = this.decodeFormat(data, type, format)
    const [error] = result
    if (error) {
      logger.debug('Packet decode rejected', {
        format,
        code: error.code,
        context: error.context,
      })
    }
    return result
  }

  private decodeFormat<T>(
    data: Uint8Array,
    type: TypeRep<T>,
    format: EncodingFormat,
  ): Safe<Packet<T>, PackError<DecodeFailureCode>> {
    switch (format) {
      case EncodingFormat.BINARY:
        return this.binary.decode(data, type)
      case EncodingFormat.TEXT:
        return this.text.decode(bytesToString(data), type)
    }
  }
}
