/**
 * Packet file I/O
 *
 * Values written to and read back from packet files
 */

import { readFile, writeFile } from 'node:fs/promises'
import { logger } from '@heappack/core'
import { HeapGraphCodec } from '@heappack/heap'
import {
  DECODE_ERRORS,
  EncodingFormat,
  isPackError,
  PackError,
  type Safe,
  type SafePromise,
  safeError,
  safeResult,
  safeTry,
  type TypeRep,
} from '@heappack/types'
import type { Packet } from './packet'
import { PacketCodec } from './packet-codec'
import { SerializationService } from './serialization-service'

export interface PacketFileOptions {
  service?: SerializationService
  /** Defaults to a codec over the service's graph codec */
  codec?: PacketCodec
}

let defaults: Required<PacketFileOptions> | undefined

function resolve(options: PacketFileOptions): Required<PacketFileOptions> {
  const { service, codec } = options
  if (service) {
    return { service, codec: codec ?? new PacketCodec({}, service.graphCodec) }
  }
  if (codec) {
    return { service: new SerializationService(codec.graphCodec), codec }
  }
  if (defaults === undefined) {
    const graphCodec = new HeapGraphCodec()
    defaults = {
      service: new SerializationService(graphCodec),
      codec: new PacketCodec({}, graphCodec),
    }
  }
  return defaults
}

/**
 * Pack a value without waiting and write it to a file
 */
export async function encodeToFile<T>(
  path: string,
  value: T,
  type: TypeRep<T>,
  format: EncodingFormat = EncodingFormat.BINARY,
  options: PacketFileOptions = {},
): SafePromise<void> {
  const { service, codec } = resolve(options)

  const [packError, packet] = service.trySerialize(value, type)
  if (packError) return safeError(packError)

  const [writeError] = await safeTry(writeFile(path, codec.encode(packet, format)))
  if (writeError) return safeError(writeError)

  logger.debug('Packet written', { path, format, words: packet.wordCount })
  return safeResult(undefined)
}

/**
 * Read a packet file and rebuild its value. Read failures come back as
 * they are; anything else that goes wrong while decoding the bytes is a
 * parse error.
 */
export async function decodeFromFile<T>(
  path: string,
  type: TypeRep<T>,
  format: EncodingFormat = EncodingFormat.BINARY,
  options: PacketFileOptions = {},
): SafePromise<T> {
  const { service, codec } = resolve(options)

  const [readError, data] = await safeTry(readFile(path))
  if (readError) return safeError(readError)

  const [decodeError, packet] = decodeBytes(codec, data, type, format)
  if (decodeError) return safeError(decodeError)

  return service.deserialize(packet)
}

function decodeBytes<T>(
  codec: PacketCodec,
  data: Uint8Array,
  type: TypeRep<T>,
  format: EncodingFormat,
): Safe<Packet<T>, PackError> {
  try {
    return codec.decode(data, type, format)
  } catch (error) {
    if (isPackError(error)) return safeError(error)
    logger.warn('Packet decode raised', { error })
    return safeError(
      new PackError(DECODE_ERRORS.PARSE_ERROR, {
        detail: error instanceof Error ? error.message : String(error),
      }),
    )
  }
}
