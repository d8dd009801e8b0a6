/**
 * heappack codec
 *
 * Typed serialization packets, their text and binary encodings, and
 * packet files
 */

export * from './src/file-io'
export * from './src/formats/binary'
export * from './src/formats/text'
export { Packet } from './src/packet'
export * from './src/packet-codec'
export * from './src/serialization-service'
export * from './src/type-identity'
export * from './src/type-rep'
