/**
 * Graph Codec Boundary
 *
 * Contract of the primitive that flattens a live object graph into a word
 * buffer and rebuilds a graph from one. The packet layer only ever talks
 * to this interface.
 */

import type { Fingerprint } from './fingerprint'

/**
 * Status codes returned by the pack and unpack primitives.
 * Zero is success; every other value names one failure.
 */
export enum PackStatus {
  SUCCESS = 0,
  BLACKHOLE = 1,
  NO_BUFFER = 2,
  CANNOT_PACK = 3,
  UNSUPPORTED = 4,
  IMPOSSIBLE = 5,
  GARBLED = 6,
}

export interface PackOutcome {
  status: PackStatus
  /** Word buffer, present only on success */
  buffer?: Uint8Array
  /**
   * Settles when the computation that stopped a BLACKHOLE pack finishes
   * evaluating
   */
  blockedOn?: Promise<unknown>
  /** Description of the value that stopped the walk */
  detail?: string
}

export interface UnpackOutcome {
  status: PackStatus
  /** Root of the rebuilt graph, present only on success */
  root?: unknown
  detail?: string
}

export interface GraphCodec {
  /**
   * Digest of the code that packed buffers may point at. Two codecs with
   * equal digests read each other's buffers the same way.
   */
  codeIdentity(): Fingerprint
  /** Never blocks: a computation under evaluation yields BLACKHOLE */
  pack(root: unknown): PackOutcome
  unpack(buffer: Uint8Array): UnpackOutcome
}
