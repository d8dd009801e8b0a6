import { hashToFingerprint } from '@heappack/core'
import type { Fingerprint, TypeRep } from '@heappack/types'
import { stringToBytes } from 'viem'

const TYPE_DOMAIN = 'heappack:type:'

/**
 * Fingerprint of a type, derived from its descriptor's signature
 */
export function typeIdentity<T>(rep: TypeRep<T>): Fingerprint {
  return hashToFingerprint(stringToBytes(`${TYPE_DOMAIN}${rep.signature}`))
}
