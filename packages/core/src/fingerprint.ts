/**
 * Fingerprint utilities
 *
 * Construction, hashing, equality and the printed form of 128-bit
 * identity values.
 */

import { blake2b } from '@noble/hashes/blake2b'
import {
  FINGERPRINT_CONSTANTS,
  type Fingerprint,
  type Safe,
  safeError,
  safeResult,
} from '@heappack/types'
import { bytesToHex, hexToBytes, isHex } from 'viem'

const FINGERPRINT_PATTERN = new RegExp(
  `^0x[0-9a-fA-F]{${FINGERPRINT_CONSTANTS.FINGERPRINT_HEX_DIGITS}}$`,
)

/**
 * Build a fingerprint from 16 bytes, high word first, each word big-endian
 */
export function fingerprintFromBytes(bytes: Uint8Array): Safe<Fingerprint> {
  if (bytes.length !== FINGERPRINT_CONSTANTS.FINGERPRINT_SIZE) {
    return safeError(
      new Error(
        `Fingerprint must be ${FINGERPRINT_CONSTANTS.FINGERPRINT_SIZE} bytes, got ${bytes.length}`,
      ),
    )
  }
  return safeResult(readFingerprint(bytes))
}

function readFingerprint(bytes: Uint8Array): Fingerprint {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  return { hi: view.getBigUint64(0, false), lo: view.getBigUint64(8, false) }
}

export function fingerprintToBytes(fingerprint: Fingerprint): Uint8Array {
  const bytes = new Uint8Array(FINGERPRINT_CONSTANTS.FINGERPRINT_SIZE)
  const view = new DataView(bytes.buffer)
  view.setBigUint64(0, fingerprint.hi, false)
  view.setBigUint64(8, fingerprint.lo, false)
  return bytes
}

/**
 * blake2b digest truncated to fingerprint width
 */
export function hashToFingerprint(data: Uint8Array): Fingerprint {
  const digest = blake2b(data, {
    dkLen: FINGERPRINT_CONSTANTS.FINGERPRINT_SIZE,
  })
  return readFingerprint(digest)
}

export function fingerprintEquals(a: Fingerprint, b: Fingerprint): boolean {
  return a.hi === b.hi && a.lo === b.lo
}

/**
 * `0x` followed by 32 lowercase hex digits
 */
export function fingerprintToHex(fingerprint: Fingerprint): string {
  return bytesToHex(fingerprintToBytes(fingerprint))
}

export function parseFingerprint(text: string): Safe<Fingerprint> {
  const hex = text.toLowerCase()
  if (!FINGERPRINT_PATTERN.test(hex) || !isHex(hex)) {
    return safeError(new Error(`Invalid fingerprint: ${text}`))
  }
  return fingerprintFromBytes(hexToBytes(hex))
}
