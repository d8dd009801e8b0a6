/**
 * A 128-bit opaque identity value, held as two unsigned 64-bit words.
 * Only equality is meaningful.
 */
export interface Fingerprint {
  readonly hi: bigint
  readonly lo: bigint
}
