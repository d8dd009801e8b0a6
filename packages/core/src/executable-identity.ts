/**
 * Executable identity
 *
 * Fingerprint of the program that is running, used to refuse packets
 * written by any other program. The executable part is computed once per
 * process and kept for its lifetime; packets carry it combined with the
 * digest of the code their graphs point at.
 */

import { readFileSync, realpathSync } from 'node:fs'
import { FINGERPRINT_CONSTANTS, type Fingerprint } from '@heappack/types'
import { getPackingEnv } from './env'
import { fingerprintToBytes, hashToFingerprint } from './fingerprint'
import { logger } from './logger'

export type FingerprintLoader = () => Fingerprint

type CacheState =
  | { kind: 'empty' }
  | { kind: 'loading' }
  | { kind: 'ready'; value: Fingerprint }

/**
 * Write-once cache around a fingerprint loader. The loader is synchronous,
 * so a first call runs to completion before any other caller on this
 * thread can observe the cache; re-entrant calls from inside the loader
 * are rejected rather than allowed to start a second computation.
 */
export class ExecutableIdentityCache {
  private state: CacheState = { kind: 'empty' }

  constructor(private readonly loader: FingerprintLoader) {}

  get isInitialized(): boolean {
    return this.state.kind === 'ready'
  }

  current(): Fingerprint {
    if (this.state.kind === 'ready') return this.state.value
    if (this.state.kind === 'loading') {
      throw new Error('Executable identity requested while it is being computed')
    }

    this.state = { kind: 'loading' }
    try {
      const value = Object.freeze({ ...this.loader() })
      this.state = { kind: 'ready', value }
      return value
    } catch (error) {
      this.state = { kind: 'empty' }
      throw error
    }
  }
}

/**
 * File whose bytes identify this program: the configured override, else
 * the entry script, else the runtime binary
 */
export function executablePath(): string {
  const configured = getPackingEnv().HEAPPACK_EXECUTABLE
  if (configured) return configured
  return process.argv[1] ?? process.execPath
}

export function hashExecutable(path: string = executablePath()): Fingerprint {
  const resolved = realpathSync(path)
  const fingerprint = hashToFingerprint(readFileSync(resolved))
  logger.debug('Computed executable identity', { path: resolved })
  return fingerprint
}

export const executableIdentity = new ExecutableIdentityCache(() =>
  hashExecutable(),
)

export const ExecutableIdentity = {
  current(): Fingerprint {
    return executableIdentity.current()
  },
}

/**
 * Program identity recorded in packets: the executable fingerprint
 * combined with the digest of a graph codec's code
 */
export function programIdentity(
  code: Fingerprint,
  executable: Fingerprint = ExecutableIdentity.current(),
): Fingerprint {
  const size = FINGERPRINT_CONSTANTS.FINGERPRINT_SIZE
  const bytes = new Uint8Array(2 * size)
  bytes.set(fingerprintToBytes(executable), 0)
  bytes.set(fingerprintToBytes(code), size)
  return hashToFingerprint(bytes)
}
