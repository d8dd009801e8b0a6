/**
 * heappack core
 *
 * Logging, environment configuration, fingerprints and the executable
 * identity shared by every package
 */

export * from './env'
export * from './executable-identity'
export * from './fingerprint'
export * from './logger'
export * from './utils'
