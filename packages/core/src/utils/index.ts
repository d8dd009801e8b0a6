/**
 * Utility exports for heappack core
 */

export * from './words'
