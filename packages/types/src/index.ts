/**
 * Centralized Type Definitions for heappack
 *
 * Interfaces, enums, constants and result helpers shared by every
 * package in the workspace.
 */

// Layout constants
export * from './constants'
// Error taxonomy
export * from './errors'
export * from './fingerprint'
// Graph codec boundary
export * from './graph'
// Packet records and type descriptors
export * from './packing'
// Safe types
export * from './safe'
