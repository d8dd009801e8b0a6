/**
 * Graph packing
 *
 * Breadth-first walk from the root that numbers every reachable node on
 * first sight and writes each node once, so shared and cyclic structure
 * is preserved by reference.
 */

import { WordUtils } from '@heappack/core'
import { PackStatus, type PackOutcome } from '@heappack/types'
import type { CodeEntry, CodeTable } from './code-table'
import {
  GRAPH_MAGIC,
  headerWord,
  NodeTag,
  numberToWord,
  wordsForBytes,
} from './layout'
import { Closure, SyncCell, Thunk } from './values'

/**
 * Stops the walk with a failure status
 */
class PackAbort extends Error {
  constructor(
    readonly status: PackStatus,
    readonly detail: string,
    readonly blockedOn?: Promise<unknown>,
  ) {
    super(detail)
  }
}

const encoder = new TextEncoder()

function bytesToWords(bytes: Uint8Array): bigint[] {
  const padded = WordUtils.alloc(wordsForBytes(bytes.length))
  padded.set(bytes)
  return WordUtils.toWords(padded)
}

function isUnpackable(value: object): string | undefined {
  if (value instanceof SyncCell) return 'SyncCell'
  if (value instanceof Promise) return 'Promise'
  if (value instanceof WeakMap) return 'WeakMap'
  if (value instanceof WeakSet) return 'WeakSet'
  if (value instanceof WeakRef) return 'WeakRef'
  if (value instanceof SharedArrayBuffer) return 'SharedArrayBuffer'
  return undefined
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

export class HeapPacker {
  private readonly ids = new Map<unknown, number>()
  private readonly pending: unknown[] = []
  private readonly words: bigint[] = [GRAPH_MAGIC, 0n]
  private unsharedCount = 0

  constructor(
    private readonly table: CodeTable,
    private readonly capacityWords: number,
  ) {}

  pack(root: unknown): PackOutcome {
    try {
      this.intern(root)
      let written = 0
      while (written < this.pending.length) {
        this.writeNode(this.pending[written])
        written++
      }
      if (written !== this.ids.size + this.unsharedCount) {
        throw new PackAbort(
          PackStatus.IMPOSSIBLE,
          `wrote ${written} nodes for ${this.ids.size + this.unsharedCount} references`,
        )
      }
      this.words[1] = BigInt(written)
      return {
        status: PackStatus.SUCCESS,
        buffer: WordUtils.fromWords(this.words),
      }
    } catch (error) {
      if (error instanceof PackAbort) {
        return {
          status: error.status,
          detail: error.detail,
          blockedOn: error.blockedOn,
        }
      }
      return {
        status: PackStatus.IMPOSSIBLE,
        detail: error instanceof Error ? error.message : String(error),
      }
    }
  }

  /**
   * Node index of a value, queueing it for writing on first sight.
   * Objects, strings and bigints are shared; other primitives get a node
   * per occurrence.
   */
  private intern(value: unknown): number {
    const shared =
      (typeof value === 'object' && value !== null) ||
      typeof value === 'function' ||
      typeof value === 'string' ||
      typeof value === 'bigint'

    if (shared) {
      const known = this.ids.get(value)
      if (known !== undefined) return known
    }

    const index = this.pending.length
    this.pending.push(value)
    if (shared) {
      this.ids.set(value, index)
    } else {
      this.unsharedCount++
    }
    return index
  }

  private emit(words: bigint[]): void {
    for (const word of words) this.words.push(word)
    if (this.words.length > this.capacityWords) {
      throw new PackAbort(
        PackStatus.NO_BUFFER,
        `graph needs more than ${this.capacityWords} words`,
      )
    }
  }

  private emitNode(tag: NodeTag, count: number, payload: bigint[]): void {
    this.emit([headerWord(tag, count), ...payload])
  }

  private refs(values: Iterable<unknown>): bigint[] {
    const refs: bigint[] = []
    for (const value of values) refs.push(BigInt(this.intern(value)))
    return refs
  }

  private codeIndex(code: CodeEntry): bigint {
    if (!this.table.owns(code)) {
      throw new PackAbort(
        PackStatus.UNSUPPORTED,
        `code entry ${code.name} is not registered in this table`,
      )
    }
    return BigInt(code.index)
  }

  private writeNode(value: unknown): void {
    switch (typeof value) {
      case 'undefined':
        return this.emitNode(NodeTag.UNDEFINED, 0, [])
      case 'boolean':
        return this.emitNode(NodeTag.BOOL, value ? 1 : 0, [])
      case 'number':
        return this.emitNode(NodeTag.NUMBER, 0, [numberToWord(value)])
      case 'bigint':
        return this.writeBigInt(value)
      case 'string': {
        const bytes = encoder.encode(value)
        return this.emitNode(NodeTag.STRING, bytes.length, bytesToWords(bytes))
      }
      case 'symbol':
        throw new PackAbort(PackStatus.UNSUPPORTED, 'symbol')
      case 'function':
        throw new PackAbort(
          PackStatus.UNSUPPORTED,
          `unregistered function ${value.name || '<anonymous>'}`,
        )
      case 'object':
        if (value === null) return this.emitNode(NodeTag.NULL, 0, [])
        return this.writeObject(value)
    }
  }

  private writeBigInt(value: bigint): void {
    const tag = value < 0n ? NodeTag.BIGINT_NEG : NodeTag.BIGINT_POS
    let magnitude = value < 0n ? -value : value
    const limbs: bigint[] = []
    while (magnitude > 0n) {
      limbs.push(magnitude & 0xffffffffffffffffn)
      magnitude >>= 64n
    }
    this.emitNode(tag, limbs.length, limbs)
  }

  private writeObject(value: object): void {
    const unpackable = isUnpackable(value)
    if (unpackable !== undefined) {
      throw new PackAbort(PackStatus.CANNOT_PACK, unpackable)
    }

    if (value instanceof Thunk) return this.writeThunk(value)
    if (value instanceof Closure) {
      return this.emitNode(NodeTag.CLOSURE, value.captured.length, [
        this.codeIndex(value.code),
        ...this.refs(value.captured),
      ])
    }
    if (Array.isArray(value)) {
      return this.emitNode(NodeTag.ARRAY, value.length, this.refs(value))
    }
    if (value instanceof Map) {
      const refs: bigint[] = []
      for (const [key, entry] of value) refs.push(...this.refs([key, entry]))
      return this.emitNode(NodeTag.MAP, value.size, refs)
    }
    if (value instanceof Set) {
      return this.emitNode(NodeTag.SET, value.size, this.refs(value))
    }
    if (value instanceof Date) {
      return this.emitNode(NodeTag.DATE, 0, [numberToWord(value.getTime())])
    }
    if (value instanceof Uint8Array) {
      return this.emitNode(NodeTag.BYTES, value.length, bytesToWords(value))
    }
    if (isPlainObject(value)) {
      const refs: bigint[] = []
      const entries = Object.entries(value)
      for (const [key, entry] of entries) refs.push(...this.refs([key, entry]))
      return this.emitNode(NodeTag.OBJECT, entries.length, refs)
    }

    throw new PackAbort(
      PackStatus.UNSUPPORTED,
      `instance of ${value.constructor?.name ?? 'unknown class'}`,
    )
  }

  private writeThunk(thunk: Thunk<unknown>): void {
    const state = thunk.inspect()
    switch (state.kind) {
      case 'evaluating':
        throw new PackAbort(
          PackStatus.BLACKHOLE,
          `computation ${state.code.name} is under evaluation`,
          state.pending,
        )
      case 'suspended':
        return this.emitNode(NodeTag.THUNK, state.args.length, [
          this.codeIndex(state.code),
          ...this.refs(state.args),
        ])
      case 'evaluated':
        return this.emitNode(NodeTag.EVALUATED, 0, this.refs([state.value]))
    }
  }
}
