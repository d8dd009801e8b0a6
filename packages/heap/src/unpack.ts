/**
 * Graph unpacking
 *
 * The whole buffer is validated (layout, tags, lengths, references, code
 * indices) before any value is allocated. Containers are then allocated
 * empty and filled in a second pass, which lets references point forward
 * and form cycles.
 */

import { WordUtils } from '@heappack/core'
import {
  PackStatus,
  type UnpackOutcome,
  WORD_CONSTANTS,
} from '@heappack/types'
import type { CodeEntry, CodeTable } from './code-table'
import {
  GRAPH_MAGIC,
  GRAPH_PREAMBLE_WORDS,
  isNodeTag,
  NodeTag,
  splitHeader,
  wordsForBytes,
  wordToNumber,
} from './layout'
import { Closure, Thunk } from './values'

class Garbled extends Error {}

interface NodeExtent {
  tag: NodeTag
  count: number
  /** Word index of the first payload word */
  start: number
}

const decoder = new TextDecoder('utf-8', { fatal: true })

function payloadWords(tag: NodeTag, count: number): number {
  switch (tag) {
    case NodeTag.UNDEFINED:
    case NodeTag.NULL:
    case NodeTag.BOOL:
      return 0
    case NodeTag.NUMBER:
    case NodeTag.DATE:
    case NodeTag.EVALUATED:
      return 1
    case NodeTag.BIGINT_POS:
    case NodeTag.BIGINT_NEG:
    case NodeTag.ARRAY:
    case NodeTag.SET:
      return count
    case NodeTag.STRING:
    case NodeTag.BYTES:
      return wordsForBytes(count)
    case NodeTag.OBJECT:
    case NodeTag.MAP:
      return 2 * count
    case NodeTag.THUNK:
    case NodeTag.CLOSURE:
      return 1 + count
  }
}

/** Largest count any node can carry in this buffer */
function countLimit(tag: NodeTag): number {
  switch (tag) {
    case NodeTag.UNDEFINED:
    case NodeTag.NULL:
    case NodeTag.NUMBER:
    case NodeTag.DATE:
    case NodeTag.EVALUATED:
      return 0
    case NodeTag.BOOL:
      return 1
    default:
      return Number.MAX_SAFE_INTEGER
  }
}

export class HeapUnpacker {
  private buffer = new Uint8Array(0)
  private nodes: NodeExtent[] = []

  constructor(private readonly table: CodeTable) {}

  unpack(buffer: Uint8Array): UnpackOutcome {
    try {
      this.buffer = buffer
      this.nodes = []
      this.scan()
      this.validateReferences()
      return { status: PackStatus.SUCCESS, root: this.materialize() }
    } catch (error) {
      return {
        status: PackStatus.GARBLED,
        detail: error instanceof Error ? error.message : String(error),
      }
    }
  }

  private word(index: number): bigint {
    return WordUtils.read(this.buffer, index)
  }

  private scan(): void {
    if (!WordUtils.isAligned(this.buffer)) {
      throw new Garbled('buffer is not word aligned')
    }
    const total = WordUtils.count(this.buffer)
    if (total < GRAPH_PREAMBLE_WORDS + 1) {
      throw new Garbled(`buffer of ${total} words is too short`)
    }
    if (this.word(0) !== GRAPH_MAGIC) {
      throw new Garbled('bad magic word')
    }
    const nodeCount = this.word(1)
    if (nodeCount < 1n || nodeCount > BigInt(total - GRAPH_PREAMBLE_WORDS)) {
      throw new Garbled(`node count ${nodeCount} does not fit the buffer`)
    }

    let cursor = GRAPH_PREAMBLE_WORDS
    for (let i = 0; i < Number(nodeCount); i++) {
      if (cursor >= total) {
        throw new Garbled(`node ${i} starts past the end of the buffer`)
      }
      const { tag, count } = splitHeader(this.word(cursor))
      if (!isNodeTag(tag)) {
        throw new Garbled(`node ${i} has unknown tag ${tag}`)
      }
      if (count > BigInt(countLimit(tag))) {
        throw new Garbled(`node ${i} has count ${count} out of range`)
      }
      const length = payloadWords(tag, Number(count))
      if (cursor + 1 + length > total) {
        throw new Garbled(`node ${i} overruns the buffer`)
      }
      this.nodes.push({ tag, count: Number(count), start: cursor + 1 })
      cursor += 1 + length
    }
    if (cursor !== total) {
      throw new Garbled(`${total - cursor} trailing words after the last node`)
    }
  }

  private refsOf(node: NodeExtent): number[] {
    let first: number
    let length: number
    switch (node.tag) {
      case NodeTag.ARRAY:
      case NodeTag.SET:
        first = node.start
        length = node.count
        break
      case NodeTag.OBJECT:
      case NodeTag.MAP:
        first = node.start
        length = 2 * node.count
        break
      case NodeTag.THUNK:
      case NodeTag.CLOSURE:
        first = node.start + 1
        length = node.count
        break
      case NodeTag.EVALUATED:
        first = node.start
        length = 1
        break
      default:
        return []
    }

    const refs: number[] = []
    for (let k = 0; k < length; k++) {
      const ref = this.word(first + k)
      if (ref >= BigInt(this.nodes.length)) {
        throw new Garbled(`reference ${ref} points past the last node`)
      }
      refs.push(Number(ref))
    }
    return refs
  }

  private codeOf(node: NodeExtent): CodeEntry {
    const index = this.word(node.start)
    const entry =
      index < BigInt(this.table.size)
        ? this.table.entryAt(Number(index))
        : undefined
    if (entry === undefined) {
      throw new Garbled(`unknown code index ${index}`)
    }
    return entry
  }

  private validateReferences(): void {
    for (const node of this.nodes) {
      const refs = this.refsOf(node)
      if (node.tag === NodeTag.THUNK || node.tag === NodeTag.CLOSURE) {
        this.codeOf(node)
      }
      if (node.tag === NodeTag.OBJECT) {
        for (let k = 0; k < refs.length; k += 2) {
          if (this.nodes[refs[k]]?.tag !== NodeTag.STRING) {
            throw new Garbled('object key is not a string node')
          }
        }
      }
    }
  }

  private bytesOf(node: NodeExtent): Uint8Array {
    const offset = node.start * WORD_CONSTANTS.WORD_SIZE
    return this.buffer.slice(offset, offset + node.count)
  }

  private materialize(): unknown {
    const values: unknown[] = new Array(this.nodes.length)
    const fills: Array<() => void> = []

    this.nodes.forEach((node, index) => {
      const refs = this.refsOf(node)
      const at = (k: number): unknown => values[refs[k]]

      switch (node.tag) {
        case NodeTag.UNDEFINED:
          values[index] = undefined
          return
        case NodeTag.NULL:
          values[index] = null
          return
        case NodeTag.BOOL:
          values[index] = node.count === 1
          return
        case NodeTag.NUMBER:
          values[index] = wordToNumber(this.word(node.start))
          return
        case NodeTag.DATE:
          values[index] = new Date(wordToNumber(this.word(node.start)))
          return
        case NodeTag.BIGINT_POS:
        case NodeTag.BIGINT_NEG: {
          let magnitude = 0n
          for (let k = node.count - 1; k >= 0; k--) {
            magnitude = (magnitude << 64n) | this.word(node.start + k)
          }
          values[index] =
            node.tag === NodeTag.BIGINT_NEG ? -magnitude : magnitude
          return
        }
        case NodeTag.STRING:
          values[index] = decoder.decode(this.bytesOf(node))
          return
        case NodeTag.BYTES:
          values[index] = this.bytesOf(node)
          return
        case NodeTag.ARRAY: {
          const array: unknown[] = new Array(node.count)
          values[index] = array
          fills.push(() => {
            for (let k = 0; k < refs.length; k++) array[k] = at(k)
          })
          return
        }
        case NodeTag.OBJECT: {
          const object: Record<string, unknown> = {}
          values[index] = object
          fills.push(() => {
            for (let k = 0; k < refs.length; k += 2) {
              const key = at(k)
              if (typeof key !== 'string') {
                throw new Garbled('object key is not a string')
              }
              Object.defineProperty(object, key, {
                value: at(k + 1),
                enumerable: true,
                writable: true,
                configurable: true,
              })
            }
          })
          return
        }
        case NodeTag.MAP: {
          const map = new Map<unknown, unknown>()
          values[index] = map
          fills.push(() => {
            for (let k = 0; k < refs.length; k += 2) map.set(at(k), at(k + 1))
          })
          return
        }
        case NodeTag.SET: {
          const set = new Set<unknown>()
          values[index] = set
          fills.push(() => {
            for (let k = 0; k < refs.length; k++) set.add(at(k))
          })
          return
        }
        case NodeTag.THUNK: {
          const code = this.codeOf(node)
          const args: unknown[] = []
          values[index] = new Thunk<unknown>({
            kind: 'suspended',
            code,
            args,
            run: async () => await code.apply(args),
          })
          fills.push(() => {
            for (let k = 0; k < refs.length; k++) args.push(at(k))
          })
          return
        }
        case NodeTag.EVALUATED: {
          const state: { kind: 'evaluated'; value: unknown } = {
            kind: 'evaluated',
            value: undefined,
          }
          values[index] = new Thunk<unknown>(state)
          fills.push(() => {
            state.value = at(0)
          })
          return
        }
        case NodeTag.CLOSURE: {
          const code = this.codeOf(node)
          const captured: unknown[] = []
          values[index] = new Closure<unknown[], unknown>(
            code,
            captured,
            (...rest: unknown[]) => code.apply([...captured, ...rest]),
          )
          fills.push(() => {
            for (let k = 0; k < refs.length; k++) captured.push(at(k))
          })
          return
        }
      }
    })

    for (const fill of fills) fill()
    return values[0]
  }
}
