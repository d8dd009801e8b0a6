/**
 * Heap Graph Codec Tests
 *
 * Pack/unpack of JavaScript object graphs and the failure statuses of
 * both walkers
 */

import { WordUtils } from '@heappack/core'
import { PackStatus } from '@heappack/types'
import { describe, expect, it } from 'vitest'
import { CodeTable } from '../code-table'
import { HeapGraphCodec } from '../heap-graph-codec'
import { GRAPH_MAGIC, headerWord, NodeTag, numberToWord } from '../layout'
import { Closure, closure, suspend, SyncCell, Thunk } from '../values'

function packed(codec: HeapGraphCodec, value: unknown): Uint8Array {
  const outcome = codec.pack(value)
  expect(outcome.status).toBe(PackStatus.SUCCESS)
  if (!outcome.buffer) throw new Error('pack produced no buffer')
  return outcome.buffer
}

function roundTrip(codec: HeapGraphCodec, value: unknown): unknown {
  const outcome = codec.unpack(packed(codec, value))
  expect(outcome.status).toBe(PackStatus.SUCCESS)
  return outcome.root
}

function asArray(value: unknown): unknown[] {
  if (!Array.isArray(value)) throw new Error('expected an array root')
  return value
}

describe('HeapGraphCodec', () => {
  const table = new CodeTable()
  const add = table.register('add', (a: number, b: number) => a + b)
  const mul = table.register('mul', (a: number, b: number) => a * b)
  const codec = new HeapGraphCodec(table, { capacityWords: 4096 })

  describe('Buffer layout', () => {
    it('should lay out a single number as magic, count, header and bits', () => {
      const buffer = packed(codec, 42)

      expect(WordUtils.toWords(buffer)).toEqual([
        GRAPH_MAGIC,
        1n,
        4n,
        numberToWord(42),
      ])
    })

    it('should number array elements in discovery order', () => {
      const buffer = packed(codec, [1, 2, 3])

      expect(WordUtils.toWords(buffer)).toEqual([
        GRAPH_MAGIC,
        4n,
        headerWord(NodeTag.ARRAY, 3),
        1n,
        2n,
        3n,
        4n,
        numberToWord(1),
        4n,
        numberToWord(2),
        4n,
        numberToWord(3),
      ])
      expect(headerWord(NodeTag.ARRAY, 3)).toBe(776n)
    })
  })

  describe('Round trips', () => {
    it('should rebuild primitives and containers', () => {
      const value = {
        n: 1.5,
        s: 'héllo',
        b: true,
        nil: null,
        big: -(2n ** 70n) + 5n,
        list: [1, 2, 3],
        date: new Date(0),
        bytes: new Uint8Array([1, 2, 3]),
        map: new Map([['a', 1]]),
        set: new Set([1, 2]),
      }

      expect(roundTrip(codec, value)).toEqual(value)
    })

    it('should keep shared references shared', () => {
      const shared = { x: 1 }
      const root = asArray(roundTrip(codec, [shared, shared]))

      expect(root[0]).toEqual({ x: 1 })
      expect(root[0]).toBe(root[1])
    })

    it('should rebuild cycles', () => {
      const node: { self?: unknown } = {}
      node.self = node
      const root = roundTrip(codec, node)

      if (typeof root !== 'object' || root === null) {
        throw new Error('expected an object root')
      }
      expect(Reflect.get(root, 'self')).toBe(root)
    })

    it('should keep a suspended computation suspended', async () => {
      const root = asArray(roundTrip(codec, [suspend(add, 2, 3)]))
      const thunk = root[0]

      expect(thunk).toBeInstanceOf(Thunk)
      if (!(thunk instanceof Thunk)) return
      expect(thunk.isEvaluated).toBe(false)
      expect(await thunk.force()).toBe(5)
      expect(thunk.isEvaluated).toBe(true)
    })

    it('should carry the value of an evaluated computation', async () => {
      const thunk = suspend(add, 20, 22)
      await thunk.force()
      const rebuilt = roundTrip(codec, thunk)

      expect(rebuilt).toBeInstanceOf(Thunk)
      if (!(rebuilt instanceof Thunk)) return
      expect(rebuilt.isEvaluated).toBe(true)
      expect(rebuilt.peek()).toBe(42)
    })

    it('should rebuild closures over registered code', () => {
      const times6 = closure<[number], [number], number>(mul, 6)
      const rebuilt = roundTrip(codec, times6)

      expect(rebuilt).toBeInstanceOf(Closure)
      if (!(rebuilt instanceof Closure)) return
      expect(rebuilt.apply(7)).toBe(42)
    })
  })

  describe('Pack failures', () => {
    it('should report a computation under evaluation as a black hole', async () => {
      let release: (value: number) => void = () => undefined
      const gate = new Promise<number>((resolve) => {
        release = resolve
      })
      const wait = table.register('wait-for-gate', () => gate)
      const thunk = suspend(wait)
      const evaluation = thunk.force()

      const outcome = codec.pack([thunk])
      expect(outcome.status).toBe(PackStatus.BLACKHOLE)
      expect(outcome.buffer).toBeUndefined()
      expect(outcome.blockedOn).toBeInstanceOf(Promise)

      release(7)
      expect(await evaluation).toBe(7)
      expect(codec.pack([thunk]).status).toBe(PackStatus.SUCCESS)
    })

    it('should refuse synchronised cells and other unpackable values', () => {
      expect(codec.pack({ cell: new SyncCell<number>(1) }).status).toBe(
        PackStatus.CANNOT_PACK,
      )
      expect(codec.pack([Promise.resolve(1)]).status).toBe(
        PackStatus.CANNOT_PACK,
      )
      expect(codec.pack(new WeakMap()).status).toBe(PackStatus.CANNOT_PACK)
    })

    it('should refuse value kinds it has no layout for', () => {
      class Opaque {}
      const foreign = new CodeTable().register('elsewhere', () => 1)

      expect(codec.pack([() => 1]).status).toBe(PackStatus.UNSUPPORTED)
      expect(codec.pack(Symbol('s')).status).toBe(PackStatus.UNSUPPORTED)
      expect(codec.pack(new Opaque()).status).toBe(PackStatus.UNSUPPORTED)
      expect(codec.pack(suspend(foreign)).status).toBe(PackStatus.UNSUPPORTED)
    })

    it('should report an exhausted buffer', () => {
      const small = new HeapGraphCodec(table, { capacityWords: 4 })
      const outcome = small.pack([1, 2, 3])

      expect(outcome.status).toBe(PackStatus.NO_BUFFER)
      expect(small.pack(42).status).toBe(PackStatus.SUCCESS)
    })
  })

  describe('Unpack validation', () => {
    it('should reject a bad magic word', () => {
      const buffer = packed(codec, [1, 2, 3])
      WordUtils.write(buffer, 0, 0n)

      expect(codec.unpack(buffer).status).toBe(PackStatus.GARBLED)
    })

    it('should reject a reference past the last node', () => {
      const buffer = WordUtils.fromWords([
        GRAPH_MAGIC,
        1n,
        headerWord(NodeTag.ARRAY, 1),
        5n,
      ])

      expect(codec.unpack(buffer).status).toBe(PackStatus.GARBLED)
    })

    it('should reject an unknown code index', () => {
      const buffer = WordUtils.fromWords([
        GRAPH_MAGIC,
        1n,
        headerWord(NodeTag.THUNK, 0),
        99n,
      ])

      expect(codec.unpack(buffer).status).toBe(PackStatus.GARBLED)
    })

    it('should reject trailing words and unaligned buffers', () => {
      const buffer = WordUtils.fromWords([
        GRAPH_MAGIC,
        1n,
        headerWord(NodeTag.NULL, 0),
        0n,
      ])

      expect(codec.unpack(buffer).status).toBe(PackStatus.GARBLED)
      expect(codec.unpack(new Uint8Array(7)).status).toBe(PackStatus.GARBLED)
    })

    it('should reject object keys that are not strings', () => {
      const buffer = WordUtils.fromWords([
        GRAPH_MAGIC,
        3n,
        headerWord(NodeTag.OBJECT, 1),
        1n,
        2n,
        headerWord(NodeTag.NULL, 0),
        headerWord(NodeTag.NULL, 0),
      ])

      expect(codec.unpack(buffer).status).toBe(PackStatus.GARBLED)
    })
  })
})
