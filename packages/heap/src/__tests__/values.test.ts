import { PackStatus } from '@heappack/types'
import { describe, expect, it } from 'vitest'
import { CodeTable, defaultCodeTable, registerCode } from '../code-table'
import { HeapGraphCodec } from '../heap-graph-codec'
import { closure, suspend, SyncCell, Thunk } from '../values'

describe('CodeTable', () => {
  it('should number entries by registration order', () => {
    const table = new CodeTable()
    const first = table.register('first', () => 1)
    const second = table.register('second', (x: number) => x + 1)

    expect(first.entry.index).toBe(0)
    expect(second.entry.index).toBe(1)
    expect(table.size).toBe(2)
    expect(table.lookup('second')).toBe(second.entry)
    expect(table.entryAt(0)).toBe(first.entry)
    expect(second.entry.apply([41])).toBe(42)
  })

  it('should reject duplicate names', () => {
    const table = new CodeTable()
    table.register('dup', () => 1)

    expect(() => table.register('dup', () => 2)).toThrow(
      'Code entry already registered: dup',
    )
  })

  it('should register into the process-wide table by default', () => {
    const double = registerCode('values-test-double', (x: number) => x * 2)

    expect(defaultCodeTable.owns(double.entry)).toBe(true)
    expect(defaultCodeTable.lookup('values-test-double')).toBe(double.entry)
    expect(double.call(21)).toBe(42)
  })

  it('should fingerprint the order and source of its entries', () => {
    const plusOne = (x: number) => x + 1
    const plusTwo = (x: number) => x + 2
    const build = (names: string[], fn = plusOne): CodeTable => {
      const table = new CodeTable()
      for (const name of names) table.register(name, fn)
      return table
    }

    const reference = build(['a', 'b']).fingerprint()
    expect(build(['a', 'b']).fingerprint()).toEqual(reference)
    expect(build(['b', 'a']).fingerprint()).not.toEqual(reference)
    expect(build(['a', 'b'], plusTwo).fingerprint()).not.toEqual(reference)
    expect(build(['a']).fingerprint()).not.toEqual(reference)
  })

  it('should refresh its fingerprint on registration', () => {
    const table = new CodeTable()
    const empty = table.fingerprint()
    table.register('late', () => 1)

    expect(table.fingerprint()).not.toEqual(empty)
  })

  it('should only own its own entries', () => {
    const table = new CodeTable()
    const other = new CodeTable()
    const mine = table.register('f', () => 1)
    const theirs = other.register('f', () => 1)

    expect(table.owns(mine.entry)).toBe(true)
    expect(table.owns(theirs.entry)).toBe(false)
  })
})

describe('Thunk', () => {
  it('should run its code once for concurrent forces', async () => {
    const table = new CodeTable()
    let runs = 0
    const count = table.register('count', async (x: number) => {
      runs++
      return x * 2
    })
    const thunk = suspend(count, 21)

    expect(thunk.isEvaluated).toBe(false)
    const [a, b] = await Promise.all([thunk.force(), thunk.force()])

    expect(a).toBe(42)
    expect(b).toBe(42)
    expect(runs).toBe(1)
    expect(thunk.peek()).toBe(42)
    expect(await thunk.force()).toBe(42)
    expect(runs).toBe(1)
  })

  it('should be under evaluation until its run settles', async () => {
    const table = new CodeTable()
    const slow = table.register('slow', async () => 'done')
    const thunk = suspend(slow)

    const pending = thunk.force()
    expect(thunk.isUnderEvaluation).toBe(true)
    expect(thunk.peek()).toBeUndefined()

    expect(await pending).toBe('done')
    expect(thunk.isUnderEvaluation).toBe(false)
    expect(thunk.isEvaluated).toBe(true)
  })

  it('should already be a black hole when its own code runs', async () => {
    const table = new CodeTable()
    const codec = new HeapGraphCodec(table, { capacityWords: 64 })
    const holder: { thunk?: Thunk<number> } = {}
    let runs = 0
    let statusDuringRun: PackStatus | undefined
    let nested: Promise<number> | undefined
    const self = table.register('self', () => {
      runs++
      if (holder.thunk) {
        statusDuringRun = codec.pack(holder.thunk).status
        nested = holder.thunk.force()
      }
      return 7
    })
    const thunk = suspend(self)
    holder.thunk = thunk

    expect(await thunk.force()).toBe(7)
    expect(await nested).toBe(7)
    expect(runs).toBe(1)
    expect(statusDuringRun).toBe(PackStatus.BLACKHOLE)
  })

  it('should return to suspended when its run fails', async () => {
    const table = new CodeTable()
    let attempts = 0
    const flaky = table.register('flaky', () => {
      attempts++
      if (attempts === 1) throw new Error('first attempt fails')
      return attempts
    })
    const thunk = suspend(flaky)

    await expect(thunk.force()).rejects.toThrow('first attempt fails')
    expect(thunk.isEvaluated).toBe(false)
    expect(thunk.isUnderEvaluation).toBe(false)

    expect(await thunk.force()).toBe(2)
  })

  it('should wrap ready values', async () => {
    const thunk = Thunk.of('ready')

    expect(thunk.isEvaluated).toBe(true)
    expect(thunk.peek()).toBe('ready')
    expect(await thunk.force()).toBe('ready')
  })
})

describe('Closure', () => {
  it('should prepend captured arguments', () => {
    const table = new CodeTable()
    const join = table.register(
      'join',
      (sep: string, a: string, b: string) => `${a}${sep}${b}`,
    )
    const dashed = closure<[string], [string, string], string>(join, '-')

    expect(dashed.captured).toEqual(['-'])
    expect(dashed.apply('a', 'b')).toBe('a-b')
  })
})

describe('SyncCell', () => {
  it('should hand a put value to a waiting taker', async () => {
    const cell = new SyncCell<number>()
    const taken = cell.take()
    await cell.put(1)

    expect(await taken).toBe(1)
    expect(cell.isEmpty).toBe(true)
  })

  it('should hold a second put until the cell empties', async () => {
    const cell = new SyncCell<number>(1)
    let secondDone = false
    const second = cell.put(2).then(() => {
      secondDone = true
    })

    expect(await cell.take()).toBe(1)
    await second
    expect(secondDone).toBe(true)
    expect(await cell.take()).toBe(2)
    expect(cell.isEmpty).toBe(true)
  })

  it('should leave the value in place on read', async () => {
    const cell = new SyncCell<string>('kept')

    expect(await cell.read()).toBe('kept')
    expect(cell.isEmpty).toBe(false)
  })
})
