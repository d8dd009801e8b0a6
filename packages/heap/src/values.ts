/**
 * Heap values with packing semantics of their own: suspended
 * computations, closures over registered code, and synchronised cells.
 */

import type { CodeEntry, CodeRef } from './code-table'

export type ThunkState<T> =
  | {
      kind: 'suspended'
      code: CodeEntry
      args: unknown[]
      run: () => Promise<T>
    }
  | {
      kind: 'evaluating'
      code: CodeEntry
      args: unknown[]
      run: () => Promise<T>
      pending: Promise<T>
    }
  | { kind: 'evaluated'; value: T }

/**
 * A computation that has not necessarily run yet. Forcing it runs the
 * code once; concurrent forces share that run. While the run is in flight
 * the thunk is a black hole and cannot be packed without waiting.
 */
export class Thunk<T> {
  constructor(private state: ThunkState<T>) {}

  static of<T>(value: T): Thunk<T> {
    return new Thunk<T>({ kind: 'evaluated', value })
  }

  get isEvaluated(): boolean {
    return this.state.kind === 'evaluated'
  }

  get isUnderEvaluation(): boolean {
    return this.state.kind === 'evaluating'
  }

  /**
   * Current state, for the packer. Callers must not mutate it.
   */
  inspect(): Readonly<ThunkState<T>> {
    return this.state
  }

  /**
   * The value if already evaluated
   */
  peek(): T | undefined {
    return this.state.kind === 'evaluated' ? this.state.value : undefined
  }

  force(): Promise<T> {
    const state = this.state
    switch (state.kind) {
      case 'evaluated':
        return Promise.resolve(state.value)
      case 'evaluating':
        return state.pending
      case 'suspended': {
        // the code starts on the next microtask, once the thunk is
        // already marked as evaluating
        const pending = Promise.resolve()
          .then(() => state.run())
          .then(
            (value) => {
              this.state = { kind: 'evaluated', value }
              return value
            },
            (error: unknown) => {
              // a failed run leaves the computation suspended for a retry
              this.state = state
              throw error
            },
          )
        this.state = { ...state, kind: 'evaluating', pending }
        return pending
      }
    }
  }
}

/**
 * Suspend a call of registered code on the given arguments
 */
export function suspend<A extends unknown[], R>(
  code: CodeRef<A, R>,
  ...args: A
): Thunk<Awaited<R>> {
  return new Thunk<Awaited<R>>({
    kind: 'suspended',
    code: code.entry,
    args,
    run: async (): Promise<Awaited<R>> => await code.call(...args),
  })
}

/**
 * Registered code partially applied to captured arguments
 */
export class Closure<A extends unknown[], R> {
  constructor(
    readonly code: CodeEntry,
    readonly captured: unknown[],
    private readonly invoke: (...rest: A) => R,
  ) {}

  apply(...rest: A): R {
    return this.invoke(...rest)
  }
}

export function closure<C extends unknown[], A extends unknown[], R>(
  code: CodeRef<[...C, ...A], R>,
  ...captured: C
): Closure<A, R> {
  return new Closure<A, R>(code.entry, captured, (...rest: A) =>
    code.call(...captured, ...rest),
  )
}

/**
 * Mutable cell whose readers and writers synchronise through it: `take`
 * waits for a value, `put` waits for the cell to empty. Such cells are
 * tied to the tasks waiting on them and can never be packed.
 */
export class SyncCell<T> {
  private contents: { value: T } | undefined
  private readonly takers: Array<(value: T) => void> = []
  private readonly putters: Array<{ value: T; done: () => void }> = []

  constructor(...initial: [] | [T]) {
    if (initial.length === 1) this.contents = { value: initial[0] }
  }

  get isEmpty(): boolean {
    return this.contents === undefined
  }

  take(): Promise<T> {
    const contents = this.contents
    if (contents === undefined) {
      return new Promise((resolve) => this.takers.push(resolve))
    }
    this.contents = undefined
    this.admitPutter()
    return Promise.resolve(contents.value)
  }

  put(value: T): Promise<void> {
    if (this.contents !== undefined) {
      return new Promise((done) => this.putters.push({ value, done }))
    }
    const taker = this.takers.shift()
    if (taker) {
      taker(value)
    } else {
      this.contents = { value }
    }
    return Promise.resolve()
  }

  /**
   * Wait for a value without emptying the cell
   */
  async read(): Promise<T> {
    const value = await this.take()
    await this.put(value)
    return value
  }

  private admitPutter(): void {
    const putter = this.putters.shift()
    if (!putter) return
    const taker = this.takers.shift()
    if (taker) {
      taker(putter.value)
    } else {
      this.contents = { value: putter.value }
    }
    putter.done()
  }
}
