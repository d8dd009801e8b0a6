/**
 * Code table
 *
 * Registry of the functions a packed graph may point at. A code pointer
 * is the position of its entry in the table, so packed buffers are only
 * meaningful to a program that registers the same functions in the same
 * order. The table's fingerprint covers every entry's position, name and
 * source text, and is folded into the program identity packets carry.
 */

import { hashToFingerprint } from '@heappack/core'
import type { Fingerprint } from '@heappack/types'
import { stringToBytes } from 'viem'

export interface CodeEntry {
  readonly table: CodeTable
  readonly index: number
  readonly name: string
  /** Source text of the registered function */
  readonly source: string
  apply(args: readonly unknown[]): unknown
}

/**
 * Typed handle to a registered function
 */
export class CodeRef<A extends unknown[], R> {
  constructor(
    readonly entry: CodeEntry,
    private readonly fn: (...args: A) => R,
  ) {}

  get name(): string {
    return this.entry.name
  }

  call(...args: A): R {
    return this.fn(...args)
  }
}

export class CodeTable {
  private readonly entries: CodeEntry[] = []
  private readonly byName = new Map<string, CodeEntry>()
  private digest: Fingerprint | undefined

  get size(): number {
    return this.entries.length
  }

  /**
   * Throws when the name is already taken
   */
  register<A extends unknown[], R>(
    name: string,
    fn: (...args: A) => R,
  ): CodeRef<A, R> {
    if (this.byName.has(name)) {
      throw new Error(`Code entry already registered: ${name}`)
    }
    const entry: CodeEntry = {
      table: this,
      index: this.entries.length,
      name,
      source: fn.toString(),
      apply: (args) => Reflect.apply(fn, undefined, args),
    }
    this.entries.push(entry)
    this.byName.set(name, entry)
    this.digest = undefined
    return new CodeRef(entry, fn)
  }

  /**
   * Digest of the ordered entries. Changes whenever an entry is added, so
   * packets written before a registration no longer match.
   */
  fingerprint(): Fingerprint {
    if (this.digest === undefined) {
      const listing = this.entries
        .map((entry) => `${entry.index}\0${entry.name}\0${entry.source}`)
        .join('\0\0')
      this.digest = hashToFingerprint(
        stringToBytes(`heappack:code:${this.entries.length}\0${listing}`),
      )
    }
    return this.digest
  }

  entryAt(index: number): CodeEntry | undefined {
    return this.entries[index]
  }

  lookup(name: string): CodeEntry | undefined {
    return this.byName.get(name)
  }

  owns(entry: CodeEntry): boolean {
    return entry.table === this && this.entries[entry.index] === entry
  }
}

/** Process-wide table used when a codec is given none */
export const defaultCodeTable = new CodeTable()

export function registerCode<A extends unknown[], R>(
  name: string,
  fn: (...args: A) => R,
): CodeRef<A, R> {
  return defaultCodeTable.register(name, fn)
}
