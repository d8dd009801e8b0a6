/**
 * Type descriptors
 *
 * Constructors for the runtime descriptors that stand in for erased
 * static types. A descriptor's signature is what its identity hashes, so
 * two descriptors with the same signature describe the same type.
 */

import { Closure, SyncCell, Thunk } from '@heappack/heap'
import type { RepType, TypeRep } from '@heappack/types'

/** Static types of a tuple of descriptors */
export type RepTypes<P extends readonly unknown[]> = {
  -readonly [K in keyof P]: RepType<P[K]>
}

type RecordOf<F extends Record<string, TypeRep<unknown>>> = {
  [K in keyof F]: RepType<F[K]>
}

function primitive<T>(
  signature: string,
  is: (value: unknown) => value is T,
): TypeRep<T> {
  return { signature, is }
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null
}

function signatures(reps: readonly TypeRep<unknown>[]): string {
  return reps.map((rep) => rep.signature).join(', ')
}

const int = primitive('Int', (value): value is number =>
  Number.isSafeInteger(value),
)

const float = primitive(
  'Float',
  (value): value is number => typeof value === 'number',
)

const bool = primitive(
  'Bool',
  (value): value is boolean => typeof value === 'boolean',
)

const str = primitive(
  'Str',
  (value): value is string => typeof value === 'string',
)

const bigint = primitive(
  'Integer',
  (value): value is bigint => typeof value === 'bigint',
)

const unit = primitive('()', (value): value is undefined => value === undefined)

const date = primitive(
  'Date',
  (value): value is Date => value instanceof Date,
)

const bytes = primitive(
  'Bytes',
  (value): value is Uint8Array => value instanceof Uint8Array,
)

function list<T>(item: TypeRep<T>): TypeRep<T[]> {
  return {
    signature: `[${item.signature}]`,
    is: (value): value is T[] =>
      Array.isArray(value) && value.every((entry) => item.is(entry)),
  }
}

function tuple<P extends readonly TypeRep<unknown>[]>(
  ...items: P
): TypeRep<RepTypes<P>> {
  return {
    signature: `(${signatures(items)})`,
    is: (value): value is RepTypes<P> =>
      Array.isArray(value) &&
      value.length === items.length &&
      items.every((item, index) => item.is(value[index])),
  }
}

/** Optional value; absence is `null` */
function maybe<T>(item: TypeRep<T>): TypeRep<T | null> {
  return {
    signature: `Maybe<${item.signature}>`,
    is: (value): value is T | null => value === null || item.is(value),
  }
}

function map<K, V>(key: TypeRep<K>, entry: TypeRep<V>): TypeRep<Map<K, V>> {
  return {
    signature: `Map<${key.signature}, ${entry.signature}>`,
    is: (value): value is Map<K, V> => {
      if (!(value instanceof Map)) return false
      for (const [k, v] of value) {
        if (!key.is(k) || !entry.is(v)) return false
      }
      return true
    },
  }
}

function set<T>(item: TypeRep<T>): TypeRep<Set<T>> {
  return {
    signature: `Set<${item.signature}>`,
    is: (value): value is Set<T> => {
      if (!(value instanceof Set)) return false
      for (const entry of value) {
        if (!item.is(entry)) return false
      }
      return true
    },
  }
}

/**
 * Named plain-object type. Field names and types are part of the
 * signature, in declaration order.
 */
function record<F extends Record<string, TypeRep<unknown>>>(
  name: string,
  fields: F,
): TypeRep<RecordOf<F>> {
  const entries = Object.entries(fields)
  const body = entries
    .map(([field, rep]) => `${field}: ${rep.signature}`)
    .join(', ')
  return {
    signature: `${name} {${body}}`,
    is: (value): value is RecordOf<F> =>
      isObject(value) &&
      !Array.isArray(value) &&
      entries.every(([field, rep]) => rep.is(Reflect.get(value, field))),
  }
}

function union<P extends readonly TypeRep<unknown>[]>(
  name: string,
  ...variants: P
): TypeRep<RepType<P[number]>> {
  return {
    signature: `${name} = ${variants.map((v) => v.signature).join(' | ')}`,
    is: (value): value is RepType<P[number]> =>
      variants.some((variant) => variant.is(value)),
  }
}

/** Suspended computation; only the outer class is checked */
function lazy<T>(result: TypeRep<T>): TypeRep<Thunk<T>> {
  return {
    signature: `Lazy<${result.signature}>`,
    is: (value): value is Thunk<T> => value instanceof Thunk,
  }
}

/** Closure over registered code; only the outer class is checked */
function closure<P extends readonly TypeRep<unknown>[], R>(
  args: readonly [...P],
  result: TypeRep<R>,
): TypeRep<Closure<Extract<RepTypes<P>, unknown[]>, R>> {
  return {
    signature: `(${signatures(args)}) -> ${result.signature}`,
    is: (value): value is Closure<Extract<RepTypes<P>, unknown[]>, R> =>
      value instanceof Closure,
  }
}

/**
 * Synchronised cell. Its identity exists, but a value of this type never
 * packs.
 */
function cell<T>(item: TypeRep<T>): TypeRep<SyncCell<T>> {
  return {
    signature: `Cell<${item.signature}>`,
    is: (value): value is SyncCell<T> => value instanceof SyncCell,
  }
}

export const Rep = {
  int,
  float,
  bool,
  str,
  bigint,
  unit,
  date,
  bytes,
  list,
  tuple,
  maybe,
  map,
  set,
  record,
  union,
  lazy,
  closure,
  cell,
} as const
