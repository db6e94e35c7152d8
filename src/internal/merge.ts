/**
 * Internal utilities for merging CRDT states.
 *
 * @since 0.1.0
 * @internal
 */

import * as Array from "effect/Array"
import * as Chunk from "effect/Chunk"
import { pipe } from "effect/Function"
import * as HashMap from "effect/HashMap"
import * as HashSet from "effect/HashSet"
import * as Option from "effect/Option"

/**
 * True iff `f` holds for every pair of slots at the same position.
 *
 * Stops at the first pair that violates `f`; two empty chunks compare true.
 *
 * @internal
 */
export const everySlot = (
  self: Chunk.Chunk<number>,
  that: Chunk.Chunk<number>,
  f: (x: number, y: number) => boolean
): boolean => {
  const other = Chunk.toReadonlyArray(that)
  return Array.every(Chunk.toReadonlyArray(self), (x, i) => f(x, other[i] ?? 0))
}

/**
 * Merges two multimaps by taking the union of the sets stored under each key.
 *
 * @internal
 */
export const unionMultiMaps = <K, V>(
  a: HashMap.HashMap<K, HashSet.HashSet<V>>,
  b: HashMap.HashMap<K, HashSet.HashSet<V>>
): HashMap.HashMap<K, HashSet.HashSet<V>> =>
  HashMap.reduce(b, a, (result, values, key) =>
    HashMap.set(
      result,
      key,
      pipe(
        HashMap.get(result, key),
        Option.match({
          onNone: () => values,
          onSome: (existing) => HashSet.union(existing, values)
        })
      )
    ))

/**
 * True iff every `(key, value)` pair of `a` is also a pair of `b`.
 *
 * @internal
 */
export const isSubMultiMap = <K, V>(
  a: HashMap.HashMap<K, HashSet.HashSet<V>>,
  b: HashMap.HashMap<K, HashSet.HashSet<V>>
): boolean => {
  for (const [key, values] of a) {
    const included = pipe(
      HashMap.get(b, key),
      Option.exists((other) => HashSet.isSubset(values, other))
    )
    if (!included) {
      return false
    }
  }
  return true
}
