/**
 * Property-based tests for CRDT laws.
 *
 * These tests verify that every state type forms a join-semilattice, which is
 * what gives strong eventual consistency:
 * - Commutativity: merge(a, b) = merge(b, a)
 * - Associativity: merge(merge(a, b), c) = merge(a, merge(b, c))
 * - Idempotence: merge(a, a) = a
 * - Order: a <= b exactly when merge(a, b) = b, and a <= merge(a, b)
 *
 * States are generated directly rather than through replicas, restricted to
 * shapes a replica can actually reach.
 *
 * @since 0.1.0
 */

import { describe, it } from "vitest"
import * as Chunk from "effect/Chunk"
import * as Either from "effect/Either"
import * as Equal from "effect/Equal"
import * as FastCheck from "effect/FastCheck"
import { pipe } from "effect/Function"
import * as HashMap from "effect/HashMap"
import * as HashSet from "effect/HashSet"
import * as Option from "effect/Option"
import { ReplicaId, type Semilattice } from "../../src/CRDT.js"
import * as CRDTCounter from "../../src/CRDTCounter.js"
import * as CRDTSet from "../../src/CRDTSet.js"

const REPLICAS = 3

const gcounterArbitrary: FastCheck.Arbitrary<CRDTCounter.GCounterState> = FastCheck
  .array(FastCheck.nat({ max: 20 }), { minLength: REPLICAS, maxLength: REPLICAS })
  .map((counts) => CRDTCounter.makeGCounterState(Chunk.fromIterable(counts)))

const pncounterArbitrary: FastCheck.Arbitrary<CRDTCounter.PNCounterState> = FastCheck
  .tuple(gcounterArbitrary, gcounterArbitrary)
  .map(([increments, decrements]) => CRDTCounter.makePNCounterState(increments, decrements))

const gsetArbitrary: FastCheck.Arbitrary<CRDTSet.GSetState<number>> = FastCheck
  .uniqueArray(FastCheck.nat({ max: 10 }), { maxLength: 6 })
  .map((elements) => CRDTSet.makeGSetState(HashSet.fromIterable(elements)))

// Only added elements can be removed.
const twoPSetArbitrary: FastCheck.Arbitrary<CRDTSet.TwoPSetState<number>> = FastCheck
  .uniqueArray(FastCheck.tuple(FastCheck.nat({ max: 10 }), FastCheck.boolean()), {
    maxLength: 6,
    selector: ([element]) => element
  })
  .map((entries) =>
    CRDTSet.makeTwoPSetState(
      CRDTSet.makeGSetState(HashSet.fromIterable(entries.map(([element]) => element))),
      CRDTSet.makeGSetState(
        HashSet.fromIterable(entries.filter(([, removed]) => removed).map(([element]) => element))
      )
    )
  )

// A tag always belongs to the same element, whichever state it shows up in,
// and only observed tags are tombstoned.
const elementOf = (tag: CRDTSet.Tag): string => `e${tag.sequence % 3}`

const orSetArbitrary: FastCheck.Arbitrary<CRDTSet.ORSetState<string>> = FastCheck
  .uniqueArray(
    FastCheck.tuple(FastCheck.constantFrom("a", "b", "c"), FastCheck.nat({ max: 5 }), FastCheck.boolean()),
    { maxLength: 8, selector: ([replica, sequence]) => `${replica}:${sequence}` }
  )
  .map((adds) => {
    let entries = HashMap.empty<string, HashSet.HashSet<CRDTSet.Tag>>()
    let tombstones = HashSet.empty<CRDTSet.Tag>()
    for (const [replica, sequence, removed] of adds) {
      const tag = CRDTSet.makeTag(ReplicaId(replica), sequence)
      const element = elementOf(tag)
      entries = HashMap.set(
        entries,
        element,
        pipe(
          HashMap.get(entries, element),
          Option.match({
            onNone: () => HashSet.make(tag),
            onSome: (tags) => HashSet.add(tags, tag)
          })
        )
      )
      if (removed) {
        tombstones = HashSet.add(tombstones, tag)
      }
    }
    return CRDTSet.makeORSetState(entries, tombstones)
  })

const checkLaws = <S, E>(lattice: Semilattice<S, E>, arbitrary: FastCheck.Arbitrary<S>) => {
  const join = (a: S, b: S): S => Either.getOrThrow(lattice.join(a, b))
  const leq = (a: S, b: S): boolean => Either.getOrThrow(lattice.lessThanOrEqualTo(a, b))

  it("merge(a, b) = merge(b, a)", () =>
    FastCheck.assert(FastCheck.property(arbitrary, arbitrary, (a, b) => Equal.equals(join(a, b), join(b, a)))))

  it("merge(merge(a, b), c) = merge(a, merge(b, c))", () =>
    FastCheck.assert(
      FastCheck.property(
        arbitrary,
        arbitrary,
        arbitrary,
        (a, b, c) => Equal.equals(join(join(a, b), c), join(a, join(b, c)))
      )
    ))

  it("merge(a, a) = a", () => FastCheck.assert(FastCheck.property(arbitrary, (a) => Equal.equals(join(a, a), a))))

  it("a <= merge(a, b)", () =>
    FastCheck.assert(FastCheck.property(arbitrary, arbitrary, (a, b) => leq(a, join(a, b)) && leq(b, join(a, b)))))

  it("a <= b iff merge(a, b) = b", () =>
    FastCheck.assert(FastCheck.property(arbitrary, arbitrary, (a, b) => leq(a, b) === Equal.equals(join(a, b), b))))
}

describe("CRDT Laws", () => {
  describe("G-Counter", () => checkLaws(CRDTCounter.GCounterSemilattice, gcounterArbitrary))
  describe("PN-Counter", () => checkLaws(CRDTCounter.PNCounterSemilattice, pncounterArbitrary))
  describe("G-Set", () => checkLaws(CRDTSet.getGSetSemilattice<number>(), gsetArbitrary))
  describe("2P-Set", () => checkLaws(CRDTSet.getTwoPSetSemilattice<number>(), twoPSetArbitrary))
  describe("OR-Set", () => checkLaws(CRDTSet.getORSetSemilattice<string>(), orSetArbitrary))
})
