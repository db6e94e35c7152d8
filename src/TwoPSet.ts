/**
 * 2P-Set (Two-Phase Set) CRDT implementation.
 *
 * A 2P-Set is a state-based CRDT built from two G-Sets: one of added elements
 * and one of removed elements (tombstones). An element can only be removed
 * after it has been observed as added, and once removed it can never come
 * back: removal wins over every add, past or future.
 *
 * Properties:
 * - Supports both add and remove operations
 * - Elements cannot be re-added after removal (tombstone forever)
 * - Commutative merge operation
 * - Associative merge operation
 * - Idempotent merge operation
 * - Eventually consistent across all replicas
 *
 * @since 0.1.0
 */

import * as Context from "effect/Context"
import * as Data from "effect/Data"
import * as Effect from "effect/Effect"
import { dual, pipe } from "effect/Function"
import * as HashSet from "effect/HashSet"
import * as Layer from "effect/Layer"
import type { Pipeable } from "effect/Pipeable"
import * as STM from "effect/STM"
import * as TRef from "effect/TRef"
import type { Mutable } from "effect/Types"
import type * as Types from "effect/Types"
import { ElementNotObserved } from "./CRDT.js"
import * as CRDTSet from "./CRDTSet.js"
import { isCRDT, makeProtoBase, transition } from "./internal/proto.js"

// =============================================================================
// Symbols
// =============================================================================

/**
 * 2P-Set type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const TwoPSetTypeId: unique symbol = Symbol.for("lattice-crdts/TwoPSet")

/**
 * 2P-Set type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type TwoPSetTypeId = typeof TwoPSetTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * 2P-Set (Two-Phase Set) data structure.
 *
 * @since 0.1.0
 * @category models
 */
export interface TwoPSet<A> extends Pipeable {
  readonly [TwoPSetTypeId]: {
    readonly _A: Types.Invariant<A>
  }
  readonly stateRef: TRef.TRef<CRDTSet.TwoPSetState<A>>
}

/**
 * Re-export TwoPSetState from CRDTSet for convenience.
 *
 * @since 0.1.0
 * @category models
 */
export type { TwoPSetState } from "./CRDTSet.js"

// =============================================================================
// Errors
// =============================================================================

/**
 * Error thrown by 2P-Set constructors.
 *
 * @since 0.1.0
 * @category errors
 */
export class TwoPSetError extends Data.TaggedError("TwoPSetError")<{
  readonly message: string
}> {}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a value is a TwoPSet.
 *
 * @since 0.1.0
 * @category guards
 */
export const isTwoPSet = <A>(u: unknown): u is TwoPSet<A> => isCRDT(u) && TwoPSetTypeId in u

// =============================================================================
// Proto Objects
// =============================================================================

/** @internal */
const ProtoTwoPSet = {
  ...makeProtoBase("TwoPSet"),
  [TwoPSetTypeId]: TwoPSetTypeId
}

// =============================================================================
// Constructors
// =============================================================================

/** @internal */
const unsafeMake = <A>(state: CRDTSet.TwoPSetState<A>): STM.STM<TwoPSet<A>> =>
  STM.map(TRef.make(state), (stateRef) => {
    const set: Mutable<TwoPSet<A>> = Object.create(ProtoTwoPSet)
    set.stateRef = stateRef
    return set
  })

/**
 * Creates a 2P-Set from an existing state.
 *
 * Dies with a `TwoPSetError` when the state removes an element it never
 * added.
 *
 * @since 0.1.0
 * @category constructors
 */
export const fromState = <A>(state: CRDTSet.TwoPSetState<A>): STM.STM<TwoPSet<A>> =>
  CRDTSet.isWellFormedTwoPSetState(state)
    ? unsafeMake(state)
    : STM.die(new TwoPSetError({ message: "Every removed element must also have been added" }))

/**
 * Creates a new, empty 2P-Set.
 *
 * @example
 * ```ts
 * import * as TwoPSet from "lattice-crdts/TwoPSet"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const set = yield* TwoPSet.make<string>()
 *
 *   yield* TwoPSet.add(set, "apple")
 *   yield* TwoPSet.add(set, "banana")
 *   yield* TwoPSet.remove(set, "apple")
 *
 *   console.log("Has apple:", yield* TwoPSet.has(set, "apple"))   // false
 *   console.log("Has banana:", yield* TwoPSet.has(set, "banana")) // true
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = <A>(): STM.STM<TwoPSet<A>> => unsafeMake(CRDTSet.emptyTwoPSetState<A>())

// =============================================================================
// Operations
// =============================================================================

/**
 * Add an element to a set.
 *
 * The element always lands in the added set, but if it was removed before it
 * stays absent (tombstone property).
 *
 * @since 0.1.0
 * @category operations
 */
export const add: {
  <A>(element: A): (self: TwoPSet<A>) => STM.STM<TwoPSet<A>>
  <A>(self: TwoPSet<A>, element: A): STM.STM<TwoPSet<A>>
} = dual(
  2,
  <A>(self: TwoPSet<A>, element: A): STM.STM<TwoPSet<A>> =>
    TRef.update(self.stateRef, (state) =>
      CRDTSet.makeTwoPSetState(CRDTSet.gsetAdd(state.added, element), state.removed)).pipe(STM.as(self))
)

/**
 * Remove an element from a set.
 *
 * Only an element this replica has seen added can be removed. Removing an
 * element that was never added is a no-op; use `removeOrFail` to be told
 * about it instead. Once removed, the element cannot be re-added.
 *
 * @example
 * ```ts
 * import * as TwoPSet from "lattice-crdts/TwoPSet"
 * import * as Effect from "effect/Effect"
 * import { pipe } from "effect/Function"
 *
 * const program = Effect.gen(function* () {
 *   const set = yield* TwoPSet.make<string>()
 *
 *   yield* pipe(set, TwoPSet.add("apple"))
 *   yield* pipe(set, TwoPSet.remove("apple"))
 *
 *   // Try to re-add
 *   yield* pipe(set, TwoPSet.add("apple"))
 *
 *   console.log("Has apple:", yield* TwoPSet.has(set, "apple")) // false - tombstone forever
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const remove: {
  <A>(element: A): (self: TwoPSet<A>) => STM.STM<TwoPSet<A>>
  <A>(self: TwoPSet<A>, element: A): STM.STM<TwoPSet<A>>
} = dual(
  2,
  <A>(self: TwoPSet<A>, element: A): STM.STM<TwoPSet<A>> =>
    TRef.update(self.stateRef, (state) =>
      CRDTSet.gsetHas(state.added, element)
        ? CRDTSet.makeTwoPSetState(state.added, CRDTSet.gsetAdd(state.removed, element))
        : state).pipe(STM.as(self))
)

/**
 * Remove an element from a set, failing with `ElementNotObserved` when the
 * element was never added to this replica.
 *
 * @since 0.1.0
 * @category operations
 */
export const removeOrFail: {
  <A>(element: A): (self: TwoPSet<A>) => STM.STM<TwoPSet<A>, ElementNotObserved>
  <A>(self: TwoPSet<A>, element: A): STM.STM<TwoPSet<A>, ElementNotObserved>
} = dual(
  2,
  <A>(self: TwoPSet<A>, element: A): STM.STM<TwoPSet<A>, ElementNotObserved> =>
    transition(self, (state): STM.STM<CRDTSet.TwoPSetState<A>, ElementNotObserved> =>
      CRDTSet.gsetHas(state.added, element)
        ? STM.succeed(CRDTSet.makeTwoPSetState(state.added, CRDTSet.gsetAdd(state.removed, element)))
        : STM.fail(
          new ElementNotObserved({
            element,
            message: "Cannot remove an element that was never added"
          })
        )).pipe(STM.as(self))
)

/**
 * Merge another set's state into this set.
 *
 * Merges the added G-Sets and the removed G-Sets. `other` is expected to come
 * from a replica's `query` or from the `TwoPSetState` schema, both of which
 * only yield states whose removed elements were all added; merging any other
 * state removes elements this replica may add later.
 *
 * @since 0.1.0
 * @category operations
 */
export const merge: {
  <A>(other: CRDTSet.TwoPSetState<A>): (self: TwoPSet<A>) => STM.STM<TwoPSet<A>>
  <A>(self: TwoPSet<A>, other: CRDTSet.TwoPSetState<A>): STM.STM<TwoPSet<A>>
} = dual(
  2,
  <A>(self: TwoPSet<A>, other: CRDTSet.TwoPSetState<A>): STM.STM<TwoPSet<A>> =>
    transition(self, (state) => STM.fromEither(CRDTSet.getTwoPSetSemilattice<A>().join(state, other))).pipe(
      STM.as(self)
    )
)

// =============================================================================
// Getters
// =============================================================================

/**
 * Check if a set contains an element: it was added and never removed.
 *
 * @since 0.1.0
 * @category getters
 */
export const has: {
  <A>(element: A): (self: TwoPSet<A>) => STM.STM<boolean>
  <A>(self: TwoPSet<A>, element: A): STM.STM<boolean>
} = dual(
  2,
  <A>(self: TwoPSet<A>, element: A): STM.STM<boolean> =>
    TRef.get(self.stateRef).pipe(
      STM.map((state) => CRDTSet.twoPSetHas(state, element))
    )
)

/**
 * Get the members of a set: added elements minus removed elements.
 *
 * The result is computed from scratch on each call, in time proportional to
 * the number of elements ever added. Hold on to it rather than calling this in
 * a loop.
 *
 * @since 0.1.0
 * @category getters
 */
export const value = <A>(self: TwoPSet<A>): STM.STM<HashSet.HashSet<A>> =>
  TRef.get(self.stateRef).pipe(STM.map((state) => CRDTSet.twoPSetMembers(state)))

/**
 * Get the number of members of a set.
 *
 * @since 0.1.0
 * @category getters
 */
export const size = <A>(self: TwoPSet<A>): STM.STM<number> => value(self).pipe(STM.map(HashSet.size))

/**
 * Check whether both the added and the removed elements of this set are
 * included in those of `other`.
 *
 * @since 0.1.0
 * @category getters
 */
export const lessThanOrEqualTo: {
  <A>(other: CRDTSet.TwoPSetState<A>): (self: TwoPSet<A>) => STM.STM<boolean>
  <A>(self: TwoPSet<A>, other: CRDTSet.TwoPSetState<A>): STM.STM<boolean>
} = dual(
  2,
  <A>(self: TwoPSet<A>, other: CRDTSet.TwoPSetState<A>): STM.STM<boolean> =>
    TRef.get(self.stateRef).pipe(
      STM.flatMap((state) => STM.fromEither(CRDTSet.getTwoPSetSemilattice<A>().lessThanOrEqualTo(state, other)))
    )
)

/**
 * Get the current state of a set.
 *
 * @since 0.1.0
 * @category getters
 */
export const query = <A>(self: TwoPSet<A>): STM.STM<CRDTSet.TwoPSetState<A>> => TRef.get(self.stateRef)

// =============================================================================
// Layers
// =============================================================================

/**
 * Service tag of a 2P-Set holding elements of type `A`.
 *
 * @since 0.1.0
 * @category tags
 */
export const tag = <A>(): Context.Tag<TwoPSet<A>, TwoPSet<A>> =>
  Context.GenericTag<TwoPSet<A>>("lattice-crdts/TwoPSet")

/**
 * Creates a live layer with no persistence.
 *
 * @since 0.1.0
 * @category layers
 */
export const Live = <A>(): Layer.Layer<TwoPSet<A>> =>
  Layer.effect(
    tag<A>(),
    pipe(
      make<A>(),
      STM.commit,
      Effect.tap(() => Effect.logDebug("2P-Set replica initialised"))
    )
  )
