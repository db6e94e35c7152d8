/**
 * G-Set (Grow-only Set) CRDT implementation.
 *
 * A G-Set is a state-based CRDT that implements a set that can only grow by adding
 * elements. Once an element is added, it cannot be removed. Merging is done by
 * taking the union of both sets.
 *
 * Properties:
 * - Add-only (no removes)
 * - Commutative merge operation
 * - Associative merge operation
 * - Idempotent merge operation
 * - Eventually consistent across all replicas
 *
 * @since 0.1.0
 */

import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import { dual, pipe } from "effect/Function"
import * as HashSet from "effect/HashSet"
import * as Layer from "effect/Layer"
import type { Pipeable } from "effect/Pipeable"
import * as STM from "effect/STM"
import * as TRef from "effect/TRef"
import type { Mutable } from "effect/Types"
import type * as Types from "effect/Types"
import * as CRDTSet from "./CRDTSet.js"
import { isCRDT, makeProtoBase, transition } from "./internal/proto.js"

// =============================================================================
// Symbols
// =============================================================================

/**
 * G-Set type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const GSetTypeId: unique symbol = Symbol.for("lattice-crdts/GSet")

/**
 * G-Set type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type GSetTypeId = typeof GSetTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * G-Set (Grow-only Set) data structure.
 *
 * @since 0.1.0
 * @category models
 */
export interface GSet<A> extends Pipeable {
  readonly [GSetTypeId]: {
    readonly _A: Types.Invariant<A>
  }
  readonly stateRef: TRef.TRef<CRDTSet.GSetState<A>>
}

/**
 * Re-export GSetState from CRDTSet for convenience.
 *
 * @since 0.1.0
 * @category models
 */
export type { GSetState } from "./CRDTSet.js"

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a value is a GSet.
 *
 * @since 0.1.0
 * @category guards
 */
export const isGSet = <A>(u: unknown): u is GSet<A> => isCRDT(u) && GSetTypeId in u

// =============================================================================
// Proto Objects
// =============================================================================

/** @internal */
const ProtoGSet = {
  ...makeProtoBase("GSet"),
  [GSetTypeId]: GSetTypeId
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a G-Set from an existing state.
 *
 * @example
 * ```ts
 * import * as GSet from "lattice-crdts/GSet"
 * import * as CRDTSet from "lattice-crdts/CRDTSet"
 * import * as Effect from "effect/Effect"
 * import * as HashSet from "effect/HashSet"
 *
 * const program = Effect.gen(function* () {
 *   const set = yield* GSet.fromState(CRDTSet.makeGSetState(HashSet.make("apple", "banana")))
 *
 *   console.log("Size:", yield* GSet.size(set)) // 2
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const fromState = <A>(state: CRDTSet.GSetState<A>): STM.STM<GSet<A>> =>
  STM.map(TRef.make(state), (stateRef) => {
    const set: Mutable<GSet<A>> = Object.create(ProtoGSet)
    set.stateRef = stateRef
    return set
  })

/**
 * Creates a new, empty G-Set.
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = <A>(): STM.STM<GSet<A>> => fromState(CRDTSet.emptyGSetState<A>())

// =============================================================================
// Operations
// =============================================================================

/**
 * Add an element to a set. Adding an element that is already present changes
 * nothing.
 *
 * @example
 * ```ts
 * import * as GSet from "lattice-crdts/GSet"
 * import * as Effect from "effect/Effect"
 * import { pipe } from "effect/Function"
 *
 * const program = Effect.gen(function* () {
 *   const set = yield* GSet.make<string>()
 *
 *   // Data-first
 *   yield* GSet.add(set, "apple")
 *
 *   // Data-last (with pipe)
 *   yield* pipe(set, GSet.add("banana"))
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const add: {
  <A>(element: A): (self: GSet<A>) => STM.STM<GSet<A>>
  <A>(self: GSet<A>, element: A): STM.STM<GSet<A>>
} = dual(
  2,
  <A>(self: GSet<A>, element: A): STM.STM<GSet<A>> =>
    TRef.update(self.stateRef, (state) => CRDTSet.gsetAdd(state, element)).pipe(STM.as(self))
)

/**
 * Merge another set's state into this set.
 *
 * Takes the union of both sets.
 *
 * @since 0.1.0
 * @category operations
 */
export const merge: {
  <A>(other: CRDTSet.GSetState<A>): (self: GSet<A>) => STM.STM<GSet<A>>
  <A>(self: GSet<A>, other: CRDTSet.GSetState<A>): STM.STM<GSet<A>>
} = dual(
  2,
  <A>(self: GSet<A>, other: CRDTSet.GSetState<A>): STM.STM<GSet<A>> =>
    transition(self, (state) => STM.fromEither(CRDTSet.getGSetSemilattice<A>().join(state, other))).pipe(
      STM.as(self)
    )
)

// =============================================================================
// Getters
// =============================================================================

/**
 * Check if a set contains an element.
 *
 * @since 0.1.0
 * @category getters
 */
export const has: {
  <A>(element: A): (self: GSet<A>) => STM.STM<boolean>
  <A>(self: GSet<A>, element: A): STM.STM<boolean>
} = dual(
  2,
  <A>(self: GSet<A>, element: A): STM.STM<boolean> =>
    TRef.get(self.stateRef).pipe(STM.map((state) => CRDTSet.gsetHas(state, element)))
)

/**
 * Get all values in a set.
 *
 * @since 0.1.0
 * @category getters
 */
export const values = <A>(self: GSet<A>): STM.STM<HashSet.HashSet<A>> =>
  TRef.get(self.stateRef).pipe(STM.map((state) => state.elements))

/**
 * Get the size of a set.
 *
 * @since 0.1.0
 * @category getters
 */
export const size = <A>(self: GSet<A>): STM.STM<number> =>
  TRef.get(self.stateRef).pipe(STM.map((state) => HashSet.size(state.elements)))

/**
 * Check whether every element of this set is also an element of `other`.
 *
 * Each element is looked up in `other`; the result does not depend on the
 * order either set iterates in.
 *
 * @example
 * ```ts
 * import * as GSet from "lattice-crdts/GSet"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const small = yield* GSet.make<string>()
 *   const large = yield* GSet.make<string>()
 *
 *   yield* GSet.add(small, "apple")
 *   yield* GSet.add(large, "banana")
 *   yield* GSet.add(large, "apple")
 *
 *   const state = yield* GSet.query(large)
 *   console.log(yield* GSet.lessThanOrEqualTo(small, state)) // true
 * })
 * ```
 *
 * @since 0.1.0
 * @category getters
 */
export const lessThanOrEqualTo: {
  <A>(other: CRDTSet.GSetState<A>): (self: GSet<A>) => STM.STM<boolean>
  <A>(self: GSet<A>, other: CRDTSet.GSetState<A>): STM.STM<boolean>
} = dual(
  2,
  <A>(self: GSet<A>, other: CRDTSet.GSetState<A>): STM.STM<boolean> =>
    TRef.get(self.stateRef).pipe(
      STM.flatMap((state) => STM.fromEither(CRDTSet.getGSetSemilattice<A>().lessThanOrEqualTo(state, other)))
    )
)

/**
 * Get the current state of a set.
 *
 * Returns a snapshot of the set's state that can be used for merging with
 * other replicas.
 *
 * @since 0.1.0
 * @category getters
 */
export const query = <A>(self: GSet<A>): STM.STM<CRDTSet.GSetState<A>> => TRef.get(self.stateRef)

// =============================================================================
// Layers
// =============================================================================

/**
 * Service tag of a G-Set holding elements of type `A`.
 *
 * @since 0.1.0
 * @category tags
 */
export const tag = <A>(): Context.Tag<GSet<A>, GSet<A>> => Context.GenericTag<GSet<A>>("lattice-crdts/GSet")

/**
 * Creates a live layer with no persistence.
 *
 * State will be held in memory and lost when the process exits.
 *
 * @example
 * ```ts
 * import * as GSet from "lattice-crdts/GSet"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const set = yield* GSet.tag<string>()
 *   yield* GSet.add(set, "apple")
 * })
 *
 * Effect.runPromise(program.pipe(Effect.provide(GSet.Live<string>())))
 * ```
 *
 * @since 0.1.0
 * @category layers
 */
export const Live = <A>(): Layer.Layer<GSet<A>> =>
  Layer.effect(
    tag<A>(),
    pipe(
      make<A>(),
      STM.commit,
      Effect.tap(() => Effect.logDebug("G-Set replica initialised"))
    )
  )
