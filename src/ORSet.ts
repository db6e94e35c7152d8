/**
 * OR-Set (Observed-Remove Set) CRDT implementation.
 *
 * An OR-Set is a state-based CRDT that implements a set supporting both additions
 * and removals. Unlike 2P-Set, elements can be re-added after removal. Each add
 * operation generates a unique tag, and a remove tombstones the tags of the
 * element that the replica has observed so far. An add concurrent with a remove
 * carries a tag the remove never saw, so the element survives the merge.
 *
 * Properties:
 * - Supports both add and remove operations
 * - Elements can be re-added after removal
 * - Each add generates a unique tag (replica ID and sequence number)
 * - Remove operation tombstones all observed tags
 * - Commutative merge operation
 * - Associative merge operation
 * - Idempotent merge operation
 * - Eventually consistent across all replicas
 * - Concurrent add wins over remove (observe-remove semantics)
 *
 * @since 0.1.0
 */

import * as Config from "effect/Config"
import type * as ConfigError from "effect/ConfigError"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import { dual, pipe } from "effect/Function"
import * as HashMap from "effect/HashMap"
import * as HashSet from "effect/HashSet"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import type { Pipeable } from "effect/Pipeable"
import * as STM from "effect/STM"
import * as TRef from "effect/TRef"
import type { Mutable } from "effect/Types"
import type * as Types from "effect/Types"
import { type ReplicaId, replicaIdConfig } from "./CRDT.js"
import * as CRDTSet from "./CRDTSet.js"
import { isCRDT, makeProtoBase } from "./internal/proto.js"

// =============================================================================
// Symbols
// =============================================================================

/**
 * OR-Set type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const ORSetTypeId: unique symbol = Symbol.for("lattice-crdts/ORSet")

/**
 * OR-Set type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type ORSetTypeId = typeof ORSetTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * OR-Set (Observed-Remove Set) data structure.
 *
 * `sequenceRef` holds the sequence number of the next tag this replica will
 * mint. It belongs to this instance alone.
 *
 * @since 0.1.0
 * @category models
 */
export interface ORSet<A> extends Pipeable {
  readonly [ORSetTypeId]: {
    readonly _A: Types.Invariant<A>
  }
  readonly replicaId: ReplicaId
  readonly sequenceRef: TRef.TRef<number>
  readonly stateRef: TRef.TRef<CRDTSet.ORSetState<A>>
}

/**
 * Re-export ORSetState and Tag from CRDTSet for convenience.
 *
 * @since 0.1.0
 * @category models
 */
export type { ORSetState, Tag } from "./CRDTSet.js"

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a value is an ORSet.
 *
 * @since 0.1.0
 * @category guards
 */
export const isORSet = <A>(u: unknown): u is ORSet<A> => isCRDT(u) && ORSetTypeId in u

// =============================================================================
// Proto Objects
// =============================================================================

/** @internal */
const ProtoORSet = {
  ...makeProtoBase("ORSet"),
  [ORSetTypeId]: ORSetTypeId
}

// =============================================================================
// Tag Generation
// =============================================================================

/**
 * The first sequence number `replicaId` can use without colliding with any of
 * its tags already present in `state`.
 *
 * @internal
 */
const nextSequence = <A>(replicaId: ReplicaId, state: CRDTSet.ORSetState<A>): number => {
  const step = (next: number, tag: CRDTSet.Tag): number =>
    tag.replicaId === replicaId ? Math.max(next, tag.sequence + 1) : next
  return HashMap.reduce(
    state.entries,
    HashSet.reduce(state.tombstones, 0, step),
    (next, tags) => HashSet.reduce(tags, next, step)
  )
}

/** @internal */
const generateTag = <A>(self: ORSet<A>): STM.STM<CRDTSet.Tag> =>
  TRef.getAndUpdate(self.sequenceRef, (sequence) => sequence + 1).pipe(
    STM.map((sequence) => CRDTSet.makeTag(self.replicaId, sequence))
  )

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates an OR-Set for `replicaId` from an existing state.
 *
 * New tags continue after the highest sequence number of `replicaId` found in
 * the state, so a replica restored from a snapshot never reissues a tag.
 *
 * @since 0.1.0
 * @category constructors
 */
export const fromState = <A>(replicaId: ReplicaId, state: CRDTSet.ORSetState<A>): STM.STM<ORSet<A>> =>
  STM.gen(function* () {
    const sequenceRef = yield* TRef.make(nextSequence(replicaId, state))
    const stateRef = yield* TRef.make(state)
    const set: Mutable<ORSet<A>> = Object.create(ProtoORSet)
    set.replicaId = replicaId
    set.sequenceRef = sequenceRef
    set.stateRef = stateRef
    return set
  })

/**
 * Creates a new, empty OR-Set with the given replica ID.
 *
 * @example
 * ```ts
 * import * as ORSet from "lattice-crdts/ORSet"
 * import { ReplicaId } from "lattice-crdts/CRDT"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const set = yield* ORSet.make<string>(ReplicaId("replica-1"))
 *
 *   yield* ORSet.add(set, "item1")
 *   yield* ORSet.add(set, "item2")
 *
 *   console.log("Values:", Array.from(yield* ORSet.elements(set)))
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = <A>(replicaId: ReplicaId): STM.STM<ORSet<A>> =>
  fromState(replicaId, CRDTSet.emptyORSetState<A>())

// =============================================================================
// Operations
// =============================================================================

/**
 * Add an element to a set.
 *
 * Generates a unique tag for this add operation. If the element already exists,
 * adds a new tag to its tag set.
 *
 * @example
 * ```ts
 * import * as ORSet from "lattice-crdts/ORSet"
 * import { ReplicaId } from "lattice-crdts/CRDT"
 * import * as Effect from "effect/Effect"
 * import { pipe } from "effect/Function"
 *
 * const program = Effect.gen(function* () {
 *   const set = yield* ORSet.make<string>(ReplicaId("replica-1"))
 *
 *   // Data-first
 *   yield* ORSet.add(set, "apple")
 *
 *   // Data-last (with pipe)
 *   yield* pipe(set, ORSet.add("banana"))
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const add: {
  <A>(element: A): (self: ORSet<A>) => STM.STM<ORSet<A>>
  <A>(self: ORSet<A>, element: A): STM.STM<ORSet<A>>
} = dual(
  2,
  <A>(self: ORSet<A>, element: A): STM.STM<ORSet<A>> =>
    STM.gen(function* () {
      const tag = yield* generateTag(self)
      yield* TRef.update(self.stateRef, (state) =>
        CRDTSet.makeORSetState(
          HashMap.set(
            state.entries,
            element,
            pipe(
              HashMap.get(state.entries, element),
              Option.match({
                onNone: () => HashSet.make(tag),
                onSome: (tags) => HashSet.add(tags, tag)
              })
            )
          ),
          state.tombstones
        ))
      return self
    })
)

/**
 * Remove an element from a set.
 *
 * Tombstones every tag of the element that this replica has observed. Tags
 * minted concurrently by other replicas and not merged yet are untouched, so
 * their adds survive. Removing an absent element changes nothing.
 *
 * @example
 * ```ts
 * import * as ORSet from "lattice-crdts/ORSet"
 * import { ReplicaId } from "lattice-crdts/CRDT"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const set = yield* ORSet.make<string>(ReplicaId("replica-1"))
 *
 *   yield* ORSet.add(set, "apple")
 *   const before = yield* ORSet.has(set, "apple") // true
 *
 *   yield* ORSet.remove(set, "apple")
 *   const after = yield* ORSet.has(set, "apple") // false
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const remove: {
  <A>(element: A): (self: ORSet<A>) => STM.STM<ORSet<A>>
  <A>(self: ORSet<A>, element: A): STM.STM<ORSet<A>>
} = dual(
  2,
  <A>(self: ORSet<A>, element: A): STM.STM<ORSet<A>> =>
    TRef.update(self.stateRef, (state) =>
      pipe(
        HashMap.get(state.entries, element),
        Option.match({
          onNone: () => state,
          onSome: (observed) => CRDTSet.makeORSetState(state.entries, HashSet.union(state.tombstones, observed))
        })
      )).pipe(STM.as(self))
)

/**
 * Merge another set's state into this set.
 *
 * Takes the union of the tags of every element and the union of the
 * tombstones. If the merged state holds tags of this replica that it had not
 * accounted for, the sequence moves past them.
 *
 * @example
 * ```ts
 * import * as ORSet from "lattice-crdts/ORSet"
 * import { ReplicaId } from "lattice-crdts/CRDT"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const set1 = yield* ORSet.make<string>(ReplicaId("replica-1"))
 *   const set2 = yield* ORSet.make<string>(ReplicaId("replica-2"))
 *
 *   yield* ORSet.add(set1, "apple")
 *   yield* ORSet.add(set2, "banana")
 *
 *   const state2 = yield* ORSet.query(set2)
 *   yield* ORSet.merge(set1, state2)
 *
 *   console.log("Merged size:", yield* ORSet.size(set1)) // 2
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const merge: {
  <A>(other: CRDTSet.ORSetState<A>): (self: ORSet<A>) => STM.STM<ORSet<A>>
  <A>(self: ORSet<A>, other: CRDTSet.ORSetState<A>): STM.STM<ORSet<A>>
} = dual(
  2,
  <A>(self: ORSet<A>, other: CRDTSet.ORSetState<A>): STM.STM<ORSet<A>> =>
    STM.gen(function* () {
      const current = yield* TRef.get(self.stateRef)
      const merged = yield* STM.fromEither(CRDTSet.getORSetSemilattice<A>().join(current, other))
      yield* TRef.set(self.stateRef, merged)
      const floor = nextSequence(self.replicaId, other)
      yield* TRef.update(self.sequenceRef, (sequence) => Math.max(sequence, floor))
      return self
    })
)

// =============================================================================
// Getters
// =============================================================================

/**
 * Check if a set contains an element.
 *
 * An element is present if at least one of its tags is not tombstoned.
 *
 * @since 0.1.0
 * @category getters
 */
export const has: {
  <A>(element: A): (self: ORSet<A>) => STM.STM<boolean>
  <A>(self: ORSet<A>, element: A): STM.STM<boolean>
} = dual(
  2,
  <A>(self: ORSet<A>, element: A): STM.STM<boolean> =>
    TRef.get(self.stateRef).pipe(STM.map((state) => CRDTSet.orSetHas(state, element)))
)

/**
 * Get the elements present in a set.
 *
 * The returned iterable is lazy and restartable: it reads from the snapshot
 * taken when the transaction ran and yields every present element once.
 *
 * @since 0.1.0
 * @category getters
 */
export const elements = <A>(self: ORSet<A>): STM.STM<Iterable<A>> =>
  TRef.get(self.stateRef).pipe(STM.map((state) => CRDTSet.orSetElements(state)))

/**
 * Get the number of elements present in a set.
 *
 * @since 0.1.0
 * @category getters
 */
export const size = <A>(self: ORSet<A>): STM.STM<number> =>
  TRef.get(self.stateRef).pipe(STM.map((state) => CRDTSet.orSetSize(state)))

/**
 * Get the live tags for a specific element.
 *
 * Returns the tags of the element that have not been tombstoned. If the
 * element is not in the set, returns an empty set.
 *
 * @since 0.1.0
 * @category getters
 */
export const tags: {
  <A>(element: A): (self: ORSet<A>) => STM.STM<HashSet.HashSet<CRDTSet.Tag>>
  <A>(self: ORSet<A>, element: A): STM.STM<HashSet.HashSet<CRDTSet.Tag>>
} = dual(
  2,
  <A>(self: ORSet<A>, element: A): STM.STM<HashSet.HashSet<CRDTSet.Tag>> =>
    TRef.get(self.stateRef).pipe(STM.map((state) => CRDTSet.liveTags(state, element)))
)

/**
 * Check whether both the tagged entries and the tombstones of this set are
 * included in those of `other`.
 *
 * @since 0.1.0
 * @category getters
 */
export const lessThanOrEqualTo: {
  <A>(other: CRDTSet.ORSetState<A>): (self: ORSet<A>) => STM.STM<boolean>
  <A>(self: ORSet<A>, other: CRDTSet.ORSetState<A>): STM.STM<boolean>
} = dual(
  2,
  <A>(self: ORSet<A>, other: CRDTSet.ORSetState<A>): STM.STM<boolean> =>
    TRef.get(self.stateRef).pipe(
      STM.flatMap((state) => STM.fromEither(CRDTSet.getORSetSemilattice<A>().lessThanOrEqualTo(state, other)))
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
export const query = <A>(self: ORSet<A>): STM.STM<CRDTSet.ORSetState<A>> => TRef.get(self.stateRef)

// =============================================================================
// Layers
// =============================================================================

/**
 * Service tag of an OR-Set holding elements of type `A`.
 *
 * @since 0.1.0
 * @category tags
 */
export const tag = <A>(): Context.Tag<ORSet<A>, ORSet<A>> => Context.GenericTag<ORSet<A>>("lattice-crdts/ORSet")

/**
 * Creates a live layer with no persistence.
 *
 * State will be held in memory and lost when the process exits.
 *
 * @example
 * ```ts
 * import * as ORSet from "lattice-crdts/ORSet"
 * import { ReplicaId } from "lattice-crdts/CRDT"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const set = yield* ORSet.tag<string>()
 *   yield* ORSet.add(set, "apple")
 * })
 *
 * Effect.runPromise(program.pipe(Effect.provide(ORSet.Live<string>(ReplicaId("replica-1")))))
 * ```
 *
 * @since 0.1.0
 * @category layers
 */
export const Live = <A>(replicaId: ReplicaId): Layer.Layer<ORSet<A>> =>
  Layer.effect(
    tag<A>(),
    Effect.gen(function* () {
      const set = yield* make<A>(replicaId)
      yield* Effect.logDebug("OR-Set replica initialised").pipe(Effect.annotateLogs({ replicaId }))
      return set
    })
  )

/**
 * Creates a live layer whose replica ID is read from configuration, by
 * default the `replicaId` key.
 *
 * @since 0.1.0
 * @category layers
 */
export const layerConfig = <A>(
  config: Config.Config<ReplicaId> = replicaIdConfig
): Layer.Layer<ORSet<A>, ConfigError.ConfigError> =>
  Layer.unwrapEffect(Effect.map(config, (replicaId) => Live<A>(replicaId)))
