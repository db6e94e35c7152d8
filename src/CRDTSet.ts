/**
 * Set CRDT state types, schemas and semilattices.
 *
 * Provides the snapshot types of the set-based CRDTs, schema constructors for
 * serializing them given a schema for their elements, and the pure join and
 * order they are merged with. Elements are compared with `Equal` and `Hash`,
 * so element types other than primitives should be `Data` values.
 *
 * @since 0.1.0
 */
import * as Data from "effect/Data"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"
import * as HashMap from "effect/HashMap"
import * as HashSet from "effect/HashSet"
import * as Option from "effect/Option"
import * as Schema from "effect/Schema"
import { type ReplicaId, ReplicaIdSchema, type Semilattice } from "./CRDT.js"
import { isSubMultiMap, unionMultiMaps } from "./internal/merge.js"

// =============================================================================
// Tags
// =============================================================================

/**
 * Schema for the tag of a single OR-Set add operation.
 *
 * @since 0.1.0
 * @category schemas
 */
export const TagSchema = Schema.Struct({
  replicaId: ReplicaIdSchema,
  sequence: Schema.Int.pipe(Schema.nonNegative())
}).pipe(
  Schema.Data,
  Schema.annotations({
    identifier: "Tag",
    description: "Unique identifier of an OR-Set add operation"
  })
)

/**
 * Unique identifier of an OR-Set add operation: the replica that performed the
 * add and that replica's sequence number for it. A tag is never reused.
 *
 * @since 0.1.0
 * @category models
 */
export type Tag = Schema.Schema.Type<typeof TagSchema>

/**
 * @since 0.1.0
 * @category constructors
 */
export const makeTag = (replicaId: ReplicaId, sequence: number): Tag => Data.struct({ replicaId, sequence })

// =============================================================================
// Models
// =============================================================================

/**
 * State of a G-Set (grow-only set) CRDT.
 *
 * @since 0.1.0
 * @category models
 */
export interface GSetState<A> {
  readonly type: "GSet"
  readonly elements: HashSet.HashSet<A>
}

/**
 * State of a 2P-Set (two-phase set) CRDT: a pair of G-Sets.
 *
 * `removed` only ever holds elements that are also in `added` (see
 * `isWellFormedTwoPSetState`). An element in `removed` is absent for good.
 *
 * @since 0.1.0
 * @category models
 */
export interface TwoPSetState<A> {
  readonly type: "TwoPSet"
  readonly added: GSetState<A>
  readonly removed: GSetState<A>
}

/**
 * State of an OR-Set (observed-remove set) CRDT.
 *
 * `entries` maps each element to the tags of every add of it that the replica
 * has seen; `tombstones` holds the tags that were removed. Tombstoned tags stay
 * in `entries` so that both components only ever grow.
 *
 * @since 0.1.0
 * @category models
 */
export interface ORSetState<A> {
  readonly type: "ORSet"
  readonly entries: HashMap.HashMap<A, HashSet.HashSet<Tag>>
  readonly tombstones: HashSet.HashSet<Tag>
}

/**
 * Discriminated union of all set CRDT states.
 *
 * @since 0.1.0
 * @category models
 */
export type SetState<A> = GSetState<A> | TwoPSetState<A> | ORSetState<A>

// =============================================================================
// Schemas
// =============================================================================

/**
 * Schema for GSetState with elements described by `item`.
 *
 * @example
 * ```ts
 * import * as CRDTSet from "lattice-crdts/CRDTSet"
 * import * as Schema from "effect/Schema"
 *
 * const codec = CRDTSet.GSetState(Schema.String)
 * const encoded = Schema.encodeSync(codec)(CRDTSet.emptyGSetState<string>())
 * // { type: "GSet", elements: [] }
 * ```
 *
 * @since 0.1.0
 * @category schemas
 */
export const GSetState = <A, I, R>(item: Schema.Schema<A, I, R>) =>
  Schema.Struct({
    type: Schema.Literal("GSet"),
    elements: Schema.HashSet(item)
  }).pipe(
    Schema.Data,
    Schema.annotations({
      identifier: "GSetState",
      title: "G-Set State",
      description: "State of a grow-only set CRDT"
    })
  )

/**
 * Schema for TwoPSetState with elements described by `item`.
 *
 * Decoding rejects a state that removes an element it never added.
 *
 * @example
 * ```ts
 * import * as CRDTSet from "lattice-crdts/CRDTSet"
 * import * as Schema from "effect/Schema"
 *
 * const codec = CRDTSet.TwoPSetState(Schema.String)
 * const state = Schema.decodeUnknownSync(codec)({
 *   type: "TwoPSet",
 *   added: { type: "GSet", elements: ["a", "b"] },
 *   removed: { type: "GSet", elements: ["a"] }
 * })
 * ```
 *
 * @since 0.1.0
 * @category schemas
 */
export const TwoPSetState = <A, I, R>(item: Schema.Schema<A, I, R>) =>
  Schema.Struct({
    type: Schema.Literal("TwoPSet"),
    added: GSetState(item),
    removed: GSetState(item)
  }).pipe(
    Schema.Data,
    Schema.filter((state) =>
      HashSet.isSubset(state.removed.elements, state.added.elements) ||
      "Every removed element must also have been added"
    ),
    Schema.annotations({
      identifier: "TwoPSetState",
      title: "2P-Set State",
      description: "State of a two-phase set CRDT"
    })
  )

/**
 * Schema for ORSetState with elements described by `item`.
 *
 * @since 0.1.0
 * @category schemas
 */
export const ORSetState = <A, I, R>(item: Schema.Schema<A, I, R>) =>
  Schema.Struct({
    type: Schema.Literal("ORSet"),
    entries: Schema.HashMap({ key: item, value: Schema.HashSet(TagSchema) }),
    tombstones: Schema.HashSet(TagSchema)
  }).pipe(
    Schema.Data,
    Schema.annotations({
      identifier: "ORSetState",
      title: "OR-Set State",
      description: "State of an observed-remove set CRDT"
    })
  )

// =============================================================================
// Constructors
// =============================================================================

/**
 * @since 0.1.0
 * @category constructors
 */
export const makeGSetState = <A>(elements: HashSet.HashSet<A>): GSetState<A> =>
  Data.struct({ type: "GSet" as const, elements })

/**
 * @since 0.1.0
 * @category constructors
 */
export const emptyGSetState = <A>(): GSetState<A> => makeGSetState(HashSet.empty())

/**
 * @since 0.1.0
 * @category constructors
 */
export const makeTwoPSetState = <A>(
  added: GSetState<A>,
  removed: GSetState<A>
): TwoPSetState<A> => Data.struct({ type: "TwoPSet" as const, added, removed })

/**
 * @since 0.1.0
 * @category constructors
 */
export const emptyTwoPSetState = <A>(): TwoPSetState<A> =>
  makeTwoPSetState(emptyGSetState(), emptyGSetState())

/**
 * @since 0.1.0
 * @category constructors
 */
export const makeORSetState = <A>(
  entries: HashMap.HashMap<A, HashSet.HashSet<Tag>>,
  tombstones: HashSet.HashSet<Tag>
): ORSetState<A> => Data.struct({ type: "ORSet" as const, entries, tombstones })

/**
 * @since 0.1.0
 * @category constructors
 */
export const emptyORSetState = <A>(): ORSetState<A> => makeORSetState(HashMap.empty(), HashSet.empty())

// =============================================================================
// Getters
// =============================================================================

/**
 * @since 0.1.0
 * @category getters
 */
export const gsetHas = <A>(state: GSetState<A>, element: A): boolean => HashSet.has(state.elements, element)

/**
 * The G-Set state with `element` inserted.
 *
 * @since 0.1.0
 * @category getters
 */
export const gsetAdd = <A>(state: GSetState<A>, element: A): GSetState<A> =>
  makeGSetState(HashSet.add(state.elements, element))

/**
 * Whether every removed element of a 2P-Set state was also added. A replica
 * only ever produces such states; a state that breaks it would shadow adds
 * the replica has not made yet.
 *
 * @since 0.1.0
 * @category getters
 */
export const isWellFormedTwoPSetState = <A>(state: TwoPSetState<A>): boolean =>
  HashSet.isSubset(state.removed.elements, state.added.elements)

/**
 * An element is a member when it was added and not removed.
 *
 * @since 0.1.0
 * @category getters
 */
export const twoPSetHas = <A>(state: TwoPSetState<A>, element: A): boolean =>
  gsetHas(state.added, element) && !gsetHas(state.removed, element)

/**
 * Materialises the members of a 2P-Set: every added element that was not
 * removed.
 *
 * Builds a new set on every call, in time proportional to `added`.
 *
 * @since 0.1.0
 * @category getters
 */
export const twoPSetMembers = <A>(state: TwoPSetState<A>): HashSet.HashSet<A> =>
  HashSet.difference(state.added.elements, state.removed.elements)

const isLive = <A>(state: ORSetState<A>, tags: HashSet.HashSet<Tag>): boolean =>
  HashSet.some(tags, (tag) => !HashSet.has(state.tombstones, tag))

/**
 * The tags of `element` that have not been tombstoned.
 *
 * @since 0.1.0
 * @category getters
 */
export const liveTags = <A>(state: ORSetState<A>, element: A): HashSet.HashSet<Tag> =>
  pipe(
    HashMap.get(state.entries, element),
    Option.match({
      onNone: () => HashSet.empty<Tag>(),
      onSome: (tags) => HashSet.filter(tags, (tag) => !HashSet.has(state.tombstones, tag))
    })
  )

/**
 * An element is present when at least one of its tags survives.
 *
 * @since 0.1.0
 * @category getters
 */
export const orSetHas = <A>(state: ORSetState<A>, element: A): boolean =>
  pipe(
    HashMap.get(state.entries, element),
    Option.exists((tags) => isLive(state, tags))
  )

/**
 * The distinct elements present in an OR-Set state.
 *
 * The result is lazy and can be iterated any number of times; each iteration
 * walks the same immutable snapshot.
 *
 * @since 0.1.0
 * @category getters
 */
export const orSetElements = <A>(state: ORSetState<A>): Iterable<A> => ({
  *[Symbol.iterator]() {
    for (const [element, tags] of state.entries) {
      if (isLive(state, tags)) {
        yield element
      }
    }
  }
})

/**
 * Number of distinct elements present in an OR-Set state.
 *
 * @since 0.1.0
 * @category getters
 */
export const orSetSize = <A>(state: ORSetState<A>): number =>
  HashMap.reduce(state.entries, 0, (count, tags) => isLive(state, tags) ? count + 1 : count)

// =============================================================================
// Semilattices
// =============================================================================

/**
 * Join and order of G-Set states: union and subset.
 *
 * @since 0.1.0
 * @category semilattices
 */
export const getGSetSemilattice = <A>(): Semilattice<GSetState<A>> => ({
  join: (self, that) => Either.right(makeGSetState(HashSet.union(self.elements, that.elements))),
  lessThanOrEqualTo: (self, that) => Either.right(HashSet.isSubset(self.elements, that.elements))
})

/**
 * Join and order of 2P-Set states: the G-Set join and order on `added` and on
 * `removed`.
 *
 * @since 0.1.0
 * @category semilattices
 */
export const getTwoPSetSemilattice = <A>(): Semilattice<TwoPSetState<A>> => {
  const GSet = getGSetSemilattice<A>()
  return {
    join: (self, that) =>
      pipe(
        Either.all({
          added: GSet.join(self.added, that.added),
          removed: GSet.join(self.removed, that.removed)
        }),
        Either.map(({ added, removed }) => makeTwoPSetState(added, removed))
      ),
    lessThanOrEqualTo: (self, that) =>
      pipe(
        Either.all([
          GSet.lessThanOrEqualTo(self.added, that.added),
          GSet.lessThanOrEqualTo(self.removed, that.removed)
        ]),
        Either.map(([added, removed]) => added && removed)
      )
  }
}

/**
 * Join and order of OR-Set states.
 *
 * The join takes the union of the tags seen for every element and the union
 * of the tombstones. A tombstoned tag stays absent whatever side it came from.
 *
 * @since 0.1.0
 * @category semilattices
 */
export const getORSetSemilattice = <A>(): Semilattice<ORSetState<A>> => ({
  join: (self, that) =>
    Either.right(
      makeORSetState(
        unionMultiMaps(self.entries, that.entries),
        HashSet.union(self.tombstones, that.tombstones)
      )
    ),
  lessThanOrEqualTo: (self, that) =>
    Either.right(
      HashSet.isSubset(self.tombstones, that.tombstones) && isSubMultiMap(self.entries, that.entries)
    )
})
