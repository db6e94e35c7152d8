/**
 * Core CRDT (Conflict-free Replicated Data Type) types and utilities.
 *
 * Provides the identifiers, the semilattice contract, the error types and the
 * configuration descriptors shared by every CRDT in the library. Each CRDT is
 * a bounded join-semilattice: replicas mutate independently and converge by
 * joining snapshots, whatever the order or repetition of the joins.
 *
 * @since 0.1.0
 */
import * as Brand from "effect/Brand"
import * as Config from "effect/Config"
import * as Data from "effect/Data"
import type * as Either from "effect/Either"
import * as Schema from "effect/Schema"

// =============================================================================
// Symbols
// =============================================================================

/**
 * Core CRDT type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const CRDTTypeId: unique symbol = Symbol.for("lattice-crdts/CRDT")

/**
 * Core CRDT type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type CRDTTypeId = typeof CRDTTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * Replica ID for identifying different CRDT instances.
 *
 * Used by the OR-Set to make the tag of every add operation globally unique.
 * Two live replicas must never share an ID.
 *
 * @since 0.1.0
 * @category models
 */
export type ReplicaId = Brand.Branded<string, "ReplicaId">

/**
 * A bounded join-semilattice over snapshots of type `S`.
 *
 * `join` must be commutative, associative and idempotent, and
 * `lessThanOrEqualTo(a, b)` must hold exactly when `join(a, b)` equals `b`.
 * `E` is the failure raised when two snapshots cannot be compared at all,
 * such as counters configured for a different number of replicas.
 *
 * @since 0.1.0
 * @category models
 */
export interface Semilattice<S, E = never> {
  readonly join: (self: S, that: S) => Either.Either<S, E>
  readonly lessThanOrEqualTo: (self: S, that: S) => Either.Either<boolean, E>
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a replica ID from a string.
 *
 * @example
 * ```ts
 * import { ReplicaId } from "lattice-crdts/CRDT"
 *
 * const replica1 = ReplicaId("replica-1")
 * const replica2 = ReplicaId("replica-2")
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const ReplicaId = Brand.nominal<ReplicaId>()

// =============================================================================
// Schemas
// =============================================================================

/**
 * Schema for ReplicaId serialization/deserialization.
 *
 * @since 0.1.0
 * @category schemas
 */
export const ReplicaIdSchema: Schema.BrandSchema<ReplicaId, string> = Schema.String.pipe(
  Schema.fromBrand(ReplicaId)
)

/**
 * Number of replicas a counter accounts for. Fixed for the counter's lifetime.
 *
 * @since 0.1.0
 * @category schemas
 */
export const ReplicaCount = Schema.Int.pipe(
  Schema.positive(),
  Schema.annotations({
    identifier: "ReplicaCount",
    description: "A positive number of replica slots"
  })
)

/**
 * @since 0.1.0
 * @category guards
 */
export const isReplicaCount: (u: unknown) => u is number = Schema.is(ReplicaCount)

// =============================================================================
// Errors
// =============================================================================

/**
 * A counter operation addressed a slot outside `0..size-1`.
 *
 * @since 0.1.0
 * @category errors
 */
export class InvalidIndex extends Data.TaggedError("InvalidIndex")<{
  readonly index: number
  readonly size: number
  readonly message: string
}> {}

/**
 * Two snapshots were configured for a different number of replicas.
 *
 * @since 0.1.0
 * @category errors
 */
export class IncompatibleShape extends Data.TaggedError("IncompatibleShape")<{
  readonly expected: number
  readonly actual: number
  readonly message: string
}> {}

/**
 * A strict removal targeted an element the replica has never seen added.
 *
 * @since 0.1.0
 * @category errors
 */
export class ElementNotObserved extends Data.TaggedError("ElementNotObserved")<{
  readonly element: unknown
  readonly message: string
}> {}

/** @internal */
export const invalidIndex = (index: number, size: number): InvalidIndex =>
  new InvalidIndex({
    index,
    size,
    message: `Index ${index} is out of range for ${size} replica slots`
  })

/** @internal */
export const incompatibleShape = (expected: number, actual: number): IncompatibleShape =>
  new IncompatibleShape({
    expected,
    actual,
    message: `Expected a snapshot with ${expected} replica slots, received ${actual}`
  })

// =============================================================================
// Config
// =============================================================================

/**
 * Reads the replica count of a counter from the `replicas` key.
 *
 * @since 0.1.0
 * @category config
 */
export const replicaCountConfig: Config.Config<number> = Config.integer("replicas").pipe(
  Config.validate({
    message: "Expected a positive number of replicas",
    validation: isReplicaCount
  })
)

/**
 * Reads the identity of the local replica from the `replicaId` key.
 *
 * @since 0.1.0
 * @category config
 */
export const replicaIdConfig: Config.Config<ReplicaId> = Config.string("replicaId").pipe(
  Config.validate({
    message: "Expected a non-empty replica id",
    validation: (id: string) => id.length > 0
  }),
  Config.map(ReplicaId)
)
