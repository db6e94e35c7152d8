/**
 * Counter CRDT state types, schemas and semilattices.
 *
 * Provides the snapshot types of the counter-based CRDTs (GCounter and
 * PNCounter), their schemas for serialization, and the pure join and order
 * they are merged with. A snapshot is immutable and compares structurally
 * with `Equal.equals`.
 *
 * @since 0.1.0
 */
import * as Chunk from "effect/Chunk"
import * as Data from "effect/Data"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"
import * as Number from "effect/Number"
import * as Schema from "effect/Schema"
import { incompatibleShape, type IncompatibleShape, type Semilattice } from "./CRDT.js"
import { everySlot } from "./internal/merge.js"

// =============================================================================
// Schemas
// =============================================================================

const Count = Schema.Int.pipe(Schema.nonNegative())

const Counts = Schema.Chunk(Count).pipe(
  Schema.filter((counts) => Chunk.size(counts) > 0 || "Expected at least one replica slot")
)

/**
 * Schema for GCounterState.
 *
 * A G-Counter holds one non-negative count per replica slot. Slot `i` is only
 * ever incremented by replica `i`; the other slots are copies received
 * through merges. The global value is the sum of all slots.
 *
 * @since 0.1.0
 * @category schemas
 * @example
 * ```ts
 * import * as CRDTCounter from "lattice-crdts/CRDTCounter"
 * import * as Schema from "effect/Schema"
 *
 * const state = Schema.decodeUnknownSync(CRDTCounter.GCounterState)({
 *   type: "GCounter",
 *   counts: [5, 3, 0]
 * })
 * ```
 */
export const GCounterState = Schema.Struct({
  type: Schema.Literal("GCounter"),
  counts: Counts
}).pipe(
  Schema.Data,
  Schema.annotations({
    identifier: "GCounterState",
    title: "G-Counter State",
    description: "State of a grow-only counter CRDT"
  })
)

/**
 * Schema for PNCounterState.
 *
 * A PN-Counter is a pair of G-Counters of the same size: one counts
 * increments, the other decrements. The global value is the difference.
 *
 * @since 0.1.0
 * @category schemas
 */
export const PNCounterState = Schema.Struct({
  type: Schema.Literal("PNCounter"),
  increments: GCounterState,
  decrements: GCounterState
}).pipe(
  Schema.Data,
  Schema.annotations({
    identifier: "PNCounterState",
    title: "PN-Counter State",
    description: "State of a positive-negative counter CRDT"
  })
)

/**
 * Schema for CounterState (union of GCounter and PNCounter states).
 *
 * @since 0.1.0
 * @category schemas
 */
export const CounterState = Schema.Union(GCounterState, PNCounterState).pipe(
  Schema.annotations({
    identifier: "CounterState",
    title: "Counter State",
    description: "Discriminated union of all counter CRDT states"
  })
)

// =============================================================================
// Models
// =============================================================================

/**
 * State of a G-Counter (grow-only counter) CRDT.
 *
 * @since 0.1.0
 * @category models
 */
export type GCounterState = Schema.Schema.Type<typeof GCounterState>

/**
 * State of a PN-Counter (positive-negative counter) CRDT.
 *
 * @since 0.1.0
 * @category models
 */
export type PNCounterState = Schema.Schema.Type<typeof PNCounterState>

/**
 * Discriminated union of all counter CRDT states.
 *
 * @since 0.1.0
 * @category models
 */
export type CounterState = Schema.Schema.Type<typeof CounterState>

// =============================================================================
// Constructors
// =============================================================================

/**
 * @since 0.1.0
 * @category constructors
 */
export const makeGCounterState = (counts: Chunk.Chunk<number>): GCounterState =>
  Data.struct({ type: "GCounter" as const, counts })

/**
 * A G-Counter state with `size` zero slots.
 *
 * @since 0.1.0
 * @category constructors
 */
export const emptyGCounterState = (size: number): GCounterState =>
  makeGCounterState(Chunk.makeBy(size, () => 0))

/**
 * @since 0.1.0
 * @category constructors
 */
export const makePNCounterState = (
  increments: GCounterState,
  decrements: GCounterState
): PNCounterState => Data.struct({ type: "PNCounter" as const, increments, decrements })

/**
 * @since 0.1.0
 * @category constructors
 */
export const emptyPNCounterState = (size: number): PNCounterState =>
  makePNCounterState(emptyGCounterState(size), emptyGCounterState(size))

// =============================================================================
// Getters
// =============================================================================

/**
 * Number of replica slots of a G-Counter state.
 *
 * @since 0.1.0
 * @category getters
 */
export const gcounterSize = (state: GCounterState): number => Chunk.size(state.counts)

/**
 * @since 0.1.0
 * @category getters
 */
export const gcounterValue = (state: GCounterState): number => Number.sumAll(state.counts)

/**
 * @since 0.1.0
 * @category getters
 */
export const pncounterValue = (state: PNCounterState): number =>
  Number.subtract(gcounterValue(state.increments), gcounterValue(state.decrements))

// =============================================================================
// Semilattices
// =============================================================================

const sameShape = <S>(
  self: GCounterState,
  that: GCounterState,
  f: () => S
): Either.Either<S, IncompatibleShape> =>
  gcounterSize(self) === gcounterSize(that)
    ? Either.right(f())
    : Either.left(incompatibleShape(gcounterSize(self), gcounterSize(that)))

/**
 * Join and order of G-Counter states.
 *
 * The join keeps the maximum of each slot. `a ≤ b` holds when no slot of `a`
 * exceeds the same slot of `b`.
 *
 * @since 0.1.0
 * @category semilattices
 */
export const GCounterSemilattice: Semilattice<GCounterState, IncompatibleShape> = {
  join: (self, that) =>
    sameShape(self, that, () => makeGCounterState(Chunk.zipWith(self.counts, that.counts, Number.max))),
  lessThanOrEqualTo: (self, that) =>
    sameShape(self, that, () => everySlot(self.counts, that.counts, Number.lessThanOrEqualTo))
}

/**
 * Join and order of PN-Counter states, component-wise over both G-Counters.
 *
 * @since 0.1.0
 * @category semilattices
 */
export const PNCounterSemilattice: Semilattice<PNCounterState, IncompatibleShape> = {
  join: (self, that) =>
    pipe(
      Either.all({
        increments: GCounterSemilattice.join(self.increments, that.increments),
        decrements: GCounterSemilattice.join(self.decrements, that.decrements)
      }),
      Either.map(({ decrements, increments }) => makePNCounterState(increments, decrements))
    ),
  lessThanOrEqualTo: (self, that) =>
    pipe(
      Either.all([
        GCounterSemilattice.lessThanOrEqualTo(self.increments, that.increments),
        GCounterSemilattice.lessThanOrEqualTo(self.decrements, that.decrements)
      ]),
      Either.map(([increments, decrements]) => increments && decrements)
    )
}
