/**
 * G-Counter (Grow-only Counter) CRDT implementation.
 *
 * A G-Counter is a state-based CRDT that implements a counter that can only be
 * incremented. It accounts for a fixed number of replicas: each replica owns
 * one slot and increments only that slot, and the global value is the sum of
 * all slots. Merging is done by taking the maximum count for each slot.
 *
 * Properties:
 * - Increment-only (no decrements)
 * - Commutative merge operation
 * - Associative merge operation
 * - Idempotent merge operation
 * - Eventually consistent across all replicas
 *
 * @since 0.1.0
 */

import * as Chunk from "effect/Chunk"
import * as Config from "effect/Config"
import type * as ConfigError from "effect/ConfigError"
import * as Context from "effect/Context"
import * as Data from "effect/Data"
import * as Effect from "effect/Effect"
import { dual } from "effect/Function"
import * as Layer from "effect/Layer"
import type { Pipeable } from "effect/Pipeable"
import * as STM from "effect/STM"
import * as TRef from "effect/TRef"
import type { Mutable } from "effect/Types"
import {
  type IncompatibleShape,
  invalidIndex,
  type InvalidIndex,
  isReplicaCount,
  replicaCountConfig
} from "./CRDT.js"
import * as Counter from "./CRDTCounter.js"
import { isCRDT, makeProtoBase, transition } from "./internal/proto.js"

// =============================================================================
// Symbols
// =============================================================================

/**
 * G-Counter type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const GCounterTypeId: unique symbol = Symbol.for("lattice-crdts/GCounter")

/**
 * G-Counter type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type GCounterTypeId = typeof GCounterTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * A live G-Counter replica.
 *
 * @since 0.1.0
 * @category models
 */
export interface GCounter extends Pipeable {
  readonly [GCounterTypeId]: GCounterTypeId
  readonly size: number
  readonly stateRef: TRef.TRef<Counter.GCounterState>
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error thrown by G-Counter operations.
 *
 * @since 0.1.0
 * @category errors
 */
export class GCounterError extends Data.TaggedError("GCounterError")<{
  readonly message: string
}> {}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a value is a GCounter.
 *
 * @since 0.1.0
 * @category guards
 */
export const isGCounter = (u: unknown): u is GCounter => isCRDT(u) && GCounterTypeId in u

// =============================================================================
// Proto Objects
// =============================================================================

/** @internal */
const ProtoGCounter = {
  ...makeProtoBase("GCounter"),
  [GCounterTypeId]: GCounterTypeId
}

// =============================================================================
// Constructors
// =============================================================================

/** @internal */
const unsafeMake = (state: Counter.GCounterState): STM.STM<GCounter> =>
  STM.map(TRef.make(state), (stateRef) => {
    const counter: Mutable<GCounter> = Object.create(ProtoGCounter)
    counter.size = Counter.gcounterSize(state)
    counter.stateRef = stateRef
    return counter
  })

/**
 * Creates a new G-Counter with `size` replica slots, all at zero.
 *
 * Dies with a `GCounterError` when `size` is not a positive integer.
 *
 * @example
 * ```ts
 * import * as GCounter from "lattice-crdts/GCounter"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const counter = yield* GCounter.make(3)
 *
 *   yield* GCounter.increment(counter, 0)
 *   yield* GCounter.increment(counter, 2)
 *
 *   console.log("Value:", yield* GCounter.value(counter)) // 2
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = (size: number): STM.STM<GCounter> =>
  isReplicaCount(size)
    ? unsafeMake(Counter.emptyGCounterState(size))
    : STM.die(new GCounterError({ message: `Expected a positive number of replicas, received ${size}` }))

/**
 * Creates a G-Counter from an existing state. The counter takes the size of
 * the state.
 *
 * Dies with a `GCounterError` when the state has no slots.
 *
 * @since 0.1.0
 * @category constructors
 */
export const fromState = (state: Counter.GCounterState): STM.STM<GCounter> =>
  isReplicaCount(Counter.gcounterSize(state))
    ? unsafeMake(state)
    : STM.die(new GCounterError({ message: "Expected a state with at least one replica slot" }))

// =============================================================================
// Operations
// =============================================================================

/**
 * Increment the slot of replica `index` by one.
 *
 * Fails with `InvalidIndex` unless `index` is an integer in `0..size-1`; the
 * counter is left untouched in that case.
 *
 * @example
 * ```ts
 * import * as GCounter from "lattice-crdts/GCounter"
 * import * as Effect from "effect/Effect"
 * import { pipe } from "effect/Function"
 *
 * const program = Effect.gen(function* () {
 *   const counter = yield* GCounter.make(3)
 *
 *   // Data-first
 *   yield* GCounter.increment(counter, 1)
 *
 *   // Data-last (with pipe)
 *   yield* pipe(counter, GCounter.increment(1))
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const increment: {
  (index: number): (self: GCounter) => STM.STM<GCounter, InvalidIndex>
  (self: GCounter, index: number): STM.STM<GCounter, InvalidIndex>
} = dual(
  2,
  (self: GCounter, index: number): STM.STM<GCounter, InvalidIndex> =>
    transition(self, (state): STM.STM<Counter.GCounterState, InvalidIndex> =>
      Number.isInteger(index) && index >= 0 && index < self.size
        ? STM.succeed(
          Counter.makeGCounterState(Chunk.modify(state.counts, index, (count) => count + 1))
        )
        : STM.fail(invalidIndex(index, self.size))).pipe(STM.as(self))
)

/**
 * Merge another counter's state into this counter.
 *
 * Every slot becomes the maximum of both sides. Fails with
 * `IncompatibleShape` when the state accounts for a different number of
 * replicas.
 *
 * @example
 * ```ts
 * import * as GCounter from "lattice-crdts/GCounter"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const counter1 = yield* GCounter.make(2)
 *   const counter2 = yield* GCounter.make(2)
 *
 *   yield* GCounter.increment(counter1, 0)
 *   yield* GCounter.increment(counter2, 1)
 *
 *   const state2 = yield* GCounter.query(counter2)
 *   yield* GCounter.merge(counter1, state2)
 *
 *   console.log("Merged value:", yield* GCounter.value(counter1)) // 2
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const merge: {
  (other: Counter.GCounterState): (self: GCounter) => STM.STM<GCounter, IncompatibleShape>
  (self: GCounter, other: Counter.GCounterState): STM.STM<GCounter, IncompatibleShape>
} = dual(
  2,
  (self: GCounter, other: Counter.GCounterState): STM.STM<GCounter, IncompatibleShape> =>
    transition(self, (state) => STM.fromEither(Counter.GCounterSemilattice.join(state, other))).pipe(
      STM.as(self)
    )
)

// =============================================================================
// Getters
// =============================================================================

/**
 * Get the current value of a counter: the sum of all slots.
 *
 * @since 0.1.0
 * @category getters
 */
export const value = (self: GCounter): STM.STM<number> =>
  TRef.get(self.stateRef).pipe(STM.map(Counter.gcounterValue))

/**
 * Check whether this counter is below or equal to `other` in the merge order,
 * i.e. whether merging `other` in would leave `other` unchanged.
 *
 * @since 0.1.0
 * @category getters
 */
export const lessThanOrEqualTo: {
  (other: Counter.GCounterState): (self: GCounter) => STM.STM<boolean, IncompatibleShape>
  (self: GCounter, other: Counter.GCounterState): STM.STM<boolean, IncompatibleShape>
} = dual(
  2,
  (self: GCounter, other: Counter.GCounterState): STM.STM<boolean, IncompatibleShape> =>
    TRef.get(self.stateRef).pipe(
      STM.flatMap((state) => STM.fromEither(Counter.GCounterSemilattice.lessThanOrEqualTo(state, other)))
    )
)

/**
 * Get the current state of a counter.
 *
 * The snapshot is immutable and can be handed to another replica's `merge`.
 *
 * @since 0.1.0
 * @category getters
 */
export const query = (self: GCounter): STM.STM<Counter.GCounterState> => TRef.get(self.stateRef)

// =============================================================================
// Layers
// =============================================================================

/**
 * G-Counter service tag for dependency injection.
 *
 * @example
 * ```ts
 * import * as GCounter from "lattice-crdts/GCounter"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const counter = yield* GCounter.Tag
 *
 *   yield* GCounter.increment(counter, 0)
 *   console.log("Counter value:", yield* GCounter.value(counter)) // 1
 * })
 *
 * Effect.runPromise(program.pipe(Effect.provide(GCounter.Live(3))))
 * ```
 *
 * @since 0.1.0
 * @category tags
 */
export class Tag extends Context.Tag("lattice-crdts/GCounter")<Tag, GCounter>() {}

/**
 * Creates a live layer with no persistence.
 *
 * State will be held in memory and lost when the process exits.
 *
 * @since 0.1.0
 * @category layers
 */
export const Live = (size: number): Layer.Layer<Tag> =>
  Layer.effect(
    Tag,
    Effect.gen(function* () {
      const counter = yield* make(size)
      yield* Effect.logDebug("G-Counter replica initialised").pipe(Effect.annotateLogs({ size }))
      return counter
    })
  )

/**
 * Creates a live layer whose size is read from configuration, by default the
 * `replicas` key.
 *
 * @since 0.1.0
 * @category layers
 */
export const layerConfig = (
  config: Config.Config<number> = replicaCountConfig
): Layer.Layer<Tag, ConfigError.ConfigError> =>
  Layer.unwrapEffect(Effect.map(config, Live))
