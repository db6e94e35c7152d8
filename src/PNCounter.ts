/**
 * PN-Counter (Positive-Negative Counter) CRDT implementation.
 *
 * A PN-Counter is a state-based CRDT that implements a counter that can be both
 * incremented and decremented. It maintains two G-Counters internally: one for
 * increments (positive) and one for decrements (negative). The value is the
 * difference between the two and may be negative.
 *
 * Properties:
 * - Supports both increment and decrement
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
  incompatibleShape,
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
 * PN-Counter type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const PNCounterTypeId: unique symbol = Symbol.for("lattice-crdts/PNCounter")

/**
 * PN-Counter type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type PNCounterTypeId = typeof PNCounterTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * A live PN-Counter replica.
 *
 * @since 0.1.0
 * @category models
 */
export interface PNCounter extends Pipeable {
  readonly [PNCounterTypeId]: PNCounterTypeId
  readonly size: number
  readonly stateRef: TRef.TRef<Counter.PNCounterState>
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error thrown by PN-Counter operations.
 *
 * @since 0.1.0
 * @category errors
 */
export class PNCounterError extends Data.TaggedError("PNCounterError")<{
  readonly message: string
}> {}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a value is a PNCounter.
 *
 * @since 0.1.0
 * @category guards
 */
export const isPNCounter = (u: unknown): u is PNCounter => isCRDT(u) && PNCounterTypeId in u

// =============================================================================
// Proto Objects
// =============================================================================

/** @internal */
const ProtoPNCounter = {
  ...makeProtoBase("PNCounter"),
  [PNCounterTypeId]: PNCounterTypeId
}

// =============================================================================
// Constructors
// =============================================================================

/** @internal */
const unsafeMake = (state: Counter.PNCounterState): STM.STM<PNCounter> =>
  STM.map(TRef.make(state), (stateRef) => {
    const counter: Mutable<PNCounter> = Object.create(ProtoPNCounter)
    counter.size = Counter.gcounterSize(state.increments)
    counter.stateRef = stateRef
    return counter
  })

/**
 * Creates a new PN-Counter with `size` replica slots.
 *
 * Dies with a `PNCounterError` when `size` is not a positive integer.
 *
 * @example
 * ```ts
 * import * as PNCounter from "lattice-crdts/PNCounter"
 * import * as Effect from "effect/Effect"
 *
 * const program = Effect.gen(function* () {
 *   const counter = yield* PNCounter.make(2)
 *
 *   yield* PNCounter.increment(counter, 0)
 *   yield* PNCounter.increment(counter, 0)
 *   yield* PNCounter.decrement(counter, 1)
 *
 *   console.log("Value:", yield* PNCounter.value(counter)) // 1
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = (size: number): STM.STM<PNCounter> =>
  isReplicaCount(size)
    ? unsafeMake(Counter.emptyPNCounterState(size))
    : STM.die(new PNCounterError({ message: `Expected a positive number of replicas, received ${size}` }))

/**
 * Creates a PN-Counter from an existing state.
 *
 * Fails with `IncompatibleShape` when the increment and decrement counters
 * of the state account for a different number of replicas, and dies with a
 * `PNCounterError` when they have no slots.
 *
 * @since 0.1.0
 * @category constructors
 */
export const fromState = (state: Counter.PNCounterState): STM.STM<PNCounter, IncompatibleShape> => {
  const expected = Counter.gcounterSize(state.increments)
  const actual = Counter.gcounterSize(state.decrements)
  if (expected !== actual) {
    return STM.fail(incompatibleShape(expected, actual))
  }
  return isReplicaCount(expected)
    ? unsafeMake(state)
    : STM.die(new PNCounterError({ message: "Expected a state with at least one replica slot" }))
}

// =============================================================================
// Operations
// =============================================================================

/** @internal */
const bump = (
  self: PNCounter,
  index: number,
  component: "increments" | "decrements"
): STM.STM<PNCounter, InvalidIndex> =>
  transition(self, (state): STM.STM<Counter.PNCounterState, InvalidIndex> => {
    if (!Number.isInteger(index) || index < 0 || index >= self.size) {
      return STM.fail(invalidIndex(index, self.size))
    }
    const counts = Chunk.modify(state[component].counts, index, (count) => count + 1)
    const bumped = Counter.makeGCounterState(counts)
    return STM.succeed(
      component === "increments"
        ? Counter.makePNCounterState(bumped, state.decrements)
        : Counter.makePNCounterState(state.increments, bumped)
    )
  }).pipe(STM.as(self))

/**
 * Increment the counter on behalf of replica `index`.
 *
 * @since 0.1.0
 * @category operations
 */
export const increment: {
  (index: number): (self: PNCounter) => STM.STM<PNCounter, InvalidIndex>
  (self: PNCounter, index: number): STM.STM<PNCounter, InvalidIndex>
} = dual(2, (self: PNCounter, index: number) => bump(self, index, "increments"))

/**
 * Decrement the counter on behalf of replica `index`.
 *
 * @since 0.1.0
 * @category operations
 */
export const decrement: {
  (index: number): (self: PNCounter) => STM.STM<PNCounter, InvalidIndex>
  (self: PNCounter, index: number): STM.STM<PNCounter, InvalidIndex>
} = dual(2, (self: PNCounter, index: number) => bump(self, index, "decrements"))

/**
 * Merge another counter's state into this counter.
 *
 * @since 0.1.0
 * @category operations
 */
export const merge: {
  (other: Counter.PNCounterState): (self: PNCounter) => STM.STM<PNCounter, IncompatibleShape>
  (self: PNCounter, other: Counter.PNCounterState): STM.STM<PNCounter, IncompatibleShape>
} = dual(
  2,
  (self: PNCounter, other: Counter.PNCounterState): STM.STM<PNCounter, IncompatibleShape> =>
    transition(self, (state) => STM.fromEither(Counter.PNCounterSemilattice.join(state, other))).pipe(
      STM.as(self)
    )
)

// =============================================================================
// Getters
// =============================================================================

/**
 * Get the current value of a counter.
 *
 * @since 0.1.0
 * @category getters
 */
export const value = (self: PNCounter): STM.STM<number> =>
  TRef.get(self.stateRef).pipe(STM.map(Counter.pncounterValue))

/**
 * Check whether this counter is below or equal to `other` in the merge order.
 *
 * @since 0.1.0
 * @category getters
 */
export const lessThanOrEqualTo: {
  (other: Counter.PNCounterState): (self: PNCounter) => STM.STM<boolean, IncompatibleShape>
  (self: PNCounter, other: Counter.PNCounterState): STM.STM<boolean, IncompatibleShape>
} = dual(
  2,
  (self: PNCounter, other: Counter.PNCounterState): STM.STM<boolean, IncompatibleShape> =>
    TRef.get(self.stateRef).pipe(
      STM.flatMap((state) => STM.fromEither(Counter.PNCounterSemilattice.lessThanOrEqualTo(state, other)))
    )
)

/**
 * Get the current state of a counter.
 *
 * @since 0.1.0
 * @category getters
 */
export const query = (self: PNCounter): STM.STM<Counter.PNCounterState> => TRef.get(self.stateRef)

// =============================================================================
// Layers
// =============================================================================

/**
 * PN-Counter service tag for dependency injection.
 *
 * @since 0.1.0
 * @category tags
 */
export class Tag extends Context.Tag("lattice-crdts/PNCounter")<Tag, PNCounter>() {}

/**
 * Creates a live layer with no persistence.
 *
 * @since 0.1.0
 * @category layers
 */
export const Live = (size: number): Layer.Layer<Tag> =>
  Layer.effect(
    Tag,
    Effect.gen(function* () {
      const counter = yield* make(size)
      yield* Effect.logDebug("PN-Counter replica initialised").pipe(Effect.annotateLogs({ size }))
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
