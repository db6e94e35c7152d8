/**
 * Example: Basic counter usage with G-Counter and PN-Counter.
 *
 * Three replicas of each counter share a fixed number of slots; replica `i`
 * only ever touches slot `i`.
 *
 * @since 0.1.0
 */

import * as Effect from "effect/Effect"
import * as GCounter from "../src/GCounter.js"
import * as PNCounter from "../src/PNCounter.js"

const REPLICAS = 3

// Example 1: Simple G-Counter usage
const simpleGCounter = Effect.gen(function* () {
  console.log("=== Simple G-Counter Example ===")

  const counter = yield* GCounter.Tag

  yield* GCounter.increment(counter, 0)
  yield* GCounter.increment(counter, 0)

  console.log("Counter value:", yield* GCounter.value(counter)) // 2
})

// Example 2: Multi-replica G-Counter with synchronization
const multiReplicaGCounter = Effect.gen(function* () {
  console.log("\n=== Multi-Replica G-Counter Example ===")

  const replica0 = yield* GCounter.make(REPLICAS)
  const replica1 = yield* GCounter.make(REPLICAS)

  yield* GCounter.increment(replica0, 0)
  yield* GCounter.increment(replica1, 1)
  yield* GCounter.increment(replica1, 1)

  console.log(
    "Before sync - Replica 0:",
    yield* GCounter.value(replica0),
    "Replica 1:",
    yield* GCounter.value(replica1)
  )

  yield* GCounter.merge(replica0, yield* GCounter.query(replica1))
  yield* GCounter.merge(replica1, yield* GCounter.query(replica0))

  // Both replicas now agree
  console.log(
    "After sync - Replica 0:",
    yield* GCounter.value(replica0),
    "Replica 1:",
    yield* GCounter.value(replica1)
  ) // 3 3
})

// Example 3: Multi-replica PN-Counter
const multiReplicaPNCounter = Effect.gen(function* () {
  console.log("\n=== Multi-Replica PN-Counter Example ===")

  const replica0 = yield* PNCounter.make(REPLICAS)
  const replica2 = yield* PNCounter.make(REPLICAS)

  // Replica 0: +2, -1 = 1
  yield* PNCounter.increment(replica0, 0)
  yield* PNCounter.increment(replica0, 0)
  yield* PNCounter.decrement(replica0, 0)

  // Replica 2: -3
  for (let i = 0; i < 3; i++) {
    yield* PNCounter.decrement(replica2, 2)
  }

  yield* PNCounter.merge(replica0, yield* PNCounter.query(replica2))
  console.log("Merged value:", yield* PNCounter.value(replica0)) // -2
})

// Example 4: Addressing a slot the counter does not have
const invalidIndex = Effect.gen(function* () {
  console.log("\n=== Invalid Index Example ===")

  const counter = yield* GCounter.make(REPLICAS)
  const error = yield* GCounter.increment(counter, REPLICAS).pipe(Effect.flip)
  console.log(error._tag, error.message)
})

const program = Effect.gen(function* () {
  yield* simpleGCounter.pipe(Effect.provide(GCounter.Live(REPLICAS)))
  yield* multiReplicaGCounter
  yield* multiReplicaPNCounter
  yield* invalidIndex
})

Effect.runPromise(program).catch(console.error)
