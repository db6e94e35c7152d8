/**
 * Example: Set CRDTs and how they resolve a concurrent add and remove.
 *
 * The same history is replayed on a 2P-Set, where the removal wins for good,
 * and on an OR-Set, where the add the remover never saw survives.
 *
 * @since 0.1.0
 */

import * as Effect from "effect/Effect"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"
import { ReplicaId } from "../src/CRDT.js"
import * as GSet from "../src/GSet.js"
import * as ORSet from "../src/ORSet.js"
import * as TwoPSet from "../src/TwoPSet.js"

const gsetExample = Effect.gen(function* () {
  const set = yield* GSet.tag<string>()
  yield* GSet.add(set, "apple")
  yield* GSet.add(set, "apple")
  yield* Effect.log("G-Set size after adding apple twice").pipe(
    Effect.annotateLogs({ size: yield* GSet.size(set) })
  )
})

const twoPSetExample = Effect.gen(function* () {
  const alice = yield* TwoPSet.make<string>()
  const bob = yield* TwoPSet.make<string>()

  yield* TwoPSet.add(alice, "milk")
  yield* TwoPSet.merge(bob, yield* TwoPSet.query(alice))
  yield* TwoPSet.remove(bob, "milk")
  yield* TwoPSet.add(alice, "milk")

  yield* TwoPSet.merge(alice, yield* TwoPSet.query(bob))
  yield* Effect.log("2P-Set after sync").pipe(
    Effect.annotateLogs({ milk: yield* TwoPSet.has(alice, "milk") })
  ) // false
})

const orSetExample = Effect.gen(function* () {
  const alice = yield* ORSet.make<string>(ReplicaId("alice"))
  const bob = yield* ORSet.make<string>(ReplicaId("bob"))

  yield* ORSet.add(alice, "milk")
  yield* ORSet.merge(bob, yield* ORSet.query(alice))
  yield* ORSet.remove(bob, "milk")
  yield* ORSet.add(alice, "milk")

  yield* ORSet.merge(alice, yield* ORSet.query(bob))
  yield* ORSet.merge(bob, yield* ORSet.query(alice))
  yield* Effect.log("OR-Set after sync").pipe(
    Effect.annotateLogs({
      alice: yield* ORSet.has(alice, "milk"),
      bob: yield* ORSet.has(bob, "milk")
    })
  ) // true true
})

const program = Effect.gen(function* () {
  yield* gsetExample.pipe(Effect.provide(GSet.Live<string>()))
  yield* twoPSetExample
  yield* orSetExample
})

Effect.runPromise(program.pipe(Logger.withMinimumLogLevel(LogLevel.Debug))).catch(console.error)
