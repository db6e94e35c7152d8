/**
 * Unit tests for G-Counter CRDT.
 *
 * @since 0.1.0
 */

import { describe, it, expect } from "vitest"
import * as Chunk from "effect/Chunk"
import * as ConfigProvider from "effect/ConfigProvider"
import * as Effect from "effect/Effect"
import * as Equal from "effect/Equal"
import * as Exit from "effect/Exit"
import { pipe } from "effect/Function"
import * as Schema from "effect/Schema"
import * as STM from "effect/STM"
import * as CRDTCounter from "./CRDTCounter.js"
import * as GCounter from "./GCounter.js"

const stateOf = (...counts: Array<number>) => CRDTCounter.makeGCounterState(Chunk.fromIterable(counts))

describe("GCounter", () => {
  it("should start with value 0", async () => {
    const program = Effect.gen(function* () {
      const counter = yield* GCounter.make(3)
      return yield* GCounter.value(counter)
    })

    const result = await Effect.runPromise(program)
    expect(result).toBe(0)
  })

  it("should count one per increment", async () => {
    const program = Effect.gen(function* () {
      const counter = yield* GCounter.make(2)

      for (let i = 0; i < 5; i++) {
        yield* GCounter.increment(counter, 1)
      }

      const state = yield* GCounter.query(counter)
      return { value: yield* GCounter.value(counter), counts: Chunk.toReadonlyArray(state.counts) }
    })

    const result = await Effect.runPromise(program)
    expect(result.value).toBe(5)
    expect(result.counts).toEqual([0, 5])
  })

  it("should support data-last increment", async () => {
    const program = Effect.gen(function* () {
      const counter = yield* GCounter.make(3)
      yield* pipe(counter, GCounter.increment(2))
      return yield* GCounter.value(counter)
    })

    const result = await Effect.runPromise(program)
    expect(result).toBe(1)
  })

  it("should merge states slot by slot", async () => {
    const program = Effect.gen(function* () {
      const counter = yield* GCounter.fromState(stateOf(1, 0, 2))
      yield* GCounter.merge(counter, stateOf(0, 3, 1))

      const state = yield* GCounter.query(counter)
      return { value: yield* GCounter.value(counter), counts: Chunk.toReadonlyArray(state.counts) }
    })

    const result = await Effect.runPromise(program)
    expect(result.counts).toEqual([1, 3, 2])
    expect(result.value).toBe(6)
  })

  it("should converge regardless of merge order", async () => {
    const program = Effect.gen(function* () {
      const counter1 = yield* GCounter.make(3)
      const counter2 = yield* GCounter.make(3)
      const counter3 = yield* GCounter.make(3)

      yield* GCounter.increment(counter1, 0)
      yield* GCounter.increment(counter2, 1)
      yield* GCounter.increment(counter2, 1)
      yield* GCounter.increment(counter3, 2)

      const state1 = yield* GCounter.query(counter1)
      const state2 = yield* GCounter.query(counter2)
      const state3 = yield* GCounter.query(counter3)

      yield* GCounter.merge(counter1, state2)
      yield* GCounter.merge(counter1, state3)
      yield* GCounter.merge(counter3, state2)
      yield* GCounter.merge(counter3, state1)

      return {
        left: yield* GCounter.query(counter1),
        right: yield* GCounter.query(counter3),
        value: yield* GCounter.value(counter3)
      }
    })

    const result = await Effect.runPromise(program)
    expect(Equal.equals(result.left, result.right)).toBe(true)
    expect(result.value).toBe(4)
  })

  it("should be idempotent when merging the same state twice", async () => {
    const program = Effect.gen(function* () {
      const counter = yield* GCounter.fromState(stateOf(2, 0))
      yield* GCounter.merge(counter, stateOf(1, 4))
      yield* GCounter.merge(counter, stateOf(1, 4))
      return yield* GCounter.value(counter)
    })

    const result = await Effect.runPromise(program)
    expect(result).toBe(6)
  })

  describe("errors", () => {
    it.each([3, 7, -1, 0.5])("should reject index %d and keep the state", async (index) => {
      const program = Effect.gen(function* () {
        const counter = yield* GCounter.fromState(stateOf(1, 1, 1))
        const error = yield* GCounter.increment(counter, index).pipe(STM.flip)
        const state = yield* GCounter.query(counter)
        return { error, counts: Chunk.toReadonlyArray(state.counts) }
      })

      const result = await Effect.runPromise(program)
      expect(result.error._tag).toBe("InvalidIndex")
      expect(result.error.index).toBe(index)
      expect(result.error.size).toBe(3)
      expect(result.counts).toEqual([1, 1, 1])
    })

    it("should reject merging a state of a different size", async () => {
      const program = Effect.gen(function* () {
        const counter = yield* GCounter.fromState(stateOf(1, 2))
        const error = yield* GCounter.merge(counter, stateOf(1, 2, 3)).pipe(STM.flip)
        const state = yield* GCounter.query(counter)
        return { error, counts: Chunk.toReadonlyArray(state.counts) }
      })

      const result = await Effect.runPromise(program)
      expect(result.error._tag).toBe("IncompatibleShape")
      expect(result.error.expected).toBe(2)
      expect(result.error.actual).toBe(3)
      expect(result.counts).toEqual([1, 2])
    })

    it.each([0, -2, 1.5])("should die when created with %d replicas", async (size) => {
      const exit = await Effect.runPromiseExit(STM.commit(GCounter.make(size)))
      expect(Exit.isFailure(exit)).toBe(true)
      if (Exit.isFailure(exit)) {
        expect(exit.cause._tag).toBe("Die")
      }
    })

    it("should die when restored from a state without slots", async () => {
      const exit = await Effect.runPromiseExit(
        STM.commit(GCounter.fromState(CRDTCounter.makeGCounterState(Chunk.empty())))
      )
      expect(Exit.isFailure(exit)).toBe(true)
      if (Exit.isFailure(exit)) {
        expect(exit.cause._tag).toBe("Die")
      }
    })
  })

  describe("lessThanOrEqualTo", () => {
    it("should hold for a state below on every slot", async () => {
      const program = Effect.gen(function* () {
        const counter = yield* GCounter.fromState(stateOf(1, 2, 0))
        return {
          below: yield* GCounter.lessThanOrEqualTo(counter, stateOf(1, 3, 0)),
          equal: yield* GCounter.lessThanOrEqualTo(counter, stateOf(1, 2, 0)),
          above: yield* GCounter.lessThanOrEqualTo(counter, stateOf(0, 5, 5)),
          zero: yield* GCounter.lessThanOrEqualTo(counter, stateOf(0, 0, 0))
        }
      })

      const result = await Effect.runPromise(program)
      expect(result).toEqual({ below: true, equal: true, above: false, zero: false })
    })

    it("should fail for states of a different size", async () => {
      const program = Effect.gen(function* () {
        const counter = yield* GCounter.make(2)
        return yield* GCounter.lessThanOrEqualTo(counter, stateOf(0)).pipe(STM.flip)
      })

      const result = await Effect.runPromise(program)
      expect(result._tag).toBe("IncompatibleShape")
    })
  })

  describe("layers", () => {
    it("should provide a counter through Live", async () => {
      const program = Effect.gen(function* () {
        const counter = yield* GCounter.Tag
        yield* GCounter.increment(counter, 0)
        return { size: counter.size, value: yield* GCounter.value(counter) }
      })

      const result = await Effect.runPromise(program.pipe(Effect.provide(GCounter.Live(4))))
      expect(result).toEqual({ size: 4, value: 1 })
    })

    it("should read the number of replicas from configuration", async () => {
      const provider = ConfigProvider.fromMap(new Map([["replicas", "5"]]))
      const program = Effect.map(GCounter.Tag, (counter) => counter.size)

      const result = await Effect.runPromise(
        program.pipe(Effect.provide(GCounter.layerConfig()), Effect.withConfigProvider(provider))
      )
      expect(result).toBe(5)
    })

    it("should reject a zero replica count in configuration", async () => {
      const provider = ConfigProvider.fromMap(new Map([["replicas", "0"]]))
      const program = Effect.map(GCounter.Tag, (counter) => counter.size)

      const exit = await Effect.runPromiseExit(
        program.pipe(Effect.provide(GCounter.layerConfig()), Effect.withConfigProvider(provider))
      )
      expect(Exit.isFailure(exit)).toBe(true)
    })
  })

  describe("schema", () => {
    it("should round trip a state through its encoded form", () => {
      const state = stateOf(4, 0, 9)
      const encoded = Schema.encodeSync(CRDTCounter.GCounterState)(state)
      expect(encoded).toEqual({ type: "GCounter", counts: [4, 0, 9] })

      const decoded = Schema.decodeUnknownSync(CRDTCounter.GCounterState)(encoded)
      expect(Equal.equals(decoded, state)).toBe(true)
    })

    it("should reject negative counts", () => {
      const decode = Schema.decodeUnknownEither(CRDTCounter.GCounterState)
      expect(decode({ type: "GCounter", counts: [1, -1] })._tag).toBe("Left")
    })

    it("should reject a state without slots", () => {
      const decode = Schema.decodeUnknownEither(CRDTCounter.GCounterState)
      expect(decode({ type: "GCounter", counts: [] })._tag).toBe("Left")
    })
  })
})
