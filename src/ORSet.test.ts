import { describe, it, expect } from "vitest"
import * as ConfigProvider from "effect/ConfigProvider"
import * as Effect from "effect/Effect"
import * as Equal from "effect/Equal"
import * as HashMap from "effect/HashMap"
import * as HashSet from "effect/HashSet"
import * as Schema from "effect/Schema"
import { ReplicaId } from "./CRDT.js"
import * as CRDTSet from "./CRDTSet.js"
import * as ORSet from "./ORSet.js"

const replicaA = ReplicaId("replica-a")
const replicaB = ReplicaId("replica-b")

describe("ORSet", () => {
  it("should add and remove elements", async () => {
    const program = Effect.gen(function* () {
      const set = yield* ORSet.make<string>(replicaA)
      yield* ORSet.add(set, "apple")
      yield* ORSet.add(set, "banana")
      yield* ORSet.remove(set, "apple")
      return {
        apple: yield* ORSet.has(set, "apple"),
        banana: yield* ORSet.has(set, "banana"),
        size: yield* ORSet.size(set)
      }
    })

    const result = await Effect.runPromise(program)
    expect(result).toEqual({ apple: false, banana: true, size: 1 })
  })

  it("should re-add an element after removing it", async () => {
    const program = Effect.gen(function* () {
      const set = yield* ORSet.make<string>(replicaA)
      yield* ORSet.add(set, "x")
      yield* ORSet.remove(set, "x")
      yield* ORSet.add(set, "x")
      return {
        has: yield* ORSet.has(set, "x"),
        tags: Array.from(yield* ORSet.tags(set, "x"))
      }
    })

    const result = await Effect.runPromise(program)
    expect(result.has).toBe(true)
    expect(result.tags).toHaveLength(1)
    expect(Equal.equals(result.tags[0], CRDTSet.makeTag(replicaA, 1))).toBe(true)
  })

  it("should ignore the removal of an absent element", async () => {
    const program = Effect.gen(function* () {
      const set = yield* ORSet.make<string>(replicaA)
      yield* ORSet.remove(set, "ghost")
      return yield* ORSet.query(set)
    })

    const result = await Effect.runPromise(program)
    expect(Equal.equals(result, CRDTSet.emptyORSetState<string>())).toBe(true)
  })

  it("should keep an add the remover had not observed", async () => {
    const program = Effect.gen(function* () {
      const a = yield* ORSet.make<string>(replicaA)
      const b = yield* ORSet.make<string>(replicaB)

      yield* ORSet.add(a, "x")
      yield* ORSet.merge(b, yield* ORSet.query(a))
      yield* ORSet.remove(b, "x")
      yield* ORSet.add(a, "x")

      yield* ORSet.merge(a, yield* ORSet.query(b))
      yield* ORSet.merge(b, yield* ORSet.query(a))

      return {
        a: yield* ORSet.has(a, "x"),
        b: yield* ORSet.has(b, "x"),
        converged: Equal.equals(yield* ORSet.query(a), yield* ORSet.query(b))
      }
    })

    const result = await Effect.runPromise(program)
    expect(result).toEqual({ a: true, b: true, converged: true })
  })

  it("should remove an element everywhere once every add was observed", async () => {
    const program = Effect.gen(function* () {
      const a = yield* ORSet.make<string>(replicaA)
      const b = yield* ORSet.make<string>(replicaB)

      yield* ORSet.add(a, "x")
      yield* ORSet.add(b, "x")
      yield* ORSet.merge(a, yield* ORSet.query(b))
      yield* ORSet.remove(a, "x")
      yield* ORSet.merge(b, yield* ORSet.query(a))

      return { a: yield* ORSet.has(a, "x"), b: yield* ORSet.has(b, "x") }
    })

    const result = await Effect.runPromise(program)
    expect(result).toEqual({ a: false, b: false })
  })

  it("should yield the same elements on every iteration", async () => {
    const program = Effect.gen(function* () {
      const set = yield* ORSet.make<string>(replicaA)
      yield* ORSet.add(set, "a")
      yield* ORSet.add(set, "b")
      yield* ORSet.add(set, "c")
      yield* ORSet.remove(set, "b")
      const elements = yield* ORSet.elements(set)
      return [Array.from(elements).sort(), Array.from(elements).sort()]
    })

    const [first, second] = await Effect.runPromise(program)
    expect(first).toEqual(["a", "c"])
    expect(second).toEqual(["a", "c"])
  })

  it("should continue the tag sequence of a restored replica", async () => {
    const program = Effect.gen(function* () {
      const original = yield* ORSet.make<string>(replicaA)
      yield* ORSet.add(original, "x")
      yield* ORSet.add(original, "y")
      yield* ORSet.remove(original, "y")

      const restored = yield* ORSet.fromState(replicaA, yield* ORSet.query(original))
      yield* ORSet.add(restored, "z")
      return Array.from(yield* ORSet.tags(restored, "z"))
    })

    const result = await Effect.runPromise(program)
    expect(result).toHaveLength(1)
    expect(Equal.equals(result[0], CRDTSet.makeTag(replicaA, 2))).toBe(true)
  })

  it("should continue after the highest own sequence across every element", async () => {
    const state = CRDTSet.makeORSetState(
      HashMap.make(
        ["x", HashSet.make(CRDTSet.makeTag(replicaA, 3), CRDTSet.makeTag(replicaB, 20))],
        ["y", HashSet.make(CRDTSet.makeTag(replicaA, 7), CRDTSet.makeTag(replicaA, 11))]
      ),
      HashSet.make(CRDTSet.makeTag(replicaA, 11))
    )
    const program = Effect.gen(function* () {
      const set = yield* ORSet.fromState(replicaA, state)
      yield* ORSet.add(set, "z")
      return Array.from(yield* ORSet.tags(set, "z"))
    })

    const result = await Effect.runPromise(program)
    expect(result).toHaveLength(1)
    expect(Equal.equals(result[0], CRDTSet.makeTag(replicaA, 12))).toBe(true)
  })

  it("should move the tag sequence past its own tags received in a merge", async () => {
    const program = Effect.gen(function* () {
      const state = CRDTSet.makeORSetState(
        HashMap.make(["x", HashSet.make(CRDTSet.makeTag(replicaA, 4), CRDTSet.makeTag(replicaB, 9))]),
        HashSet.empty<CRDTSet.Tag>()
      )
      const set = yield* ORSet.make<string>(replicaA)
      yield* ORSet.merge(set, state)
      yield* ORSet.add(set, "y")
      return Array.from(yield* ORSet.tags(set, "y"))
    })

    const result = await Effect.runPromise(program)
    expect(Equal.equals(result[0], CRDTSet.makeTag(replicaA, 5))).toBe(true)
  })

  it("should order states by inclusion of entries and tombstones", async () => {
    const program = Effect.gen(function* () {
      const a = yield* ORSet.make<string>(replicaA)
      const b = yield* ORSet.make<string>(replicaB)

      yield* ORSet.add(a, "x")
      yield* ORSet.merge(b, yield* ORSet.query(a))
      yield* ORSet.remove(b, "x")

      return {
        aBelowB: yield* ORSet.lessThanOrEqualTo(a, yield* ORSet.query(b)),
        bBelowA: yield* ORSet.lessThanOrEqualTo(b, yield* ORSet.query(a))
      }
    })

    const result = await Effect.runPromise(program)
    expect(result).toEqual({ aBelowB: true, bBelowA: false })
  })

  it("should read the replica id from configuration", async () => {
    const provider = ConfigProvider.fromMap(new Map([["replicaId", "configured"]]))
    const program = Effect.gen(function* () {
      const set = yield* ORSet.tag<string>()
      yield* ORSet.add(set, "x")
      return { replicaId: set.replicaId, tags: Array.from(yield* ORSet.tags(set, "x")) }
    })

    const result = await Effect.runPromise(
      program.pipe(Effect.provide(ORSet.layerConfig<string>()), Effect.withConfigProvider(provider))
    )
    expect(result.replicaId).toBe("configured")
    expect(Equal.equals(result.tags[0], CRDTSet.makeTag(ReplicaId("configured"), 0))).toBe(true)
  })

  it("should round trip a state through its schema", async () => {
    const program = Effect.gen(function* () {
      const set = yield* ORSet.make<string>(replicaA)
      yield* ORSet.add(set, "x")
      yield* ORSet.remove(set, "x")
      yield* ORSet.add(set, "y")
      return yield* ORSet.query(set)
    })

    const state = await Effect.runPromise(program)
    const codec = CRDTSet.ORSetState(Schema.String)
    const encoded = Schema.encodeSync(codec)(state)
    expect(encoded.tombstones).toEqual([{ replicaId: "replica-a", sequence: 0 }])
    expect(Equal.equals(Schema.decodeUnknownSync(codec)(encoded), state)).toBe(true)
  })
})
