/**
 * Property-based tests for the merge laws of LWW-Element-Dictionary.
 *
 * These tests verify that replicas built from arbitrary operation sequences
 * satisfy the properties required for strong eventual consistency:
 * - Commutativity: merge(a, b) = merge(b, a)
 * - Associativity: merge(merge(a, b), c) = merge(a, merge(b, c))
 * - Idempotence: merge(a, a) = a
 *
 * Add timestamps are unique per key across all replicas, the way a clock
 * issues them; removals may share timestamps with anything.
 *
 * @since 0.1.0
 */

import { describe, it, expect } from "vitest"
import * as Effect from "effect/Effect"
import * as FastCheck from "effect/FastCheck"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import * as STM from "effect/STM"
import * as LWWElementDict from "../../src/LWWElementDict.js"
import { ReplicaId } from "../../src/CRDT.js"
import * as View from "../../src/internal/view.js"

interface Op {
  readonly replica: number
  readonly kind: "add" | "remove"
  readonly key: string
  readonly value: number
  readonly timestamp: number
}

const opArbitrary = (replicas: number) =>
  FastCheck.uniqueArray(
    FastCheck.record({
      replica: FastCheck.integer({ min: 0, max: replicas - 1 }),
      kind: FastCheck.constantFrom<"add" | "remove">("add", "remove"),
      key: FastCheck.constantFrom("A", "B", "C"),
      value: FastCheck.integer({ min: 0, max: 3 }),
      timestamp: FastCheck.integer({ min: 0, max: 20 })
    }),
    {
      maxLength: 40,
      selector: (op) =>
        op.kind === "add" ? `add:${op.key}:${op.timestamp}` : `remove:${op.key}:${op.timestamp}:${op.value}`
    }
  )

type Dict = LWWElementDict.LWWElementDict<string, number, number>

const build = (replica: number, ops: ReadonlyArray<Op>): STM.STM<Dict> =>
  STM.gen(function* () {
    const dict = yield* LWWElementDict.make<string, number, number>(ReplicaId(`replica-${replica}`), Order.number)
    for (const op of ops) {
      if (op.replica !== replica) continue
      if (op.kind === "add") {
        yield* LWWElementDict.add(dict, op.key, op.value, op.timestamp)
      } else {
        yield* LWWElementDict.remove(dict, op.key, op.value, op.timestamp)
      }
    }
    return dict
  })

const view = (dict: Dict) =>
  STM.map(LWWElementDict.entries(dict), (entries) =>
    Array.from(entries).sort(([a], [b]) => a.localeCompare(b)))

const events = (dict: Dict) =>
  STM.map(LWWElementDict.query(dict), (state) => {
    const flatten = (log: LWWElementDict.LWWElementDictState<string, number, number>["added"]) =>
      Array.from(log)
        .flatMap(([key, history]) => history.map((entry) => `${key}:${entry.value}@${entry.timestamp}`))
        .sort()
    return { added: flatten(state.added), removed: flatten(state.removed) }
  })

const mergedCopy = (left: Dict, right: Dict) =>
  STM.gen(function* () {
    const result = yield* LWWElementDict.copy(left)
    return yield* LWWElementDict.merge(result, right)
  })

describe("LWWElementDict Laws", () => {
  describe("Commutativity", () => {
    it("merge(a, b) = merge(b, a)", async () => FastCheck.assert(
      FastCheck.asyncProperty(opArbitrary(2), async (ops) => {
        const program = Effect.gen(function* () {
          const a = yield* build(0, ops)
          const b = yield* build(1, ops)

          const ab = yield* mergedCopy(a, b)
          const ba = yield* mergedCopy(b, a)

          return {
            viewAB: yield* view(ab),
            viewBA: yield* view(ba),
            eventsAB: yield* events(ab),
            eventsBA: yield* events(ba)
          }
        })

        const result = await Effect.runPromise(program)
        expect(result.viewAB).toEqual(result.viewBA)
        expect(result.eventsAB).toEqual(result.eventsBA)
      }),
      { numRuns: 100 }
    ))
  })

  describe("Associativity", () => {
    it("merge(merge(a, b), c) = merge(a, merge(b, c))", async () => FastCheck.assert(
      FastCheck.asyncProperty(opArbitrary(3), async (ops) => {
        const program = Effect.gen(function* () {
          const a = yield* build(0, ops)
          const b = yield* build(1, ops)
          const c = yield* build(2, ops)

          const left = yield* mergedCopy(yield* mergedCopy(a, b), c)
          const right = yield* mergedCopy(a, yield* mergedCopy(b, c))

          return {
            viewLeft: yield* view(left),
            viewRight: yield* view(right),
            eventsLeft: yield* events(left),
            eventsRight: yield* events(right)
          }
        })

        const result = await Effect.runPromise(program)
        expect(result.viewLeft).toEqual(result.viewRight)
        expect(result.eventsLeft).toEqual(result.eventsRight)
      }),
      { numRuns: 100 }
    ))
  })

  describe("Idempotence", () => {
    it("merge(a, a) = a", async () => FastCheck.assert(
      FastCheck.asyncProperty(opArbitrary(1), async (ops) => {
        const program = Effect.gen(function* () {
          const a = yield* build(0, ops)

          const viewBefore = yield* view(a)
          const eventsBefore = yield* events(a)

          yield* LWWElementDict.merge(a, a)

          return {
            viewBefore,
            eventsBefore,
            viewAfter: yield* view(a),
            eventsAfter: yield* events(a)
          }
        })

        const result = await Effect.runPromise(program)
        expect(result.viewAfter).toEqual(result.viewBefore)
        expect(result.eventsAfter).toEqual(result.eventsBefore)
      }),
      { numRuns: 100 }
    ))
  })

  describe("Derivation", () => {
    it("the current view equals the winner derived from full history", async () => FastCheck.assert(
      FastCheck.asyncProperty(opArbitrary(2), async (ops) => {
        const program = Effect.gen(function* () {
          const a = yield* build(0, ops)
          const b = yield* build(1, ops)
          const merged = yield* mergedCopy(a, b)

          const state = yield* LWWElementDict.query(merged)
          const derived = Array.from(state.added)
            .flatMap(([key, history]) => {
              const winner = View.derive(history, state.removed.get(key) ?? [], Order.number)
              return Option.isSome(winner) ? [[key, winner.value.value] as const] : []
            })
            .sort(([x], [y]) => x.localeCompare(y))

          return { derived, current: yield* view(merged) }
        })

        const result = await Effect.runPromise(program)
        expect(result.current).toEqual(result.derived)
      }),
      { numRuns: 100 }
    ))
  })

  describe("Convergence", () => {
    it("replicas exchanging state in any order agree", async () => FastCheck.assert(
      FastCheck.asyncProperty(opArbitrary(3), async (ops) => {
        const program = Effect.gen(function* () {
          const a = yield* build(0, ops)
          const b = yield* build(1, ops)
          const c = yield* build(2, ops)

          yield* LWWElementDict.merge(a, b)
          yield* LWWElementDict.merge(c, a)
          yield* LWWElementDict.merge(b, c)
          yield* LWWElementDict.merge(a, c)

          return [yield* view(a), yield* view(b), yield* view(c)]
        })

        const [viewA, viewB, viewC] = await Effect.runPromise(program)
        expect(viewB).toEqual(viewA)
        expect(viewC).toEqual(viewA)
      }),
      { numRuns: 100 }
    ))
  })
})
