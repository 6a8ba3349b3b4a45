import { describe, it, expect } from "vitest"
import * as Equal from "effect/Equal"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import type { History } from "../CRDTDict.js"
import * as History$ from "./history.js"
import * as View from "./view.js"

const eq = Equal.equivalence<string>()

const history: History<string, number> = [
  { value: "a", timestamp: 1 },
  { value: "b", timestamp: 3 },
  { value: "c", timestamp: 3 },
  { value: "d", timestamp: 7 }
]

describe("history", () => {
  it("finds the first entry with a strictly greater timestamp", () => {
    expect(History$.upperBound(history, 0, Order.number)).toBe(0)
    expect(History$.upperBound(history, 1, Order.number)).toBe(1)
    expect(History$.upperBound(history, 3, Order.number)).toBe(3)
    expect(History$.upperBound(history, 5, Order.number)).toBe(3)
    expect(History$.upperBound(history, 9, Order.number)).toBe(4)
    expect(History$.upperBound([], 9, Order.number)).toBe(0)
  })

  it("inserts after entries with an equal timestamp", () => {
    const result = History$.insert(history, { value: "e", timestamp: 3 }, Order.number, eq)
    expect(Option.getOrNull(Option.map(result, (h) => h.map((entry) => entry.value)))).toEqual(
      ["a", "b", "c", "e", "d"]
    )
  })

  it("inserts at both ends", () => {
    const first = History$.insert(history, { value: "z", timestamp: 0 }, Order.number, eq)
    const last = History$.insert(history, { value: "z", timestamp: 8 }, Order.number, eq)
    expect(Option.getOrNull(Option.map(first, (h) => h[0]))).toEqual({ value: "z", timestamp: 0 })
    expect(Option.getOrNull(Option.map(last, (h) => h[4]))).toEqual({ value: "z", timestamp: 8 })
  })

  it("rejects an already recorded event", () => {
    expect(Option.isNone(History$.insert(history, { value: "b", timestamp: 3 }, Order.number, eq))).toBe(true)
    expect(Option.isNone(History$.insert(history, { value: "c", timestamp: 3 }, Order.number, eq))).toBe(true)
  })

  it("keeps the same value at another timestamp", () => {
    const result = History$.insert(history, { value: "a", timestamp: 2 }, Order.number, eq)
    expect(Option.getOrNull(Option.map(result, (h) => h.map((entry) => entry.timestamp)))).toEqual([1, 2, 3, 3, 7])
  })

  it("does not mutate the input", () => {
    History$.insert(history, { value: "e", timestamp: 4 }, Order.number, eq)
    expect(history).toHaveLength(4)
  })

  it("unions two histories without duplicates", () => {
    const other: History<string, number> = [
      { value: "a", timestamp: 1 },
      { value: "x", timestamp: 2 },
      { value: "d", timestamp: 7 }
    ]
    const result = History$.union(history, other, Order.number, eq)
    expect(result.map((entry) => `${entry.value}@${entry.timestamp}`)).toEqual([
      "a@1",
      "x@2",
      "b@3",
      "c@3",
      "d@7"
    ])
  })

  it("returns the entry with the greatest timestamp", () => {
    expect(Option.getOrNull(History$.latest(history))).toEqual({ value: "d", timestamp: 7 })
    expect(Option.isNone(History$.latest([]))).toBe(true)
  })
})

describe("view derivation", () => {
  it("picks the first add at the greatest timestamp", () => {
    const added: History<string, number> = [
      { value: "a", timestamp: 1 },
      { value: "b", timestamp: 4 },
      { value: "c", timestamp: 4 }
    ]
    expect(Option.getOrNull(View.derive(added, [], Order.number))).toEqual({ value: "b", timestamp: 4 })
  })

  it("hides a key removed at or after its latest add", () => {
    const added: History<string, number> = [{ value: "a", timestamp: 4 }]
    expect(Option.isNone(View.derive(added, [{ value: "a", timestamp: 4 }], Order.number))).toBe(true)
    expect(Option.isNone(View.derive(added, [{ value: "a", timestamp: 6 }], Order.number))).toBe(true)
    expect(Option.getOrNull(View.derive(added, [{ value: "a", timestamp: 3 }], Order.number))).toEqual(
      { value: "a", timestamp: 4 }
    )
  })

  it("has no winner without adds", () => {
    expect(Option.isNone(View.derive([], [{ value: "a", timestamp: 1 }], Order.number))).toBe(true)
  })
})
