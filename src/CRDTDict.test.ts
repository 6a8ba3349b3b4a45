import { describe, it, expect } from "vitest"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import * as Schema from "effect/Schema"
import { ReplicaId } from "./CRDT.js"
import * as CRDTDict from "./CRDTDict.js"
import * as LWWElementDict from "./LWWElementDict.js"

const schema = CRDTDict.LWWElementDictState(Schema.String, Schema.String, Schema.Number)

describe("LWWElementDictState schema", () => {
  it("decodes a snapshot sent by another replica", async () => {
    const state = Schema.decodeUnknownSync(schema)({
      type: "LWWElementDict",
      replicaId: "tablet",
      added: [["theme", [{ value: "light", timestamp: 1 }, { value: "dark", timestamp: 4 }]]],
      removed: [["theme", [{ value: "light", timestamp: 2 }]]]
    })

    expect(state.replicaId).toBe("tablet")
    expect(state.added.get("theme")).toEqual([
      { value: "light", timestamp: 1 },
      { value: "dark", timestamp: 4 }
    ])

    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const dict = yield* LWWElementDict.fromState(state, Order.number)
        return yield* LWWElementDict.get(dict, "theme")
      })
    )
    expect(Option.getOrNull(result)).toBe("dark")
  })

  it("rejects a snapshot of another CRDT type", () => {
    const result = Schema.decodeUnknownEither(schema)({
      type: "LWWMap",
      replicaId: "tablet",
      added: [],
      removed: []
    })
    expect(Either.isLeft(result)).toBe(true)
  })

  it("rejects a history entry without a timestamp", () => {
    const result = Schema.decodeUnknownEither(schema)({
      type: "LWWElementDict",
      replicaId: "tablet",
      added: [["theme", [{ value: "dark" }]]],
      removed: []
    })
    expect(Either.isLeft(result)).toBe(true)
  })

  it("encodes logs as key and history pairs", () => {
    const encoded = Schema.encodeSync(schema)({
      type: "LWWElementDict",
      replicaId: ReplicaId("tablet"),
      added: new Map([["theme", [{ value: "dark", timestamp: 4 }]]]),
      removed: new Map<string, ReadonlyArray<CRDTDict.HistoryEntry<string, number>>>()
    })
    expect(encoded.replicaId).toBe("tablet")
    expect(encoded.added).toEqual([["theme", [{ value: "dark", timestamp: 4 }]]])
    expect(encoded.removed).toEqual([])
  })
})
