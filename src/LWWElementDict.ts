/**
 * LWW-Element-Dictionary (Last-Writer-Wins Element Dictionary) CRDT
 * implementation.
 *
 * An LWW-Element-Dictionary is a state-based CRDT mapping keys to values. Each
 * replica keeps two append-only event logs, one for adds and one for removals,
 * where every event is a `(value, timestamp)` pair recorded under its key. The
 * visible value of a key is the add with the greatest timestamp, unless a
 * removal is at or after it. Merging takes the union of both logs.
 *
 * Properties:
 * - Last-writer-wins conflict resolution by timestamp
 * - Removal wins over an add with the same timestamp
 * - Commutative merge operation
 * - Associative merge operation
 * - Idempotent merge operation
 * - Eventually consistent across all replicas
 *
 * Semantics:
 * - Add operation: record `(value, timestamp)` in the added log
 * - Remove operation: record `(value, timestamp)` in the removed log
 * - Lookup: the current winner, maintained incrementally as events arrive
 * - Merge: union both logs key by key, re-admitting every incoming event
 *
 * Every mutation is a single STM transaction, so concurrent fibers never
 * observe a partially applied add, removal or merge.
 *
 * @since 0.1.0
 */

import type { ConfigError } from "effect/ConfigError"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Equal from "effect/Equal"
import type * as Equivalence from "effect/Equivalence"
import { dual, pipe } from "effect/Function"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"
import type * as Order from "effect/Order"
import * as Predicate from "effect/Predicate"
import * as STM from "effect/STM"
import * as TMap from "effect/TMap"
import type { Mutable } from "effect/Types"
import type * as Types from "effect/Types"
import { ReplicaIdConfig } from "./CRDT.js"
import type { ReplicaId } from "./CRDT.js"
import type { EventLog, History, HistoryEntry, LWWElementDictState } from "./CRDTDict.js"
import * as History$ from "./internal/history.js"
import { mergeLog } from "./internal/merge.js"
import { makeProtoBase } from "./internal/proto.js"
import * as View from "./internal/view.js"

export type { History, HistoryEntry, LWWElementDictState } from "./CRDTDict.js"

// =============================================================================
// Symbols
// =============================================================================

/**
 * LWW-Element-Dictionary type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const LWWElementDictTypeId: unique symbol = Symbol.for("lww-element-dict/LWWElementDict")

/**
 * LWW-Element-Dictionary type identifier type.
 *
 * @since 0.1.0
 * @category symbols
 */
export type LWWElementDictTypeId = typeof LWWElementDictTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * LWW-Element-Dictionary CRDT data structure.
 *
 * `added` and `removed` are the event logs. `current` is the materialized
 * winner of every visible key.
 *
 * @since 0.1.0
 * @category models
 */
export interface LWWElementDict<K, V, T> extends LWWElementDict.Variance<K, V, T> {
  readonly replicaId: ReplicaId
  readonly timestampOrder: Order.Order<T>
  readonly valueEquivalence: Equivalence.Equivalence<V>
  readonly added: TMap.TMap<K, History<V, T>>
  readonly removed: TMap.TMap<K, History<V, T>>
  readonly current: TMap.TMap<K, HistoryEntry<V, T>>
}

/**
 * @since 0.1.0
 */
export declare namespace LWWElementDict {
  /**
   * @since 0.1.0
   * @category models
   */
  export interface Variance<K, V, T> {
    readonly [LWWElementDictTypeId]: {
      readonly _K: Types.Invariant<K>
      readonly _V: Types.Invariant<V>
      readonly _T: Types.Invariant<T>
    }
  }
}

/**
 * Construction options.
 *
 * `valueEquivalence` decides when two events carry the same value. It
 * defaults to `Equal.equals`.
 *
 * @since 0.1.0
 * @category models
 */
export interface Options<V> {
  readonly valueEquivalence?: Equivalence.Equivalence<V>
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard to check if a value is an LWWElementDict.
 *
 * @since 0.1.0
 * @category guards
 */
export const isLWWElementDict = (u: unknown): u is LWWElementDict<unknown, unknown, unknown> =>
  Predicate.hasProperty(u, LWWElementDictTypeId)

// =============================================================================
// Proto Objects
// =============================================================================

/** @internal */
const ProtoLWWElementDict = makeProtoBase(LWWElementDictTypeId, "LWWElementDict")

// =============================================================================
// Constructors
// =============================================================================

/** @internal */
const unsafeMake = <K, V, T>(
  replicaId: ReplicaId,
  timestampOrder: Order.Order<T>,
  options: Options<V> | undefined,
  added: TMap.TMap<K, History<V, T>>,
  removed: TMap.TMap<K, History<V, T>>,
  current: TMap.TMap<K, HistoryEntry<V, T>>
): LWWElementDict<K, V, T> => {
  const dict: Mutable<LWWElementDict<K, V, T>> = Object.create(ProtoLWWElementDict)
  dict.replicaId = replicaId
  dict.timestampOrder = timestampOrder
  dict.valueEquivalence = options?.valueEquivalence ?? Equal.equivalence<V>()
  dict.added = added
  dict.removed = removed
  dict.current = current
  return dict
}

/**
 * Creates a new, empty LWW-Element-Dictionary.
 *
 * Timestamps may be of any type with a total order: numbers, dates, bigints
 * or a hybrid clock with a custom `Order`.
 *
 * @example
 * ```ts
 * import * as LWWElementDict from "lww-element-dict/LWWElementDict"
 * import { ReplicaId } from "lww-element-dict/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 *
 * const program = Effect.gen(function* () {
 *   const dict = yield* LWWElementDict.make<string, number, number>(ReplicaId("replica-1"), Order.number)
 *
 *   yield* LWWElementDict.add(dict, "A", 10, 1)
 *   const value = yield* LWWElementDict.get(dict, "A")
 *
 *   console.log("Value:", value) // Option.some(10)
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = <K, V, T>(
  replicaId: ReplicaId,
  timestampOrder: Order.Order<T>,
  options?: Options<V>
): STM.STM<LWWElementDict<K, V, T>> =>
  STM.gen(function* () {
    const added = yield* TMap.empty<K, History<V, T>>()
    const removed = yield* TMap.empty<K, History<V, T>>()
    const current = yield* TMap.empty<K, HistoryEntry<V, T>>()
    return unsafeMake(replicaId, timestampOrder, options, added, removed, current)
  })

/**
 * Creates an LWW-Element-Dictionary from a snapshot of its event logs.
 *
 * Histories are re-sorted and deduplicated on the way in, and the current
 * view is derived from them rather than read from the snapshot.
 *
 * @example
 * ```ts
 * import * as LWWElementDict from "lww-element-dict/LWWElementDict"
 * import { ReplicaId } from "lww-element-dict/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 *
 * const program = Effect.gen(function* () {
 *   const dict = yield* LWWElementDict.fromState({
 *     type: "LWWElementDict" as const,
 *     replicaId: ReplicaId("replica-1"),
 *     added: new Map([["A", [{ value: 10, timestamp: 1 }]]]),
 *     removed: new Map()
 *   }, Order.number)
 *
 *   const value = yield* LWWElementDict.get(dict, "A")
 *   console.log("Value:", value) // Option.some(10)
 * })
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const fromState = <K, V, T>(
  state: LWWElementDictState<K, V, T>,
  timestampOrder: Order.Order<T>,
  options?: Options<V>
): STM.STM<LWWElementDict<K, V, T>> =>
  STM.gen(function* () {
    const equivalence = options?.valueEquivalence ?? Equal.equivalence<V>()
    const normalize = (log: EventLog<K, V, T>) =>
      Array.from(log, ([key, history]): [K, History<V, T>] => [
        key,
        History$.union([], history, timestampOrder, equivalence)
      ])

    const addedEntries = normalize(state.added)
    const added = yield* TMap.fromIterable(addedEntries)
    const removed = yield* TMap.fromIterable(normalize(state.removed))
    const current = yield* TMap.empty<K, HistoryEntry<V, T>>()

    yield* STM.forEach(addedEntries, ([key, history]) =>
      pipe(
        TMap.getOrElse(removed, key, (): History<V, T> => []),
        STM.flatMap((removals) =>
          Option.match(View.derive(history, removals, timestampOrder), {
            onNone: () => STM.void,
            onSome: (winner) => TMap.set(current, key, winner)
          })
        )
      ), { discard: true })

    return unsafeMake(state.replicaId, timestampOrder, { valueEquivalence: equivalence }, added, removed, current)
  })

/**
 * Creates an independent replica holding a snapshot of `self`'s history.
 *
 * The source is only read, in a single transaction. The copy keeps the
 * source's replica ID unless another one is given.
 *
 * @since 0.1.0
 * @category constructors
 */
export const copy = <K, V, T>(
  self: LWWElementDict<K, V, T>,
  replicaId: ReplicaId = self.replicaId
): STM.STM<LWWElementDict<K, V, T>> =>
  pipe(
    query(self),
    STM.flatMap((state) =>
      fromState({ ...state, replicaId }, self.timestampOrder, { valueEquivalence: self.valueEquivalence })
    )
  )

// =============================================================================
// Operations
// =============================================================================

/**
 * Record an add of `value` under `key` at `timestamp`.
 *
 * The value becomes visible when its timestamp is after both the current
 * winner and the latest removal of the key. Recording the same
 * `(value, timestamp)` twice keeps one event.
 *
 * @example
 * ```ts
 * import * as LWWElementDict from "lww-element-dict/LWWElementDict"
 * import { ReplicaId } from "lww-element-dict/CRDT"
 * import { pipe } from "effect/Function"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 *
 * const program = Effect.gen(function* () {
 *   const dict = yield* LWWElementDict.make<string, number, number>(ReplicaId("replica-1"), Order.number)
 *
 *   // Data-first style
 *   yield* LWWElementDict.add(dict, "A", 10, 1)
 *
 *   // Data-last style (pipe)
 *   yield* pipe(dict, LWWElementDict.add("A", 20, 2))
 *
 *   const value = yield* LWWElementDict.get(dict, "A")
 *   console.log(value) // Option.some(20)
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const add: {
  <K, V, T>(key: K, value: V, timestamp: T): (self: LWWElementDict<K, V, T>) => STM.STM<LWWElementDict<K, V, T>>
  <K, V, T>(self: LWWElementDict<K, V, T>, key: K, value: V, timestamp: T): STM.STM<LWWElementDict<K, V, T>>
} = dual(
  4,
  <K, V, T>(self: LWWElementDict<K, V, T>, key: K, value: V, timestamp: T): STM.STM<LWWElementDict<K, V, T>> =>
    STM.gen(function* () {
      const entry: HistoryEntry<V, T> = { value, timestamp }
      yield* History$.record(self.added, key, entry, self.timestampOrder, self.valueEquivalence)
      yield* View.admitAdd(self, key, entry)
      return self
    })
)

/**
 * Record a removal of `key` at `timestamp`.
 *
 * Clears the visible value when the removal is at or after the current
 * winner. An earlier removal is recorded but leaves the value in place.
 *
 * @example
 * ```ts
 * import * as LWWElementDict from "lww-element-dict/LWWElementDict"
 * import { ReplicaId } from "lww-element-dict/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 *
 * const program = Effect.gen(function* () {
 *   const dict = yield* LWWElementDict.make<string, number, number>(ReplicaId("replica-1"), Order.number)
 *
 *   yield* LWWElementDict.add(dict, "A", 10, 1)
 *   yield* LWWElementDict.remove(dict, "A", 10, 1)
 *
 *   const exists = yield* LWWElementDict.has(dict, "A")
 *   console.log(exists) // false - removal wins the tie
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const remove: {
  <K, V, T>(key: K, value: V, timestamp: T): (self: LWWElementDict<K, V, T>) => STM.STM<LWWElementDict<K, V, T>>
  <K, V, T>(self: LWWElementDict<K, V, T>, key: K, value: V, timestamp: T): STM.STM<LWWElementDict<K, V, T>>
} = dual(
  4,
  <K, V, T>(self: LWWElementDict<K, V, T>, key: K, value: V, timestamp: T): STM.STM<LWWElementDict<K, V, T>> =>
    STM.gen(function* () {
      const entry: HistoryEntry<V, T> = { value, timestamp }
      yield* History$.record(self.removed, key, entry, self.timestampOrder, self.valueEquivalence)
      yield* View.admitRemove(self, key, entry)
      return self
    })
)

/**
 * Set `key` to `value` at `timestamp`. Same as {@link add}.
 *
 * @since 0.1.0
 * @category operations
 */
export const update: {
  <K, V, T>(key: K, value: V, timestamp: T): (self: LWWElementDict<K, V, T>) => STM.STM<LWWElementDict<K, V, T>>
  <K, V, T>(self: LWWElementDict<K, V, T>, key: K, value: V, timestamp: T): STM.STM<LWWElementDict<K, V, T>>
} = add

/**
 * Merge a snapshot of another replica into this one.
 *
 * @since 0.1.0
 * @category operations
 */
export const mergeState: {
  <K, V, T>(other: LWWElementDictState<K, V, T>): (self: LWWElementDict<K, V, T>) => STM.STM<LWWElementDict<K, V, T>>
  <K, V, T>(self: LWWElementDict<K, V, T>, other: LWWElementDictState<K, V, T>): STM.STM<LWWElementDict<K, V, T>>
} = dual(
  2,
  <K, V, T>(self: LWWElementDict<K, V, T>, other: LWWElementDictState<K, V, T>): STM.STM<LWWElementDict<K, V, T>> =>
    STM.gen(function* () {
      yield* mergeLog(
        self.added,
        other.added,
        self.timestampOrder,
        self.valueEquivalence,
        (key, entry) => View.admitAdd(self, key, entry)
      )
      yield* mergeLog(
        self.removed,
        other.removed,
        self.timestampOrder,
        self.valueEquivalence,
        (key, entry) => View.admitRemove(self, key, entry)
      )
      return self
    })
)

/**
 * Merge another replica into this one.
 *
 * Both event logs of `other` are unioned into `self` and the current view is
 * updated for every incoming event. `other` is read, never written; merging a
 * replica with itself changes nothing.
 *
 * @example
 * ```ts
 * import * as LWWElementDict from "lww-element-dict/LWWElementDict"
 * import { ReplicaId } from "lww-element-dict/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 *
 * const program = Effect.gen(function* () {
 *   const dict1 = yield* LWWElementDict.make<string, number, number>(ReplicaId("replica-1"), Order.number)
 *   const dict2 = yield* LWWElementDict.make<string, number, number>(ReplicaId("replica-2"), Order.number)
 *
 *   yield* LWWElementDict.add(dict1, "A", 10, 1)
 *   yield* LWWElementDict.add(dict2, "A", 20, 2)
 *
 *   yield* LWWElementDict.merge(dict1, dict2)
 *
 *   const value = yield* LWWElementDict.get(dict1, "A")
 *   console.log(value) // Option.some(20)
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const merge: {
  <K, V, T>(other: LWWElementDict<K, V, T>): (self: LWWElementDict<K, V, T>) => STM.STM<LWWElementDict<K, V, T>>
  <K, V, T>(self: LWWElementDict<K, V, T>, other: LWWElementDict<K, V, T>): STM.STM<LWWElementDict<K, V, T>>
} = dual(
  2,
  <K, V, T>(self: LWWElementDict<K, V, T>, other: LWWElementDict<K, V, T>): STM.STM<LWWElementDict<K, V, T>> =>
    pipe(
      query(other),
      STM.flatMap((state) => mergeState(self, state))
    )
)

// =============================================================================
// Getters
// =============================================================================

/**
 * Get the visible value for a key.
 *
 * Returns Option.none if the key was never added or its latest add is
 * dominated by a removal.
 *
 * @since 0.1.0
 * @category getters
 */
export const get: {
  <K>(key: K): <V, T>(self: LWWElementDict<K, V, T>) => STM.STM<Option.Option<V>>
  <K, V, T>(self: LWWElementDict<K, V, T>, key: K): STM.STM<Option.Option<V>>
} = dual(
  2,
  <K, V, T>(self: LWWElementDict<K, V, T>, key: K): STM.STM<Option.Option<V>> =>
    pipe(
      TMap.get(self.current, key),
      STM.map(Option.map((entry) => entry.value))
    )
)

/**
 * Get the winning event for a key, with its timestamp.
 *
 * @since 0.1.0
 * @category getters
 */
export const getEntry: {
  <K>(key: K): <V, T>(self: LWWElementDict<K, V, T>) => STM.STM<Option.Option<HistoryEntry<V, T>>>
  <K, V, T>(self: LWWElementDict<K, V, T>, key: K): STM.STM<Option.Option<HistoryEntry<V, T>>>
} = dual(
  2,
  <K, V, T>(self: LWWElementDict<K, V, T>, key: K): STM.STM<Option.Option<HistoryEntry<V, T>>> =>
    TMap.get(self.current, key)
)

/**
 * Check if a key currently has a visible value.
 *
 * @since 0.1.0
 * @category getters
 */
export const has: {
  <K>(key: K): <V, T>(self: LWWElementDict<K, V, T>) => STM.STM<boolean>
  <K, V, T>(self: LWWElementDict<K, V, T>, key: K): STM.STM<boolean>
} = dual(
  2,
  <K, V, T>(self: LWWElementDict<K, V, T>, key: K): STM.STM<boolean> => TMap.has(self.current, key)
)

/**
 * Get all keys with a visible value.
 *
 * @since 0.1.0
 * @category getters
 */
export const keys = <K, V, T>(self: LWWElementDict<K, V, T>): STM.STM<Array<K>> => TMap.keys(self.current)

/**
 * Get all visible values.
 *
 * @since 0.1.0
 * @category getters
 */
export const values = <K, V, T>(self: LWWElementDict<K, V, T>): STM.STM<Array<V>> =>
  pipe(
    TMap.values(self.current),
    STM.map((entries) => entries.map((entry) => entry.value))
  )

/**
 * Get the current view as a map from key to visible value.
 *
 * @since 0.1.0
 * @category getters
 */
export const entries = <K, V, T>(self: LWWElementDict<K, V, T>): STM.STM<ReadonlyMap<K, V>> =>
  pipe(
    TMap.toArray(self.current),
    STM.map((pairs) => new Map(pairs.map(([key, entry]): [K, V] => [key, entry.value])))
  )

/**
 * Get the number of keys with a visible value.
 *
 * @since 0.1.0
 * @category getters
 */
export const size = <K, V, T>(self: LWWElementDict<K, V, T>): STM.STM<number> => TMap.size(self.current)

/**
 * Every add recorded for a key, ascending by timestamp.
 *
 * @since 0.1.0
 * @category getters
 */
export const addedHistory: {
  <K>(key: K): <V, T>(self: LWWElementDict<K, V, T>) => STM.STM<History<V, T>>
  <K, V, T>(self: LWWElementDict<K, V, T>, key: K): STM.STM<History<V, T>>
} = dual(
  2,
  <K, V, T>(self: LWWElementDict<K, V, T>, key: K): STM.STM<History<V, T>> =>
    TMap.getOrElse(self.added, key, (): History<V, T> => [])
)

/**
 * Every removal recorded for a key, ascending by timestamp.
 *
 * @since 0.1.0
 * @category getters
 */
export const removedHistory: {
  <K>(key: K): <V, T>(self: LWWElementDict<K, V, T>) => STM.STM<History<V, T>>
  <K, V, T>(self: LWWElementDict<K, V, T>, key: K): STM.STM<History<V, T>>
} = dual(
  2,
  <K, V, T>(self: LWWElementDict<K, V, T>, key: K): STM.STM<History<V, T>> =>
    TMap.getOrElse(self.removed, key, (): History<V, T> => [])
)

/**
 * Get a snapshot of both event logs.
 *
 * Suitable for shipping to another replica and merging with
 * {@link mergeState}, or for an embedding system to persist.
 *
 * @since 0.1.0
 * @category getters
 */
export const query = <K, V, T>(self: LWWElementDict<K, V, T>): STM.STM<LWWElementDictState<K, V, T>> =>
  STM.gen(function* () {
    const added = yield* TMap.toMap(self.added)
    const removed = yield* TMap.toMap(self.removed)
    return {
      type: "LWWElementDict" as const,
      replicaId: self.replicaId,
      added,
      removed
    }
  })

// =============================================================================
// Tags
// =============================================================================

/**
 * LWWElementDict service tag for dependency injection.
 *
 * @since 0.1.0
 * @category tags
 */
export const Tag = <K, V, T>() => Context.GenericTag<LWWElementDict<K, V, T>>("lww-element-dict/LWWElementDict")

// =============================================================================
// Layers
// =============================================================================

/**
 * Creates a live layer with the given replica ID.
 *
 * @example
 * ```ts
 * import * as LWWElementDict from "lww-element-dict/LWWElementDict"
 * import { ReplicaId } from "lww-element-dict/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 *
 * const DictTag = LWWElementDict.Tag<string, number, number>()
 *
 * const program = Effect.gen(function* () {
 *   const dict = yield* DictTag
 *   yield* LWWElementDict.add(dict, "count", 42, Date.now())
 *   const val = yield* LWWElementDict.get(dict, "count")
 *   console.log("Value:", val)
 * })
 *
 * Effect.runPromise(
 *   program.pipe(
 *     Effect.provide(LWWElementDict.Live(DictTag, ReplicaId("replica-1"), Order.number))
 *   )
 * )
 * ```
 *
 * @since 0.1.0
 * @category layers
 */
export const Live = <K, V, T>(
  tag: Context.Tag<LWWElementDict<K, V, T>, LWWElementDict<K, V, T>>,
  replicaId: ReplicaId,
  timestampOrder: Order.Order<T>,
  options?: Options<V>
): Layer.Layer<LWWElementDict<K, V, T>> =>
  Layer.effect(
    tag,
    pipe(make<K, V, T>(replicaId, timestampOrder, options), STM.commit)
  )

/**
 * Creates a live layer whose replica ID is read from `REPLICA_ID`.
 *
 * Fails with a `ConfigError` when the entry is missing or empty.
 *
 * @since 0.1.0
 * @category layers
 */
export const layerConfig = <K, V, T>(
  tag: Context.Tag<LWWElementDict<K, V, T>, LWWElementDict<K, V, T>>,
  timestampOrder: Order.Order<T>,
  options?: Options<V>
): Layer.Layer<LWWElementDict<K, V, T>, ConfigError> =>
  Layer.effect(
    tag,
    Effect.gen(function* () {
      const replicaId = yield* ReplicaIdConfig
      yield* Effect.annotateLogs(Effect.logDebug("replica created"), "replicaId", replicaId)
      return yield* make<K, V, T>(replicaId, timestampOrder, options)
    })
  )
