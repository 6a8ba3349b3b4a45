/**
 * Internal utilities for merging event logs.
 *
 * @since 0.1.0
 * @internal
 */

import type * as Equivalence from "effect/Equivalence"
import * as Option from "effect/Option"
import type * as Order from "effect/Order"
import * as STM from "effect/STM"
import * as TMap from "effect/TMap"
import type { EventLog, History, HistoryEntry } from "../CRDTDict.js"
import * as History$ from "./history.js"

/**
 * Unions every per-key history of `source` into `target`.
 *
 * Each incoming entry is handed to `admit` afterwards, including entries the
 * target already held: the target's other log may have changed since the
 * entry was first recorded.
 *
 * @internal
 */
export const mergeLog = <K, V, T>(
  target: TMap.TMap<K, History<V, T>>,
  source: EventLog<K, V, T>,
  order: Order.Order<T>,
  equivalence: Equivalence.Equivalence<V>,
  admit: (key: K, entry: HistoryEntry<V, T>) => STM.STM<void>
): STM.STM<void> =>
  STM.forEach(
    source,
    ([key, incoming]) =>
      STM.gen(function* () {
        const existing = yield* TMap.get(target, key)
        const merged = Option.match(existing, {
          // Snapshots may come unsorted or with duplicates
          onNone: () => History$.union([], incoming, order, equivalence),
          onSome: (history) => History$.union(history, incoming, order, equivalence)
        })
        yield* TMap.set(target, key, merged)
        yield* STM.forEach(incoming, (entry) => admit(key, entry), { discard: true })
      }),
    { discard: true }
  )
