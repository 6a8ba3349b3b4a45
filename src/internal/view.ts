/**
 * Incremental maintenance of the current view.
 *
 * Each new history entry is compared against the current winner and the
 * latest removal of its key only. Timestamps are totally ordered and the logs
 * never shrink, so this stays equal to a full re-derivation.
 *
 * @since 0.1.0
 * @internal
 */

import * as Arr from "effect/Array"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import * as STM from "effect/STM"
import * as TMap from "effect/TMap"
import type { History, HistoryEntry } from "../CRDTDict.js"
import * as History$ from "./history.js"

/**
 * The stores a view admission reads and writes.
 *
 * @internal
 */
export interface ViewStores<K, V, T> {
  readonly timestampOrder: Order.Order<T>
  readonly removed: TMap.TMap<K, History<V, T>>
  readonly current: TMap.TMap<K, HistoryEntry<V, T>>
}

/**
 * Admits a newly recorded add into the view.
 *
 * An add at or before the latest removal of its key never becomes visible.
 * Among adds, only a strictly later timestamp replaces the winner.
 *
 * @internal
 */
export const admitAdd = <K, V, T>(
  self: ViewStores<K, V, T>,
  key: K,
  entry: HistoryEntry<V, T>
): STM.STM<void> =>
  STM.gen(function* () {
    const removals = yield* TMap.getOrElse(self.removed, key, (): History<V, T> => [])
    const lastRemoval = History$.latest(removals)
    if (
      Option.isSome(lastRemoval) &&
      Order.greaterThanOrEqualTo(self.timestampOrder)(lastRemoval.value.timestamp, entry.timestamp)
    ) {
      return
    }

    const winner = yield* TMap.get(self.current, key)
    if (Option.isNone(winner) || Order.lessThan(self.timestampOrder)(winner.value.timestamp, entry.timestamp)) {
      yield* TMap.set(self.current, key, entry)
    }
  })

/**
 * Admits a newly recorded removal into the view.
 *
 * Evicts the winner when the removal is at or after it (removal wins ties).
 *
 * @internal
 */
export const admitRemove = <K, V, T>(
  self: ViewStores<K, V, T>,
  key: K,
  entry: HistoryEntry<V, T>
): STM.STM<void> =>
  STM.gen(function* () {
    const winner = yield* TMap.get(self.current, key)
    if (
      Option.isSome(winner) &&
      Order.greaterThanOrEqualTo(self.timestampOrder)(entry.timestamp, winner.value.timestamp)
    ) {
      yield* TMap.remove(self.current, key)
    }
  })

/**
 * Derives the winner of a key from its full history.
 *
 * The winner is the first recorded add with the greatest timestamp, provided
 * that timestamp is strictly after every removal.
 *
 * @internal
 */
export const derive = <V, T>(
  added: History<V, T>,
  removed: History<V, T>,
  order: Order.Order<T>
): Option.Option<HistoryEntry<V, T>> =>
  Option.gen(function* () {
    const last = yield* History$.latest(added)
    const winner = yield* Arr.findFirst(added, (entry) => order(entry.timestamp, last.timestamp) === 0)
    const lastRemoval = History$.latest(removed)
    if (Option.isSome(lastRemoval) && Order.greaterThanOrEqualTo(order)(lastRemoval.value.timestamp, winner.timestamp)) {
      return yield* Option.none()
    }
    return winner
  })
