/**
 * Ordered, deduplicated per-key event histories.
 *
 * @since 0.1.0
 * @internal
 */

import * as Arr from "effect/Array"
import type * as Equivalence from "effect/Equivalence"
import { pipe } from "effect/Function"
import * as Option from "effect/Option"
import type * as Order from "effect/Order"
import * as STM from "effect/STM"
import * as TMap from "effect/TMap"
import type { History, HistoryEntry } from "../CRDTDict.js"

/**
 * Index of the first entry whose timestamp is strictly greater than
 * `timestamp`, or the length of the history when there is none.
 *
 * @internal
 */
export const upperBound = <V, T>(
  history: History<V, T>,
  timestamp: T,
  order: Order.Order<T>
): number => {
  let low = 0
  let high = history.length
  while (low < high) {
    const mid = (low + high) >>> 1
    if (order(history[mid].timestamp, timestamp) === 1) {
      high = mid
    } else {
      low = mid + 1
    }
  }
  return low
}

/**
 * Inserts an entry into a history, keeping it ascending by timestamp.
 *
 * Only entries sharing the timestamp of the new one can be duplicates, so the
 * scan covers that run alone. Returns `Option.none()` when an entry with an
 * equivalent value and the same timestamp is already recorded.
 *
 * @internal
 */
export const insert = <V, T>(
  history: History<V, T>,
  entry: HistoryEntry<V, T>,
  order: Order.Order<T>,
  equivalence: Equivalence.Equivalence<V>
): Option.Option<History<V, T>> => {
  const position = upperBound(history, entry.timestamp, order)
  for (let i = position - 1; i >= 0 && order(history[i].timestamp, entry.timestamp) === 0; i--) {
    if (equivalence(history[i].value, entry.value)) {
      return Option.none()
    }
  }
  return Arr.insertAt(history, position, entry)
}

/**
 * Inserts every entry of `incoming` into `history`.
 *
 * @internal
 */
export const union = <V, T>(
  history: History<V, T>,
  incoming: History<V, T>,
  order: Order.Order<T>,
  equivalence: Equivalence.Equivalence<V>
): History<V, T> =>
  Arr.reduce(incoming, history, (acc, entry) =>
    Option.getOrElse(insert(acc, entry, order, equivalence), () => acc))

/**
 * The entry with the greatest timestamp.
 *
 * @internal
 */
export const latest = <V, T>(history: History<V, T>): Option.Option<HistoryEntry<V, T>> => Arr.last(history)

/**
 * Records an event in a per-key log.
 *
 * @internal
 */
export const record = <K, V, T>(
  log: TMap.TMap<K, History<V, T>>,
  key: K,
  entry: HistoryEntry<V, T>,
  order: Order.Order<T>,
  equivalence: Equivalence.Equivalence<V>
): STM.STM<void> =>
  pipe(
    TMap.getOrElse(log, key, (): History<V, T> => []),
    STM.flatMap((history) =>
      Option.match(insert(history, entry, order, equivalence), {
        onNone: () => STM.void,
        onSome: (next) => TMap.set(log, key, next)
      })
    )
  )
