/**
 * In-process anti-entropy between replicas.
 *
 * These helpers exchange full snapshots between dictionary instances living
 * in the same process. Carrying snapshots across a network is left to the
 * embedding system: ship the result of `LWWElementDict.query` and apply it
 * with `LWWElementDict.mergeState`.
 *
 * @since 0.1.0
 */

import * as Effect from "effect/Effect"
import * as STM from "effect/STM"
import * as LWWElementDict from "./LWWElementDict.js"

/**
 * Exchange state between two replicas so that both hold the union of their
 * histories.
 *
 * Both snapshots are taken in one transaction, then each replica merges the
 * other's snapshot.
 *
 * @example
 * ```ts
 * import * as LWWElementDict from "lww-element-dict/LWWElementDict"
 * import { syncReplicas } from "lww-element-dict/Replication"
 * import { ReplicaId } from "lww-element-dict/CRDT"
 * import * as Effect from "effect/Effect"
 * import * as Order from "effect/Order"
 *
 * const program = Effect.gen(function* () {
 *   const phone = yield* LWWElementDict.make<string, string, number>(ReplicaId("phone"), Order.number)
 *   const laptop = yield* LWWElementDict.make<string, string, number>(ReplicaId("laptop"), Order.number)
 *
 *   yield* LWWElementDict.add(phone, "theme", "dark", 1)
 *   yield* LWWElementDict.add(laptop, "theme", "light", 2)
 *
 *   yield* syncReplicas(phone, laptop)
 *   // both replicas now see "light"
 * })
 * ```
 *
 * @since 0.1.0
 * @category replication
 */
export const syncReplicas = <K, V, T>(
  left: LWWElementDict.LWWElementDict<K, V, T>,
  right: LWWElementDict.LWWElementDict<K, V, T>
): Effect.Effect<void> =>
  Effect.gen(function* () {
    const [leftState, rightState] = yield* STM.all([
      LWWElementDict.query(left),
      LWWElementDict.query(right)
    ])

    yield* LWWElementDict.mergeState(left, rightState)
    yield* LWWElementDict.mergeState(right, leftState)

    const visible = yield* LWWElementDict.size(left)
    yield* Effect.logDebug("replicas synchronized").pipe(
      Effect.annotateLogs({ left: left.replicaId, right: right.replicaId, visible })
    )
  }).pipe(Effect.withLogSpan("syncReplicas"))

/**
 * Bring every replica up to date with every other one.
 *
 * All snapshots are taken in one transaction before any merge, then each
 * replica merges the snapshots of the others. Replicas converge when no
 * writes race with the round.
 *
 * @since 0.1.0
 * @category replication
 */
export const syncAll = <K, V, T>(
  replicas: ReadonlyArray<LWWElementDict.LWWElementDict<K, V, T>>
): Effect.Effect<void> =>
  Effect.gen(function* () {
    const states = yield* STM.forEach(replicas, (replica) => LWWElementDict.query(replica))

    yield* Effect.forEach(replicas, (replica, index) =>
      STM.forEach(
        states.filter((_, other) => other !== index),
        (state) => LWWElementDict.mergeState(replica, state),
        { discard: true }
      ), { discard: true })

    yield* Effect.logDebug("sync round complete").pipe(
      Effect.annotateLogs("replicas", replicas.length)
    )
  }).pipe(Effect.withLogSpan("syncAll"))
