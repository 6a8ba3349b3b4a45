/**
 * Element dictionary state types.
 *
 * A snapshot of a replica is its two event logs. The current view is not
 * part of the state: it is always re-derivable from the logs.
 *
 * The schemas validate snapshots handed over by other replicas before they
 * are merged in.
 *
 * @since 0.1.0
 */
import * as Schema from "effect/Schema"
import { ReplicaIdSchema } from "./CRDT.js"
import type { ReplicaId } from "./CRDT.js"

// =============================================================================
// Models
// =============================================================================

/**
 * A single recorded add or remove event for a key.
 *
 * @since 0.1.0
 * @category models
 */
export interface HistoryEntry<V, T> {
  readonly value: V
  readonly timestamp: T
}

/**
 * Every event recorded for one key, ascending by timestamp.
 *
 * @since 0.1.0
 * @category models
 */
export type History<V, T> = ReadonlyArray<HistoryEntry<V, T>>

/**
 * Per-key event log.
 *
 * @since 0.1.0
 * @category models
 */
export type EventLog<K, V, T> = ReadonlyMap<K, History<V, T>>

/**
 * State of an LWW-Element-Dictionary replica.
 *
 * `added` holds every add ever applied or merged in, `removed` every removal.
 * Both are append-only.
 *
 * @since 0.1.0
 * @category models
 */
export interface LWWElementDictState<K, V, T> {
  readonly type: "LWWElementDict"
  readonly replicaId: ReplicaId
  readonly added: EventLog<K, V, T>
  readonly removed: EventLog<K, V, T>
}

// =============================================================================
// Schemas
// =============================================================================

/**
 * Schema for a single history entry.
 *
 * @since 0.1.0
 * @category schemas
 */
export const HistoryEntry = <V extends Schema.Schema.Any, T extends Schema.Schema.Any>(
  valueSchema: V,
  timestampSchema: T
) =>
  Schema.Struct({
    value: valueSchema,
    timestamp: timestampSchema
  })

/**
 * Schema for LWWElementDictState.
 *
 * Each log is encoded as an array of `[key, history]` pairs. Decoding does
 * not sort or deduplicate histories; `fromState` and `mergeState` do.
 *
 * @example
 * ```ts
 * import * as CRDTDict from "lww-element-dict/CRDTDict"
 * import * as Schema from "effect/Schema"
 *
 * const schema = CRDTDict.LWWElementDictState(Schema.String, Schema.String, Schema.Number)
 * const decode = Schema.decodeUnknown(schema)
 * ```
 *
 * @since 0.1.0
 * @category schemas
 */
export const LWWElementDictState = <
  K extends Schema.Schema.Any,
  V extends Schema.Schema.Any,
  T extends Schema.Schema.Any
>(
  keySchema: K,
  valueSchema: V,
  timestampSchema: T
) => {
  const log = Schema.ReadonlyMap({
    key: keySchema,
    value: Schema.Array(HistoryEntry(valueSchema, timestampSchema))
  })
  return Schema.Struct({
    type: Schema.Literal("LWWElementDict"),
    replicaId: ReplicaIdSchema,
    added: log,
    removed: log
  }).pipe(
    Schema.annotations({
      identifier: "LWWElementDictState",
      title: "LWW-Element-Dictionary State",
      description: "Add and remove event logs of a last-writer-wins element dictionary replica"
    })
  )
}
