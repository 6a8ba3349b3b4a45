/**
 * Core CRDT (Conflict-free Replicated Data Type) types and utilities.
 *
 * Provides the replica identity shared by every dictionary instance, and the
 * configuration entry it can be read from.
 *
 * @since 0.1.0
 */
import * as Brand from "effect/Brand"
import * as Config from "effect/Config"
import * as Schema from "effect/Schema"

// =============================================================================
// Models
// =============================================================================

/**
 * Replica ID for identifying different CRDT instances.
 *
 * Each dictionary instance is associated with a replica ID. It names the
 * replica in snapshots and log annotations; it takes no part in conflict
 * resolution, which is decided by timestamps alone.
 *
 * @since 0.1.0
 * @category models
 */
export type ReplicaId = Brand.Branded<string, "ReplicaId">

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a replica ID from a string.
 *
 * @example
 * ```ts
 * import { ReplicaId } from "lww-element-dict/CRDT"
 *
 * const replica1 = ReplicaId("replica-1")
 * const replica2 = ReplicaId("replica-2")
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const ReplicaId = Brand.nominal<ReplicaId>()

// =============================================================================
// Schemas
// =============================================================================

/**
 * Schema for ReplicaId serialization/deserialization.
 *
 * @since 0.1.0
 * @category schemas
 */
export const ReplicaIdSchema: Schema.BrandSchema<ReplicaId, string> = Schema.String.pipe(
  Schema.fromBrand(ReplicaId)
)

// =============================================================================
// Config
// =============================================================================

/**
 * Replica ID read from the `REPLICA_ID` configuration entry.
 *
 * Resolved by the current `ConfigProvider` (environment variables unless
 * another provider is installed). Empty values are rejected.
 *
 * @since 0.1.0
 * @category config
 */
export const ReplicaIdConfig: Config.Config<ReplicaId> = Config.string("REPLICA_ID").pipe(
  Config.validate({
    message: "Expected a non-empty replica ID",
    validation: (value: string) => value.length > 0
  }),
  Config.map(ReplicaId)
)
