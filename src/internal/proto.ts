/**
 * Shared Proto object utilities.
 *
 * Provides the Inspectable and Pipeable protocols for dictionary instances.
 *
 * @since 0.1.0
 * @internal
 */

import { format, NodeInspectSymbol } from "effect/Inspectable"
import { pipeArguments } from "effect/Pipeable"
import type { ReplicaId } from "../CRDT.js"

/**
 * What an instance exposes to inspection.
 * @internal
 */
interface Inspected {
  readonly replicaId: ReplicaId
}

/**
 * Creates common Proto object methods.
 *
 * Inspection shows the type and replica only.
 *
 * @internal
 */
export const makeProtoBase = (typeId: symbol, name: string) => {
  const toJSON = (self: Inspected) => ({ _id: name, replicaId: self.replicaId })
  return {
    [typeId]: typeId,
    toJSON(this: Inspected) {
      return toJSON(this)
    },
    [NodeInspectSymbol](this: Inspected) {
      return toJSON(this)
    },
    toString(this: Inspected) {
      return format(toJSON(this))
    },
    pipe() {
      return pipeArguments(this, arguments)
    }
  }
}

