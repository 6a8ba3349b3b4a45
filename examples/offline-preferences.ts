/**
 * Offline Preferences Demo
 *
 * This demo shows how an LWW-Element-Dictionary keeps user preferences in
 * sync across devices that edit them while offline.
 *
 * Real-world use case: settings screen of an app installed on a phone and a
 * laptop, where each device may change or reset settings without a
 * connection and reconcile later.
 */

import * as Console from "effect/Console"
import * as Effect from "effect/Effect"
import * as Order from "effect/Order"
import * as LWWElementDict from "../src/LWWElementDict.js"
import { syncReplicas } from "../src/Replication.js"
import { ReplicaId } from "../src/CRDT.js"

const printView = (label: string, dict: LWWElementDict.LWWElementDict<string, string, number>) =>
  Effect.gen(function* () {
    const view = yield* LWWElementDict.entries(dict)
    yield* Console.log(`📍 ${label}:`)
    for (const [key, value] of Array.from(view).sort(([a], [b]) => a.localeCompare(b))) {
      yield* Console.log(`   - ${key.padEnd(10)} ${value}`)
    }
    yield* Console.log("")
  })

const program = Effect.gen(function* () {
  yield* Console.log("⚙️  Offline Preferences Demo")
  yield* Console.log("=".repeat(60))
  yield* Console.log("")

  const phone = yield* LWWElementDict.make<string, string, number>(ReplicaId("phone"), Order.number)
  const laptop = yield* LWWElementDict.make<string, string, number>(ReplicaId("laptop"), Order.number)

  // Both devices start from the same settings
  yield* LWWElementDict.add(phone, "theme", "light", 100)
  yield* LWWElementDict.add(phone, "language", "en", 100)
  yield* LWWElementDict.add(phone, "fontSize", "14", 100)
  yield* syncReplicas(phone, laptop)

  yield* Console.log("🔌 Both devices go offline")
  yield* Console.log("")

  // Phone: switches to dark mode, then resets the font size
  yield* LWWElementDict.update(phone, "theme", "dark", 110)
  yield* LWWElementDict.remove(phone, "fontSize", "14", 130)

  // Laptop: changes language, and bumps the font size before the phone's reset
  yield* LWWElementDict.update(laptop, "language", "fr", 120)
  yield* LWWElementDict.update(laptop, "fontSize", "16", 125)

  yield* printView("Phone (offline)", phone)
  yield* printView("Laptop (offline)", laptop)

  yield* Console.log("🌐 Devices reconnect and sync...")
  yield* Console.log("")
  yield* syncReplicas(phone, laptop)

  yield* printView("Phone (synced)", phone)
  yield* printView("Laptop (synced)", laptop)

  const phoneView = Array.from(yield* LWWElementDict.entries(phone)).sort().join(",")
  const laptopView = Array.from(yield* LWWElementDict.entries(laptop)).sort().join(",")

  if (phoneView === laptopView) {
    yield* Console.log("✅ VERIFICATION PASSED: All replicas converged to identical state")
  } else {
    yield* Console.log("❌ VERIFICATION FAILED: Replicas diverged!")
  }
})

Effect.runFork(program)
