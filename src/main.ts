import { NodeRuntime } from "@effect/platform-node"
import { Effect, Layer } from "effect"
import { HttpLive } from "./Http.js"
import { LoggingLive } from "./Logging.js"

NodeRuntime.runMain(
  Layer.launch(HttpLive).pipe(Effect.provide(LoggingLive))
)
