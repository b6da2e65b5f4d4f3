import { HttpApiBuilder } from "@effect/platform"
import { DateTime, Effect } from "effect"
import { Api } from "../Api.js"

export const HealthHttp = HttpApiBuilder.group(Api, "health", (handlers) =>
  handlers.handle("health", () =>
    Effect.map(DateTime.now, (now) => ({
      status: "healthy" as const,
      timestamp: DateTime.formatIso(now),
      uptime: process.uptime()
    }))
  )
)
