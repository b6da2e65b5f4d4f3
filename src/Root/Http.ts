import { HttpApiBuilder } from "@effect/platform"
import { Effect } from "effect"
import { Api } from "../Api.js"
import { RootMessage } from "./Api.js"

export const RootHttp = HttpApiBuilder.group(Api, "root", (handlers) =>
  handlers.handle("root", () => Effect.succeed([RootMessage] as const))
)
