import { HttpApiBuilder, HttpApiSwagger, HttpMiddleware, HttpServer } from "@effect/platform"
import { NodeHttpServer } from "@effect/platform-node"
import { Effect, Layer } from "effect"
import { createServer } from "node:http"
import { Api } from "./Api.js"
import { HealthHttp } from "./Health/Http.js"
import { RootHttp } from "./Root/Http.js"
import { ServerConfig } from "./ServerConfig.js"

export const ApiLive = Layer.provide(HttpApiBuilder.api(Api), [
  RootHttp,
  HealthHttp
])

const ServerLive = Effect.gen(function*() {
  const { host, port } = yield* ServerConfig
  return NodeHttpServer.layer(createServer, { host, port })
}).pipe(Layer.unwrapEffect)

// Swagger UI at /docs, the OpenAPI document at /openapi.json and CORS headers
export const DocsLive = Layer.mergeAll(
  HttpApiSwagger.layer(),
  HttpApiBuilder.middlewareOpenApi(),
  HttpApiBuilder.middlewareCors()
)

export const HttpLive = HttpApiBuilder.serve(HttpMiddleware.logger).pipe(
  Layer.provide(DocsLive),
  Layer.provide(ApiLive),
  HttpServer.withLogAddress,
  Layer.provide(ServerLive)
)
