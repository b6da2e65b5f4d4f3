import { HttpApi, OpenApi } from "@effect/platform"
import { HealthApi } from "./Health/Api.js"
import { RootApi } from "./Root/Api.js"

export class Api extends HttpApi.make("api")
  .add(RootApi)
  .add(HealthApi)
  .annotate(OpenApi.Title, "Backend API")
{}
