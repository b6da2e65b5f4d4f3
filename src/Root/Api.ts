import { HttpApiEndpoint, HttpApiGroup, OpenApi } from "@effect/platform"
import { Schema } from "effect"

export const RootMessage = "This is the root of the API"

// A one-element JSON array
export const RootResponse = Schema.Tuple(Schema.Literal(RootMessage))

export class RootApi extends HttpApiGroup.make("root")
  .add(
    HttpApiEndpoint.get("root", "/")
      .addSuccess(RootResponse)
      .annotate(
        OpenApi.Summary,
        "API root"
      )
  ) {}
