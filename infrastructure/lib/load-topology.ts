import { FileSystem } from "@effect/platform"
import { Effect, Schema } from "effect"
import { fileURLToPath } from "node:url"
import { type Topology, type TopologyValidationError, validateTopology } from "./topology.js"

export class TopologyLoadError extends Schema.TaggedError<TopologyLoadError>()(
  "TopologyLoadError",
  {
    path: Schema.String,
    message: Schema.String
  }
) {}

const PresetName = /^[a-z0-9-]+$/

export const topologyPath = (name: string): Effect.Effect<string, TopologyLoadError> =>
  PresetName.test(name)
    ? Effect.succeed(fileURLToPath(new URL(`../topology/${name}.json`, import.meta.url)))
    : Effect.fail(new TopologyLoadError({ path: name, message: `invalid topology preset name "${name}"` }))

const parseJson = (path: string, text: string): Effect.Effect<unknown, TopologyLoadError> =>
  Effect.try({
    try: (): unknown => JSON.parse(text),
    catch: (error) => new TopologyLoadError({ path, message: `invalid JSON: ${String(error)}` })
  })

// Read a preset from infrastructure/topology and validate it
export const loadTopology = (
  name: string
): Effect.Effect<Topology, TopologyLoadError | TopologyValidationError, FileSystem.FileSystem> =>
  Effect.gen(function*() {
    const fs = yield* FileSystem.FileSystem
    const path = yield* topologyPath(name)
    const text = yield* fs.readFileString(path).pipe(
      Effect.mapError((error) => new TopologyLoadError({ path, message: error.message }))
    )
    const topology = yield* parseJson(path, text).pipe(Effect.flatMap(validateTopology))
    yield* Effect.logDebug("Loaded topology").pipe(
      Effect.annotateLogs({ preset: name, stackName: topology.stackName })
    )
    return topology
  })
