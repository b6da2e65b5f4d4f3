import { Config, Effect, Layer, Logger, LogLevel } from "effect"

// json in containers so CloudWatch keeps one record per line
export const LoggingLive = Effect.gen(function*() {
  const level = yield* Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info))
  const format = yield* Config.literal("logfmt", "json", "pretty")("LOG_FORMAT").pipe(
    Config.withDefault("logfmt" as const)
  )
  const logger = format === "json" ? Logger.json : format === "pretty" ? Logger.pretty : Logger.logFmt
  return Layer.merge(logger, Logger.minimumLogLevel(level))
}).pipe(Layer.unwrapEffect)
