import { Config } from "effect"

export const ServerConfig = Config.all({
  host: Config.string("HOST").pipe(Config.withDefault("0.0.0.0")),
  port: Config.integer("PORT").pipe(
    Config.withDefault(80),
    Config.validate({
      message: "PORT must be between 1 and 65535",
      validation: (port) => port >= 1 && port <= 65535
    })
  )
})
