import { Config, Effect, Layer, Logger, LogLevel } from "effect"

const readLogLevel = Effect.gen(function* () {
  return yield* Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info))
})

/**
 * Minimum log level from LOG_LEVEL (TRACE, DEBUG, INFO, WARN, ERROR, FATAL, ALL or OFF).
 * An unreadable value is reported and replaced with Info.
 */
export const LoggingLive = Layer.unwrapEffect(
  readLogLevel.pipe(
    Effect.catchAll((error) => Effect.as(Effect.logWarning("Invalid LOG_LEVEL, using Info", error), LogLevel.Info)),
    Effect.map(Logger.minimumLogLevel),
  ),
)
