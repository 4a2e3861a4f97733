import { FileSystem, Path, PlatformLogger } from "@effect/platform";
import { Config, Console, Effect, Layer, Logger, LogLevel } from "effect";

export const LogLevelConfig = Config.logLevel("CRATEYARD_LOG_LEVEL").pipe(
  Config.withDefault(LogLevel.Info),
);

const fileLogger = (logFilePath: string) =>
  Layer.unwrapScoped(
    Effect.gen(function* () {
      const fileSystem = yield* FileSystem.FileSystem;
      const pathService = yield* Path.Path;

      yield* fileSystem.makeDirectory(pathService.dirname(logFilePath), { recursive: true });
      const logger = yield* PlatformLogger.toFile(Logger.logfmtLogger, logFilePath, { flag: "a" });

      return Logger.replace(Logger.defaultLogger, logger);
    }),
  );

/**
 * Sends log output to `logFilePath` in logfmt, at the level named by `CRATEYARD_LOG_LEVEL`.
 *
 * Logging is never fatal: when the file cannot be opened the layer prints one warning
 * to stderr and runs without a logger.
 */
export const LoggingLive = (
  logFilePath: string,
): Layer.Layer<never, never, FileSystem.FileSystem | Path.Path> =>
  Layer.unwrapEffect(
    Effect.map(LogLevelConfig, (level) =>
      Layer.merge(fileLogger(logFilePath), Logger.minimumLogLevel(level)),
    ),
  ).pipe(
    Layer.catchAll((error) =>
      Layer.merge(
        Layer.effectDiscard(Console.error(`Failed to initialize logging: ${String(error)}`)),
        Logger.remove(Logger.defaultLogger),
      ),
    ),
  );
