import { CONFIG_FILE_NAME, currentEnvironment, resolveAppDirectory } from "@crateyard/config";
import { Path } from "@effect/platform";
import { Config, type ConfigError, Effect, Option } from "effect";

export const LOG_FILE_NAME = "crateyard.log";

export interface CliPaths {
  readonly configFilePath: string;
  readonly logFilePath: string;
}

/** Overrides the per-user application directory; mostly useful for trying things out. */
export const ConfigDirectoryOverride = Config.option(Config.nonEmptyString("CRATEYARD_CONFIG_DIR"));

export const resolveCliPaths: Effect.Effect<CliPaths, ConfigError.ConfigError, Path.Path> =
  Effect.gen(function* () {
    const pathService = yield* Path.Path;
    const override = yield* ConfigDirectoryOverride;

    const directory = pathService.resolve(
      Option.getOrElse(override, () => resolveAppDirectory(currentEnvironment())),
    );

    return {
      configFilePath: pathService.join(directory, CONFIG_FILE_NAME),
      logFilePath: pathService.join(directory, LOG_FILE_NAME),
    };
  });
