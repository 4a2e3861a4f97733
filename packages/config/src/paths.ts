import * as nodePath from "node:path";
import { homedir } from "node:os";

export const APP_DIRECTORY_NAME = "crateyard";
export const CONFIG_FILE_NAME = "config.yaml";
export const TEMP_FILE_SUFFIX = ".tmp";

export interface ConfigEnvironment {
  readonly platform: NodeJS.Platform;
  readonly homeDirectory: string;
  readonly env: Readonly<Record<string, string | undefined>>;
}

export const currentEnvironment = (): ConfigEnvironment => ({
  platform: process.platform,
  homeDirectory: homedir(),
  env: process.env,
});

const pathFor = (platform: NodeJS.Platform): nodePath.PlatformPath =>
  platform === "win32" ? nodePath.win32 : nodePath.posix;

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value.trim() !== "" ? value : undefined;

/**
 * Per-user configuration base directory, following each platform's convention:
 * XDG on Linux and other Unixes, Application Support on macOS, roaming AppData on Windows.
 */
export const resolveConfigDirectory = (environment: ConfigEnvironment): string => {
  const path = pathFor(environment.platform);
  const fallback = path.join(environment.homeDirectory, ".config");

  switch (environment.platform) {
    case "darwin":
      return path.join(environment.homeDirectory, "Library", "Application Support");
    case "win32":
      return nonEmpty(environment.env.APPDATA) ?? fallback;
    default: {
      const xdgConfigHome = nonEmpty(environment.env.XDG_CONFIG_HOME);
      // Relative XDG values are invalid per the XDG base directory rules.
      return xdgConfigHome !== undefined && path.isAbsolute(xdgConfigHome)
        ? xdgConfigHome
        : fallback;
    }
  }
};

export const resolveAppDirectory = (environment: ConfigEnvironment): string =>
  pathFor(environment.platform).join(resolveConfigDirectory(environment), APP_DIRECTORY_NAME);

export const resolveConfigFilePath = (environment: ConfigEnvironment): string =>
  pathFor(environment.platform).join(resolveAppDirectory(environment), CONFIG_FILE_NAME);

export const tempFilePathFor = (configFilePath: string): string =>
  `${configFilePath}${TEMP_FILE_SUFFIX}`;
