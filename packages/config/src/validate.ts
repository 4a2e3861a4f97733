import { FileSystem, Path } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Effect } from "effect";

import {
  DirectoryMissing,
  EmptyField,
  NotADirectory,
  NotReadable,
  NotWritable,
  type ConfigField,
  type ValidationFault,
} from "./errors";

/** Reserved name: an existing file with this name in the projects directory is overwritten and removed. */
export const WRITE_PROBE_FILE = ".crateyard-write-probe";

const FIELD: ConfigField = "projects_directory";

export const isBlank = (value: string): boolean => value.trim() === "";

export const requireNonBlank = (
  field: ConfigField,
  value: string,
): Effect.Effect<void, EmptyField> =>
  isBlank(value) ? Effect.fail(new EmptyField({ field })) : Effect.void;

export const isMissing = (error: PlatformError): boolean =>
  error._tag === "SystemError" &&
  // BadResource covers ENOTDIR: a parent component is a regular file.
  (error.reason === "NotFound" || error.reason === "BadResource");

const mapStatError = (path: string, error: PlatformError): DirectoryMissing | NotReadable =>
  isMissing(error)
    ? new DirectoryMissing({ field: FIELD, path })
    : new NotReadable({ field: FIELD, path, message: error.message });

/**
 * Checks that `path` names a directory that exists, can be listed and accepts new files.
 *
 * Checks run in a fixed order and the first failing one is reported.
 * Only the probe file is ever written, and it is removed straight away.
 */
export const validateProjectsDirectory = (
  path: string,
): Effect.Effect<void, ValidationFault, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    yield* requireNonBlank(FIELD, path);

    const fileSystem = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    const info = yield* fileSystem
      .stat(path)
      .pipe(Effect.mapError((error) => mapStatError(path, error)));

    if (info.type !== "Directory") {
      return yield* new NotADirectory({ field: FIELD, path });
    }

    yield* fileSystem
      .readDirectory(path)
      .pipe(
        Effect.mapError(
          (error) => new NotReadable({ field: FIELD, path, message: error.message }),
        ),
      );

    const probePath = pathService.join(path, WRITE_PROBE_FILE);

    yield* fileSystem
      .writeFile(probePath, new Uint8Array())
      .pipe(
        Effect.mapError(
          (error) => new NotWritable({ field: FIELD, path, message: error.message }),
        ),
      );

    yield* fileSystem.remove(probePath).pipe(Effect.ignore);
  });

/** The one rule set shared by loading and saving. */
export const validateConfigurationInput = (
  projectsDirectory: string,
  editorCommand: string,
): Effect.Effect<void, ValidationFault, FileSystem.FileSystem | Path.Path> =>
  requireNonBlank("editor_command", editorCommand).pipe(
    Effect.zipRight(validateProjectsDirectory(projectsDirectory)),
  );
