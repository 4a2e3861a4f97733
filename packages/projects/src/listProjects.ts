import { validateProjectsDirectory } from "@crateyard/config";
import { FileSystem, Path } from "@effect/platform";
import { Array as Arr, Effect, Option, Order } from "effect";

import { ProjectsDirectoryInvalid, ProjectsListFailed, type ListProjectsError } from "./errors";
import { ProcessRunner } from "./ProcessRunner";

export const MANIFEST_FILE_NAME = "Cargo.toml";

export interface ProjectInfo {
  readonly name: string;
  readonly path: string;
  readonly hasUncommittedChanges: boolean;
}

const byName = Order.mapInput(Order.string, (project: ProjectInfo) => project.name.toLowerCase());

const hasUncommittedChanges = (
  projectPath: string,
): Effect.Effect<boolean, never, FileSystem.FileSystem | Path.Path | ProcessRunner> =>
  Effect.gen(function* () {
    const fileSystem = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    const runner = yield* ProcessRunner;

    const isRepository = yield* fileSystem
      .exists(pathService.join(projectPath, ".git"))
      .pipe(Effect.orElseSucceed(() => false));

    if (!isRepository) {
      return false;
    }

    return yield* runner
      .run("git", ["status", "--porcelain", "--untracked-files=all"], { cwd: projectPath })
      .pipe(
        Effect.flatMap((output) =>
          output.exitCode === 0
            ? Effect.succeed(output.stdout.trim() !== "")
            : Effect.logWarning("git status exited with a non-zero code", {
                path: projectPath,
                exitCode: output.exitCode,
                stderr: output.stderr.trim(),
              }).pipe(Effect.as(false)),
        ),
        Effect.catchAll((error) =>
          Effect.logWarning("Unable to read git status", {
            path: projectPath,
            error: error._tag,
          }).pipe(Effect.as(false)),
        ),
      );
  });

const inspectEntry = (
  projectsDirectory: string,
  entry: string,
): Effect.Effect<
  Option.Option<ProjectInfo>,
  never,
  FileSystem.FileSystem | Path.Path | ProcessRunner
> =>
  Effect.gen(function* () {
    const fileSystem = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    const entryPath = pathService.join(projectsDirectory, entry);

    const info = yield* fileSystem.stat(entryPath).pipe(
      Effect.map(Option.some),
      Effect.catchAll((error) =>
        Effect.logWarning("Skipping unreadable entry", {
          path: entryPath,
          message: error.message,
        }).pipe(Effect.as(Option.none())),
      ),
    );

    if (Option.isNone(info) || info.value.type !== "Directory") {
      return Option.none();
    }

    const isProject = yield* fileSystem
      .stat(pathService.join(entryPath, MANIFEST_FILE_NAME))
      .pipe(
        Effect.map((manifest) => manifest.type === "File"),
        Effect.orElseSucceed(() => false),
      );

    if (!isProject) {
      return Option.none();
    }

    return Option.some({
      name: entry,
      path: entryPath,
      hasUncommittedChanges: yield* hasUncommittedChanges(entryPath),
    });
  });

/**
 * Lists the immediate subdirectories of `projectsDirectory` that hold a `Cargo.toml`,
 * sorted by name without regard to case.
 */
export const listProjects = (
  projectsDirectory: string,
): Effect.Effect<
  ReadonlyArray<ProjectInfo>,
  ListProjectsError,
  FileSystem.FileSystem | Path.Path | ProcessRunner
> =>
  Effect.gen(function* () {
    yield* validateProjectsDirectory(projectsDirectory).pipe(
      Effect.mapError((fault) => new ProjectsDirectoryInvalid({ fault })),
    );

    const fileSystem = yield* FileSystem.FileSystem;
    const entries = yield* fileSystem.readDirectory(projectsDirectory).pipe(
      Effect.mapError(
        (error) => new ProjectsListFailed({ path: projectsDirectory, message: error.message }),
      ),
    );

    const inspected = yield* Effect.forEach(entries, (entry) =>
      inspectEntry(projectsDirectory, entry),
    );
    const projects = Arr.sort(Arr.getSomes(inspected), byName);

    yield* Effect.logInfo("Listed projects", {
      path: projectsDirectory,
      count: projects.length,
    });

    return projects;
  });
