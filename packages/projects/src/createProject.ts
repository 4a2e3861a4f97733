import { validateProjectsDirectory, type ConfigurationRecord } from "@crateyard/config";
import { FileSystem, Path } from "@effect/platform";
import { Effect, Schema } from "effect";

import {
  CargoFailed,
  CargoNotFound,
  InvalidProjectName,
  OpenAfterCreateFailed,
  ProjectAlreadyExists,
  ProjectsDirectoryInvalid,
  type CreateProjectError,
} from "./errors";
import { openInEditor } from "./openInEditor";
import { ProcessRunner } from "./ProcessRunner";

export const ProjectTypeSchema = Schema.Literal("bin", "lib");
export type ProjectType = typeof ProjectTypeSchema.Type;

export const EditionSchema = Schema.Literal("2015", "2018", "2021", "2024");
export type Edition = typeof EditionSchema.Type;

export interface CreateProjectParams {
  readonly name: string;
  readonly projectType: ProjectType;
  readonly edition: Edition;
}

export const DEFAULT_PROJECT_TYPE: ProjectType = "bin";
export const DEFAULT_EDITION: Edition = "2024";

export const makeCreateProjectParams = (
  name: string,
  overrides: Partial<Omit<CreateProjectParams, "name">> = {},
): CreateProjectParams => ({
  name,
  projectType: overrides.projectType ?? DEFAULT_PROJECT_TYPE,
  edition: overrides.edition ?? DEFAULT_EDITION,
});

export interface CreatedProject {
  readonly name: string;
  readonly path: string;
  readonly projectType: ProjectType;
  readonly edition: Edition;
}

const ASCII_LETTER = /^[A-Za-z]$/;
const NAME_CHARACTERS = /^[A-Za-z0-9_-]+$/;
const WHITESPACE = /\s/;

export const validateProjectName = (name: string): Effect.Effect<void, InvalidProjectName> => {
  const reject = (reason: string) => Effect.fail(new InvalidProjectName({ name, reason }));

  if (name.trim() === "") {
    return reject("name cannot be blank");
  }
  if (WHITESPACE.test(name)) {
    return reject("name cannot contain whitespace");
  }
  if (!ASCII_LETTER.test(name.charAt(0))) {
    return reject("name must start with an ASCII letter");
  }
  if (!NAME_CHARACTERS.test(name)) {
    return reject("name can only contain ASCII letters, digits, '_' or '-'");
  }

  return Effect.void;
};

// New repositories should start on `main` whatever git's own default is.
const setDefaultBranch: Effect.Effect<void, never, ProcessRunner> = Effect.gen(function* () {
  const runner = yield* ProcessRunner;

  yield* runner.run("git", ["config", "--global", "init.defaultBranch", "main"]).pipe(
    Effect.flatMap((output) =>
      output.exitCode === 0
        ? Effect.void
        : Effect.logWarning("Unable to set git's default branch", {
            exitCode: output.exitCode,
            stderr: output.stderr.trim(),
          }),
    ),
    Effect.catchAll((error) =>
      Effect.logWarning("Unable to set git's default branch", { error: error._tag }),
    ),
  );
});

export const createProject = (
  config: ConfigurationRecord,
  params: CreateProjectParams,
): Effect.Effect<CreatedProject, CreateProjectError, FileSystem.FileSystem | Path.Path | ProcessRunner> =>
  Effect.gen(function* () {
    yield* validateProjectName(params.name);
    yield* validateProjectsDirectory(config.projectsDirectory).pipe(
      Effect.mapError((fault) => new ProjectsDirectoryInvalid({ fault })),
    );

    const fileSystem = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    const runner = yield* ProcessRunner;

    const projectPath = pathService.join(config.projectsDirectory, params.name);
    const taken = yield* fileSystem.exists(projectPath).pipe(Effect.orElseSucceed(() => false));

    if (taken) {
      return yield* new ProjectAlreadyExists({ path: projectPath });
    }

    yield* setDefaultBranch;

    yield* Effect.logInfo("Creating project", {
      path: projectPath,
      projectType: params.projectType,
      edition: params.edition,
    });

    const output = yield* runner
      .run("cargo", ["new", `--${params.projectType}`, "--edition", params.edition, projectPath])
      .pipe(
        Effect.catchTags({
          ProcessNotFound: () => Effect.fail(new CargoNotFound()),
          ProcessSpawnFailed: (error) =>
            Effect.fail(new CargoFailed({ exitCode: -1, stderr: error.message })),
        }),
      );

    if (output.exitCode !== 0) {
      return yield* new CargoFailed({ exitCode: output.exitCode, stderr: output.stderr.trim() });
    }

    yield* Effect.logInfo("Project created", { path: projectPath });

    return {
      name: params.name,
      path: projectPath,
      projectType: params.projectType,
      edition: params.edition,
    };
  });

/** Creates the project, then opens it in the configured editor when `open` is set. */
export const createAndOpen = (
  config: ConfigurationRecord,
  params: CreateProjectParams,
  open: boolean,
): Effect.Effect<
  CreatedProject,
  CreateProjectError | OpenAfterCreateFailed,
  FileSystem.FileSystem | Path.Path | ProcessRunner
> =>
  Effect.gen(function* () {
    const project = yield* createProject(config, params);

    if (open) {
      yield* openInEditor(config.editorCommand, project.path).pipe(
        Effect.mapError((cause) => new OpenAfterCreateFailed({ projectPath: project.path, cause })),
      );
    }

    return project;
  });
