import type { ConfigurationRecord } from "@crateyard/config";
import {
  DEFAULT_EDITION,
  DEFAULT_PROJECT_TYPE,
  EditionSchema,
  ProcessRunner,
  ProjectTypeSchema,
  createAndOpen,
  listProjects,
  makeCreateProjectParams,
} from "@crateyard/projects";
import { FileSystem, Path, Terminal } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Effect, Either, Option } from "effect";

import { formatCreateAndOpenError, formatListProjectsError, formatProjectList } from "./format";
import { ask, askChoice, askYesNo, say, type InputClosed } from "./prompt";

export type MenuChoice = "create" | "list" | "quit";

export const MENU_TEXT = ["", "1) Create new project", "2) List projects", "3) Quit"].join("\n");

export const parseMenuChoice = (input: string): Option.Option<MenuChoice> => {
  switch (input.trim().toLowerCase()) {
    case "1":
      return Option.some("create");
    case "2":
      return Option.some("list");
    case "3":
    case "q":
      return Option.some("quit");
    default:
      return Option.none();
  }
};

type MenuServices = FileSystem.FileSystem | Path.Path | ProcessRunner | Terminal.Terminal;

const createFlow = (
  config: ConfigurationRecord,
): Effect.Effect<void, PlatformError | InputClosed, MenuServices> =>
  Effect.gen(function* () {
    const name = (yield* ask("Project name: ")).trim();
    const projectType = yield* askChoice(
      `Project type (bin/lib) [${DEFAULT_PROJECT_TYPE}]: `,
      ProjectTypeSchema,
      DEFAULT_PROJECT_TYPE,
    );
    const edition = yield* askChoice(
      `Rust edition (2015/2018/2021/2024) [${DEFAULT_EDITION}]: `,
      EditionSchema,
      DEFAULT_EDITION,
    );
    const open = yield* askYesNo("Open in editor? [y/N]: ");

    const result = yield* createAndOpen(
      config,
      makeCreateProjectParams(name, { projectType, edition }),
      open,
    ).pipe(Effect.either);

    if (Either.isLeft(result)) {
      yield* Effect.logError("Project creation failed", { error: result.left._tag });
      yield* say(formatCreateAndOpenError(result.left));
      return;
    }

    yield* say(`Project created at: ${result.right.path}`);
  });

const listFlow = (
  config: ConfigurationRecord,
): Effect.Effect<void, PlatformError, MenuServices> =>
  listProjects(config.projectsDirectory).pipe(
    Effect.matchEffect({
      onFailure: (error) => say(formatListProjectsError(error)),
      onSuccess: (projects) => say(formatProjectList(projects)),
    }),
  );

export const runMainMenu = (
  config: ConfigurationRecord,
): Effect.Effect<void, PlatformError, MenuServices> =>
  Effect.gen(function* () {
    while (true) {
      yield* say(MENU_TEXT);
      const choice = parseMenuChoice(yield* ask("> "));

      if (Option.isNone(choice)) {
        yield* say("Unknown choice.");
        continue;
      }

      if (choice.value === "quit") {
        return;
      }

      yield* choice.value === "create" ? createFlow(config) : listFlow(config);
    }
  }).pipe(Effect.catchTag("InputClosed", () => Effect.void));
