import { Array as Arr, Effect } from "effect";

import {
  EditorCommandEmpty,
  EditorExited,
  EditorLaunchFailed,
  type OpenEditorError,
} from "./errors";
import { ProcessRunner } from "./ProcessRunner";

/** Splits an editor command such as `code --wait` into program and arguments. */
export const splitEditorCommand = (editorCommand: string): ReadonlyArray<string> =>
  editorCommand.trim().split(/\s+/).filter((token) => token !== "");

export const openInEditor = (
  editorCommand: string,
  projectPath: string,
): Effect.Effect<void, OpenEditorError, ProcessRunner> =>
  Effect.gen(function* () {
    const tokens = splitEditorCommand(editorCommand);

    if (!Arr.isNonEmptyReadonlyArray(tokens)) {
      return yield* new EditorCommandEmpty();
    }

    const [program, ...args] = tokens;
    const runner = yield* ProcessRunner;

    yield* Effect.logInfo("Opening project in editor", { program, path: projectPath });

    const output = yield* runner
      .run(program, [...args, projectPath], { interactive: true })
      .pipe(
        Effect.mapError(
          (error) =>
            new EditorLaunchFailed({
              command: program,
              message:
                error._tag === "ProcessNotFound" ? `${program} was not found` : error.message,
            }),
        ),
      );

    if (output.exitCode !== 0) {
      return yield* new EditorExited({ command: program, exitCode: output.exitCode });
    }
  });
