import type { SaveFailure, SetupReason, ValidationFault } from "@crateyard/config";
import { Terminal } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Effect, Option } from "effect";

import { formatSaveFailure, formatSetupIntro, formatValidationFault } from "./format";
import type { SetupDraft } from "./machines/configSession";
import { ask, say } from "./prompt";

export const QUIT_COMMAND = ":q";

export type SetupAnswer =
  | { readonly _tag: "Submit"; readonly draft: SetupDraft }
  | { readonly _tag: "Quit" };

export interface SetupPrompt {
  readonly setupReason: SetupReason;
  readonly fault: Option.Option<ValidationFault>;
  readonly saveFailure: Option.Option<SaveFailure>;
  readonly draft: SetupDraft;
}

const quit: SetupAnswer = { _tag: "Quit" };

// A blank answer keeps the previously entered value.
const askField = (
  label: string,
  previous: string,
): Effect.Effect<Option.Option<string>, PlatformError, Terminal.Terminal> =>
  ask(previous === "" ? `${label}: ` : `${label} [${previous}]: `).pipe(
    Effect.map((answer) =>
      answer.trim() === QUIT_COMMAND
        ? Option.none()
        : Option.some(answer.trim() === "" ? previous : answer),
    ),
    Effect.catchTag("InputClosed", () => Effect.succeed(Option.none())),
  );

export const describeSetup = (prompt: SetupPrompt): ReadonlyArray<string> =>
  Option.match(prompt.saveFailure, {
    onSome: (failure) => [
      `Error saving configuration: ${formatSaveFailure(failure)}`,
      "Please adjust and try again.",
    ],
    onNone: () => [
      formatSetupIntro(prompt.setupReason),
      ...Option.toArray(Option.map(prompt.fault, formatValidationFault)),
    ],
  });

export const promptForSetup = (
  prompt: SetupPrompt,
): Effect.Effect<SetupAnswer, PlatformError, Terminal.Terminal> =>
  Effect.gen(function* () {
    for (const line of describeSetup(prompt)) {
      yield* say(line);
    }
    yield* say(`Type ${QUIT_COMMAND} to quit.`);

    const projectsDirectory = yield* askField(
      "Projects directory",
      prompt.draft.projectsDirectory,
    );
    if (Option.isNone(projectsDirectory)) {
      return quit;
    }

    const editorCommand = yield* askField(
      "Editor command (e.g. code, code -n, vim)",
      prompt.draft.editorCommand,
    );
    if (Option.isNone(editorCommand)) {
      return quit;
    }

    const answer: SetupAnswer = {
      _tag: "Submit",
      draft: { projectsDirectory: projectsDirectory.value, editorCommand: editorCommand.value },
    };
    return answer;
  });
