import { ConfigStore, type ConfigurationRecord } from "@crateyard/config";
import { Terminal } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Effect, Option, Schema } from "effect";
import { createActor, waitFor } from "xstate";

import { formatLoadFailure } from "./format";
import { configSessionMachine } from "./machines/configSession";
import { promptForSetup } from "./setup";

export class StartupFailed extends Schema.TaggedError<StartupFailed>(
  "@crateyard/cli/StartupFailed",
)("StartupFailed", {
  message: Schema.String,
}) {}

/**
 * Loads the configuration, running the setup prompts until a valid one is saved.
 *
 * Resolves to `None` when the user quits during setup.
 */
export const resolveConfiguration: Effect.Effect<
  Option.Option<ConfigurationRecord>,
  StartupFailed | PlatformError,
  ConfigStore | Terminal.Terminal
> = Effect.gen(function* () {
  const store = yield* ConfigStore;
  const runtime = yield* Effect.runtime<ConfigStore>();

  const actor = createActor(configSessionMachine, { input: { runtime } });
  actor.start();

  while (true) {
    const snapshot = yield* Effect.promise(() =>
      waitFor(actor, (state) => !state.hasTag("busy")),
    );
    const { config, loadFailure, defect } = snapshot.context;

    if (snapshot.status === "done") {
      if (config !== null) {
        yield* Effect.logInfo("Configuration ready", { path: store.configFilePath });
        return Option.some(config);
      }

      if (loadFailure !== null) {
        yield* Effect.logError("Configuration could not be loaded", {
          path: store.configFilePath,
          failure: loadFailure._tag,
        });
        return yield* new StartupFailed({
          message: `${formatLoadFailure(loadFailure)}\nPlease fix or delete ${store.configFilePath}, then restart.`,
        });
      }

      if (defect !== null) {
        return yield* new StartupFailed({ message: `Unexpected failure: ${defect}` });
      }

      yield* Effect.logInfo("Setup cancelled");
      return Option.none();
    }

    const { saveFailure } = snapshot.context;
    if (Option.isSome(saveFailure)) {
      yield* Effect.logWarning("Failed to save configuration", {
        path: store.configFilePath,
        failure: saveFailure.value._tag,
      });
    }

    const answer = yield* promptForSetup(snapshot.context);

    if (answer._tag === "Quit") {
      actor.send({ type: "QUIT" });
    } else {
      actor.send({ type: "SUBMIT", draft: answer.draft });
    }
  }
});
