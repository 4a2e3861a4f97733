#!/usr/bin/env node
import { ConfigStoreLive } from "@crateyard/config";
import { ProcessRunnerLive } from "@crateyard/projects";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import type { PlatformError } from "@effect/platform/Error";
import { Cause, ConfigError, Console, Effect, Layer, Option } from "effect";

import { LoggingLive } from "./logging";
import { runMainMenu } from "./menu";
import { resolveCliPaths } from "./paths";
import { resolveConfiguration, type StartupFailed } from "./session";

const program = Effect.gen(function* () {
  const config = yield* resolveConfiguration;

  if (Option.isSome(config)) {
    yield* runMainMenu(config.value);
  }
});

const describeFailure = (
  error: StartupFailed | PlatformError | ConfigError.ConfigError,
): string =>
  ConfigError.isConfigError(error) ? `Invalid environment: ${String(error)}` : error.message;

const main = Effect.gen(function* () {
  const paths = yield* resolveCliPaths;

  yield* program.pipe(
    Effect.provide(
      Layer.mergeAll(
        ConfigStoreLive({ configFilePath: paths.configFilePath }),
        ProcessRunnerLive,
        LoggingLive(paths.logFilePath),
      ),
    ),
  );
}).pipe(
  Effect.tapError((error) => Console.error(describeFailure(error))),
  Effect.tapDefect((defect) => Console.error(Cause.pretty(defect))),
  Effect.provide(NodeContext.layer),
);

NodeRuntime.runMain(main, { disableErrorReporting: true });
