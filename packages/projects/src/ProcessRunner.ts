import { Command, CommandExecutor } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Context, Effect, Layer, Schema, Stream } from "effect";

export class ProcessNotFound extends Schema.TaggedError<ProcessNotFound>(
  "@crateyard/projects/ProcessNotFound",
)("ProcessNotFound", {
  command: Schema.String,
}) {}

export class ProcessSpawnFailed extends Schema.TaggedError<ProcessSpawnFailed>(
  "@crateyard/projects/ProcessSpawnFailed",
)("ProcessSpawnFailed", {
  command: Schema.String,
  message: Schema.String,
}) {}

export type ProcessError = ProcessNotFound | ProcessSpawnFailed;

export interface RunOptions {
  readonly cwd?: string;
  /** Hand the terminal to the child. Output is not captured. */
  readonly interactive?: boolean;
}

export interface ProcessOutput {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export interface ProcessRunner {
  readonly run: (
    command: string,
    args: ReadonlyArray<string>,
    options?: RunOptions,
  ) => Effect.Effect<ProcessOutput, ProcessError>;
}

export const ProcessRunner = Context.GenericTag<ProcessRunner>("@crateyard/projects/ProcessRunner");

const collectText = <E>(stream: Stream.Stream<Uint8Array, E>): Effect.Effect<string, E> =>
  stream.pipe(
    Stream.decodeText(),
    Stream.runFold("", (text, chunk) => text + chunk),
  );

const toProcessError =
  (command: string) =>
  (error: PlatformError): ProcessError =>
    error._tag === "SystemError" && error.reason === "NotFound"
      ? new ProcessNotFound({ command })
      : new ProcessSpawnFailed({ command, message: error.message });

export const makeProcessRunner: Effect.Effect<
  ProcessRunner,
  never,
  CommandExecutor.CommandExecutor
> = Effect.gen(function* () {
  const executor = yield* CommandExecutor.CommandExecutor;

  const run = (
    command: string,
    args: ReadonlyArray<string>,
    options: RunOptions = {},
  ): Effect.Effect<ProcessOutput, ProcessError> => {
    const base = Command.make(command, ...args);
    const prepared =
      options.cwd === undefined ? base : Command.workingDirectory(base, options.cwd);

    const program: Effect.Effect<ProcessOutput, PlatformError, CommandExecutor.CommandExecutor> =
      options.interactive === true
        ? prepared.pipe(
            Command.stdin("inherit"),
            Command.stdout("inherit"),
            Command.stderr("inherit"),
            Command.exitCode,
            Effect.map((exitCode) => ({ exitCode, stdout: "", stderr: "" })),
          )
        : Effect.scoped(
            Effect.gen(function* () {
              const child = yield* Command.start(prepared);
              const [exitCode, stdout, stderr] = yield* Effect.all(
                [child.exitCode, collectText(child.stdout), collectText(child.stderr)],
                { concurrency: "unbounded" },
              );

              return { exitCode, stdout, stderr };
            }),
          );

    return program.pipe(
      Effect.provideService(CommandExecutor.CommandExecutor, executor),
      Effect.mapError(toProcessError(command)),
    );
  };

  return { run };
});

export const ProcessRunnerLive: Layer.Layer<
  ProcessRunner,
  never,
  CommandExecutor.CommandExecutor
> = Layer.effect(ProcessRunner, makeProcessRunner);
