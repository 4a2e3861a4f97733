import * as fs from "node:fs/promises";
import * as path from "node:path";
import { tmpdir } from "node:os";

import { FileSystem, Path } from "@effect/platform";
import { NodeFileSystem, NodePath } from "@effect/platform-node";
import { Effect, Either, Layer } from "effect";

import { ProcessRunner, type ProcessError, type ProcessOutput, type RunOptions } from "../src";

export interface RecordedRun {
  readonly command: string;
  readonly args: ReadonlyArray<string>;
  readonly options: RunOptions;
}

export type RunResponder = (run: RecordedRun) => Effect.Effect<ProcessOutput, ProcessError>;

export const succeedWith = (output: Partial<ProcessOutput> = {}): Effect.Effect<ProcessOutput> =>
  Effect.succeed({ exitCode: 0, stdout: "", stderr: "", ...output });

/** A process runner that records every call and answers from `respond`. */
export const makeFakeRunner = (respond: RunResponder = () => succeedWith()) => {
  const runs: Array<RecordedRun> = [];

  const layer = Layer.succeed(ProcessRunner, {
    run: (command, args, options = {}) => {
      const recorded = { command, args: [...args], options };
      runs.push(recorded);
      return respond(recorded);
    },
  });

  return { runs, layer };
};

export type TestServices = FileSystem.FileSystem | Path.Path | ProcessRunner;

export const runEitherWith =
  (runner: Layer.Layer<ProcessRunner>) =>
  <A, E>(effect: Effect.Effect<A, E, TestServices>): Promise<Either.Either<A, E>> =>
    effect.pipe(
      Effect.either,
      Effect.provide(Layer.mergeAll(NodeFileSystem.layer, NodePath.layer, runner)),
      Effect.runPromise,
    );

export const withTempRoot = async (
  prefix: string,
  body: (rootPath: string) => Promise<void>,
): Promise<void> => {
  const rootPath = await fs.mkdtemp(path.join(tmpdir(), prefix));
  try {
    await body(rootPath);
  } finally {
    await fs.rm(rootPath, { recursive: true, force: true });
  }
};

export const makeCrate = async (rootPath: string, name: string): Promise<string> => {
  const cratePath = path.join(rootPath, name);
  await fs.mkdir(cratePath, { recursive: true });
  await fs.writeFile(path.join(cratePath, "Cargo.toml"), `[package]\nname = "${name}"\n`, "utf8");
  return cratePath;
};

export const leftOf = <A, E>(result: Either.Either<A, E>): E => {
  if (Either.isRight(result)) {
    throw new Error("Expected the effect to fail.");
  }

  return result.left;
};

export const rightOf = <A, E>(result: Either.Either<A, E>): A => {
  if (Either.isLeft(result)) {
    throw new Error(`Expected the effect to succeed, got ${String(result.left)}`);
  }

  return result.right;
};
