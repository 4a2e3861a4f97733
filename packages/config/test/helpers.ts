import * as fs from "node:fs/promises";
import * as path from "node:path";
import { tmpdir } from "node:os";

import { FileSystem, Path } from "@effect/platform";
import { SystemError, type SystemErrorReason } from "@effect/platform/Error";
import { NodeFileSystem, NodePath } from "@effect/platform-node";
import { Effect, Either, Layer } from "effect";

export const NodeServicesLive = Layer.mergeAll(NodeFileSystem.layer, NodePath.layer);

export const makeSystemError = (
  reason: SystemErrorReason,
  method: string,
  pathOrDescriptor: string,
): SystemError =>
  new SystemError({
    reason,
    module: "FileSystem",
    method,
    pathOrDescriptor,
  });

/** The real Node file system with selected operations replaced. */
export const overrideFileSystem = (
  overrides: Partial<FileSystem.FileSystem>,
): Layer.Layer<FileSystem.FileSystem | Path.Path> =>
  Layer.merge(
    Layer.effect(
      FileSystem.FileSystem,
      Effect.map(FileSystem.FileSystem, (fileSystem) => ({ ...fileSystem, ...overrides })),
    ).pipe(Layer.provide(NodeFileSystem.layer)),
    NodePath.layer,
  );

export const runWith =
  (layer: Layer.Layer<FileSystem.FileSystem | Path.Path>) =>
  <A, E>(effect: Effect.Effect<A, E, FileSystem.FileSystem | Path.Path>): Promise<A> =>
    effect.pipe(Effect.provide(layer), Effect.runPromise);

export const runEitherWith =
  (layer: Layer.Layer<FileSystem.FileSystem | Path.Path>) =>
  <A, E>(
    effect: Effect.Effect<A, E, FileSystem.FileSystem | Path.Path>,
  ): Promise<Either.Either<A, E>> =>
    effect.pipe(Effect.either, Effect.provide(layer), Effect.runPromise);

export const run = runWith(NodeServicesLive);
export const runEither = runEitherWith(NodeServicesLive);

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

export const pathExists = async (targetPath: string): Promise<boolean> =>
  fs.access(targetPath).then(
    () => true,
    () => false,
  );

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
