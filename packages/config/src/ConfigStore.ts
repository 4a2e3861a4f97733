import { FileSystem, Path } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Context, Effect, Either, Layer, Option, ParseResult, Predicate, Schema } from "effect";
import * as yaml from "yaml";

import {
  ConfigCorrupt,
  ConfigReadFailed,
  ConfigSerializeFailed,
  ConfigValidationFailed,
  ConfigWriteFailed,
  type LoadFailure,
  type SaveFailure,
  type ValidationFault,
} from "./errors";
import { tempFilePathFor } from "./paths";
import {
  ConfigFileSchema,
  ConfigurationRecord,
  needsSetup,
  ready,
  type LoadOutcome,
} from "./schema";
import { isMissing, validateConfigurationInput } from "./validate";

export interface ConfigStore {
  readonly configFilePath: string;
  readonly load: () => Effect.Effect<LoadOutcome, LoadFailure>;
  readonly createAndPersist: (
    projectsDirectory: string,
    editorCommand: string,
  ) => Effect.Effect<ConfigurationRecord, SaveFailure>;
  readonly save: (record: ConfigurationRecord) => Effect.Effect<void, SaveFailure>;
}

export const ConfigStore = Context.GenericTag<ConfigStore>("@crateyard/config/ConfigStore");

export interface MakeConfigStoreOptions {
  readonly configFilePath: string;
}

const asMessage = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

const decodeConfigFile = Schema.decodeUnknownEither(ConfigFileSchema, { errors: "all" });
const encodeConfigFile = Schema.encode(ConfigFileSchema);

// A mapping whose only problems are absent keys is incomplete, not corrupt.
const isOnlyMissingKeys = (document: unknown, error: ParseResult.ParseError): boolean => {
  if (!Predicate.isRecord(document)) {
    return false;
  }

  const issues = ParseResult.ArrayFormatter.formatErrorSync(error);
  return issues.length > 0 && issues.every((issue) => issue._tag === "Missing");
};

export const makeConfigStore = ({
  configFilePath,
}: MakeConfigStoreOptions): Effect.Effect<
  ConfigStore,
  never,
  FileSystem.FileSystem | Path.Path
> =>
  Effect.gen(function* () {
    const fileSystem = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    const configDirectory = pathService.dirname(configFilePath);
    const tempFilePath = tempFilePathFor(configFilePath);

    const validate = (
      projectsDirectory: string,
      editorCommand: string,
    ): Effect.Effect<void, ValidationFault> =>
      validateConfigurationInput(projectsDirectory, editorCommand).pipe(
        Effect.provideService(FileSystem.FileSystem, fileSystem),
        Effect.provideService(Path.Path, pathService),
      );

    const toReadFailed = (message: string): ConfigReadFailed =>
      new ConfigReadFailed({ path: configFilePath, message });

    const toCorrupt = (message: string): ConfigCorrupt =>
      new ConfigCorrupt({ path: configFilePath, message });

    const toWriteFailed = (error: PlatformError): ConfigWriteFailed =>
      new ConfigWriteFailed({
        path: configFilePath,
        message: `Unable to persist configuration file: ${error.message}`,
      });

    const readRaw = (): Effect.Effect<Option.Option<string>, ConfigReadFailed> =>
      fileSystem.readFileString(configFilePath, "utf8").pipe(
        Effect.map(Option.some),
        Effect.catchTag("SystemError", (error) =>
          isMissing(error)
            ? Effect.succeed(Option.none())
            : Effect.fail(toReadFailed(`Unable to read configuration file: ${error.message}`)),
        ),
        Effect.catchTag("BadArgument", (error) =>
          Effect.fail(toReadFailed(`Invalid configuration path: ${error.message}`)),
        ),
      );

    const parseDocument = (raw: string): Effect.Effect<unknown, ConfigCorrupt> =>
      Effect.try({
        try: (): unknown => yaml.parse(raw),
        catch: (cause) => toCorrupt(`Configuration file is not valid YAML: ${asMessage(cause)}`),
      }).pipe(
        // Empty and comment-only files parse to null: a mapping with no keys yet.
        Effect.map((document) => (document === null || document === undefined ? {} : document)),
      );

    const load = (): Effect.Effect<LoadOutcome, LoadFailure> =>
      Effect.gen(function* () {
        const raw = yield* readRaw();

        if (Option.isNone(raw)) {
          return needsSetup("missing_file");
        }

        const document = yield* parseDocument(raw.value);
        const decoded = decodeConfigFile(document);

        if (Either.isLeft(decoded)) {
          if (isOnlyMissingKeys(document, decoded.left)) {
            yield* Effect.logInfo("Configuration file is missing required keys", {
              path: configFilePath,
            });
            return needsSetup("incomplete_data");
          }

          return yield* toCorrupt(
            `Configuration file has an unexpected shape: ${ParseResult.TreeFormatter.formatErrorSync(decoded.left)}`,
          );
        }

        const file = decoded.right;
        const validation = yield* validate(file.projects_directory, file.editor_command).pipe(
          Effect.either,
        );

        if (Either.isLeft(validation)) {
          yield* Effect.logWarning("Configuration failed validation; setup required", {
            path: configFilePath,
            fault: validation.left._tag,
          });
          return needsSetup("incomplete_data", Option.some(validation.left));
        }

        return ready(
          new ConfigurationRecord({
            projectsDirectory: file.projects_directory,
            editorCommand: file.editor_command.trim(),
          }),
        );
      });

    const serialize = (record: ConfigurationRecord): Effect.Effect<string, ConfigSerializeFailed> =>
      encodeConfigFile(record.toFile()).pipe(
        Effect.flatMap((encoded) => Effect.try(() => yaml.stringify(encoded))),
        Effect.mapError(
          (error) =>
            new ConfigSerializeFailed({
              path: configFilePath,
              message: `Unable to encode configuration: ${asMessage(error)}`,
            }),
        ),
      );

    const writeAndCommit = (serialized: string): Effect.Effect<void, ConfigWriteFailed> =>
      Effect.gen(function* () {
        yield* fileSystem
          .makeDirectory(configDirectory, { recursive: true })
          .pipe(Effect.mapError(toWriteFailed));

        yield* Effect.scoped(
          Effect.gen(function* () {
            const file = yield* fileSystem
              .open(tempFilePath, { flag: "w" })
              .pipe(Effect.mapError(toWriteFailed));

            yield* file.writeAll(new TextEncoder().encode(serialized)).pipe(
              Effect.mapError(toWriteFailed),
            );
            yield* file.sync.pipe(Effect.mapError(toWriteFailed));
          }),
        );

        // The rename is the only step that makes new content visible under the canonical name.
        yield* fileSystem
          .rename(tempFilePath, configFilePath)
          .pipe(Effect.mapError(toWriteFailed));
      });

    const persist = (
      record: ConfigurationRecord,
    ): Effect.Effect<void, ConfigSerializeFailed | ConfigWriteFailed> =>
      Effect.gen(function* () {
        const serialized = yield* serialize(record);

        yield* writeAndCommit(serialized).pipe(
          Effect.catchAll((error) =>
            fileSystem.remove(tempFilePath, { force: true }).pipe(
              Effect.catchAll(() => Effect.void),
              Effect.zipRight(Effect.fail(error)),
            ),
          ),
        );

        yield* Effect.logInfo("Configuration saved", { path: configFilePath });
      });

    const validateForSave = (
      projectsDirectory: string,
      editorCommand: string,
    ): Effect.Effect<void, ConfigValidationFailed> =>
      validate(projectsDirectory, editorCommand).pipe(
        Effect.mapError((fault) => new ConfigValidationFailed({ fault })),
      );

    return {
      configFilePath,
      load,
      createAndPersist: (projectsDirectory, editorCommand) =>
        Effect.gen(function* () {
          yield* validateForSave(projectsDirectory, editorCommand);

          const record = new ConfigurationRecord({
            projectsDirectory,
            editorCommand: editorCommand.trim(),
          });

          yield* persist(record);
          return record;
        }),
      save: (record) =>
        validateForSave(record.projectsDirectory, record.editorCommand).pipe(
          Effect.zipRight(persist(record)),
        ),
    };
  });

export const ConfigStoreLive = (
  options: MakeConfigStoreOptions,
): Layer.Layer<ConfigStore, never, FileSystem.FileSystem | Path.Path> =>
  Layer.effect(ConfigStore, makeConfigStore(options));
