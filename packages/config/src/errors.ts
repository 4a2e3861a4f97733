import { Schema } from "effect";

export const ConfigFieldSchema = Schema.Literal("projects_directory", "editor_command");

export type ConfigField = typeof ConfigFieldSchema.Type;

export class EmptyField extends Schema.TaggedError<EmptyField>("@crateyard/config/EmptyField")(
  "EmptyField",
  {
    field: ConfigFieldSchema,
  },
) {}

export class DirectoryMissing extends Schema.TaggedError<DirectoryMissing>(
  "@crateyard/config/DirectoryMissing",
)("DirectoryMissing", {
  field: ConfigFieldSchema,
  path: Schema.String,
}) {}

export class NotADirectory extends Schema.TaggedError<NotADirectory>(
  "@crateyard/config/NotADirectory",
)("NotADirectory", {
  field: ConfigFieldSchema,
  path: Schema.String,
}) {}

export class NotReadable extends Schema.TaggedError<NotReadable>("@crateyard/config/NotReadable")(
  "NotReadable",
  {
    field: ConfigFieldSchema,
    path: Schema.String,
    message: Schema.String,
  },
) {}

export class NotWritable extends Schema.TaggedError<NotWritable>("@crateyard/config/NotWritable")(
  "NotWritable",
  {
    field: ConfigFieldSchema,
    path: Schema.String,
    message: Schema.String,
  },
) {}

export const ValidationFaultSchema = Schema.Union(
  EmptyField,
  DirectoryMissing,
  NotADirectory,
  NotReadable,
  NotWritable,
);

export type ValidationFault = typeof ValidationFaultSchema.Type;

export class ConfigCorrupt extends Schema.TaggedError<ConfigCorrupt>(
  "@crateyard/config/ConfigCorrupt",
)("ConfigCorrupt", {
  path: Schema.String,
  message: Schema.String,
}) {}

export class ConfigReadFailed extends Schema.TaggedError<ConfigReadFailed>(
  "@crateyard/config/ConfigReadFailed",
)("ConfigReadFailed", {
  path: Schema.String,
  message: Schema.String,
}) {}

export const LoadFailureSchema = Schema.Union(ConfigCorrupt, ConfigReadFailed);

export type LoadFailure = typeof LoadFailureSchema.Type;

export class ConfigValidationFailed extends Schema.TaggedError<ConfigValidationFailed>(
  "@crateyard/config/ConfigValidationFailed",
)("ConfigValidationFailed", {
  fault: ValidationFaultSchema,
}) {}

export class ConfigSerializeFailed extends Schema.TaggedError<ConfigSerializeFailed>(
  "@crateyard/config/ConfigSerializeFailed",
)("ConfigSerializeFailed", {
  path: Schema.String,
  message: Schema.String,
}) {}

export class ConfigWriteFailed extends Schema.TaggedError<ConfigWriteFailed>(
  "@crateyard/config/ConfigWriteFailed",
)("ConfigWriteFailed", {
  path: Schema.String,
  message: Schema.String,
}) {}

export const SaveFailureSchema = Schema.Union(
  ConfigValidationFailed,
  ConfigSerializeFailed,
  ConfigWriteFailed,
);

export type SaveFailure = typeof SaveFailureSchema.Type;
