import { Option, Schema } from "effect";

import type { ValidationFault } from "./errors";

/** Shape of `config.yaml`. Keys are snake_case on disk. */
export const ConfigFileSchema = Schema.Struct({
  projects_directory: Schema.String,
  editor_command: Schema.String,
});

export type ConfigFile = typeof ConfigFileSchema.Type;

/**
 * A configuration that passed validation when it was loaded or saved.
 *
 * Instances are immutable; a changed configuration is a new record.
 */
export class ConfigurationRecord extends Schema.Class<ConfigurationRecord>("ConfigurationRecord")({
  projectsDirectory: Schema.String.pipe(Schema.nonEmptyString()),
  editorCommand: Schema.String.pipe(Schema.nonEmptyString()),
}) {
  toFile(): ConfigFile {
    return {
      projects_directory: this.projectsDirectory,
      editor_command: this.editorCommand,
    };
  }
}

export const SetupReasonSchema = Schema.Literal("missing_file", "incomplete_data");

export type SetupReason = typeof SetupReasonSchema.Type;

export interface LoadReady {
  readonly status: "ready";
  readonly config: ConfigurationRecord;
}

export interface LoadNeedsSetup {
  readonly status: "needs_setup";
  readonly reason: SetupReason;
  readonly fault: Option.Option<ValidationFault>;
}

export type LoadOutcome = LoadReady | LoadNeedsSetup;

export const ready = (config: ConfigurationRecord): LoadReady => ({
  status: "ready",
  config,
});

export const needsSetup = (
  reason: SetupReason,
  fault: Option.Option<ValidationFault> = Option.none(),
): LoadNeedsSetup => ({
  status: "needs_setup",
  reason,
  fault,
});
