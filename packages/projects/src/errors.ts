import { ValidationFaultSchema } from "@crateyard/config";
import { Schema } from "effect";

export class ProjectsDirectoryInvalid extends Schema.TaggedError<ProjectsDirectoryInvalid>(
  "@crateyard/projects/ProjectsDirectoryInvalid",
)("ProjectsDirectoryInvalid", {
  fault: ValidationFaultSchema,
}) {}

export class ProjectsListFailed extends Schema.TaggedError<ProjectsListFailed>(
  "@crateyard/projects/ProjectsListFailed",
)("ProjectsListFailed", {
  path: Schema.String,
  message: Schema.String,
}) {}

export const ListProjectsErrorSchema = Schema.Union(ProjectsDirectoryInvalid, ProjectsListFailed);

export type ListProjectsError = typeof ListProjectsErrorSchema.Type;

export class InvalidProjectName extends Schema.TaggedError<InvalidProjectName>(
  "@crateyard/projects/InvalidProjectName",
)("InvalidProjectName", {
  name: Schema.String,
  reason: Schema.String,
}) {}

export class ProjectAlreadyExists extends Schema.TaggedError<ProjectAlreadyExists>(
  "@crateyard/projects/ProjectAlreadyExists",
)("ProjectAlreadyExists", {
  path: Schema.String,
}) {}

export class CargoNotFound extends Schema.TaggedError<CargoNotFound>(
  "@crateyard/projects/CargoNotFound",
)("CargoNotFound", {}) {}

export class CargoFailed extends Schema.TaggedError<CargoFailed>("@crateyard/projects/CargoFailed")(
  "CargoFailed",
  {
    exitCode: Schema.Number,
    stderr: Schema.String,
  },
) {}

export const CreateProjectErrorSchema = Schema.Union(
  InvalidProjectName,
  ProjectsDirectoryInvalid,
  ProjectAlreadyExists,
  CargoNotFound,
  CargoFailed,
);

export type CreateProjectError = typeof CreateProjectErrorSchema.Type;

export class EditorCommandEmpty extends Schema.TaggedError<EditorCommandEmpty>(
  "@crateyard/projects/EditorCommandEmpty",
)("EditorCommandEmpty", {}) {}

export class EditorLaunchFailed extends Schema.TaggedError<EditorLaunchFailed>(
  "@crateyard/projects/EditorLaunchFailed",
)("EditorLaunchFailed", {
  command: Schema.String,
  message: Schema.String,
}) {}

export class EditorExited extends Schema.TaggedError<EditorExited>(
  "@crateyard/projects/EditorExited",
)("EditorExited", {
  command: Schema.String,
  exitCode: Schema.Number,
}) {}

export const OpenEditorErrorSchema = Schema.Union(
  EditorCommandEmpty,
  EditorLaunchFailed,
  EditorExited,
);

export type OpenEditorError = typeof OpenEditorErrorSchema.Type;

export class OpenAfterCreateFailed extends Schema.TaggedError<OpenAfterCreateFailed>(
  "@crateyard/projects/OpenAfterCreateFailed",
)("OpenAfterCreateFailed", {
  projectPath: Schema.String,
  cause: OpenEditorErrorSchema,
}) {}
