import type { LoadFailure, SaveFailure, SetupReason, ValidationFault } from "@crateyard/config";
import type {
  CreateProjectError,
  ListProjectsError,
  OpenAfterCreateFailed,
  OpenEditorError,
  ProjectInfo,
} from "@crateyard/projects";

export const formatValidationFault = (fault: ValidationFault): string => {
  switch (fault._tag) {
    case "EmptyField":
      return `Field '${fault.field}' cannot be empty`;
    case "DirectoryMissing":
      return `Projects directory does not exist: ${fault.path}`;
    case "NotADirectory":
      return `Projects directory is not a directory: ${fault.path}`;
    case "NotReadable":
      return `Projects directory not readable: ${fault.path}`;
    case "NotWritable":
      return `Projects directory not writable: ${fault.path}`;
  }
};

export const formatLoadFailure = (failure: LoadFailure): string => {
  switch (failure._tag) {
    case "ConfigCorrupt":
      return `Configuration file is corrupt: ${failure.message}`;
    case "ConfigReadFailed":
      return `I/O error loading config: ${failure.message}`;
  }
};

export const formatSaveFailure = (failure: SaveFailure): string => {
  switch (failure._tag) {
    case "ConfigValidationFailed":
      return `Validation error: ${formatValidationFault(failure.fault)}`;
    case "ConfigSerializeFailed":
      return `Serialization error: ${failure.message}`;
    case "ConfigWriteFailed":
      return `I/O error saving config: ${failure.message}`;
  }
};

export const formatSetupIntro = (reason: SetupReason): string => {
  switch (reason) {
    case "missing_file":
      return "Welcome! Let's set up crateyard.";
    case "incomplete_data":
      return "Configuration incomplete. Please re-enter required fields.";
  }
};

export const formatCreateProjectError = (error: CreateProjectError): string => {
  switch (error._tag) {
    case "InvalidProjectName":
      return `Invalid project name '${error.name}': ${error.reason}`;
    case "ProjectsDirectoryInvalid":
      return `Projects directory invalid: ${formatValidationFault(error.fault)}`;
    case "ProjectAlreadyExists":
      return `Target directory already exists: ${error.path}`;
    case "CargoNotFound":
      return "Unable to locate `cargo` in PATH";
    case "CargoFailed":
      return `\`cargo new\` failed (exit code ${error.exitCode}): ${error.stderr}`;
  }
};

export const formatOpenEditorError = (error: OpenEditorError): string => {
  switch (error._tag) {
    case "EditorCommandEmpty":
      return "Editor command is empty";
    case "EditorLaunchFailed":
      return `Failed to launch editor: ${error.message}`;
    case "EditorExited":
      return `Editor command exited with status ${error.exitCode}`;
  }
};

export const formatCreateAndOpenError = (
  error: CreateProjectError | OpenAfterCreateFailed,
): string =>
  error._tag === "OpenAfterCreateFailed"
    ? `Project created at ${error.projectPath} but failed to open editor: ${formatOpenEditorError(error.cause)}`
    : `Project creation failed: ${formatCreateProjectError(error)}`;

export const formatListProjectsError = (error: ListProjectsError): string => {
  switch (error._tag) {
    case "ProjectsDirectoryInvalid":
      return `Projects directory invalid: ${formatValidationFault(error.fault)}`;
    case "ProjectsListFailed":
      return `I/O error listing projects: ${error.message}`;
  }
};

/** `*` after the name marks uncommitted changes. */
export const formatProjectLine = (project: ProjectInfo): string =>
  `${project.name}${project.hasUncommittedChanges ? " *" : ""}  ${project.path}`;

export const formatProjectList = (projects: ReadonlyArray<ProjectInfo>): string =>
  projects.length === 0 ? "No Rust projects found." : projects.map(formatProjectLine).join("\n");
