export {
  CargoFailed,
  CargoNotFound,
  CreateProjectErrorSchema,
  EditorCommandEmpty,
  EditorExited,
  EditorLaunchFailed,
  InvalidProjectName,
  ListProjectsErrorSchema,
  OpenAfterCreateFailed,
  OpenEditorErrorSchema,
  ProjectAlreadyExists,
  ProjectsDirectoryInvalid,
  ProjectsListFailed,
  type CreateProjectError,
  type ListProjectsError,
  type OpenEditorError,
} from "./errors";

export {
  ProcessNotFound,
  ProcessRunner,
  ProcessRunnerLive,
  ProcessSpawnFailed,
  makeProcessRunner,
  type ProcessError,
  type ProcessOutput,
  type RunOptions,
} from "./ProcessRunner";

export { MANIFEST_FILE_NAME, listProjects, type ProjectInfo } from "./listProjects";

export {
  DEFAULT_EDITION,
  DEFAULT_PROJECT_TYPE,
  EditionSchema,
  ProjectTypeSchema,
  createAndOpen,
  createProject,
  makeCreateProjectParams,
  validateProjectName,
  type CreateProjectParams,
  type CreatedProject,
  type Edition,
  type ProjectType,
} from "./createProject";

export { openInEditor, splitEditorCommand } from "./openInEditor";
