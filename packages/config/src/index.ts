export {
  ConfigStore,
  ConfigStoreLive,
  makeConfigStore,
  type MakeConfigStoreOptions,
} from "./ConfigStore";

export {
  ConfigFileSchema,
  ConfigurationRecord,
  SetupReasonSchema,
  needsSetup,
  ready,
  type ConfigFile,
  type LoadNeedsSetup,
  type LoadOutcome,
  type LoadReady,
  type SetupReason,
} from "./schema";

export {
  ConfigCorrupt,
  ConfigFieldSchema,
  ConfigReadFailed,
  ConfigSerializeFailed,
  ConfigValidationFailed,
  ConfigWriteFailed,
  DirectoryMissing,
  EmptyField,
  LoadFailureSchema,
  NotADirectory,
  NotReadable,
  NotWritable,
  SaveFailureSchema,
  ValidationFaultSchema,
  type ConfigField,
  type LoadFailure,
  type SaveFailure,
  type ValidationFault,
} from "./errors";

export {
  WRITE_PROBE_FILE,
  isBlank,
  requireNonBlank,
  validateConfigurationInput,
  validateProjectsDirectory,
} from "./validate";

export {
  APP_DIRECTORY_NAME,
  CONFIG_FILE_NAME,
  TEMP_FILE_SUFFIX,
  currentEnvironment,
  resolveAppDirectory,
  resolveConfigDirectory,
  resolveConfigFilePath,
  tempFilePathFor,
  type ConfigEnvironment,
} from "./paths";
