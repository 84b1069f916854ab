/**
 * pg-maint - Configuration
 */

export {
  buildConfig,
  CONFIG_PATH_VARIABLE,
  DEFAULT_SETTINGS,
  ENV_VARIABLES,
  fromEnv,
  fromFile,
  fromFlags,
  loadConfigFile,
  mergeSettings,
  resolveConfig,
} from "./resolve.js";
export type { MaintenanceConfig, ResolveSources } from "./resolve.js";
export {
  ConfigFileSchema,
  ScheduleEntrySchema,
  SettingsSchema,
} from "./schema.js";
export type { ConfigFile, ScheduleEntry, Settings } from "./schema.js";
