/**
 * Config infrastructure exports.
 */

export {
  ConfigSchema,
  StopConfigSchema,
  OperationSchema,
  JobSchema,
  TimerDictSchema,
  TIME_OF_DAY_PATTERN,
  describeIssue,
  type Config,
  type ConfigInput,
} from "./schema.js";

export {
  loadConfig,
  applyEnvOverrides,
  getDefaultSettingsPath,
  getSettingsCandidates,
  resolveSettingsPath,
} from "./loader.js";
