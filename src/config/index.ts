// Engine settings
export {
  loadSettings,
  readSettings,
  EngineSettingsSchema,
  LogLevelSchema,
  type EngineSettings,
  type IgnoredSetting,
  type LogLevel,
} from './settings.js'

// Paths
export {
  getAppDir,
  posixAppName,
  defaultSearchPattern,
  type AppDirOptions,
} from './paths.js'

// Environment
export {
  parseValue,
  cleanEnvVarId,
  mergeEnvVarIds,
  autoEnvVarId,
  paramEnvVarIds,
  collectEnvValues,
  type EnvMapping,
} from './env.js'

// Merge utilities
export {
  setPath,
  getPath,
  isPlainObject,
  type PlainObject,
} from './merge.js'
