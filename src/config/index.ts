// Schema and types
export {
  ParserOptionsSchema,
  LoggingConfigSchema,
  type ParserOptions,
  type ParserOptionsInput,
  type LoggingConfig,
  type LoggingConfigInput,
} from './schema.js'

// Defaults
export { getDefaults, getLoggingDefaults } from './defaults.js'
export { resolveOptions } from './options.js'

// Environment
export {
  applyEnv,
  resolveEnvPrefix,
  prefixFromProgramName,
  NO_PREFIX,
  type EnvSource,
} from './env.js'
