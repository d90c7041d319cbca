export {
  EnvConfigError,
  enumVar,
  loadEnvConfig,
  stringVar,
  type EnumVarOptions,
  type EnvSource,
  type LoadEnvConfigOptions,
  type StringVarOptions
} from './envConfig';
export { LOG_LEVELS, createLogger, createLoggerOptions, createSilentLogger, type LogLevel, type Logger } from './logger';
