export * from './schemas'
export { loadEnvConfig, ConfigError, DEFAULT_MEMORY_DIR } from './config'
export type { EnvConfig } from './config'
export { createLogger, setLogLevel, getLogLevel, errorMessage } from './logger'
export type { Logger, LogLevel } from './logger'
