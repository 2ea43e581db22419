// Shared process configuration: log level and environment validation.

export {
  resolveSettings,
  isLogLevel,
  DEFAULT_SETTINGS,
  LOG_LEVELS,
  type Settings,
  type LogLevel,
} from './settings'
