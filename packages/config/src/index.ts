// Shared configuration: environment defaults for the CLI.

export {
  loadConfig,
  DEFAULT_CONFIG,
  LOG_LEVELS,
  type PanoConfig,
  type LogLevel,
} from './env.js'
