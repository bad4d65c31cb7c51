export {
  ConsoleLogger,
  createLogger,
  DEFAULT_LOG_CONFIG,
  LOG_LEVELS,
  NoopLogger,
  type LogConfig,
  type Logger,
  type LogLevel,
} from './logging.js';
