export {
  LOG_LEVELS,
  LOG_FORMATS,
  DEFAULT_LOGGER_CONFIG,
  createLogger,
  BufferLogger,
  NULL_LOGGER,
  type LogLevel,
  type LogFormat,
  type LoggerConfig,
  type Logger,
  type LogEntry,
} from "./logger.ts";
