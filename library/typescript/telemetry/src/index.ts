export {
  createLogger,
  componentLogger,
  traceFields,
  REDACTED_PATHS,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  type LogFormat,
} from './logger.js';
