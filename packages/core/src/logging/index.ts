export {
  createLogger,
  defaultLogLevel,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from './logger.js';
