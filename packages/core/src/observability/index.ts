export {
  SeqLogger,
  createLogger,
  isDebugMode,
  setDebugMode,
  type LogEntry,
  type LogLevel,
  type SeqLoggerConfig,
} from './logger.js';
