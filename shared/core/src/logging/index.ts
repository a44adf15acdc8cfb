/**
 * Logging Module
 *
 * Production code uses createLogger()/getLogger() (cached pino loggers).
 * Tests use RecordingLogger or NullLogger.
 */

export type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';

export {
  createLogger,
  createPinoLogger,
  formatLogObject,
  getLogger,
  resetLoggerCache,
} from './pino-logger';

export { RecordingLogger, NullLogger } from './testing-logger';
export type { LogEntry } from './testing-logger';
