/**
 * Logger Type Definitions
 *
 * ILogger decouples components from the logging library. Components take an
 * ILogger in their constructor; production wiring passes createLogger(name),
 * tests pass RecordingLogger or NullLogger.
 */

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Metadata attached to a log entry. BigInt values are stringified on output.
 */
export type LogMeta = Record<string, unknown>;

/**
 * Core logger interface.
 *
 * @example
 * ```typescript
 * class SubmissionEngine {
 *   constructor(private readonly logger: ILogger) {}
 * }
 *
 * new SubmissionEngine(createLogger('submission-engine'));
 * new SubmissionEngine(new RecordingLogger());
 * ```
 */
export interface ILogger {
  fatal(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace?(msg: string, meta?: LogMeta): void;

  /**
   * Create a child logger whose entries all carry `bindings`.
   *
   * @example
   * ```typescript
   * const appLogger = logger.child({ applicationId: 'app_123' });
   * appLogger.info('Generation requested'); // { applicationId: 'app_123', msg: 'Generation requested' }
   * ```
   */
  child(bindings: LogMeta): ILogger;

  isLevelEnabled?(level: LogLevel): boolean;
}

export interface LoggerConfig {
  /** Component name, emitted as `service` on every entry */
  name: string;
  /** @default process.env.LOG_LEVEL or 'info' */
  level?: LogLevel;
  /** @default process.env.NODE_ENV === 'development' */
  pretty?: boolean;
  bindings?: LogMeta;
}
