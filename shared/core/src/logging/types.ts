/**
 * Logger Type Definitions
 *
 * ILogger decouples the codebase from the logging library. Production code
 * receives a Pino-backed logger; tests inject RecordingLogger or NullLogger.
 */

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Metadata attached to a log entry. BigInt values are serialized as strings.
 */
export type LogMeta = Record<string, unknown>;

/**
 * Core logger interface. The ONLY type used for logger parameters in
 * constructors and dependency bags.
 *
 * @example
 * ```typescript
 * class NonceAllocator {
 *   constructor(private readonly logger: ILogger) {}
 * }
 *
 * new NonceAllocator(createLogger('nonce-allocator'));   // production
 * new NonceAllocator(new RecordingLogger());             // test
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
   * const log = logger.child({ chainId: '1', requestId: 'abc' });
   * log.info('Reserved nonce'); // { chainId: '1', requestId: 'abc', msg: ... }
   * ```
   */
  child(bindings: LogMeta): ILogger;

  isLevelEnabled?(level: LogLevel): boolean;
}

export interface LoggerConfig {
  /** Service/module name, included as `service` on every entry */
  name: string;
  /** @default process.env.LOG_LEVEL or 'info' */
  level?: LogLevel;
  /** @default NODE_ENV === 'development' and LOG_FORMAT !== 'json' */
  pretty?: boolean;
  bindings?: LogMeta;
}
