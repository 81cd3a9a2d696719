/**
 * Pino Logger Implementation
 *
 * - Singleton caching per service name
 * - BigInt-safe log objects (nonces are numbers, but costs and gas are bigint)
 * - JSON output for production, pino-pretty in development
 * - Redaction of key material, RPC URLs and webhook URLs
 */

import pino, { Logger as PinoLoggerType, LoggerOptions } from 'pino';
import type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';

const loggerCache = new Map<string, ILogger>();

/**
 * Reset all cached loggers. Used by tests and on shutdown.
 */
export function resetLoggerCache(): void {
  loggerCache.clear();
}

const serializers: LoggerOptions['serializers'] = {
  err: pino.stdSerializers.err,
  error: pino.stdSerializers.err,
};

const MAX_FORMAT_DEPTH = 10;

function needsFormatting(value: unknown, seen: WeakSet<object>, depth: number): boolean {
  if (typeof value === 'bigint') return true;
  if (!value || typeof value !== 'object') return false;
  // Can't scan deeper: assume formatting is needed rather than let pino throw on a BigInt
  if (depth >= MAX_FORMAT_DEPTH) return true;
  if (seen.has(value)) return false;
  seen.add(value);

  const children: unknown[] = Array.isArray(value) ? value : Object.values(value);
  return children.some(child => needsFormatting(child, seen, depth + 1));
}

function formatValue(value: unknown, seen: WeakSet<object>, depth: number): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (!value || typeof value !== 'object') {
    return value;
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  if (depth >= MAX_FORMAT_DEPTH) {
    return '[Max Depth]';
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map(item => formatValue(item, seen, depth + 1));
  }
  if (value instanceof Date || value instanceof RegExp || value instanceof Error) {
    return value;
  }

  const formatted: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    formatted[key] = formatValue(val, seen, depth + 1);
  }
  return formatted;
}

/**
 * Convert BigInt values (at any depth) to decimal strings.
 * Returns the input unchanged when it holds no BigInt.
 */
export function formatLogObject(obj: Record<string, unknown>): Record<string, unknown> {
  if (!needsFormatting(obj, new WeakSet<object>(), 0)) {
    return obj;
  }

  const seen = new WeakSet<object>();
  seen.add(obj);
  const formatted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    formatted[key] = formatValue(value, seen, 1);
  }
  return formatted;
}

/**
 * Adapts Pino to ILogger. Pino takes (meta, msg); ILogger takes (msg, meta).
 */
class PinoLoggerWrapper implements ILogger {
  constructor(private readonly pino: PinoLoggerType) {}

  fatal(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.fatal(meta, msg);
    else this.pino.fatal(msg);
  }

  error(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.error(meta, msg);
    else this.pino.error(msg);
  }

  warn(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.warn(meta, msg);
    else this.pino.warn(msg);
  }

  info(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.info(meta, msg);
    else this.pino.info(msg);
  }

  debug(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.debug(meta, msg);
    else this.pino.debug(msg);
  }

  trace(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.trace(meta, msg);
    else this.pino.trace(msg);
  }

  child(bindings: LogMeta): ILogger {
    return new PinoLoggerWrapper(this.pino.child(bindings));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }
}

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

function resolveLevel(level?: LogLevel): LogLevel {
  if (level) return level;
  const fromEnv = process.env.LOG_LEVEL;
  return LOG_LEVELS.find(candidate => candidate === fromEnv) ?? 'info';
}

/**
 * Create (or fetch the cached) Pino logger for a service.
 *
 * @example
 * ```typescript
 * const logger = createLogger('chain-worker');
 * const logger = createLogger({ name: 'chain-worker', level: 'debug', bindings: { chainId: '1' } });
 * ```
 */
export function createLogger(config: string | LoggerConfig): ILogger {
  const { name, level, pretty, bindings }: LoggerConfig =
    typeof config === 'string' ? { name: config } : config;

  const cached = loggerCache.get(name);
  if (cached) {
    return bindings ? cached.child(bindings) : cached;
  }

  const usePretty = pretty ?? (process.env.LOG_FORMAT !== 'json' && process.env.NODE_ENV === 'development');

  const options: LoggerOptions = {
    name,
    level: resolveLevel(level),
    serializers,
    formatters: {
      log: formatLogObject,
      level(label: string) {
        return { level: label };
      },
    },
    base: {
      service: name,
      pid: process.pid,
    },
    redact: {
      paths: [
        'rpcUrl', '*.rpcUrl',
        'webhookUrl', '*.webhookUrl',
        'privateKey', '*.privateKey',
        'secret', '*.secret',
        'token', '*.token',
        'authorization', '*.authorization',
      ],
      censor: '[REDACTED]',
    },
  };

  if (usePretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,service',
      },
    };
  }

  const logger = new PinoLoggerWrapper(pino(options));
  loggerCache.set(name, logger);

  return bindings ? logger.child(bindings) : logger;
}
