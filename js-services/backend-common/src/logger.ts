import winston from 'winston';
import { AsyncLocalStorage } from 'async_hooks';

const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
};

winston.addColors(logColors);

/**
 * JSON stringification that replaces circular references with '[Circular]'
 */
export function safeStringify(obj: unknown, indent?: string | number): string {
  const seen = new WeakSet<object>();

  return JSON.stringify(
    obj,
    (_key, value: unknown) => {
      if (value === null || typeof value !== 'object') {
        return value;
      }

      if (seen.has(value)) {
        return '[Circular]';
      }

      seen.add(value);
      return value;
    },
    indent
  );
}

/**
 * Logger context backed by AsyncLocalStorage.
 *
 * Everything logged inside `LogContext.run()` (including awaited work started
 * from it) carries the context fields, and nested runs inherit and extend the
 * outer context.
 *
 * @example
 * ```typescript
 * await LogContext.run({ runId, operation: 'todo-aggregation' }, async () => {
 *   logger.info('Collecting content'); // includes runId and operation
 *
 *   await LogContext.run({ source: 'email' }, async () => {
 *     logger.info('Collector finished'); // includes runId, operation AND source
 *   });
 * });
 * ```
 */
export class LogContext {
  private static storage = new AsyncLocalStorage<Record<string, unknown>>();

  static run<T>(context: Record<string, unknown>, fn: () => T): T {
    const currentContext = this.storage.getStore() || {};
    const mergedContext = { ...currentContext, ...context };
    return this.storage.run(mergedContext, fn);
  }

  static getContext(): Record<string, unknown> {
    return this.storage.getStore() || {};
  }

  static hasContext(): boolean {
    return this.storage.getStore() !== undefined;
  }
}

const getLogLevel = (): string => {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase() ?? '';
  return envLevel in logLevels ? envLevel : 'info';
};

const isProduction = (): boolean => process.env.NODE_ENV === 'production';

// Human-readable format for local runs
const devFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, context, ...meta }) => {
    let logMessage = `[${String(timestamp)}] ${level}: ${String(message)}`;

    if (context) {
      logMessage += ` [${String(context)}]`;
    }

    const metaStr = Object.keys(meta).length > 0 ? safeStringify(meta, 2) : '';
    if (metaStr) {
      logMessage += `\n${metaStr}`;
    }

    return logMessage;
  })
);

// Structured JSON for log shipping
const prodFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.printf((info) => safeStringify(info))
);

/**
 * Create a logger instance for a specific service
 */
export function createLogger(serviceName: string): winston.Logger {
  return winston.createLogger({
    levels: logLevels,
    level: getLogLevel(),
    format: isProduction() ? prodFormat : devFormat,
    defaultMeta: {
      service: serviceName,
    },
    transports: [
      new winston.transports.Console({
        handleExceptions: true,
        handleRejections: true,
      }),
    ],
    exitOnError: false,
  });
}

/**
 * The subset of a winston logger that ContextAwareLogger writes to
 */
export interface LogSink {
  error(message: string, meta: Record<string, unknown>): void;
  warn(message: string, meta: Record<string, unknown>): void;
  info(message: string, meta: Record<string, unknown>): void;
  debug(message: string, meta: Record<string, unknown>): void;
}

/**
 * Logger that merges the current LogContext with the context passed to each call
 */
export class ContextAwareLogger {
  protected baseLogger: LogSink;

  constructor(baseLogger: LogSink) {
    this.baseLogger = baseLogger;
  }

  private formatMessage(
    message: string,
    additionalContext?: Record<string, unknown>
  ): [string, Record<string, unknown>] {
    const autoContext = LogContext.getContext();
    const meta: Record<string, unknown> = { ...autoContext, ...additionalContext };

    // Short visual tag for local runs
    if (!isProduction()) {
      const contextParts: string[] = [];
      if (meta.runId) contextParts.push(`run:${String(meta.runId)}`);
      if (meta.operation) contextParts.push(`op:${String(meta.operation)}`);
      if (meta.source) contextParts.push(`src:${String(meta.source)}`);

      if (contextParts.length > 0) {
        meta.context = contextParts.join('|');
      }
    }

    return [message, meta];
  }

  error(message: string, error?: unknown, additionalContext?: Record<string, unknown>): void {
    const [msg, meta] = this.formatMessage(message, additionalContext);

    if (error) {
      if (error instanceof Error) {
        meta.error = {
          message: error.message,
          stack: error.stack,
          name: error.name,
        };
      } else {
        meta.error = String(error);
      }
    }

    this.baseLogger.error(msg, meta);
  }

  warn(message: string, additionalContext?: Record<string, unknown>): void {
    const [msg, meta] = this.formatMessage(message, additionalContext);
    this.baseLogger.warn(msg, meta);
  }

  info(message: string, additionalContext?: Record<string, unknown>): void {
    const [msg, meta] = this.formatMessage(message, additionalContext);
    this.baseLogger.info(msg, meta);
  }

  debug(message: string, additionalContext?: Record<string, unknown>): void {
    const [msg, meta] = this.formatMessage(message, additionalContext);
    this.baseLogger.debug(msg, meta);
  }
}

