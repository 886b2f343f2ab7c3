/**
 * Scoped console logging.
 *
 * Messages are prefixed with `[scope]`, filtered by level, and routed to the
 * matching console method. Structured data is appended as JSON.
 *
 * @example
 * ```ts
 * const logger = createScopedLogger('codegen', 'debug');
 * logger.info('Companion written', { path: 'src/point.g.js' });
 * // [codegen] Companion written {"path":"src/point.g.js"}
 * ```
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogData = Record<string, unknown>;

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}

/**
 * Lower number = more verbose.
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * Check if a message at `messageLevel` passes the configured threshold.
 */
export function shouldLog(messageLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}

export function formatLogMessage(scope: string, message: string, data?: LogData): string {
  const prefix = `[${scope}]`;
  if (data && Object.keys(data).length > 0) {
    return `${prefix} ${message} ${JSON.stringify(data)}`;
  }
  return `${prefix} ${message}`;
}

/**
 * Create a logger writing to `globalThis.console`.
 *
 * The console is looked up on every call so tests can spy on it after the
 * logger was created.
 *
 * @param scope - Prefix for log messages (e.g. `"codegen"`)
 * @param level - Minimum level to emit
 */
export function createScopedLogger(scope: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  return {
    debug(message, data) {
      if (shouldLog('debug', level)) {
        globalThis.console.debug(formatLogMessage(scope, message, data));
      }
    },
    info(message, data) {
      if (shouldLog('info', level)) {
        globalThis.console.info(formatLogMessage(scope, message, data));
      }
    },
    warn(message, data) {
      if (shouldLog('warn', level)) {
        globalThis.console.warn(formatLogMessage(scope, message, data));
      }
    },
    error(message, data) {
      if (shouldLog('error', level)) {
        globalThis.console.error(formatLogMessage(scope, message, data));
      }
    }
  };
}

/**
 * Logger discarding every message; the default when none is configured.
 */
export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {}
  };
}
