export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggingConfig {
  enabled?: boolean;
  level?: LogLevel;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const noop = (): void => {};

/**
 * Console logger that drops messages below the configured level. Disabled
 * unless `enabled` is set.
 */
export function createLogger(config: LoggingConfig = {}, prefix = '[QCS]'): Logger {
  const threshold = LEVELS.indexOf(config.level ?? 'info');
  const shouldLog = (target: LogLevel): boolean =>
    config.enabled === true && LEVELS.indexOf(target) >= threshold;

  return {
    debug: shouldLog('debug') ? (message, ...args) => console.debug(prefix, message, ...args) : noop,
    info: shouldLog('info') ? (message, ...args) => console.info(prefix, message, ...args) : noop,
    warn: shouldLog('warn') ? (message, ...args) => console.warn(prefix, message, ...args) : noop,
    error: shouldLog('error') ? (message, ...args) => console.error(prefix, message, ...args) : noop,
  };
}
