// @file core/core/logging/Logger.ts

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const noop = (): void => {};

/**
 * 带前缀的控制台日志，低于 level 的输出被丢弃
 */
export function createConsoleLogger(prefix = '[memtree]', level: LogLevel = 'info'): Logger {
  const enabled = (target: LogLevel) => LEVEL_ORDER[target] >= LEVEL_ORDER[level];
  return {
    debug: enabled('debug') ? (msg, ...args) => console.debug(prefix, msg, ...args) : noop,
    info: enabled('info') ? (msg, ...args) => console.info(prefix, msg, ...args) : noop,
    warn: enabled('warn') ? (msg, ...args) => console.warn(prefix, msg, ...args) : noop,
    error: enabled('error') ? (msg, ...args) => console.error(prefix, msg, ...args) : noop
  };
}

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop
};
