/**
 * Scoped console logger.
 * Every line is prefixed with `[scope]`; debug output is dropped unless LOG_LEVEL allows it.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

const envLevel = process.env.LOG_LEVEL ?? '';
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  child: (scope: string) => Logger;
}

export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (...args) => {
      if (enabled('debug')) console.debug(tag, ...args);
    },
    info: (...args) => {
      if (enabled('info')) console.log(tag, ...args);
    },
    warn: (...args) => {
      if (enabled('warn')) console.warn(tag, ...args);
    },
    error: (...args) => {
      if (enabled('error')) console.error(tag, ...args);
    },
    child: (sub) => createLogger(`${scope}:${sub}`),
  };
}
