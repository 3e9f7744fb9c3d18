export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function resolveLogLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' || raw === 'silent') {
    return raw;
  }
  return 'warn';
}

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
}

/**
 * Console logger with a `[component]` prefix. LOG_LEVEL is read on every
 * call so tests and hosts can change it at run time.
 */
export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  const enabled = (lvl: LogLevel) => LEVEL_ORDER[lvl] >= LEVEL_ORDER[resolveLogLevel()];

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.info(`${prefix} ${message}`, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...args);
    },
  };
}
