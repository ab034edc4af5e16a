export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/** Console logger tagged `[inspector:<channel>]` */
export function createLogger(channel: string): Logger {
  const tag = `[inspector:${channel}]`;
  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(tag, message, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.info(tag, message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(tag, message, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(tag, message, ...args);
    },
  };
}
