import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? '').toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

export function createLogger(namespace: string, level: LogLevel = resolveLogLevel(process.env.LOG_LEVEL)): Logger {
  const threshold = LEVEL_ORDER[level];

  const log = (messageLevel: LogLevel, message: string, args: unknown[]) => {
    if (LEVEL_ORDER[messageLevel] < threshold) return;
    const prefix = LEVEL_COLOR[messageLevel](`[${namespace}]`);
    console[messageLevel](`${prefix} ${message}`, ...args);
  };

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
