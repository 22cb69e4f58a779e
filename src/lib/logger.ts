/**
 * Console Logging
 *
 * Scoped loggers that print `[scope] message` lines, honouring the
 * logging section of the configuration (level, timestamps, colors).
 */
import chalk, { type ChalkInstance } from 'chalk';
import type { LoggingConfig } from './config.js';

export type LogLevel = LoggingConfig['level'];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLORS: Record<LogLevel, ChalkInstance> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

let settings: LoggingConfig = {
  level: 'info',
  timestamps: true,
  colors: true,
};

/**
 * Apply logging settings to every logger (existing and future)
 */
export function configureLogging(config: LoggingConfig): void {
  settings = { ...config };
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[settings.level];
}

function formatLine(scope: string, level: LogLevel, message: string): string {
  const prefix = `[${scope}]`;
  const stamp = settings.timestamps ? `${new Date().toISOString()} ` : '';

  if (!settings.colors) {
    return `${stamp}${prefix} ${message}`;
  }
  return `${chalk.dim(stamp)}${LEVEL_COLORS[level](prefix)} ${message}`;
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, details: unknown[]): void => {
    if (!isLevelEnabled(level)) return;
    const line = formatLine(scope, level, message);
    switch (level) {
      case 'error':
        console.error(line, ...details);
        break;
      case 'warn':
        console.warn(line, ...details);
        break;
      default:
        console.log(line, ...details);
    }
  };

  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
  };
}
