/**
 * Console logger with level gating
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(level: LogLevel): Logger {
  const minimum = LOG_LEVELS.indexOf(level);

  const write = (at: LogLevel, message: string, details: unknown[]): void => {
    if (LOG_LEVELS.indexOf(at) < minimum) return;
    const line = `[${new Date().toISOString()}] ${at.toUpperCase()} ${message}`;
    if (at === 'error') {
      console.error(line, ...details);
    } else if (at === 'warn') {
      console.warn(line, ...details);
    } else {
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

/** Logger that discards everything (tests) */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
